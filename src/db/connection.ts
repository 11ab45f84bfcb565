/**
 * Local SQLite mirror connection
 *
 * One handle per process. The mirror holds the three pipeline tables under
 * `schema_table` names and is used for local runs and tests.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

const MEMORY_DB = ":memory:";

let mirror: Database.Database | null = null;

export function defaultDbPath(): string {
  return join(process.cwd(), "data", "pipeline-mirror.db");
}

/**
 * Open the mirror, creating its directory on first use
 *
 * Falls back to DB_PATH, then to defaultDbPath(). Repeated calls return the
 * handle already open, whatever path they pass.
 */
export function openDb(dbPath?: string): Database.Database {
  if (mirror) {
    return mirror;
  }

  const file = dbPath || process.env.DB_PATH || defaultDbPath();
  if (file !== MEMORY_DB) {
    mkdirSync(dirname(file), { recursive: true });
  }

  mirror = new Database(file);
  mirror.pragma("journal_mode = WAL");
  return mirror;
}

export function closeDb(): void {
  if (!mirror) {
    return;
  }
  mirror.close();
  mirror = null;
}
