/**
 * Record store factory: opens the store described by a StoreConfig
 */

import type { RecordStore, StoreConfig, StoreResult } from "@/types";
import { openDb, closeDb } from "./connection";
import { applyPendingMigrations } from "./migrate";
import { connectPg } from "./pgClient";
import { PgRecordStore } from "./stores/pgRecordStore";
import { SqliteRecordStore } from "./stores/sqliteRecordStore";
import { toStoreFailure } from "@/utils";

export async function openRecordStore(
  config: StoreConfig,
): Promise<StoreResult<RecordStore>> {
  if (config.driver === "postgres") {
    const connected = await connectPg(config);
    if (!connected.ok) {
      return connected;
    }
    return { ok: true, value: new PgRecordStore(connected.value) };
  }

  try {
    const db = openDb(config.dbPath);
    // The mirror creates its own tables; PostgreSQL tables belong to ingestion
    applyPendingMigrations(db);
    return { ok: true, value: new SqliteRecordStore(db, closeDb) };
  } catch (err) {
    return { ok: false, failure: toStoreFailure(err, "CONNECTION") };
  }
}
