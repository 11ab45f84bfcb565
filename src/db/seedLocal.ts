/**
 * Seed the local SQLite mirror with a known set of duplicates
 *
 * Handy for trying the dedup CLI with DEDUP_STORE=sqlite:
 *   npm run build && node dist/db/seedLocal.js
 *   DEDUP_STORE=sqlite node dist/dedupMain.js --cleanup
 */

import type Database from "better-sqlite3";
import { openDb, closeDb } from "./connection";
import { applyPendingMigrations } from "./migrate";
import * as logger from "@/logger";

/**
 * Insert sample rows: every layer gets one duplicated key and one unique key
 *
 * @returns Rows inserted per table
 */
export function seedLocalDuplicates(
  db: Database.Database,
): Record<"landing" | "staging" | "skills", number> {
  const insertLanding = db.prepare(
    "INSERT INTO landing_raw_jobs (source_name, job_id, payload) VALUES (?, ?, ?)",
  );
  const insertStaging = db.prepare(
    "INSERT INTO staging_jobs_v1 (source_name, job_id, job_title) VALUES (?, ?, ?)",
  );
  const insertSkill = db.prepare(
    "INSERT INTO staging_job_skills (source_name, job_id, skill) VALUES (?, ?, ?)",
  );

  const landing: [string, string, string][] = [
    ["reed", "50001", '{"title":"Data Engineer"}'],
    ["reed", "50001", '{"title":"Data Engineer"}'],
    ["reed", "50001", '{"title":"Senior Data Engineer"}'],
    ["reed", "50002", '{"title":"Analytics Engineer"}'],
  ];
  const staging: [string, string, string][] = [
    ["reed", "50001", "Data Engineer"],
    ["reed", "50001", "Senior Data Engineer"],
    ["reed", "50002", "Analytics Engineer"],
  ];
  const skills: [string, string, string][] = [
    ["reed", "50001", "sql"],
    ["reed", "50001", "sql"],
    ["reed", "50001", "python"],
    ["reed", "50002", "dbt"],
  ];

  db.transaction(() => {
    for (const row of landing) insertLanding.run(...row);
    for (const row of staging) insertStaging.run(...row);
    for (const row of skills) insertSkill.run(...row);
  })();

  return {
    landing: landing.length,
    staging: staging.length,
    skills: skills.length,
  };
}

/**
 * CLI entrypoint
 */
if (require.main === module) {
  const db = openDb();
  try {
    applyPendingMigrations(db);
    const inserted = seedLocalDuplicates(db);
    logger.info("Seeded local mirror", inserted);
  } finally {
    closeDb();
  }
}
