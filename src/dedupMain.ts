#!/usr/bin/env node
/**
 * Dedup CLI entrypoint: duplicate detection and optional cleanup
 *
 * Checks landing.raw_jobs, staging.jobs_v1 and staging.job_skills for rows
 * sharing a natural key. With --cleanup, and after an interactive "yes",
 * keeps the most recent physical row of each key and removes the rest.
 *
 * Usage:
 *   npm run build && node dist/dedupMain.js            # detection only
 *   npm run build && node dist/dedupMain.js --cleanup  # detect + clean
 *
 * Configuration (environment, .env, then local.settings.json "Values"):
 *   - DEDUP_STORE: postgres (default) or sqlite
 *   - PGHOST, PGPORT, PGDATABASE, PGUSER, PGPASSWORD: required for postgres
 *   - PGSSLMODE: optional, defaults to require
 *   - DB_PATH: SQLite file for the local mirror (defaults to data/pipeline-mirror.db)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *
 * Exit codes: 0 on success (including "no duplicates" and a declined
 * cleanup), 1 on any error.
 */

import "dotenv/config";
import { parseCliArgs, promptConfirmation, USAGE } from "./cli";
import { createCliConfigProvider, loadStoreConfig } from "./config";
import { openRecordStore } from "./db/storeFactory";
import { StoreUnavailableError } from "./errors";
import { runDuplicateCheck } from "./orchestration";
import { CLEANUP_CONFIRM_PROMPT } from "./constants";
import * as logger from "./logger";

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.ok) {
    logger.error("Invalid arguments", { error: args.message });
    console.error(USAGE);
    return 1;
  }

  const provider = createCliConfigProvider();
  const config = provider.ok ? loadStoreConfig(provider.value) : provider;
  if (!config.ok) {
    logger.error("Configuration error", {
      kind: config.error.kind,
      error: config.error.message,
    });
    return 1;
  }

  const opened = await openRecordStore(config.value);
  if (!opened.ok) {
    const error = new StoreUnavailableError("connect", opened.failure);
    logger.error("Could not open record store", {
      kind: error.kind,
      error: error.message,
    });
    return 1;
  }

  const store = opened.value;
  try {
    const outcome = await runDuplicateCheck({
      store,
      cleanupRequested: args.value.cleanup,
      confirm: () => promptConfirmation(CLEANUP_CONFIRM_PROMPT),
      write: (text) => process.stdout.write(text),
    });

    logger.info("Dedup run finished", {
      state: outcome.state,
      exitCode: outcome.exitCode,
    });
    return outcome.exitCode;
  } finally {
    await store.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
