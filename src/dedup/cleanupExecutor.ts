/**
 * Cleanup executor
 *
 * Deletes every row that is not the greatest physical row of its natural
 * key group, for all three tables inside one transaction. Any failure
 * rolls the whole transaction back. After commit the verifier runs and
 * its result is part of the cleanup result.
 */

import type {
  CleanupResult,
  DedupResult,
  Logger,
  RecordStore,
  StoreFailure,
  TableName,
} from "@/types";
import { TABLE_ORDER } from "@/constants";
import { CleanupTransactionFailedError } from "@/errors";
import { verifyTables } from "./verifier";
import * as logger from "@/logger";

export type CleanupPhase = "Committed" | "Verifying";

export type CleanupOptions = {
  /** Called as the transaction commits and as verification starts */
  onPhase?: (phase: CleanupPhase) => void;
};

/**
 * Roll back and describe the failed transaction
 */
async function abortCleanup(
  store: RecordStore,
  log: Logger,
  failure: StoreFailure,
  removedBeforeFailure: Partial<Record<TableName, number>>,
): Promise<CleanupTransactionFailedError> {
  const rolledBack = await store.rollback();
  if (!rolledBack.ok) {
    log.error("Rollback failed", {
      reason: rolledBack.failure.reason,
      error: rolledBack.failure.message,
    });
  }

  const error = new CleanupTransactionFailedError({
    failure,
    removedBeforeFailure,
    rolledBack: rolledBack.ok,
    ...(rolledBack.ok ? {} : { rollbackMessage: rolledBack.failure.message }),
  });
  log.error("Cleanup transaction failed", error.context);
  return error;
}

export async function cleanupDuplicates(
  store: RecordStore,
  options: CleanupOptions = {},
): Promise<DedupResult<CleanupResult>> {
  const log = logger.withContext({ step: "cleanup", driver: store.driver });
  log.info("Starting duplicate cleanup");

  const removed: Record<TableName, number> = {
    landing: 0,
    staging: 0,
    skills: 0,
  };
  const attempted: Partial<Record<TableName, number>> = {};

  const begun = await store.begin();
  if (!begun.ok) {
    return { ok: false, error: await abortCleanup(store, log, begun.failure, {}) };
  }

  for (const table of TABLE_ORDER) {
    const deleted = await store.deleteRedundantRows(table);
    if (!deleted.ok) {
      return {
        ok: false,
        error: await abortCleanup(
          store,
          log,
          { ...deleted.failure, table },
          attempted,
        ),
      };
    }

    attempted[table] = deleted.value;
    removed[table] = deleted.value;
    if (deleted.value > 0) {
      log.info("Removed duplicate rows", { table, removed: deleted.value });
    }
  }

  const committed = await store.commit();
  if (!committed.ok) {
    return {
      ok: false,
      error: await abortCleanup(store, log, committed.failure, attempted),
    };
  }
  options.onPhase?.("Committed");

  const totalRemoved = TABLE_ORDER.reduce((sum, t) => sum + removed[t], 0);
  log.info("Cleanup committed", { totalRemoved });

  options.onPhase?.("Verifying");
  const verification = await verifyTables(store, { committedRemoved: removed });
  if (!verification.ok) {
    log.error("Verification failed after commit; deletions are permanent", {
      removed,
      totalRemoved,
    });
    return verification;
  }

  return {
    ok: true,
    value: { removed, totalRemoved, verification: verification.value },
  };
}
