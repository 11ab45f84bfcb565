/**
 * Dedup orchestrator: detect → report → confirm → cleanup → verify
 *
 * Drives one run against an injected store. The confirmation gate and the
 * output sink are injected too, so the run never touches stdin/stdout.
 *
 * Exit codes:
 * - 0: Clean, Dirty (detection only or cleanup declined), VerifiedClean,
 *      VerificationFailed (flagged as a warning)
 * - 1: any DedupError
 */

import type {
  DuplicateCheckOptions,
  RunOutcome,
  TableName,
} from "@/types";
import { StoreUnavailableError, type DedupError } from "@/errors";
import {
  RunStateMachine,
  cleanupDuplicates,
  detectDuplicates,
  formatCleanupResult,
  formatDetectionReport,
  formatRunBanner,
} from "@/dedup";
import * as logger from "@/logger";

type OutcomeDetails = Omit<RunOutcome, "state" | "exitCode" | "removed">;

const NOTHING_REMOVED: Record<TableName, number> = {
  landing: 0,
  staging: 0,
  skills: 0,
};

/**
 * Rows committed by this run, including a cleanup whose verification failed
 */
function committedRemovals(
  details: OutcomeDetails,
): Record<TableName, number> {
  if (details.cleanup) {
    return details.cleanup.removed;
  }
  if (
    details.error instanceof StoreUnavailableError &&
    details.error.committedRemoved
  ) {
    return details.error.committedRemoved;
  }
  return { ...NOTHING_REMOVED };
}

/**
 * Run one duplicate check
 *
 * Cleanup only runs when requested, duplicates exist and confirm() resolves
 * true. Errors thrown by confirm() or write() propagate to the caller.
 */
export async function runDuplicateCheck(
  options: DuplicateCheckOptions,
): Promise<RunOutcome> {
  const { store, cleanupRequested, confirm, write } = options;
  const now = options.now ?? (() => new Date());
  const machine = new RunStateMachine();

  const fail = (error: DedupError, details: OutcomeDetails = {}): RunOutcome => {
    machine.transition("Failed");
    logger.error("Duplicate check failed", {
      kind: error.kind,
      error: error.message,
      ...error.context,
    });
    write(`\nError: ${error.message}\n\n`);
    const outcome = { ...details, error };
    return {
      ...outcome,
      state: machine.state,
      exitCode: 1,
      removed: committedRemovals(outcome),
    };
  };

  const finish = (details: OutcomeDetails = {}): RunOutcome => {
    write("Duplicate check complete.\n");
    logger.info("Duplicate check finished", { history: machine.history });
    return {
      ...details,
      state: machine.state,
      exitCode: 0,
      removed: committedRemovals(details),
    };
  };

  write(formatRunBanner(cleanupRequested, now()));

  machine.transition("Detecting");
  const detected = await detectDuplicates(store);
  if (!detected.ok) {
    return fail(detected.error);
  }

  const report = detected.value;
  const { text, hasDuplicates } = formatDetectionReport(report);
  write(text + "\n");

  if (!hasDuplicates) {
    machine.transition("Clean");
    if (cleanupRequested) {
      write("No duplicates found - nothing to clean.\n\n");
    }
    return finish({ report });
  }

  machine.transition("Dirty");
  if (!cleanupRequested) {
    return finish({ report });
  }

  if (!(await confirm())) {
    write("Cleanup cancelled by user.\n\n");
    logger.info("Cleanup declined by operator");
    return finish({ report });
  }

  machine.transition("Cleaning");
  const cleaned = await cleanupDuplicates(store, {
    onPhase: (phase) => {
      machine.transition(phase);
    },
  });
  if (!cleaned.ok) {
    return fail(cleaned.error, { report });
  }

  const cleanup = cleaned.value;
  write(formatCleanupResult(cleanup) + "\n");

  if (cleanup.verification.allClean) {
    machine.transition("VerifiedClean");
  } else {
    machine.transition("VerificationFailed");
    logger.warn("Duplicates remain after cleanup; manual investigation required", {
      tables: cleanup.verification.tables.filter((t) => !t.isClean),
    });
  }

  return finish({ report, cleanup });
}
