/**
 * Dedup error classes: structured failures that end a duplicate check run
 * with exit code 1
 *
 * Separated from types (which should be shapes only).
 * A verification mismatch is not an error: it is the VerificationFailed state.
 */

import type { StoreFailure, TableName } from "@/types";

export type DedupErrorKind =
  | "CONFIG_MISSING"
  | "STORE_UNAVAILABLE"
  | "CLEANUP_TRANSACTION_FAILED";

/**
 * Base class: every dedup error carries a kind and diagnostic context
 */
export abstract class DedupError extends Error {
  public abstract readonly kind: DedupErrorKind;
  public readonly context: Record<string, unknown>;

  protected constructor(message: string, context: Record<string, unknown>) {
    super(message);
    this.context = context;
  }
}

/**
 * Configuration provider could not supply valid connection parameters
 */
export class ConfigMissingError extends DedupError {
  public readonly kind = "CONFIG_MISSING";
  public readonly missingKeys: string[];

  constructor(source: string, missingKeys: string[], detail?: string) {
    super(
      detail ??
        `Missing required configuration from ${source}: ${missingKeys.join(", ")}`,
      { source, missingKeys },
    );
    this.name = "ConfigMissingError";
    this.missingKeys = missingKeys;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigMissingError);
    }
  }
}

/**
 * Connection or query failure during detection or verification
 *
 * committedRemoved is set when the failure happened after a cleanup had
 * already committed its deletions.
 */
export class StoreUnavailableError extends DedupError {
  public readonly kind = "STORE_UNAVAILABLE";
  public readonly table?: TableName;
  public readonly committedRemoved?: Record<TableName, number>;

  constructor(
    phase: string,
    failure: StoreFailure,
    committedRemoved?: Record<TableName, number>,
  ) {
    const committedTotal = committedRemoved
      ? Object.values(committedRemoved).reduce((sum, n) => sum + n, 0)
      : 0;
    super(
      `Store unavailable during ${phase}${
        failure.table ? ` (${failure.table})` : ""
      }: ${failure.message}${
        committedRemoved
          ? ` (${committedTotal} duplicate rows were already removed and committed)`
          : ""
      }`,
      {
        phase,
        reason: failure.reason,
        table: failure.table,
        ...(committedRemoved ? { committedRemoved } : {}),
      },
    );
    this.name = "StoreUnavailableError";
    this.table = failure.table;
    this.committedRemoved = committedRemoved;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreUnavailableError);
    }
  }
}

/**
 * The cleanup transaction failed and was rolled back
 *
 * removedBeforeFailure lists deletions that were undone by the rollback.
 */
export class CleanupTransactionFailedError extends DedupError {
  public readonly kind = "CLEANUP_TRANSACTION_FAILED";
  public readonly table?: TableName;
  public readonly removedBeforeFailure: Partial<Record<TableName, number>>;
  public readonly rolledBack: boolean;

  constructor(details: {
    failure: StoreFailure;
    removedBeforeFailure: Partial<Record<TableName, number>>;
    rolledBack: boolean;
    rollbackMessage?: string;
  }) {
    const { failure, removedBeforeFailure, rolledBack, rollbackMessage } =
      details;
    super(
      `Cleanup transaction failed${
        failure.table ? ` on ${failure.table}` : ""
      }: ${failure.message}${rolledBack ? " (rolled back)" : " (rollback failed)"}`,
      {
        reason: failure.reason,
        table: failure.table,
        removedBeforeFailure,
        rolledBack,
        ...(rollbackMessage ? { rollbackMessage } : {}),
      },
    );
    this.name = "CleanupTransactionFailedError";
    this.table = failure.table;
    this.removedBeforeFailure = removedBeforeFailure;
    this.rolledBack = rolledBack;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CleanupTransactionFailedError);
    }
  }
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
