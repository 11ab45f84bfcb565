/**
 * Duplicate detection, cleanup and verification result types
 */

import type { DedupError } from "@/errors";
import type { RecordStore } from "./store";
import type { TableKeyMap, TableName } from "./tables";

/**
 * Rows sharing one natural key (count is always > 1)
 */
export type DuplicateGroup<K> = {
  key: K;
  count: number;
};

/**
 * Duplicate groups per table, ordered by count descending
 */
export type DetectionReport = {
  [T in TableName]: DuplicateGroup<TableKeyMap[T]>[];
};

/**
 * Aggregates derived from one table's duplicate groups
 */
export type TableDuplicateSummary = {
  table: TableName;
  groupCount: number;
  /** Sum of (count - 1): rows a cleanup would remove */
  extraRowCount: number;
};

export type DetectionSummary = {
  tables: TableDuplicateSummary[];
  totalGroups: number;
  totalExtraRows: number;
};

/**
 * Raw counts returned by the verification query
 */
export type TableCounts = {
  totalCount: number;
  distinctKeyCount: number;
};

export type TableVerification = TableCounts & {
  table: TableName;
  isClean: boolean;
};

export type VerificationResult = {
  tables: TableVerification[];
  allClean: boolean;
};

export type CleanupResult = {
  removed: Record<TableName, number>;
  totalRemoved: number;
  verification: VerificationResult;
};

/**
 * Outcome of a detection/cleanup/verification step
 */
export type DedupResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DedupError };

/**
 * Run states
 *
 * Idle → Detecting → (Clean | Dirty) → Cleaning → Committed → Verifying
 *   → (VerifiedClean | VerificationFailed); any step may end in Failed.
 */
export type DedupRunState =
  | "Idle"
  | "Detecting"
  | "Clean"
  | "Dirty"
  | "Cleaning"
  | "Committed"
  | "Verifying"
  | "VerifiedClean"
  | "VerificationFailed"
  | "Failed";

export type RunOutcome = {
  state: DedupRunState;
  exitCode: 0 | 1;
  /** Rows removed and committed per table; all 0 when no cleanup committed */
  removed: Record<TableName, number>;
  report?: DetectionReport;
  cleanup?: CleanupResult;
  error?: DedupError;
};

/**
 * Injected collaborators of one orchestrated run
 */
export type DuplicateCheckOptions = {
  store: RecordStore;
  cleanupRequested: boolean;
  /** Interactive yes/no gate; only called when cleanup would run */
  confirm: () => Promise<boolean>;
  /** Sink for operator-facing text */
  write: (text: string) => void;
  now?: () => Date;
};
