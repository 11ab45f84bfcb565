/**
 * Record store type definitions
 *
 * The data-access seam used by detection, cleanup and verification.
 */

import type { TableKeyMap, TableName } from "./tables";
import type { DuplicateGroup, TableCounts } from "./dedup";

/**
 * Supported store drivers
 */
export type StoreDriver = "postgres" | "sqlite";

/**
 * Store failure reasons
 *
 * - CONNECTION: the store could not be reached or the handle is closed
 * - QUERY: a statement was rejected or failed while executing
 * - TRANSACTION: begin/commit/rollback failed
 */
export type StoreFailureReason = "CONNECTION" | "QUERY" | "TRANSACTION";

export type StoreFailure = {
  reason: StoreFailureReason;
  message: string;
  table?: TableName;
};

/**
 * Explicit outcome of a store operation (store methods never throw)
 */
export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: StoreFailure };

/**
 * Data access handle for the three pipeline tables
 *
 * One connection, one transaction at a time. Deletes issued between
 * begin() and commit() are undone by rollback().
 */
export interface RecordStore {
  readonly driver: StoreDriver;

  /**
   * Natural-key groups with more than one row, largest first
   */
  findDuplicateGroups<T extends TableName>(
    table: T,
  ): Promise<StoreResult<DuplicateGroup<TableKeyMap[T]>[]>>;

  /**
   * Total row count and distinct natural-key count, in one query
   */
  countRows(table: TableName): Promise<StoreResult<TableCounts>>;

  /**
   * Delete every row that is not the greatest physical row of its group
   *
   * @returns Number of rows deleted
   */
  deleteRedundantRows(table: TableName): Promise<StoreResult<number>>;

  begin(): Promise<StoreResult<void>>;
  commit(): Promise<StoreResult<void>>;
  rollback(): Promise<StoreResult<void>>;

  close(): Promise<void>;
}
