/**
 * SQLite record store
 *
 * RecordStore over better-sqlite3. Used for the local mirror of the
 * pipeline tables and as the in-process store in tests. The physical row
 * identifier is rowid.
 */

import type Database from "better-sqlite3";
import type {
  DuplicateGroup,
  RawRow,
  RecordStore,
  StoreFailureReason,
  StoreResult,
  TableCounts,
  TableKeyMap,
  TableName,
} from "@/types";
import { getTableDefinition } from "@/dedup/tableDefinitions";
import { readCount, toStoreFailure } from "@/utils";
import {
  deleteRedundantRowsSql,
  duplicateGroupsSql,
  tableCountsSql,
} from "./sql";

export class SqliteRecordStore implements RecordStore {
  public readonly driver = "sqlite";

  /**
   * @param db - Open better-sqlite3 handle
   * @param release - Called by close(); defaults to closing the handle
   */
  constructor(
    private readonly db: Database.Database,
    private readonly release: () => void = () => db.close(),
  ) {}

  private run<T>(
    fn: () => T,
    fallback: StoreFailureReason,
    table?: TableName,
  ): StoreResult<T> {
    try {
      return { ok: true, value: fn() };
    } catch (err) {
      return { ok: false, failure: toStoreFailure(err, fallback, table) };
    }
  }

  async findDuplicateGroups<T extends TableName>(
    table: T,
  ): Promise<StoreResult<DuplicateGroup<TableKeyMap[T]>[]>> {
    const def = getTableDefinition(table);
    return this.run(
      () =>
        this.db
          .prepare<[], RawRow>(duplicateGroupsSql(table, this.driver))
          .all()
          .map((row) => ({
            key: def.decodeKey(row),
            count: readCount(row, "dup_count"),
          })),
      "QUERY",
      table,
    );
  }

  async countRows(table: TableName): Promise<StoreResult<TableCounts>> {
    return this.run(
      () => {
        const row = this.db
          .prepare<[], RawRow>(tableCountsSql(table, this.driver))
          .get();
        if (!row) {
          throw new Error("Count query returned no row");
        }
        return {
          totalCount: readCount(row, "total_count"),
          distinctKeyCount: readCount(row, "distinct_key_count"),
        };
      },
      "QUERY",
      table,
    );
  }

  async deleteRedundantRows(table: TableName): Promise<StoreResult<number>> {
    return this.run(
      () =>
        this.db.prepare(deleteRedundantRowsSql(table, this.driver)).run()
          .changes,
      "QUERY",
      table,
    );
  }

  async begin(): Promise<StoreResult<void>> {
    return this.run(() => {
      this.db.exec("BEGIN");
    }, "TRANSACTION");
  }

  async commit(): Promise<StoreResult<void>> {
    return this.run(() => {
      this.db.exec("COMMIT");
    }, "TRANSACTION");
  }

  async rollback(): Promise<StoreResult<void>> {
    return this.run(() => {
      // A failed COMMIT may already have ended the transaction
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
    }, "TRANSACTION");
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.release();
    }
  }
}
