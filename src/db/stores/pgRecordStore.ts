/**
 * PostgreSQL record store
 *
 * RecordStore over a single pg connection. The physical row identifier is
 * ctid (MAX(tid) requires PostgreSQL 14+).
 */

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

/**
 * The slice of a pg client the store needs
 */
export interface PgQueryRunner {
  query(text: string): Promise<{ rows: RawRow[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export class PgRecordStore implements RecordStore {
  public readonly driver = "postgres";
  private inTransaction = false;
  private closed = false;

  constructor(private readonly client: PgQueryRunner) {}

  private async run<T>(
    fn: () => Promise<T>,
    fallback: StoreFailureReason,
    table?: TableName,
  ): Promise<StoreResult<T>> {
    if (this.closed) {
      return {
        ok: false,
        failure: {
          reason: "CONNECTION",
          message: "Store connection is closed",
          ...(table ? { table } : {}),
        },
      };
    }

    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      return { ok: false, failure: toStoreFailure(err, fallback, table) };
    }
  }

  async findDuplicateGroups<T extends TableName>(
    table: T,
  ): Promise<StoreResult<DuplicateGroup<TableKeyMap[T]>[]>> {
    const def = getTableDefinition(table);
    return this.run(
      async () => {
        const result = await this.client.query(
          duplicateGroupsSql(table, this.driver),
        );
        return result.rows.map((row) => ({
          key: def.decodeKey(row),
          count: readCount(row, "dup_count"),
        }));
      },
      "QUERY",
      table,
    );
  }

  async countRows(table: TableName): Promise<StoreResult<TableCounts>> {
    return this.run(
      async () => {
        const result = await this.client.query(
          tableCountsSql(table, this.driver),
        );
        const [row] = result.rows;
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
      async () => {
        const result = await this.client.query(
          deleteRedundantRowsSql(table, this.driver),
        );
        return result.rowCount ?? 0;
      },
      "QUERY",
      table,
    );
  }

  async begin(): Promise<StoreResult<void>> {
    return this.run(async () => {
      await this.client.query("BEGIN");
      this.inTransaction = true;
    }, "TRANSACTION");
  }

  async commit(): Promise<StoreResult<void>> {
    return this.run(async () => {
      try {
        await this.client.query("COMMIT");
      } finally {
        // PostgreSQL ends the transaction even when COMMIT fails
        this.inTransaction = false;
      }
    }, "TRANSACTION");
  }

  async rollback(): Promise<StoreResult<void>> {
    return this.run(async () => {
      if (!this.inTransaction) {
        return;
      }
      this.inTransaction = false;
      await this.client.query("ROLLBACK");
    }, "TRANSACTION");
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.client.end();
  }
}
