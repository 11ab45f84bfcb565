/**
 * Post-cleanup verifier
 *
 * Compares total rows with distinct natural keys per table. Also usable
 * on its own as a health check.
 */

import type {
  DedupResult,
  RecordStore,
  TableName,
  TableVerification,
  VerificationResult,
} from "@/types";
import { TABLE_ORDER } from "@/constants";
import { StoreUnavailableError } from "@/errors";
import * as logger from "@/logger";

export type VerifyOptions = {
  /** Rows a cleanup already committed; carried into a failure */
  committedRemoved?: Record<TableName, number>;
};

export async function verifyTables(
  store: RecordStore,
  options: VerifyOptions = {},
): Promise<DedupResult<VerificationResult>> {
  const tables: TableVerification[] = [];

  for (const table of TABLE_ORDER) {
    const counts = await store.countRows(table);
    if (!counts.ok) {
      logger.error("Verification query failed", {
        table,
        reason: counts.failure.reason,
        error: counts.failure.message,
      });
      return {
        ok: false,
        error: new StoreUnavailableError(
          "verification",
          { ...counts.failure, table },
          options.committedRemoved,
        ),
      };
    }

    const { totalCount, distinctKeyCount } = counts.value;
    const isClean = totalCount === distinctKeyCount;
    tables.push({ table, totalCount, distinctKeyCount, isClean });

    if (!isClean) {
      logger.warn("Table still holds duplicate rows", {
        table,
        totalCount,
        distinctKeyCount,
      });
    }
  }

  const allClean = tables.every((t) => t.isClean);
  logger.info("Verification finished", { allClean });

  return { ok: true, value: { tables, allClean } };
}
