/**
 * Driver row decoding helpers
 *
 * pg returns COUNT(*) as a string (int8) while better-sqlite3 returns a
 * number; key columns may be TEXT, INTEGER or NULL.
 */

import type { RawRow } from "@/types";

/**
 * Read a natural-key column as a nullable string
 *
 * @throws Error if the column is missing or holds a non-scalar value
 */
export function readKeyColumn(row: RawRow, column: string): string | null {
  if (!(column in row)) {
    throw new Error(`Result row is missing key column "${column}"`);
  }

  const value = row[column];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return String(value);
  }
  throw new Error(
    `Key column "${column}" has unsupported type ${typeof value}`,
  );
}

/**
 * Read an aggregate count column as a safe integer
 *
 * @throws Error if the value is not a non-negative integer
 */
export function readCount(row: RawRow, column: string): number {
  const value = row[column];
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "bigint" || typeof value === "string"
        ? Number(value)
        : Number.NaN;

  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(
      `Count column "${column}" is not a valid count: ${String(value)}`,
    );
  }
  return parsed;
}
