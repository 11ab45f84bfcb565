/**
 * SQL builders shared by the PostgreSQL and SQLite stores
 *
 * Identifiers come from the static table definitions, never from input.
 */

import type { StoreDriver, TableName } from "@/types";
import { PHYSICAL_ROW_ID } from "@/constants";
import { TABLE_DEFINITIONS, physicalTableName } from "@/dedup/tableDefinitions";

function keyList(table: TableName): string {
  return TABLE_DEFINITIONS[table].keyColumns.join(", ");
}

/**
 * Natural-key groups with more than one row, largest first
 *
 * Ties are ordered by key so repeated runs print the same report.
 */
export function duplicateGroupsSql(
  table: TableName,
  driver: StoreDriver,
): string {
  const keys = keyList(table);
  return `
    SELECT ${keys}, COUNT(*) AS dup_count
    FROM ${physicalTableName(table, driver)}
    GROUP BY ${keys}
    HAVING COUNT(*) > 1
    ORDER BY dup_count DESC, ${keys}
  `;
}

/**
 * Total rows and distinct natural keys in a single statement
 */
export function tableCountsSql(table: TableName, driver: StoreDriver): string {
  const name = physicalTableName(table, driver);
  return `
    SELECT
      (SELECT COUNT(*) FROM ${name}) AS total_count,
      (SELECT COUNT(*) FROM (SELECT 1 FROM ${name} GROUP BY ${keyList(table)}) AS natural_keys) AS distinct_key_count
  `;
}

/**
 * Delete all but the greatest physical row of each natural-key group
 */
export function deleteRedundantRowsSql(
  table: TableName,
  driver: StoreDriver,
): string {
  const name = physicalTableName(table, driver);
  const rowId = PHYSICAL_ROW_ID[driver];
  return `
    DELETE FROM ${name}
    WHERE ${rowId} NOT IN (
      SELECT MAX(${rowId})
      FROM ${name}
      GROUP BY ${keyList(table)}
    )
  `;
}
