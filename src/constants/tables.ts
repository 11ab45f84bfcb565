/**
 * Pipeline table constants
 */

import type { StoreDriver, TableName } from "@/types";

/**
 * Order in which tables are detected, cleaned and verified
 * (landing → staging → derived skills)
 */
export const TABLE_ORDER: readonly TableName[] = ["landing", "staging", "skills"];

/**
 * Physical row identifier column per driver
 *
 * The greatest identifier in a group is kept on cleanup. Both columns grow
 * with insertion order as long as rows are never updated in place
 * (PostgreSQL rewrites ctid on UPDATE and VACUUM FULL).
 */
export const PHYSICAL_ROW_ID: Record<StoreDriver, string> = {
  postgres: "ctid",
  sqlite: "rowid",
};
