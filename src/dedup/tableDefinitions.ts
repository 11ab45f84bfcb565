/**
 * Pipeline table definitions
 *
 * Natural keys and report wording for the landing, staging and skills
 * layers. Stores build their SQL from these definitions.
 */

import type {
  JobKey,
  JobSkillKey,
  RawRow,
  StoreDriver,
  TableDefinition,
  TableDefinitions,
  TableKeyMap,
  TableName,
} from "@/types";
import { readKeyColumn } from "@/utils";

function decodeJobKey(row: RawRow): JobKey {
  return {
    source_name: readKeyColumn(row, "source_name"),
    job_id: readKeyColumn(row, "job_id"),
  };
}

function decodeJobSkillKey(row: RawRow): JobSkillKey {
  return {
    ...decodeJobKey(row),
    skill: readKeyColumn(row, "skill"),
  };
}

export const TABLE_DEFINITIONS: TableDefinitions = {
  landing: {
    name: "landing",
    schema: "landing",
    table: "raw_jobs",
    label: "Landing Layer",
    keyColumns: ["source_name", "job_id"],
    groupNoun: "duplicate combinations",
    copyNoun: "copies",
    decodeKey: decodeJobKey,
  },
  staging: {
    name: "staging",
    schema: "staging",
    table: "jobs_v1",
    label: "Staging Layer",
    keyColumns: ["source_name", "job_id"],
    groupNoun: "duplicate combinations",
    copyNoun: "copies",
    decodeKey: decodeJobKey,
  },
  skills: {
    name: "skills",
    schema: "staging",
    table: "job_skills",
    label: "Job Skills",
    keyColumns: ["source_name", "job_id", "skill"],
    groupNoun: "duplicate job-skill pairs",
    copyNoun: "times",
    decodeKey: decodeJobSkillKey,
  },
};

/**
 * Look up the definition of a table
 */
export function getTableDefinition<T extends TableName>(
  table: T,
): TableDefinition<TableKeyMap[T]> {
  return TABLE_DEFINITIONS[table];
}

/**
 * Display name of a table, as it appears in PostgreSQL (schema.table)
 */
export function qualifiedTableName(table: TableName): string {
  const def = TABLE_DEFINITIONS[table];
  return `${def.schema}.${def.table}`;
}

/**
 * SQL identifier of a table for the given driver
 *
 * SQLite has no schemas: the schema becomes a table-name prefix.
 */
export function physicalTableName(
  table: TableName,
  driver: StoreDriver,
): string {
  const def = TABLE_DEFINITIONS[table];
  return driver === "postgres"
    ? `${def.schema}.${def.table}`
    : `${def.schema}_${def.table}`;
}

/**
 * Render a natural key for reports ("indeed/job1/python")
 */
export function formatNaturalKey(table: TableName, key: RawRow): string {
  return TABLE_DEFINITIONS[table].keyColumns
    .map((column) => {
      const value = key[column];
      return value === null || value === undefined ? "(null)" : String(value);
    })
    .join("/");
}
