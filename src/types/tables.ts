/**
 * Pipeline table type definitions
 *
 * Natural keys and table descriptors for the three pipeline layers.
 */

/**
 * Logical tables checked for duplicates, in processing order
 */
export type TableName = "landing" | "staging" | "skills";

/**
 * Natural key of a job posting (landing and staging layers)
 *
 * Key fields are nullable: GROUP BY collapses NULLs into a single group.
 */
export type JobKey = {
  source_name: string | null;
  job_id: string | null;
};

/**
 * Natural key of a derived job-skill row (skills layer)
 */
export type JobSkillKey = JobKey & {
  skill: string | null;
};

/**
 * Natural key type per logical table
 */
export type TableKeyMap = {
  landing: JobKey;
  staging: JobKey;
  skills: JobSkillKey;
};

/**
 * Raw row as returned by a store driver before decoding
 */
export type RawRow = Record<string, unknown>;

/**
 * Static description of one pipeline table
 */
export type TableDefinition<K> = {
  name: TableName;
  /** Database schema (PostgreSQL) or table-name prefix (SQLite) */
  schema: string;
  table: string;
  /** Human label used in reports */
  label: string;
  /** Natural key columns, in GROUP BY order */
  keyColumns: readonly (keyof K & string)[];
  /** Noun for a duplicate group in reports ("duplicate combinations") */
  groupNoun: string;
  /** Noun for a group's multiplicity in reports ("copies") */
  copyNoun: string;
  /** Decode the key columns of a driver row into a typed key */
  decodeKey(row: RawRow): K;
};

/**
 * Every table definition, indexed by logical table name
 */
export type TableDefinitions = {
  [T in TableName]: TableDefinition<TableKeyMap[T]>;
};
