/**
 * Configuration type definitions
 */

import type { StoreDriver } from "./store";

/**
 * Source of raw configuration values (environment, settings file, ...)
 */
export interface ConfigProvider {
  /** Human-readable origin, used in error messages */
  readonly source: string;
  get(key: string): string | undefined;
}

/**
 * libpq-style sslmode values accepted in PGSSLMODE
 */
export type PgSslMode =
  | "disable"
  | "allow"
  | "prefer"
  | "require"
  | "verify-ca"
  | "verify-full";

export type PostgresStoreConfig = {
  driver: Extract<StoreDriver, "postgres">;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  sslMode: PgSslMode;
};

export type SqliteStoreConfig = {
  driver: Extract<StoreDriver, "sqlite">;
  dbPath: string;
};

export type StoreConfig = PostgresStoreConfig | SqliteStoreConfig;

/**
 * Parsed command-line arguments of the dedup CLI
 */
export type DedupCliArgs = {
  cleanup: boolean;
};
