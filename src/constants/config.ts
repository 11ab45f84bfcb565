/**
 * Configuration constants: keys, defaults and accepted values
 */

import type { PgSslMode, StoreDriver } from "@/types";

export const CONFIG_KEYS = {
  driver: "DEDUP_STORE",
  host: "PGHOST",
  port: "PGPORT",
  database: "PGDATABASE",
  user: "PGUSER",
  password: "PGPASSWORD",
  sslMode: "PGSSLMODE",
  dbPath: "DB_PATH",
} as const;

export const DEFAULT_STORE_DRIVER: StoreDriver = "postgres";

export const STORE_DRIVERS: readonly StoreDriver[] = ["postgres", "sqlite"];

export const DEFAULT_PG_SSL_MODE: PgSslMode = "require";

export const PG_SSL_MODES: readonly PgSslMode[] = [
  "disable",
  "allow",
  "prefer",
  "require",
  "verify-ca",
  "verify-full",
];

/**
 * Settings file consulted after the environment (Azure Functions layout)
 */
export const LOCAL_SETTINGS_FILE = "local.settings.json";

/**
 * Connect timeout for the PostgreSQL client
 */
export const PG_CONNECTION_TIMEOUT_MS = 10_000;
