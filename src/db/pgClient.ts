/**
 * PostgreSQL client
 *
 * Opens the single connection used by a dedup run.
 */

import { Client, type ClientConfig } from "pg";
import type { PgSslMode, PostgresStoreConfig, StoreResult } from "@/types";
import { PG_CONNECTION_TIMEOUT_MS } from "@/constants";
import { toStoreFailure } from "@/utils";
import type { PgQueryRunner } from "./stores/pgRecordStore";
import * as logger from "@/logger";

/**
 * Map a libpq sslmode to the pg ssl option
 *
 * pg cannot negotiate TLS opportunistically, so allow/prefer/require all
 * mean TLS without certificate verification.
 */
export function sslOptionFromMode(mode: PgSslMode): ClientConfig["ssl"] {
  switch (mode) {
    case "disable":
      return false;
    case "verify-ca":
    case "verify-full":
      return { rejectUnauthorized: true };
    case "allow":
    case "prefer":
    case "require":
      return { rejectUnauthorized: false };
  }
}

export function buildPgClientConfig(config: PostgresStoreConfig): ClientConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: sslOptionFromMode(config.sslMode),
    connectionTimeoutMillis: PG_CONNECTION_TIMEOUT_MS,
  };
}

/**
 * Connect to PostgreSQL
 *
 * @returns Connected query runner, or a CONNECTION failure
 */
export async function connectPg(
  config: PostgresStoreConfig,
): Promise<StoreResult<PgQueryRunner>> {
  const client = new Client(buildPgClientConfig(config));

  client.on("error", (err) => {
    logger.error("Unexpected error on database connection", {
      error: err.message,
    });
  });

  try {
    await client.connect();
  } catch (err) {
    return { ok: false, failure: toStoreFailure(err, "CONNECTION") };
  }

  logger.info("Connected to PostgreSQL", {
    host: config.host,
    port: config.port,
    database: config.database,
    sslMode: config.sslMode,
  });

  return {
    ok: true,
    value: {
      query: async (text) => {
        const result = await client.query(text);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      end: () => client.end(),
    },
  };
}
