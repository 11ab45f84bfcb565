/**
 * Store configuration loading
 *
 * Turns raw provider values into a validated StoreConfig. Every missing
 * key is reported at once.
 */

import type {
  ConfigProvider,
  DedupResult,
  PgSslMode,
  PostgresStoreConfig,
  StoreConfig,
  StoreDriver,
} from "@/types";
import {
  CONFIG_KEYS,
  DEFAULT_PG_SSL_MODE,
  DEFAULT_STORE_DRIVER,
  PG_SSL_MODES,
  STORE_DRIVERS,
} from "@/constants";
import { ConfigMissingError } from "@/errors";
import { defaultDbPath } from "@/db/connection";

function isStoreDriver(value: string): value is StoreDriver {
  return STORE_DRIVERS.some((driver) => driver === value);
}

function isPgSslMode(value: string): value is PgSslMode {
  return PG_SSL_MODES.some((mode) => mode === value);
}

function loadPostgresConfig(
  provider: ConfigProvider,
): DedupResult<PostgresStoreConfig> {
  const required = [
    CONFIG_KEYS.host,
    CONFIG_KEYS.port,
    CONFIG_KEYS.database,
    CONFIG_KEYS.user,
    CONFIG_KEYS.password,
  ];
  const missing = required.filter((key) => provider.get(key) === undefined);
  if (missing.length > 0) {
    return { ok: false, error: new ConfigMissingError(provider.source, missing) };
  }

  const rawPort = provider.get(CONFIG_KEYS.port) ?? "";
  const port = Number(rawPort);
  if (!/^\d+$/.test(rawPort.trim()) || port < 1 || port > 65535) {
    return {
      ok: false,
      error: new ConfigMissingError(
        provider.source,
        [CONFIG_KEYS.port],
        `${CONFIG_KEYS.port} must be a port number (1-65535), got "${rawPort}"`,
      ),
    };
  }

  const rawSslMode = (
    provider.get(CONFIG_KEYS.sslMode) ?? DEFAULT_PG_SSL_MODE
  ).toLowerCase();
  if (!isPgSslMode(rawSslMode)) {
    return {
      ok: false,
      error: new ConfigMissingError(
        provider.source,
        [CONFIG_KEYS.sslMode],
        `${CONFIG_KEYS.sslMode} must be one of ${PG_SSL_MODES.join(", ")}, got "${rawSslMode}"`,
      ),
    };
  }

  return {
    ok: true,
    value: {
      driver: "postgres",
      host: provider.get(CONFIG_KEYS.host) ?? "",
      port,
      database: provider.get(CONFIG_KEYS.database) ?? "",
      user: provider.get(CONFIG_KEYS.user) ?? "",
      password: provider.get(CONFIG_KEYS.password) ?? "",
      sslMode: rawSslMode,
    },
  };
}

/**
 * Load the record store configuration
 *
 * DEDUP_STORE selects the driver (postgres by default).
 */
export function loadStoreConfig(
  provider: ConfigProvider,
): DedupResult<StoreConfig> {
  const rawDriver = (
    provider.get(CONFIG_KEYS.driver) ?? DEFAULT_STORE_DRIVER
  ).toLowerCase();

  if (!isStoreDriver(rawDriver)) {
    return {
      ok: false,
      error: new ConfigMissingError(
        provider.source,
        [CONFIG_KEYS.driver],
        `${CONFIG_KEYS.driver} must be one of ${STORE_DRIVERS.join(", ")}, got "${rawDriver}"`,
      ),
    };
  }

  if (rawDriver === "sqlite") {
    return {
      ok: true,
      value: {
        driver: "sqlite",
        dbPath: provider.get(CONFIG_KEYS.dbPath) ?? defaultDbPath(),
      },
    };
  }

  return loadPostgresConfig(provider);
}
