/**
 * Unit Test: configuration providers and store config loading
 */

import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  chainConfigProviders,
  createCliConfigProvider,
  createEnvConfigProvider,
  createSettingsFileConfigProvider,
  createStaticConfigProvider,
  loadStoreConfig,
  parseLocalSettings,
} from "@/config";
import { ConfigMissingError } from "@/errors";

const PG_VALUES = {
  PGHOST: "db.internal",
  PGPORT: "5432",
  PGDATABASE: "jobs",
  PGUSER: "pipeline",
  PGPASSWORD: "test-secret",
};

describe("loadStoreConfig", () => {
  it("should load a postgres config with sslmode defaulting to require", () => {
    const result = loadStoreConfig(createStaticConfigProvider(PG_VALUES));

    expect(result).toEqual({
      ok: true,
      value: {
        driver: "postgres",
        host: "db.internal",
        port: 5432,
        database: "jobs",
        user: "pipeline",
        password: "test-secret",
        sslMode: "require",
      },
    });
  });

  it("should accept an explicit sslmode case-insensitively", () => {
    const result = loadStoreConfig(
      createStaticConfigProvider({ ...PG_VALUES, PGSSLMODE: "DISABLE" }),
    );

    expect(result.ok && result.value.driver === "postgres" && result.value.sslMode).toBe(
      "disable",
    );
  });

  it("should report every missing key at once", () => {
    const result = loadStoreConfig(
      createStaticConfigProvider({ PGHOST: "db.internal" }, "test values"),
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigMissingError);
    expect(result.error.kind).toBe("CONFIG_MISSING");
    expect(result.error.context).toEqual({
      source: "test values",
      missingKeys: ["PGPORT", "PGDATABASE", "PGUSER", "PGPASSWORD"],
    });
    expect(result.error.message).toBe(
      "Missing required configuration from test values: PGPORT, PGDATABASE, PGUSER, PGPASSWORD",
    );
  });

  it("should reject a non-numeric port", () => {
    const result = loadStoreConfig(
      createStaticConfigProvider({ ...PG_VALUES, PGPORT: "54x2" }),
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      'PGPORT must be a port number (1-65535), got "54x2"',
    );
  });

  it("should reject an unknown sslmode", () => {
    const result = loadStoreConfig(
      createStaticConfigProvider({ ...PG_VALUES, PGSSLMODE: "always" }),
    );

    expect(result.ok).toBe(false);
  });

  it("should load a sqlite config without postgres keys", () => {
    const result = loadStoreConfig(
      createStaticConfigProvider({ DEDUP_STORE: "sqlite", DB_PATH: "/tmp/mirror.db" }),
    );

    expect(result).toEqual({
      ok: true,
      value: { driver: "sqlite", dbPath: "/tmp/mirror.db" },
    });
  });

  it("should reject an unknown driver", () => {
    const result = loadStoreConfig(
      createStaticConfigProvider({ DEDUP_STORE: "mysql" }),
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.context).toEqual({
      source: "static values",
      missingKeys: ["DEDUP_STORE"],
    });
  });
});

describe("config providers", () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it("should treat blank environment values as missing", () => {
    const provider = createEnvConfigProvider({ PGHOST: "  ", PGUSER: "pipeline" });

    expect(provider.get("PGHOST")).toBeUndefined();
    expect(provider.get("PGUSER")).toBe("pipeline");
  });

  it("should prefer the first provider that has a value", () => {
    const provider = chainConfigProviders(
      createStaticConfigProvider({ PGHOST: "from-env" }, "env"),
      createStaticConfigProvider({ PGHOST: "from-file", PGPORT: "6543" }, "file"),
    );

    expect(provider.source).toBe("env > file");
    expect(provider.get("PGHOST")).toBe("from-env");
    expect(provider.get("PGPORT")).toBe("6543");
    expect(provider.get("PGUSER")).toBeUndefined();
  });

  it("should keep scalar Values entries of local.settings.json", () => {
    const values = parseLocalSettings(
      JSON.stringify({
        IsEncrypted: false,
        Values: { PGHOST: "db.internal", PGPORT: 5432, Nested: { a: 1 } },
      }),
      "local.settings.json",
    );

    expect(values).toEqual({ PGHOST: "db.internal", PGPORT: "5432" });
  });

  it("should throw ConfigMissingError for malformed settings JSON", () => {
    expect(() => parseLocalSettings("{not json", "local.settings.json")).toThrow(
      ConfigMissingError,
    );
  });

  it("should read a settings file and ignore a missing one", () => {
    tempDir = mkdtempSync(join(tmpdir(), "dedup-config-"));
    const path = join(tempDir, "local.settings.json");
    writeFileSync(path, JSON.stringify({ Values: PG_VALUES }));

    const provider = createSettingsFileConfigProvider(path);
    expect(provider.get("PGDATABASE")).toBe("jobs");

    const missing = createSettingsFileConfigProvider(join(tempDir, "absent.json"));
    expect(missing.get("PGDATABASE")).toBeUndefined();
  });

  it("should chain the environment ahead of local.settings.json for the CLI", () => {
    tempDir = mkdtempSync(join(tmpdir(), "dedup-config-"));
    writeFileSync(
      join(tempDir, "local.settings.json"),
      JSON.stringify({ Values: { ...PG_VALUES, PGHOST: "from-file" } }),
    );

    const result = createCliConfigProvider(tempDir, { PGHOST: "from-env" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.get("PGHOST")).toBe("from-env");
    expect(result.value.get("PGDATABASE")).toBe("jobs");
  });

  it("should return a CONFIG_MISSING failure for a malformed local.settings.json", () => {
    tempDir = mkdtempSync(join(tmpdir(), "dedup-config-"));
    writeFileSync(join(tempDir, "local.settings.json"), "{not json");

    const result = createCliConfigProvider(tempDir, {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigMissingError);
    expect(result.error.kind).toBe("CONFIG_MISSING");
  });
});
