/**
 * Configuration providers
 *
 * The dedup core never reads configuration itself; the CLI builds a
 * provider chain and injects it into loadStoreConfig().
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import type { ConfigProvider, DedupResult } from "@/types";
import { LOCAL_SETTINGS_FILE } from "@/constants";
import { ConfigMissingError, errorMessage } from "@/errors";

/**
 * Provider over environment variables (dotenv populates process.env)
 */
export function createEnvConfigProvider(
  env: NodeJS.ProcessEnv = process.env,
): ConfigProvider {
  return {
    source: "environment",
    get: (key) => {
      const value = env[key];
      return value === undefined || value.trim() === "" ? undefined : value;
    },
  };
}

/**
 * Provider over a plain key/value map
 */
export function createStaticConfigProvider(
  values: Record<string, string>,
  source = "static values",
): ConfigProvider {
  return {
    source,
    get: (key) => {
      const value = values[key];
      return value === undefined || value.trim() === "" ? undefined : value;
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the content of a local.settings.json file
 *
 * Only scalar entries of the "Values" object are kept.
 */
export function parseLocalSettings(
  content: string,
  path: string,
): Record<string, string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigMissingError(
      path,
      [],
      `Settings file ${path} is not valid JSON: ${errorMessage(err)}`,
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigMissingError(
      path,
      [],
      `Settings file ${path} must contain a JSON object`,
    );
  }

  const values: Record<string, string> = {};
  const rawValues = parsed.Values;
  if (!isRecord(rawValues)) {
    return values;
  }

  for (const [key, value] of Object.entries(rawValues)) {
    if (
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      values[key] = String(value);
    }
  }
  return values;
}

/**
 * Provider over an Azure Functions style local.settings.json
 *
 * A missing file yields an empty provider.
 *
 * @throws ConfigMissingError if the file exists but cannot be parsed
 */
export function createSettingsFileConfigProvider(
  path: string,
): ConfigProvider {
  if (!existsSync(path)) {
    return createStaticConfigProvider({}, path);
  }
  return createStaticConfigProvider(
    parseLocalSettings(readFileSync(path, "utf-8"), path),
    path,
  );
}

/**
 * First provider with a value wins
 */
export function chainConfigProviders(
  ...providers: ConfigProvider[]
): ConfigProvider {
  return {
    source: providers.map((p) => p.source).join(" > "),
    get: (key) => {
      for (const provider of providers) {
        const value = provider.get(key);
        if (value !== undefined) {
          return value;
        }
      }
      return undefined;
    },
  };
}

/**
 * Provider chain used by the CLI: environment first, then
 * local.settings.json in the working directory
 *
 * A malformed settings file is returned as a CONFIG_MISSING failure.
 */
export function createCliConfigProvider(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): DedupResult<ConfigProvider> {
  try {
    return {
      ok: true,
      value: chainConfigProviders(
        createEnvConfigProvider(env),
        createSettingsFileConfigProvider(join(cwd, LOCAL_SETTINGS_FILE)),
      ),
    };
  } catch (err) {
    if (err instanceof ConfigMissingError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
