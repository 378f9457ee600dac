import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ZodError } from "zod";
import type { AppConfig } from "@docenrich/types";
import { ConfigError } from "@docenrich/errors";
import { DEFAULT_CONFIG } from "./defaults.js";
import { envToConfigLayer, isPlainObject, parseEnv, type EnvOverrides } from "./env.js";
import { appConfigSchema } from "./schema.js";

export const DEFAULT_CONFIG_FILE = "config.json";

export interface LoadConfigOptions {
  /** Explicit config file. A missing explicit file is an error. */
  configPath?: string;
  /** Environment to read overrides from. Default: process.env. */
  env?: Record<string, string | undefined>;
}

export interface LoadedConfig {
  config: AppConfig;
  /** Absolute path of the file that was merged in, or null when only defaults applied. */
  configFile: string | null;
}

/**
 * Recursively merge `override` into `base`. Plain objects merge key by key;
 * arrays and scalars from `override` replace the base value.
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function readConfigFile(path: string, required: boolean): Record<string, unknown> | null {
  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${path}`, { details: { path } });
    }
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${path}`, {
      details: { path },
      cause: err,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${path}`, { details: { path } });
  }
  return parsed;
}

function formatIssues(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function readEnv(raw: Record<string, string | undefined>): EnvOverrides {
  try {
    return parseEnv(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid environment: ${formatIssues(err)}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Build the effective configuration: built-in defaults, then the JSON config
 * file, then environment overrides. The merged object is validated with zod
 * and any problem is reported as a {@link ConfigError}.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = readEnv(options.env ?? process.env);

  const explicitPath = options.configPath ?? env.DOCENRICH_CONFIG;
  const configFile = resolve(explicitPath ?? DEFAULT_CONFIG_FILE);
  const fileLayer = readConfigFile(configFile, explicitPath !== undefined);

  let merged = deepMerge({}, DEFAULT_CONFIG);
  if (fileLayer) merged = deepMerge(merged, fileLayer);
  merged = deepMerge(merged, envToConfigLayer(env));

  const result = appConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`, {
      details: { configFile: fileLayer ? configFile : null },
      cause: result.error,
    });
  }

  const config: AppConfig = result.data;
  return { config, configFile: fileLayer ? configFile : null };
}
