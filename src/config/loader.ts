import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import { CONFIG_KEYS, type MigrateConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

/** Looked up in the working directory when no --config is given. */
export const DEFAULT_CONFIG_FILE = "graceful-migrate.yaml";

const ENV_PREFIX = "MIGRATE_";

type Env = Record<string, string | undefined>;

/** Load a YAML file; `{}` if it does not exist. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Apply MIGRATE_ prefixed environment variable overrides for known keys only,
 * e.g. MIGRATE_SETTLE_DELAY_SECONDS → settle_delay_seconds.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result = { ...config };
  for (const key of CONFIG_KEYS) {
    const value = env[ENV_PREFIX + key.toUpperCase()];
    if (value !== undefined && value !== "") result[key] = value;
  }
  return result;
}

/**
 * Load layered raw config: YAML file ← environment variables ← explicit
 * overrides. Nothing is validated or defaulted here.
 *
 * @param configPath - Explicit file; must exist. Without it,
 *                     `graceful-migrate.yaml` in `cwd` is used when present.
 */
export function loadConfig(opts: {
  configPath?: string;
  cwd?: string;
  env?: Env;
  overrides?: Partial<Record<keyof MigrateConfig, unknown>>;
} = {}): Record<string, unknown> {
  const cwd = opts.cwd ?? process.cwd();

  let filePath: string;
  if (opts.configPath) {
    filePath = path.resolve(cwd, opts.configPath);
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
  } else {
    filePath = path.join(cwd, DEFAULT_CONFIG_FILE);
  }

  const merged = applyEnvOverrides(loadYaml(filePath), opts.env ?? process.env);
  for (const [key, value] of Object.entries(opts.overrides ?? {})) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

/** Load, validate and default the config; throws ConfigError when invalid. */
export async function resolveConfig(opts: Parameters<typeof loadConfig>[0] = {}): Promise<MigrateConfig> {
  const raw = loadConfig(opts);
  const res = await validateConfig(raw);
  if (!res.valid) {
    throw new ConfigError(`Invalid configuration: ${res.errors}`);
  }
  return res.config;
}

/** Bearer token from the environment variable the config names; "" if unset. */
export function resolveToken(config: MigrateConfig, env: Env = process.env): string {
  return env[config.token_env] ?? "";
}
