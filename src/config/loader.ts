import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigError } from "../errors.js";
import type { HygieneConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "RELEASE_HYGIENE_";

export type RawConfig = Record<string, unknown>;

/** Keys that may be overridden through `RELEASE_HYGIENE_*` variables. */
const ENV_KEYS = new Set([
  "remote",
  "stable_count",
  "automation_author",
  "label_prefix",
  "api_url",
  "page_size",
  "repository",
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let doc: unknown;
  try {
    doc = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`Failed to parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
  }
  return doc;
}

/** Apply RELEASE_HYGIENE_ prefixed environment variable overrides. */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const result: RawConfig = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // RELEASE_HYGIENE_STABLE_COUNT → stable_count
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!ENV_KEYS.has(configKey)) continue;
    result[configKey] = /^\d+$/.test(value) ? Number(value) : value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 *
 * @param envName - Optional overlay, loaded from `{configDir}/{envName}.yaml`.
 * @param configDir - Defaults to the bundled `config/` directory.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}

/**
 * Load, apply command-line overrides, and validate. Throws {@link ConfigError}
 * listing every schema violation.
 */
export function resolveConfig(opts: {
  envName?: string;
  configDir?: string;
  overrides?: Partial<HygieneConfig>;
  env?: NodeJS.ProcessEnv;
}): HygieneConfig {
  const layered = loadConfig(opts.envName, opts.configDir, opts.env ?? process.env);
  const result = validateConfig(deepMerge(layered, opts.overrides ?? {}));
  if (!result.valid) {
    throw new ConfigError(`Config invalid: ${result.errors}`);
  }
  return result.config;
}
