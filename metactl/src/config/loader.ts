import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigurationError } from "../core/errors.js";
import type { MetactlConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "METACTL_";

type ConfigObject = Record<string, unknown>;

function isConfigObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isConfigObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isConfigObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): ConfigObject {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isConfigObject(parsed)) {
    throw new ConfigurationError(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/** Apply METACTL_ prefixed environment variable overrides. Integer-looking values become numbers. */
function applyEnvOverrides(config: ConfigObject, env: NodeJS.ProcessEnv): ConfigObject {
  const result: ConfigObject = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // METACTL_VERSION_MANIFEST_URL → version_manifest_url
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = /^\d+$/.test(value) ? Number(value) : value;
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← METACTL_* environment variables.
 *
 * @param envName - Optional environment name; loads `config/{envName}.yaml` as an override layer.
 * @param configDir - Optional config directory override.
 * @throws {ConfigurationError} a layer cannot be parsed or the merged result is invalid
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): MetactlConfig {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  merged = applyEnvOverrides(merged, env);

  const res = validateConfig(merged);
  if (!res.valid) {
    throw new ConfigurationError(`Invalid configuration in ${dir}: ${res.errors}`);
  }
  return res.config;
}
