import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { ConfigurationError } from "../utils/errors.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const ENV_PREFIX = "SWEEP_";

type ConfigObject = Record<string, unknown>;

function isObject(value: unknown): value is ConfigObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigObject {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Cannot parse ${filePath}`, [e instanceof Error ? e.message : String(e)]);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isObject(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Apply SWEEP_ prefixed environment variable overrides.
 * A double underscore descends one level: SWEEP_SOURCE__HOST → source.host.
 * Values are read as YAML scalars so numbers and booleans keep their type.
 */
export function applyEnvOverrides(config: ConfigObject, env: NodeJS.ProcessEnv = process.env): ConfigObject {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let override: ConfigObject = { [segments[segments.length - 1]]: parseScalar(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

function parseScalar(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return parsed === null || isObject(parsed) || Array.isArray(parsed) ? value : parsed;
  } catch {
    return value;
  }
}

/**
 * Load layered config: base.yaml ← {profile}.yaml ← environment variables.
 *
 * The result is unvalidated; pass it through validateConfig before use.
 */
export function loadConfig(profile?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigObject {
  const dir = configDir ?? CONFIG_DIR;

  // Layer 1: base.yaml
  const base = loadYaml(path.join(dir, "base.yaml"));

  // Layer 2: bench profile override
  let merged = base;
  if (profile) {
    const profilePath = path.join(dir, `${profile}.yaml`);
    if (!fs.existsSync(profilePath)) {
      throw new ConfigurationError(`Profile not found: ${profilePath}`);
    }
    merged = deepMerge(base, loadYaml(profilePath));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}

export function defaultConfigDir(): string {
  return CONFIG_DIR;
}
