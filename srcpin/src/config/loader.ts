import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "SRCPIN_";

export type RawConfig = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new Error(`Config file is not a mapping: ${filePath}`);
  return parsed;
}

function coerce(value: string): string | number {
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) : value;
}

/**
 * Apply SRCPIN_ prefixed environment variable overrides.
 * `__` separates nesting levels: SRCPIN_HTTP__TIMEOUT_MS → http.timeout_ms.
 */
export function applyEnvOverrides(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let override: RawConfig = { [segments[segments.length - 1]]: coerce(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      override = { [segments[i]]: override };
    }
    result = deepMerge(result, override);
  }
  return result;
}

/** GITHUB_TOKEN fills in github.token when no layer set one. */
function applyGitHubToken(config: RawConfig, env: NodeJS.ProcessEnv): RawConfig {
  const token = env.GITHUB_TOKEN;
  if (!token) return config;
  const github = config.github;
  if (isPlainObject(github) && typeof github.token === "string" && github.token !== "") return config;
  return deepMerge(config, { github: { token } });
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← SRCPIN_* variables ← GITHUB_TOKEN.
 * The result is unvalidated; pass it through `validateConfig`.
 */
export function loadConfig(opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {}): RawConfig {
  const dir = opts.configDir ?? CONFIG_DIR;
  const env = opts.env ?? process.env;

  let merged = loadYaml(path.join(dir, "base.yaml"));

  if (opts.envName) {
    const envFile = path.join(dir, `${opts.envName}.yaml`);
    if (!fs.existsSync(envFile)) throw new Error(`Config environment not found: ${envFile}`);
    merged = deepMerge(merged, loadYaml(envFile));
  }

  merged = applyEnvOverrides(merged, env);
  return applyGitHubToken(merged, env);
}
