import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { CONFIG_SCHEMA } from "./validator.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "VCSPIN_";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new Error(`Config file must contain a mapping: ${filePath}`);
  return parsed;
}

const CONFIG_KEYS = new Set(Object.keys(CONFIG_SCHEMA.properties));

/**
 * Apply VCSPIN_ prefixed environment variable overrides. Only names that map
 * to a config key are read; other VCSPIN_ variables are left alone.
 */
function applyEnvOverrides(config: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // VCSPIN_PIN_MODE → pin_mode
    const name = key.slice(ENV_PREFIX.length).toLowerCase();
    if (CONFIG_KEYS.has(name)) result[name] = value;
  }
  return result;
}

/**
 * Load layered config:
 * bundled base.yaml ← {configDir}/base.yaml ← {configDir}/{envName}.yaml ← VCSPIN_* variables.
 *
 * The result is unvalidated; pass it through validateConfig.
 *
 * @param envName - Optional environment name (e.g. "ci"), loaded from the
 *                  bundled directory when no configDir is given.
 */
export function loadConfig(
  envName?: string,
  configDir?: string,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  let merged = loadYaml(path.join(CONFIG_DIR, "base.yaml"));

  const dir = configDir ? path.resolve(configDir) : CONFIG_DIR;
  if (dir !== CONFIG_DIR) {
    merged = { ...merged, ...loadYaml(path.join(dir, "base.yaml")) };
  }
  if (envName) {
    merged = { ...merged, ...loadYaml(path.join(dir, `${envName}.yaml`)) };
  }

  return applyEnvOverrides(merged, env);
}
