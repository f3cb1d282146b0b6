/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { GuardConfig } from "../types";
import { logger } from "../utils/logger";
import { DEFAULT_CONFIG, deepMerge, isPlainObject, type PlainObject } from "./defaults";
import { applyEnvOverrides, type Env } from "./env";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "backup-guard.config.yaml",
  "backup-guard.config.yml",
  "backup-guard.config.json",
];

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string, env: Env = process.env): Promise<GuardConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const ext = path.extname(absolutePath).toLowerCase();

  const parsed = parseConfigContent(content, ext);
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  return buildConfig(parsed, path.dirname(absolutePath), env);
}

/**
 * Config assembled from defaults and environment only, for env-file deployments
 */
export function configFromEnv(env: Env = process.env, baseDir: string = process.cwd()): GuardConfig {
  return buildConfig({ version: "1.0" }, baseDir, env);
}

function buildConfig(parsed: PlainObject, baseDir: string, env: Env): GuardConfig {
  const merged = deepMerge({ ...DEFAULT_CONFIG }, parsed);
  validateConfig(merged);
  const withEnv = applyEnvOverrides(merged, env);
  validateConfig(withEnv);
  return resolvePaths(withEnv, baseDir);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Check if running inside a Docker container
 */
function isRunningInDocker(): boolean {
  return existsSync("/.dockerenv");
}

function isNonEmptyFile(filePath: string): boolean {
  try {
    const stats = statSync(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

/**
 * Find a config file in the given directory or standard locations
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchDirs = [startDir];

  // Only check /config when running in Docker
  if (isRunningInDocker()) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (isNonEmptyFile(configPath)) {
        return configPath;
      }
    }
  }

  return null;
}

/**
 * Find and load a config file, falling back to defaults and environment
 */
export async function findAndLoadConfig(
  configPath?: string,
  env: Env = process.env,
): Promise<GuardConfig> {
  if (configPath) {
    return loadConfig(configPath, env);
  }

  const found = findConfigFile();
  if (!found) {
    logger.debug("No config file found, using defaults and environment variables");
    return configFromEnv(env);
  }

  return loadConfig(found, env);
}
