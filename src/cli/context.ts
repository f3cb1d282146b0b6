/**
 * Shared command setup: config, logging, database and engine
 */

import { findAndLoadConfig } from "../config";
import { createEngine, type Engine } from "../core";
import { closeDatabase, initDatabase } from "../db";
import { ConfigError, DecryptionError, describeError, JobAlreadyRunningError, WorkloadNotFoundError } from "../errors";
import type { GuardConfig } from "../types";
import { setLogLevel } from "../utils/logger";
import { ui } from "./ui";

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

export interface CommandContext {
  config: GuardConfig;
  engine: Engine;
  close(): void;
}

export async function loadCommandConfig(options: CommonOptions): Promise<GuardConfig> {
  const config = await findAndLoadConfig(options.config);
  if (options.verbose) {
    setLogLevel("debug");
  } else if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  return config;
}

export async function createCommandContext(options: CommonOptions): Promise<CommandContext> {
  const config = await loadCommandConfig(options);
  await initDatabase(config.database.path);
  const engine = createEngine(config);
  return { config, engine, close: closeDatabase };
}

/**
 * 1 for configuration and usage mistakes, 2 for runtime failures
 */
export function exitCodeFor(error: unknown): number {
  if (
    error instanceof ConfigError ||
    error instanceof WorkloadNotFoundError ||
    error instanceof JobAlreadyRunningError ||
    error instanceof DecryptionError
  ) {
    return 1;
  }
  return 2;
}

export function reportCommandError(action: string, error: unknown, verbose?: boolean): number {
  const { code, message } = describeError(error);
  ui.error(`${action} failed: ${message} ${code !== "Error" ? `(${code})` : ""}`.trimEnd());
  if (verbose) {
    console.error(error);
  }
  return exitCodeFor(error);
}
