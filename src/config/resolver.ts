/**
 * Configuration path resolution and schedule target resolution
 */

import * as path from "node:path";
import type { GuardConfig, JobTarget, ScheduleConfig } from "../types";
import { ConfigError } from "../errors";

/**
 * Resolve relative paths in config to absolute paths
 */
export function resolvePaths(config: GuardConfig, baseDir: string): GuardConfig {
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.resolve(baseDir, p));

  return {
    ...config,
    database: { ...config.database, path: resolve(config.database.path) },
    workDir: resolve(config.workDir),
    local: { ...config.local, path: resolve(config.local.path) },
    remote: { ...config.remote, configPath: resolve(config.remote.configPath) },
  };
}

export function resolveScheduleTarget(name: string, schedule: ScheduleConfig): JobTarget {
  switch (schedule.kind) {
    case "project":
      if (!schedule.target) {
        throw new ConfigError(`schedules.${name}.target is required when kind is 'project'`);
      }
      return { kind: "project", workload: schedule.target };
    case "full":
      return { kind: "full" };
    case "config":
      return { kind: "config" };
  }
}

/**
 * Parse a target from user input: a workload name, `all`, or `config`
 */
export function parseTargetArg(value: string): JobTarget {
  if (value === "all" || value === "@all") return { kind: "full" };
  if (value === "config" || value === "@config") return { kind: "config" };
  return { kind: "project", workload: value };
}
