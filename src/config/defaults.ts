/**
 * Default configuration values
 */

import type { GuardConfig } from "../types";

// version is intentionally NOT defaulted - it must be specified in a config file
export const DEFAULT_CONFIG: Omit<GuardConfig, "version"> = {
  database: { path: "./data/backup-guard.db" },
  workDir: "/backups/work",
  local: { path: "/backups/archives" },
  docker: {
    label: "backup.enable",
    projectLabel: "com.docker.compose.project",
    hostRoot: "/hostfs",
    excludePaths: ["/var/run/docker.sock"],
    stopTimeout: 30,
    restartRetries: 3,
    restartRetryDelay: 1000,
  },
  archive: {
    prefix: "guard",
    compression: 1,
  },
  remote: {
    enabled: true,
    name: "remote",
    destination: "backups",
    configPath: "/app/rclone.conf",
    retries: 3,
    retryDelay: 2000,
    timeout: 3600,
  },
  retention: { maxAgeDays: 7 },
  schedules: {},
  notifications: {},
};

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
