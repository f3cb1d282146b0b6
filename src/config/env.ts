/**
 * Environment variable overrides
 *
 * Lets a container deployment be configured from an env file alone. Values
 * set here win over the config file.
 */

import type { GuardConfig } from "../types";
import { isLogLevel } from "../utils/logger";
import { ConfigError } from "../errors";

export type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

function parseNumber(env: Env, key: string): number | undefined {
  const raw = nonEmpty(env[key]);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Convert `HH:MM` into a daily cron expression
 */
export function dailyCronFromTime(time: string): string {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim());
  const hours = Number(match?.[1]);
  const minutes = Number(match?.[2]);
  if (!match || hours > 23 || minutes > 59) {
    throw new ConfigError(`SCHEDULE_TIME must be HH:MM, got "${time}"`);
  }
  return `${minutes} ${hours} * * *`;
}

export function applyEnvOverrides(config: GuardConfig, env: Env = process.env): GuardConfig {
  const next: GuardConfig = {
    ...config,
    database: { ...config.database },
    local: { ...config.local },
    docker: { ...config.docker },
    archive: { ...config.archive },
    remote: { ...config.remote },
    retention: { ...config.retention },
    schedules: { ...config.schedules },
    notifications: { ...config.notifications },
  };

  next.database.path = nonEmpty(env.DATABASE_PATH) ?? next.database.path;
  next.workDir = nonEmpty(env.WORK_DIR) ?? next.workDir;
  next.local.path = nonEmpty(env.LOCAL_ARCHIVE_PATH) ?? next.local.path;

  next.docker.label = nonEmpty(env.BACKUP_LABEL) ?? next.docker.label;
  next.docker.hostRoot = env.HOST_ROOT !== undefined ? env.HOST_ROOT.trim() : next.docker.hostRoot;
  next.docker.stopTimeout = parseNumber(env, "STOP_TIMEOUT") ?? next.docker.stopTimeout;

  next.archive.password = nonEmpty(env.BACKUP_PASSWORD) ?? next.archive.password;
  next.archive.compression = parseNumber(env, "COMPRESSION_LEVEL") ?? next.archive.compression;

  next.remote.name = nonEmpty(env.RCLONE_REMOTE_NAME) ?? next.remote.name;
  next.remote.destination = nonEmpty(env.RCLONE_DESTINATION) ?? next.remote.destination;
  next.remote.configPath = nonEmpty(env.RCLONE_CONFIG_PATH) ?? next.remote.configPath;

  next.retention.maxAgeDays = parseNumber(env, "RETENTION_DAYS") ?? next.retention.maxAgeDays;

  const gotifyUrl = nonEmpty(env.GOTIFY_URL);
  const gotifyToken = nonEmpty(env.GOTIFY_TOKEN);
  if (gotifyUrl && gotifyToken) {
    next.notifications.gotify = { ...next.notifications.gotify, url: gotifyUrl, token: gotifyToken };
  }
  const webhookUrl = nonEmpty(env.WEBHOOK_URL);
  if (webhookUrl) {
    next.notifications.webhook = { url: webhookUrl };
  }
  const healthcheckUrl = nonEmpty(env.HEALTHCHECK_URL);
  if (healthcheckUrl) {
    next.notifications.healthcheck = { url: healthcheckUrl };
  }

  const portainerUrl = nonEmpty(env.PORTAINER_URL);
  const portainerToken = nonEmpty(env.PORTAINER_TOKEN);
  if (portainerUrl && portainerToken) {
    next.portainer = { url: portainerUrl, token: portainerToken };
  }

  if (nonEmpty(env.SCHEDULE_ENABLE)?.toLowerCase() === "true") {
    next.schedules.daily = {
      cron: dailyCronFromTime(nonEmpty(env.SCHEDULE_TIME) ?? "03:00"),
      kind: "full",
      enabled: true,
    };
  }

  const logLevel = nonEmpty(env.LOG_LEVEL)?.toLowerCase();
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
    }
    next.logLevel = logLevel;
  }

  return next;
}
