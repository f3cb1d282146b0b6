/**
 * Configuration validation
 */

import { ConfigError } from "../errors";
import type { GuardConfig } from "../types";
import { isLogLevel } from "../utils/logger";

export { ConfigError };

type Section = Record<string, unknown>;
type Validator = (config: Section) => void;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(c: Section, key: string): Section {
  const value = c[key];
  if (!isSection(value)) {
    throw new ConfigError(`Config must have a '${key}' section`);
  }
  return value;
}

function requireString(s: Section, key: string, where: string): void {
  if (typeof s[key] !== "string" || s[key] === "") {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
}

function requireNumber(s: Section, key: string, where: string, min: number, max?: number): void {
  const value = s[key];
  if (typeof value !== "number" || !Number.isFinite(value) || value < min) {
    throw new ConfigError(`${where}.${key} must be a number >= ${min}`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigError(`${where}.${key} must be a number <= ${max}`);
  }
}

function optionalEndpoint(s: Section, key: string, where: string, fields: string[]): void {
  const value = s[key];
  if (value === undefined) return;
  if (!isSection(value)) {
    throw new ConfigError(`${where}.${key} must be an object`);
  }
  for (const field of fields) {
    requireString(value, field, `${where}.${key}`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  logLevel: (c) => {
    if (c.logLevel !== undefined && !isLogLevel(c.logLevel)) {
      throw new ConfigError("logLevel must be one of debug, info, warn, error");
    }
  },

  paths: (c) => {
    requireString(section(c, "database"), "path", "database");
    requireString(section(c, "local"), "path", "local");
    if (typeof c.workDir !== "string" || c.workDir === "") {
      throw new ConfigError("workDir must be a non-empty string");
    }
  },

  docker: (c) => {
    const docker = section(c, "docker");
    requireString(docker, "label", "docker");
    requireString(docker, "projectLabel", "docker");
    if (typeof docker.hostRoot !== "string") {
      throw new ConfigError("docker.hostRoot must be a string");
    }
    if (
      !Array.isArray(docker.excludePaths) ||
      !docker.excludePaths.every((p) => typeof p === "string")
    ) {
      throw new ConfigError("docker.excludePaths must be an array of strings");
    }
    requireNumber(docker, "stopTimeout", "docker", 1);
    requireNumber(docker, "restartRetries", "docker", 1);
    requireNumber(docker, "restartRetryDelay", "docker", 0);
  },

  archive: (c) => {
    const archive = section(c, "archive");
    if (typeof archive.prefix !== "string" || !/^[a-z]+$/.test(archive.prefix)) {
      throw new ConfigError("archive.prefix must contain only lowercase letters");
    }
    requireNumber(archive, "compression", "archive", 1, 9);
    if (archive.password !== undefined && typeof archive.password !== "string") {
      throw new ConfigError("archive.password must be a string");
    }
  },

  remote: (c) => {
    const remote = section(c, "remote");
    if (typeof remote.enabled !== "boolean") {
      throw new ConfigError("remote.enabled must be a boolean");
    }
    if (remote.enabled) {
      requireString(remote, "name", "remote");
      requireString(remote, "configPath", "remote");
      if (typeof remote.destination !== "string") {
        throw new ConfigError("remote.destination must be a string");
      }
    }
    requireNumber(remote, "retries", "remote", 1);
    requireNumber(remote, "retryDelay", "remote", 0);
    requireNumber(remote, "timeout", "remote", 1);
  },

  retention: (c) => {
    requireNumber(section(c, "retention"), "maxAgeDays", "retention", 1);
  },

  schedules: (c) => {
    for (const [name, schedule] of Object.entries(section(c, "schedules"))) {
      validateSchedule(name, schedule);
    }
  },

  notifications: (c) => {
    const notifications = section(c, "notifications");
    optionalEndpoint(notifications, "gotify", "notifications", ["url", "token"]);
    optionalEndpoint(notifications, "webhook", "notifications", ["url"]);
    optionalEndpoint(notifications, "healthcheck", "notifications", ["url"]);
  },

  portainer: (c) => {
    optionalEndpoint(c, "portainer", "config", ["url", "token"]);
  },
};

function validateSchedule(name: string, schedule: unknown): void {
  if (!isSection(schedule)) {
    throw new ConfigError(`schedules.${name} must be an object`);
  }

  const sched = schedule;

  if (!sched.cron || typeof sched.cron !== "string") {
    throw new ConfigError(`schedules.${name}.cron must be a string`);
  }

  if (sched.kind !== "project" && sched.kind !== "full" && sched.kind !== "config") {
    throw new ConfigError(`schedules.${name}.kind must be 'project', 'full' or 'config'`);
  }

  if (sched.kind === "project" && (typeof sched.target !== "string" || sched.target === "")) {
    throw new ConfigError(`schedules.${name}.target is required when kind is 'project'`);
  }

  if (sched.enabled !== undefined && typeof sched.enabled !== "boolean") {
    throw new ConfigError(`schedules.${name}.enabled must be a boolean`);
  }
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is GuardConfig {
  if (!isSection(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
