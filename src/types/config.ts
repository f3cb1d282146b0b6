/**
 * Configuration type definitions for backup-guard
 */

import type { LogLevel } from "../utils/logger";
import type { JobKind } from "./job";

export interface DatabaseConfig {
  path: string;
}

export interface LocalStorageConfig {
  /** Local archive store: failed uploads and local-only archives end up here */
  path: string;
}

/**
 * Container discovery and stop/restart behaviour
 */
export interface DockerConfig {
  /** Eligibility label; a container is backed up only while it is set to "true" */
  label: string;
  /** Label used to group containers into one workload */
  projectLabel: string;
  /** Prefix under which the host filesystem is mounted (empty to use paths as-is) */
  hostRoot: string;
  /** Mount sources that are never copied */
  excludePaths: string[];
  /** Timeout in seconds for graceful stop before force stop (default: 30) */
  stopTimeout: number;
  /** Number of times to retry starting a container (default: 3) */
  restartRetries: number;
  /** Delay in milliseconds between restart retries (default: 1000) */
  restartRetryDelay: number;
}

export interface ArchiveConfig {
  prefix: string;
  /** gzip effort, 1-9 */
  compression: number;
  password?: string;
}

export interface RemoteConfig {
  enabled: boolean;
  /** rclone remote name */
  name: string;
  /** Destination path on the remote */
  destination: string;
  configPath: string;
  retries: number;
  /** Base delay in milliseconds; doubles on each retry */
  retryDelay: number;
  /** Upload timeout in seconds */
  timeout: number;
}

export interface RetentionConfig {
  maxAgeDays: number;
}

export interface ScheduleConfig {
  cron: string;
  kind: JobKind;
  /** Workload name, required when kind is "project" */
  target?: string;
  enabled?: boolean;
  timezone?: string;
}

export interface GotifyConfig {
  url: string;
  token: string;
  priority?: number;
}

export interface NotificationsConfig {
  gotify?: GotifyConfig;
  webhook?: { url: string };
  healthcheck?: { url: string };
}

export interface PortainerConfig {
  url: string;
  token: string;
}

export interface GuardConfig {
  version: string;
  logLevel?: LogLevel;
  database: DatabaseConfig;
  workDir: string;
  local: LocalStorageConfig;
  docker: DockerConfig;
  archive: ArchiveConfig;
  remote: RemoteConfig;
  retention: RetentionConfig;
  schedules: Record<string, ScheduleConfig>;
  notifications: NotificationsConfig;
  portainer?: PortainerConfig;
}
