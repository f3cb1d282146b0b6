/**
 * Docker CLI client wrapper using execa
 */

import { execa } from "execa";
import type { ContainerInfo, ContainerMount } from "../types";
import { logger } from "../utils/logger";
import { sleep } from "../utils/retry";

export interface DockerRunResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

/**
 * Run a Docker command and return the result. Never rejects on a non-zero exit.
 */
export async function dockerRun(
  args: string[],
  options: { timeoutMs?: number } = {},
): Promise<DockerRunResult> {
  const result = await execa("docker", args, {
    reject: false,
    timeout: options.timeoutMs,
  });

  return {
    success: !result.failed && result.exitCode === 0,
    stdout: String(result.stdout ?? "").trim(),
    stderr: String(result.stderr ?? "").trim(),
    exitCode: result.exitCode ?? -1,
    timedOut: result.timedOut,
  };
}

/**
 * Check if Docker is available and running
 */
export async function isDockerAvailable(): Promise<boolean> {
  const result = await dockerRun(["info", "--format", "{{.ServerVersion}}"]);
  return result.success;
}

/**
 * IDs of running containers carrying `label=value`
 */
export async function listContainerIds(label: string, value: string): Promise<string[] | null> {
  const result = await dockerRun(["ps", "-q", "--no-trunc", "--filter", `label=${label}=${value}`]);
  if (!result.success) {
    logger.error(`Failed to list containers: ${result.stderr}`);
    return null;
  }
  return result.stdout.split("\n").filter(Boolean);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function asStringMap(value: unknown): Record<string, string> {
  const map: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === "string") map[key] = entry;
    }
  }
  return map;
}

/**
 * Parse the JSON array printed by `docker inspect`
 */
export function parseInspectOutput(stdout: string): ContainerInfo[] {
  const parsed: unknown = JSON.parse(stdout);
  const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

  return items.filter(isRecord).map((item) => {
    const state = isRecord(item.State) ? item.State : {};
    const config = isRecord(item.Config) ? item.Config : {};
    const hostConfig = isRecord(item.HostConfig) ? item.HostConfig : {};
    const restartPolicy = isRecord(hostConfig.RestartPolicy) ? hostConfig.RestartPolicy : {};
    const rawMounts: unknown[] = Array.isArray(item.Mounts) ? item.Mounts : [];

    const mounts: ContainerMount[] = rawMounts.filter(isRecord).map((m) => ({
      type: asString(m.Type),
      source: asString(m.Source),
      destination: asString(m.Destination),
    }));

    return {
      id: asString(item.Id),
      name: asString(item.Name).replace(/^\//, ""),
      state: asString(state.Status) || "unknown",
      labels: asStringMap(config.Labels),
      mounts,
      restartPolicy: asString(restartPolicy.Name) || null,
    };
  });
}

export async function inspectContainers(ids: string[]): Promise<ContainerInfo[] | null> {
  if (ids.length === 0) {
    return [];
  }
  const result = await dockerRun(["inspect", ...ids]);
  if (!result.success) {
    logger.error(`Failed to inspect containers: ${result.stderr}`);
    return null;
  }
  try {
    return parseInspectOutput(result.stdout);
  } catch (err) {
    logger.error("Failed to parse docker inspect output", err);
    return null;
  }
}

export async function isContainerRunning(containerId: string): Promise<boolean> {
  const result = await dockerRun(["inspect", "--format", "{{.State.Running}}", containerId]);
  return result.success && result.stdout === "true";
}

/**
 * Stop a container with the specified timeout
 * @param timeout - Timeout in seconds for graceful stop (default: 30)
 * @returns true if stopped successfully, false otherwise
 */
export async function stopContainer(containerId: string, timeout: number = 30): Promise<boolean> {
  logger.debug(`Stopping container ${containerId} with timeout ${timeout}s`);
  // docker escalates to SIGKILL itself after the timeout; the extra margin bounds a hung daemon
  const result = await dockerRun(["stop", "-t", timeout.toString(), containerId], {
    timeoutMs: (timeout + 15) * 1000,
  });
  if (!result.success) {
    logger.warn(
      `Failed to stop container ${containerId}${result.timedOut ? " (timed out)" : ""}: ${result.stderr}`,
    );
  }
  return result.success;
}

export async function killContainer(containerId: string): Promise<boolean> {
  logger.debug(`Force-stopping container ${containerId}`);
  const result = await dockerRun(["kill", containerId], { timeoutMs: 30_000 });
  if (!result.success) {
    logger.error(`Failed to kill container ${containerId}: ${result.stderr}`);
  }
  return result.success;
}

/**
 * Start a previously stopped container
 */
export async function startContainer(containerId: string): Promise<boolean> {
  logger.debug(`Starting container ${containerId}`);
  const result = await dockerRun(["start", containerId]);
  if (!result.success) {
    logger.error(`Failed to start container ${containerId}: ${result.stderr}`);
  }
  return result.success;
}

/**
 * Start a container with retry logic
 * @param retries - Number of attempts (default: 3)
 * @param retryDelay - Delay between attempts in ms (default: 1000)
 */
export async function startContainerWithRetry(
  start: (containerId: string) => Promise<boolean>,
  containerId: string,
  retries: number = 3,
  retryDelay: number = 1000,
): Promise<boolean> {
  for (let attempt = 1; attempt <= retries; attempt++) {
    if (await start(containerId)) {
      logger.debug(`Container ${containerId} started successfully`);
      return true;
    }

    if (attempt < retries) {
      logger.warn(
        `Failed to start container ${containerId} (attempt ${attempt}/${retries}), retrying in ${retryDelay}ms...`,
      );
      await sleep(retryDelay);
    }
  }

  logger.error(`Failed to start container ${containerId} after ${retries} attempts`);
  return false;
}
