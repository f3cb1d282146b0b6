/**
 * Remote store backed by the rclone CLI
 */

import { existsSync, statSync } from "node:fs";
import * as path from "node:path";
import { execa } from "execa";
import type { RemoteConfig, RemoteEntry, RemoteStore } from "../types";
import { logger } from "../utils/logger";

export interface RcloneResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | undefined;
  timedOut: boolean;
}

/**
 * A mounted rclone config is sometimes a directory holding rclone.conf
 */
export function resolveRcloneConfigPath(configPath: string): string {
  if (existsSync(configPath) && statSync(configPath).isDirectory()) {
    return path.join(configPath, "rclone.conf");
  }
  return configPath;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse `rclone lsjson` output, keeping files only
 */
export function parseLsjsonOutput(stdout: string): RemoteEntry[] {
  const parsed: unknown = JSON.parse(stdout || "[]");
  if (!Array.isArray(parsed)) {
    throw new Error("Unexpected rclone lsjson output");
  }

  const entries: RemoteEntry[] = [];
  for (const item of parsed) {
    if (!isRecord(item) || item.IsDir === true) continue;
    const name = typeof item.Name === "string" ? item.Name : null;
    if (!name) continue;

    const size = typeof item.Size === "number" ? item.Size : 0;
    let modTime: Date | null = null;
    if (typeof item.ModTime === "string") {
      const parsedTime = new Date(item.ModTime);
      modTime = Number.isNaN(parsedTime.getTime()) ? null : parsedTime;
    }
    entries.push({ name, size, modTime });
  }
  return entries;
}

export class RcloneRemoteStore implements RemoteStore {
  private readonly configPath: string;

  constructor(private readonly config: RemoteConfig) {
    this.configPath = resolveRcloneConfigPath(config.configPath);
  }

  get description(): string {
    return `${this.config.name}:${this.config.destination}`;
  }

  /**
   * Full rclone path for a path relative to the destination root
   */
  remotePath(relativePath: string): string {
    const base = this.config.destination.replace(/\/+$/, "");
    const rel = relativePath.replace(/^\/+/, "");
    const joined = rel ? (base ? `${base}/${rel}` : rel) : base;
    return `${this.config.name}:${joined}`;
  }

  async run(args: string[], timeoutSeconds?: number): Promise<RcloneResult> {
    const fullArgs = [...args, "--config", this.configPath];
    logger.debug(`rclone ${fullArgs.join(" ")}`);

    const result = await execa("rclone", fullArgs, {
      reject: false,
      timeout: timeoutSeconds ? timeoutSeconds * 1000 : undefined,
    });

    return {
      success: result.exitCode === 0 && !result.timedOut,
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
    };
  }

  private async runOrThrow(action: string, args: string[], timeoutSeconds?: number): Promise<RcloneResult> {
    const result = await this.run(args, timeoutSeconds);
    if (!result.success) {
      const reason = result.timedOut
        ? `timed out after ${timeoutSeconds}s`
        : result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new Error(`rclone ${action} failed: ${reason}`);
    }
    return result;
  }

  async copy(localPath: string, remotePath: string): Promise<void> {
    await this.runOrThrow("copyto", ["copyto", localPath, this.remotePath(remotePath)], this.config.timeout);
  }

  async list(remotePath: string): Promise<RemoteEntry[]> {
    const result = await this.runOrThrow("lsjson", ["lsjson", "--files-only", this.remotePath(remotePath)]);
    return parseLsjsonOutput(result.stdout);
  }

  async delete(remotePath: string): Promise<void> {
    await this.runOrThrow("deletefile", ["deletefile", this.remotePath(remotePath)]);
  }

  async fetch(remotePath: string, localPath: string): Promise<void> {
    await this.runOrThrow("copyto", ["copyto", this.remotePath(remotePath), localPath], this.config.timeout);
  }
}
