/**
 * Sync manager: upload an archive, prove it landed, then reclaim local space
 */

import { rm } from "node:fs/promises";
import * as path from "node:path";
import { describeError, UploadError } from "../../errors";
import type { Archive, RemoteConfig, RemoteStore } from "../../types";
import { createLogger } from "../../utils/logger";
import { withRetry } from "../../utils/retry";

const log = createLogger("sync");

export interface UploadConfirmation {
  remotePath: string;
  sizeBytes: number;
  attempts: number;
}

export type SyncOptions = Pick<RemoteConfig, "retries" | "retryDelay">;

export class SyncManager {
  constructor(
    private readonly remote: RemoteStore,
    private readonly options: SyncOptions,
  ) {}

  get description(): string {
    return this.remote.description;
  }

  /**
   * Upload `archive` to `destinationDir` on the remote. The local file is
   * deleted only after the remote entry exists with the same size.
   */
  async upload(archive: Archive, destinationDir = ""): Promise<UploadConfirmation> {
    const remotePath = destinationDir ? path.posix.join(destinationDir, archive.name) : archive.name;
    let attempts = 0;

    try {
      await withRetry(
        async (attempt) => {
          attempts = attempt;
          await this.remote.copy(archive.path, remotePath);
          await this.verify(remotePath, archive.sizeBytes);
        },
        {
          attempts: Math.max(1, this.options.retries),
          initialDelayMs: this.options.retryDelay,
          onRetry: (attempt, error, delayMs) =>
            log.warn(
              `Upload attempt ${attempt} of ${archive.name} failed: ${describeError(error).message}; retrying in ${delayMs}ms`,
            ),
        },
      );
    } catch (err) {
      throw new UploadError(
        `Upload of ${archive.name} to ${this.remote.description} failed after ${attempts} attempt(s): ${describeError(err).message}`,
        archive.path,
        err,
      );
    }

    log.info(`Uploaded ${archive.name} to ${this.remote.description} (verified ${archive.sizeBytes} bytes)`);
    await rm(archive.path, { force: true });
    log.debug(`Deleted local archive ${archive.path}`);

    return { remotePath, sizeBytes: archive.sizeBytes, attempts };
  }

  private async verify(remotePath: string, expectedSize: number): Promise<void> {
    const dir = path.posix.dirname(remotePath);
    const name = path.posix.basename(remotePath);
    const entries = await this.remote.list(dir === "." ? "" : dir);
    const entry = entries.find((e) => e.name === name);

    if (!entry) {
      throw new Error(`${remotePath} not found on remote after copy`);
    }
    if (entry.size !== expectedSize) {
      throw new Error(`Size mismatch for ${remotePath}: remote ${entry.size} bytes, local ${expectedSize} bytes`);
    }
  }
}
