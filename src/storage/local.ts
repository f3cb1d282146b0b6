/**
 * Local filesystem archive store
 *
 * Holds archives that could not be uploaded, or every archive when the remote
 * is disabled.
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, readdir, rename, stat, unlink } from "node:fs/promises";
import * as path from "node:path";
import type { LocalStorageConfig, RemoteEntry } from "../types";
import { computeFileChecksum } from "../utils/crypto";
import { logger } from "../utils/logger";
import { ARCHIVE_EXTENSION } from "../utils/naming";

export interface LocalEntry extends RemoteEntry {
  path: string;
}

function isCrossDeviceError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EXDEV";
}

export class LocalArchiveStore {
  constructor(private readonly config: LocalStorageConfig) {}

  get root(): string {
    return this.config.path;
  }

  pathFor(archiveName: string): string {
    return path.join(this.config.path, archiveName);
  }

  async ensureDir(): Promise<void> {
    await mkdir(this.config.path, { recursive: true });
  }

  /**
   * Move an archive into the store, verifying the checksum when a copy was needed
   */
  async moveInto(sourcePath: string, archiveName: string = path.basename(sourcePath)): Promise<string> {
    await this.ensureDir();
    const destPath = this.pathFor(archiveName);

    try {
      await rename(sourcePath, destPath);
    } catch (err) {
      if (!isCrossDeviceError(err)) throw err;

      logger.debug(`Work dir is on another device, copying archive to ${destPath}`);
      await copyFile(sourcePath, destPath);
      const [sourceChecksum, destChecksum] = await Promise.all([
        computeFileChecksum(sourcePath),
        computeFileChecksum(destPath),
      ]);
      if (sourceChecksum !== destChecksum) {
        await unlink(destPath);
        throw new Error("Checksum mismatch after copying to local storage");
      }
      await unlink(sourcePath);
    }

    logger.info(`Saved to local storage: ${destPath}`);
    return destPath;
  }

  /**
   * List archive files in the store
   */
  async list(): Promise<LocalEntry[]> {
    if (!existsSync(this.config.path)) return [];

    const names = await readdir(this.config.path);
    const entries: LocalEntry[] = [];
    for (const name of names) {
      if (!name.endsWith(ARCHIVE_EXTENSION)) continue;
      const filePath = this.pathFor(name);
      const stats = await stat(filePath);
      if (!stats.isFile()) continue;
      entries.push({ name, path: filePath, size: stats.size, modTime: stats.mtime });
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  async exists(archiveName: string): Promise<boolean> {
    return existsSync(this.pathFor(archiveName));
  }

  async delete(filePath: string): Promise<void> {
    if (!existsSync(filePath)) {
      logger.warn(`Local file not found (already deleted?): ${filePath}`);
      return;
    }
    await unlink(filePath);
    logger.debug(`Deleted local file: ${filePath}`);
  }
}
