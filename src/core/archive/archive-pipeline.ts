/**
 * Archive pipeline: staged snapshot -> tar.gz -> encrypted archive
 */

import { existsSync } from "node:fs";
import { mkdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import { CompressionError, describeError } from "../../errors";
import type { Archive, ArchiveConfig, JobKind } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { createLogger } from "../../utils/logger";
import { generateArchiveName } from "../../utils/naming";
import { encryptFile } from "./encryption";

const log = createLogger("archive");

export interface ArchiveContext {
  jobId: string;
  /** Target name used in the archive name */
  targetName: string;
  kind: JobKind;
  /** Directory receiving the archive */
  outputDir: string;
  now?: Date;
}

/**
 * Write a gzip-compressed tarball of `entries` to `outputPath`
 */
export async function createTarGzip(entries: string[], outputPath: string, level: number): Promise<void> {
  if (entries.length === 0) {
    throw new CompressionError("No entries to archive");
  }

  const tarArgs = ["-cf", "-"];
  for (const entry of entries) {
    tarArgs.push("-C", path.dirname(entry), path.basename(entry));
  }

  log.debug(`Creating tar.gz archive with compression level ${level}`);
  try {
    await execa("tar", tarArgs).pipe("gzip", [`-${level}`], { stdout: { file: outputPath } });
  } catch (err) {
    await rm(outputPath, { force: true });
    throw new CompressionError(`Failed to create archive: ${describeError(err).message}`, {
      cause: err,
    });
  }
}

export class ArchivePipeline {
  constructor(private readonly config: ArchiveConfig) {}

  /**
   * Compress and encrypt the staging paths into one archive
   */
  async archive(stagingPaths: string[], passphrase: string, context: ArchiveContext): Promise<Archive> {
    const missing = stagingPaths.filter((p) => !existsSync(p));
    if (missing.length > 0) {
      throw new CompressionError(`Staging paths missing: ${missing.join(", ")}`);
    }

    await mkdir(context.outputDir, { recursive: true });
    const createdAt = context.now ?? new Date();
    const name = generateArchiveName(context.targetName, context.kind, this.config.prefix, createdAt);
    const archivePath = path.join(context.outputDir, name);
    const tarPath = archivePath.replace(/\.enc$/, "");

    try {
      await createTarGzip(stagingPaths, tarPath, this.config.compression);
      await encryptFile(tarPath, archivePath, passphrase);
    } finally {
      await rm(tarPath, { force: true });
    }

    const { size } = await stat(archivePath);
    const checksum = await computeFileChecksum(archivePath);
    log.info(`Archive created: ${name} (${size} bytes)`);

    return { path: archivePath, name, sizeBytes: size, checksum, createdAt, jobId: context.jobId };
  }
}
