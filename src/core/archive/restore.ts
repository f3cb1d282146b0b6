/**
 * Restore and verification of encrypted archives
 */

import { mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import { CompressionError, describeError } from "../../errors";
import { createLogger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { decryptFile } from "./encryption";

const log = createLogger("restore");

export interface VerifyResult {
  archivePath: string;
  entries: string[];
}

function decryptedPathFor(archivePath: string, workDir: string): string {
  const base = path.basename(archivePath).replace(/\.enc$/, "");
  return path.join(workDir, `.${base}.${process.pid}.partial`);
}

async function runTar(args: string[]): Promise<string> {
  try {
    const result = await execa("tar", args);
    return result.stdout;
  } catch (err) {
    throw new CompressionError(`tar ${args[0]} failed: ${describeError(err).message}`, { cause: err });
  }
}

/**
 * Decrypt an archive and extract it into `destDir`
 */
export async function restoreArchive(
  archivePath: string,
  passphrase: string,
  destDir: string,
): Promise<string[]> {
  await mkdir(destDir, { recursive: true });
  const tarPath = decryptedPathFor(archivePath, destDir);

  try {
    await decryptFile(archivePath, tarPath, passphrase);
    const entries = (await runTar(["-tzf", tarPath])).split("\n").filter(Boolean);
    const escaping = entries.find((entry) => !isPathWithinDir(path.join(destDir, entry), destDir));
    if (escaping !== undefined) {
      throw new CompressionError(`Refusing to extract entry outside ${destDir}: ${escaping}`);
    }
    await runTar(["-xzf", tarPath, "-C", destDir]);
    log.info(`Restored ${path.basename(archivePath)} into ${destDir}`);
    return entries;
  } finally {
    await rm(tarPath, { force: true });
  }
}

/**
 * Decrypt an archive and list its entries without extracting
 */
export async function verifyArchive(
  archivePath: string,
  passphrase: string,
  workDir: string,
): Promise<VerifyResult> {
  await mkdir(workDir, { recursive: true });
  const tarPath = decryptedPathFor(archivePath, workDir);

  try {
    await decryptFile(archivePath, tarPath, passphrase);
    const listing = await runTar(["-tzf", tarPath]);
    const entries = listing.split("\n").filter(Boolean);
    log.debug(`${path.basename(archivePath)} holds ${entries.length} entries`);
    return { archivePath, entries };
  } finally {
    await rm(tarPath, { force: true });
  }
}
