/**
 * Passphrase encryption of archive files
 *
 * File layout: magic "BGE1" | salt (16) | iv (12) | AES-256-GCM ciphertext | auth tag (16).
 * The key is derived with PBKDF2-SHA256.
 */

import { createCipheriv, createDecipheriv, pbkdf2, randomBytes } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { appendFile, open, rm, stat, writeFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { promisify } from "node:util";
import { DecryptionError, describeError, EncryptionError } from "../../errors";

const pbkdf2Async = promisify(pbkdf2);

export const ENCRYPTION_MAGIC = Buffer.from("BGE1", "ascii");
export const SALT_LENGTH = 16;
export const IV_LENGTH = 12;
export const TAG_LENGTH = 16;
export const KDF_ITERATIONS = 100_000;
const KEY_LENGTH = 32;
const HEADER_LENGTH = ENCRYPTION_MAGIC.length + SALT_LENGTH + IV_LENGTH;

export function deriveKey(passphrase: string, salt: Buffer): Promise<Buffer> {
  return pbkdf2Async(passphrase, salt, KDF_ITERATIONS, KEY_LENGTH, "sha256");
}

async function removeQuietly(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

/**
 * Encrypt `inputPath` into `outputPath`
 */
export async function encryptFile(inputPath: string, outputPath: string, passphrase: string): Promise<void> {
  if (!passphrase) {
    throw new EncryptionError("An encryption passphrase is required");
  }

  try {
    const salt = randomBytes(SALT_LENGTH);
    const iv = randomBytes(IV_LENGTH);
    const key = await deriveKey(passphrase, salt);
    const cipher = createCipheriv("aes-256-gcm", key, iv);

    await writeFile(outputPath, Buffer.concat([ENCRYPTION_MAGIC, salt, iv]));
    await pipeline(createReadStream(inputPath), cipher, createWriteStream(outputPath, { flags: "a" }));
    await appendFile(outputPath, cipher.getAuthTag());
  } catch (err) {
    await removeQuietly(outputPath);
    throw new EncryptionError(`Failed to encrypt ${inputPath}: ${describeError(err).message}`, {
      cause: err,
    });
  }
}

interface EncryptedHeader {
  salt: Buffer;
  iv: Buffer;
  tag: Buffer;
  size: number;
}

async function readHeader(inputPath: string): Promise<EncryptedHeader> {
  const { size } = await stat(inputPath);
  if (size < HEADER_LENGTH + TAG_LENGTH) {
    throw new DecryptionError(`${inputPath} is too short to be an encrypted archive`);
  }

  const handle = await open(inputPath, "r");
  try {
    const header = Buffer.alloc(HEADER_LENGTH);
    await handle.read(header, 0, HEADER_LENGTH, 0);
    const tag = Buffer.alloc(TAG_LENGTH);
    await handle.read(tag, 0, TAG_LENGTH, size - TAG_LENGTH);

    if (!header.subarray(0, ENCRYPTION_MAGIC.length).equals(ENCRYPTION_MAGIC)) {
      throw new DecryptionError(`${inputPath} is not an encrypted archive`);
    }

    const saltStart = ENCRYPTION_MAGIC.length;
    return {
      salt: header.subarray(saltStart, saltStart + SALT_LENGTH),
      iv: header.subarray(saltStart + SALT_LENGTH, HEADER_LENGTH),
      tag,
      size,
    };
  } finally {
    await handle.close();
  }
}

/**
 * Decrypt `inputPath` into `outputPath`. A wrong passphrase or a modified file
 * raises DecryptionError and leaves no output behind.
 */
export async function decryptFile(inputPath: string, outputPath: string, passphrase: string): Promise<void> {
  const { salt, iv, tag, size } = await readHeader(inputPath);

  try {
    const key = await deriveKey(passphrase, salt);
    const decipher = createDecipheriv("aes-256-gcm", key, iv);
    decipher.setAuthTag(tag);

    const end = size - TAG_LENGTH - 1;
    const source =
      end >= HEADER_LENGTH
        ? createReadStream(inputPath, { start: HEADER_LENGTH, end })
        : Readable.from([]);
    await pipeline(source, decipher, createWriteStream(outputPath));
  } catch (err) {
    await removeQuietly(outputPath);
    throw new DecryptionError(
      `Failed to decrypt ${inputPath}: wrong passphrase or corrupted archive`,
      { cause: err },
    );
  }
}
