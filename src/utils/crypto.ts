import { createHash, randomBytes, randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";

export async function computeFileChecksum(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

export function generateShortId(length = 6): string {
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let result = "";
  for (const byte of randomBytes(length)) {
    result += chars[byte % chars.length];
  }
  return result;
}

export function generateUUID(): string {
  return randomUUID();
}
