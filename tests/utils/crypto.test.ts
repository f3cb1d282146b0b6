import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { computeFileChecksum, generateShortId, generateUUID } from "../../src/utils/crypto";

describe("crypto utilities", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "guard-crypto-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  test("computeFileChecksum returns the sha256 hex digest", async () => {
    const file = join(tempDir, "hello.txt");
    await writeFile(file, "hello");
    expect(await computeFileChecksum(file)).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });

  test("computeFileChecksum of an empty file", async () => {
    const file = join(tempDir, "empty");
    await writeFile(file, "");
    expect(await computeFileChecksum(file)).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  test("generateShortId uses lowercase alphanumerics", () => {
    expect(generateShortId()).toMatch(/^[a-z0-9]{6}$/);
    expect(generateShortId(10)).toHaveLength(10);
  });

  test("generateUUID returns a v4 uuid", () => {
    expect(generateUUID()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });
});
