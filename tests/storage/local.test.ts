import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LocalArchiveStore } from "../../src/storage/local";
import { setLogLevel } from "../../src/utils/logger";

describe("LocalArchiveStore", () => {
  let tempDir: string;
  let store: LocalArchiveStore;

  beforeEach(async () => {
    setLogLevel("error");
    tempDir = await mkdtemp(join(tmpdir(), "guard-local-"));
    store = new LocalArchiveStore({ path: join(tempDir, "archives") });
  });

  afterEach(async () => {
    setLogLevel("info");
    await rm(tempDir, { recursive: true, force: true });
  });

  test("list is empty when the directory does not exist", async () => {
    expect(await store.list()).toEqual([]);
  });

  test("moveInto moves the file under the given name", async () => {
    const source = join(tempDir, "work.enc");
    await writeFile(source, "archive");

    const dest = await store.moveInto(source, "guard_a_project_2024-01-01_000000_aaa111.tar.gz.enc");
    expect(dest).toBe(store.pathFor("guard_a_project_2024-01-01_000000_aaa111.tar.gz.enc"));
    expect(existsSync(source)).toBe(false);
    expect(await readFile(dest, "utf8")).toBe("archive");
  });

  test("list returns archive files sorted by name", async () => {
    await mkdir(store.root, { recursive: true });
    await writeFile(store.pathFor("b.tar.gz.enc"), "bb");
    await writeFile(store.pathFor("a.tar.gz.enc"), "a");
    await writeFile(store.pathFor("notes.txt"), "skip");
    await mkdir(store.pathFor("dir.tar.gz.enc"));

    const entries = await store.list();
    expect(entries.map((e) => [e.name, e.size])).toEqual([
      ["a.tar.gz.enc", 1],
      ["b.tar.gz.enc", 2],
    ]);
    expect(entries[0]?.path).toBe(store.pathFor("a.tar.gz.enc"));
    expect(entries[0]?.modTime).toBeInstanceOf(Date);
  });

  test("exists and delete", async () => {
    await mkdir(store.root, { recursive: true });
    await writeFile(store.pathFor("a.tar.gz.enc"), "a");
    expect(await store.exists("a.tar.gz.enc")).toBe(true);

    await store.delete(store.pathFor("a.tar.gz.enc"));
    expect(await store.exists("a.tar.gz.enc")).toBe(false);
    await expect(store.delete(store.pathFor("a.tar.gz.enc"))).resolves.toBeUndefined();
  });
});
