import { existsSync, mkdirSync, readdirSync, writeFileSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { isProcessAlive, LockRegistry, targetKey, targetsConflict } from "../../src/core/jobs/lock-registry";
import { JobAlreadyRunningError } from "../../src/errors";
import type { JobTarget } from "../../src/types";
import { setLogLevel } from "../../src/utils/logger";

const wiki: JobTarget = { kind: "project", workload: "wiki" };
const db: JobTarget = { kind: "project", workload: "db" };
const full: JobTarget = { kind: "full" };
const config: JobTarget = { kind: "config" };

describe("LockRegistry", () => {
  test("targetKey", () => {
    expect(targetKey(wiki)).toBe("project:wiki");
    expect(targetKey(full)).toBe("full");
    expect(targetKey(config)).toBe("config");
  });

  test("targetsConflict", () => {
    expect(targetsConflict("project:wiki", "project:wiki")).toBe(true);
    expect(targetsConflict("project:wiki", "project:db")).toBe(false);
    expect(targetsConflict("project:wiki", "full")).toBe(true);
    expect(targetsConflict("full", "config")).toBe(true);
    expect(targetsConflict("config", "project:db")).toBe(false);
  });

  test("different projects run side by side", () => {
    const locks = new LockRegistry();
    locks.acquire(wiki, "j1");
    expect(() => locks.acquire(db, "j2")).not.toThrow();
    expect(locks.heldTargets().sort()).toEqual(["project:db", "project:wiki"]);
  });

  test("a second trigger for the same target is rejected", () => {
    const locks = new LockRegistry();
    locks.acquire(wiki, "j1");
    const err = (() => {
      try {
        locks.acquire(wiki, "j2");
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(JobAlreadyRunningError);
    expect(locks.holder(wiki)).toBe("j1");
  });

  test("full excludes everything and is excluded by anything", () => {
    const locks = new LockRegistry();
    const release = locks.acquire(full, "j1");
    expect(() => locks.acquire(wiki, "j2")).toThrow(JobAlreadyRunningError);
    expect(() => locks.acquire(config, "j3")).toThrow(JobAlreadyRunningError);
    release();

    locks.acquire(config, "j4");
    expect(locks.isBusy(full)).toBe(true);
    expect(locks.isBusy(wiki)).toBe(false);
    expect(() => locks.acquire(full, "j5")).toThrow('A job for "config" is already running; rejected trigger for "full"');
  });

  test("N simultaneous triggers admit exactly one", () => {
    const locks = new LockRegistry();
    const results = Array.from({ length: 5 }, (_, i) => {
      try {
        locks.acquire(wiki, `j${i}`);
        return "ok";
      } catch (e) {
        return e instanceof JobAlreadyRunningError ? "rejected" : "other";
      }
    });
    expect(results.filter((r) => r === "ok")).toHaveLength(1);
    expect(results.filter((r) => r === "rejected")).toHaveLength(4);
  });

  test("release is idempotent and cannot free a newer holder", () => {
    const locks = new LockRegistry();
    const first = locks.acquire(wiki, "j1");
    first();
    expect(locks.isHeld(wiki)).toBe(false);

    locks.acquire(wiki, "j2");
    first();
    expect(locks.holder(wiki)).toBe("j2");
  });

  test("tracks in-flight archives", () => {
    const locks = new LockRegistry();
    locks.registerArchive("a.tar.gz.enc", "j1");
    expect(locks.isInFlight("a.tar.gz.enc")).toBe(true);
    locks.releaseArchive("a.tar.gz.enc");
    expect(locks.isInFlight("a.tar.gz.enc")).toBe(false);
  });
});

describe("LockRegistry with a lock directory", () => {
  // No live process has a pid above the kernel's pid_max
  const DEAD_PID = 999_999_999;
  let dir: string;

  beforeEach(async () => {
    setLogLevel("error");
    vi.spyOn(console, "warn").mockImplementation(() => {});
    dir = join(await mkdtemp(join(tmpdir(), "guard-locks-")), "locks");
  });

  afterEach(async () => {
    setLogLevel("info");
    vi.restoreAllMocks();
    await rm(join(dir, ".."), { recursive: true, force: true });
  });

  test("isProcessAlive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
    expect(isProcessAlive(DEAD_PID)).toBe(false);
  });

  test("queries do not create the directory", () => {
    const locks = new LockRegistry({ dir });
    expect(locks.heldTargets()).toEqual([]);
    expect(locks.isInFlight("a.tar.gz.enc")).toBe(false);
    expect(existsSync(dir)).toBe(false);
  });

  test("registries sharing a directory see each other's locks", () => {
    const daemon = new LockRegistry({ dir });
    const cli = new LockRegistry({ dir });

    const release = daemon.acquire(wiki, "j1");
    expect(existsSync(join(dir, "project%3Awiki.lock"))).toBe(true);
    expect(() => cli.acquire(wiki, "j2")).toThrow(JobAlreadyRunningError);
    expect(() => cli.acquire(full, "j3")).toThrow(JobAlreadyRunningError);
    expect(cli.holder(wiki)).toBe("j1");
    expect(cli.heldTargets()).toEqual(["project:wiki"]);
    expect(() => cli.acquire(db, "j4")).not.toThrow();

    release();
    expect(existsSync(join(dir, "project%3Awiki.lock"))).toBe(false);
    expect(cli.isBusy(wiki)).toBe(false);
    expect(() => cli.acquire(wiki, "j5")).not.toThrow();
  });

  test("a full job elsewhere blocks every project", () => {
    const daemon = new LockRegistry({ dir });
    const cli = new LockRegistry({ dir });

    daemon.acquire(full, "j1");
    expect(() => cli.acquire(wiki, "j2")).toThrow('A job for "full" is already running; rejected trigger for "project:wiki"');
    expect(readdirSync(dir).filter((name) => name.endsWith(".lock"))).toEqual(["full.lock"]);
  });

  test("locks of dead processes are cleared", () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "project%3Awiki.lock"), JSON.stringify({ pid: DEAD_PID, jobId: "old" }));
    writeFileSync(join(dir, "full.lock"), "not json");

    const locks = new LockRegistry({ dir });
    expect(locks.heldTargets()).toEqual([]);
    expect(() => locks.acquire(wiki, "j1")).not.toThrow();
    expect(locks.holder(wiki)).toBe("j1");
  });

  test("a stale lock on the same key is replaced", () => {
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "config.lock"), JSON.stringify({ pid: DEAD_PID, jobId: "old" }));

    const locks = new LockRegistry({ dir });
    locks.acquire(config, "j1");
    expect(new LockRegistry({ dir }).holder(config)).toBe("j1");
  });

  test("in-flight archives are shared and released", () => {
    const daemon = new LockRegistry({ dir });
    const cli = new LockRegistry({ dir });

    daemon.registerArchive("a.tar.gz.enc", "j1");
    expect(cli.isInFlight("a.tar.gz.enc")).toBe(true);
    expect(cli.isInFlight("b.tar.gz.enc")).toBe(false);

    daemon.releaseArchive("a.tar.gz.enc");
    expect(cli.isInFlight("a.tar.gz.enc")).toBe(false);
  });

  test("in-flight markers of dead processes are ignored", () => {
    const locks = new LockRegistry({ dir });
    mkdirSync(join(dir, "archives"), { recursive: true });
    writeFileSync(join(dir, "archives", "a.tar.gz.enc"), JSON.stringify({ pid: DEAD_PID, jobId: "old" }));
    expect(locks.isInFlight("a.tar.gz.enc")).toBe(false);
    expect(existsSync(join(dir, "archives", "a.tar.gz.enc"))).toBe(false);
  });
});
