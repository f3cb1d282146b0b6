import { existsSync } from "node:fs";
import { mkdir, mkdtemp, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { cleanupCommand } from "../../src/cli/commands/cleanup";
import { historyCommand } from "../../src/cli/commands/history";
import { exitCodeFor } from "../../src/cli/context";
import { appendHistory, closeDatabase, initDatabase } from "../../src/db";
import {
  CompressionError,
  ConfigError,
  DecryptionError,
  JobAlreadyRunningError,
  UploadError,
  WorkloadNotFoundError,
} from "../../src/errors";
import type { HistoryInsert } from "../../src/types";
import { setLogLevel } from "../../src/utils/logger";

function historyEntry(jobId: string, target: string, startedAt: string): HistoryInsert {
  return {
    job_id: jobId,
    target,
    kind: "project",
    trigger: "manual",
    status: "success",
    severity: "info",
    started_at: startedAt,
    finished_at: startedAt,
    duration_ms: 1000,
    archive_name: null,
    archive_size_bytes: null,
    remote_path: null,
    local_path: null,
    error_code: null,
    error_message: null,
    workloads: [],
    pruned_count: 0,
  };
}

describe("exitCodeFor", () => {
  test("usage and configuration mistakes exit 1", () => {
    expect(exitCodeFor(new ConfigError("bad"))).toBe(1);
    expect(exitCodeFor(new WorkloadNotFoundError("ghost"))).toBe(1);
    expect(exitCodeFor(new JobAlreadyRunningError("full", "full"))).toBe(1);
    expect(exitCodeFor(new DecryptionError("wrong passphrase"))).toBe(1);
  });

  test("runtime failures exit 2", () => {
    expect(exitCodeFor(new UploadError("failed", "/tmp/a"))).toBe(2);
    expect(exitCodeFor(new CompressionError("tar"))).toBe(2);
    expect(exitCodeFor(new Error("boom"))).toBe(2);
  });
});

describe("commands", () => {
  let tempDir: string;
  let configPath: string;
  let logged: string[];

  beforeEach(async () => {
    closeDatabase();
    setLogLevel("error");
    tempDir = await mkdtemp(join(tmpdir(), "guard-cli-"));
    configPath = join(tempDir, "backup-guard.config.yaml");
    await writeFile(
      configPath,
      `version: "1.0"
logLevel: error
database:
  path: ./guard.db
workDir: ./work
local:
  path: ./archives
remote:
  enabled: false
archive:
  password: test-secret
`,
    );
    logged = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      logged.push(args.map(String).join(" "));
    });
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    closeDatabase();
    setLogLevel("info");
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  test("--help prints usage and exits 0", async () => {
    expect(await cleanupCommand(["--help"])).toBe(0);
    expect(await historyCommand(["-h"])).toBe(0);
    expect(logged.join("\n")).toContain("backup-guard cleanup");
  });

  test("cleanup rejects an unknown scope", async () => {
    expect(await cleanupCommand(["--scope", "cloud"])).toBe(1);
  });

  test("cleanup --dry-run keeps old archives", async () => {
    const archives = join(tempDir, "archives");
    await mkdir(archives, { recursive: true });
    const file = join(archives, "guard_wiki_project_2020-01-01_030000_abc123.tar.gz.enc");
    await writeFile(file, "x");
    const old = new Date("2020-01-01T03:00:00Z");
    await utimes(file, old, old);

    expect(await cleanupCommand(["-c", configPath, "-s", "local", "--dry-run"])).toBe(0);
    expect(existsSync(file)).toBe(true);
  });

  test("cleanup --force deletes old archives", async () => {
    const archives = join(tempDir, "archives");
    await mkdir(archives, { recursive: true });
    const file = join(archives, "guard_wiki_project_2020-01-01_030000_abc123.tar.gz.enc");
    await writeFile(file, "x");
    const old = new Date("2020-01-01T03:00:00Z");
    await utimes(file, old, old);

    expect(await cleanupCommand(["-c", configPath, "-s", "local", "-d", "7", "--force"])).toBe(0);
    expect(existsSync(file)).toBe(false);
  });

  test("history --format json filters by workload", async () => {
    await initDatabase(join(tempDir, "guard.db"));
    appendHistory(historyEntry("job-1", "project:wiki", "2024-05-01T03:00:00.000Z"));
    appendHistory(historyEntry("job-2", "project:db", "2024-05-02T03:00:00.000Z"));
    appendHistory(historyEntry("job-3", "project:wiki", "2024-05-03T03:00:00.000Z"));

    expect(await historyCommand(["-c", configPath, "-t", "wiki", "--format", "json"])).toBe(0);

    const parsed: unknown = JSON.parse(logged.join("\n"));
    expect(Array.isArray(parsed)).toBe(true);
    const ids = Array.isArray(parsed)
      ? parsed.map((e: unknown) => (typeof e === "object" && e !== null && "job_id" in e ? e.job_id : null))
      : [];
    expect(ids).toEqual(["job-3", "job-1"]);
  });

  test("history rejects an invalid date", async () => {
    expect(await historyCommand(["--from", "yesterday-ish"])).toBe(1);
  });
});
