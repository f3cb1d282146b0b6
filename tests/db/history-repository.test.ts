import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { closeDatabase, getDatabase, initDatabase } from "../../src/db/connection";
import {
  appendHistory,
  getHistoryByJobId,
  getLastHistoryEntry,
  queryHistory,
} from "../../src/db/history-repository";
import type { HistoryInsert } from "../../src/types";

function entry(jobId: string, target: string, startedAt: string, overrides: Partial<HistoryInsert> = {}): HistoryInsert {
  return {
    job_id: jobId,
    target,
    kind: target === "all" ? "full" : "project",
    trigger: "schedule",
    status: "success",
    severity: "info",
    started_at: startedAt,
    finished_at: startedAt,
    duration_ms: 1200,
    archive_name: `guard_${target}_project_2024-01-01_000000_abc123.tar.gz.enc`,
    archive_size_bytes: 2048,
    remote_path: null,
    local_path: null,
    error_code: null,
    error_message: null,
    workloads: [{ workload: target, ok: true, severity: "info" }],
    pruned_count: 0,
    ...overrides,
  };
}

describe("history repository", () => {
  beforeEach(async () => {
    closeDatabase();
    await initDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
  });

  test("appendHistory returns the stored entry", () => {
    const stored = appendHistory(
      entry("job-1", "wiki", "2024-05-01T03:00:00.000Z", {
        status: "partial",
        severity: "critical",
        error_code: "RestartFailedError",
        error_message: "left stopped",
        workloads: [
          { workload: "wiki", ok: true, severity: "info" },
          {
            workload: "db",
            ok: false,
            severity: "critical",
            errorCode: "RestartFailedError",
            errorMessage: "left stopped",
          },
        ],
      }),
    );

    expect(stored.id).toBeGreaterThan(0);
    expect(stored.status).toBe("partial");
    expect(stored.severity).toBe("critical");
    expect(stored.workloads).toHaveLength(2);
    expect(stored.workloads[1]).toEqual({
      workload: "db",
      ok: false,
      severity: "critical",
      errorCode: "RestartFailedError",
      errorMessage: "left stopped",
    });
  });

  test("job ids are unique", () => {
    appendHistory(entry("job-1", "wiki", "2024-05-01T03:00:00.000Z"));
    expect(() => appendHistory(entry("job-1", "wiki", "2024-05-02T03:00:00.000Z"))).toThrow();
  });

  test("getHistoryByJobId", () => {
    appendHistory(entry("job-1", "wiki", "2024-05-01T03:00:00.000Z"));
    expect(getHistoryByJobId("job-1")?.target).toBe("wiki");
    expect(getHistoryByJobId("missing")).toBeNull();
  });

  test("rows cannot be updated or deleted", () => {
    appendHistory(entry("job-1", "wiki", "2024-05-01T03:00:00.000Z"));
    const db = getDatabase();
    expect(() => db.prepare("UPDATE job_history SET status = 'failed'").run()).toThrow(
      "job_history is append-only",
    );
    expect(() => db.prepare("DELETE FROM job_history").run()).toThrow("job_history is append-only");
    expect(getHistoryByJobId("job-1")?.status).toBe("success");
  });

  describe("queryHistory", () => {
    beforeEach(() => {
      appendHistory(entry("a", "wiki", "2024-05-01T03:00:00.000Z"));
      appendHistory(entry("b", "db", "2024-05-02T03:00:00.000Z"));
      appendHistory(entry("c", "wiki", "2024-05-03T03:00:00.000Z"));
      appendHistory(entry("d", "all", "2024-05-04T03:00:00.000Z"));
    });

    test("returns newest first", () => {
      expect(queryHistory().map((e) => e.job_id)).toEqual(["d", "c", "b", "a"]);
    });

    test("filters by target", () => {
      expect(queryHistory({ target: "wiki" }).map((e) => e.job_id)).toEqual(["c", "a"]);
    });

    test("filters by an inclusive time range", () => {
      const result = queryHistory({
        from: new Date("2024-05-02T03:00:00.000Z"),
        to: new Date("2024-05-03T03:00:00.000Z"),
      });
      expect(result.map((e) => e.job_id)).toEqual(["c", "b"]);
    });

    test("applies the limit", () => {
      expect(queryHistory({ limit: 2 }).map((e) => e.job_id)).toEqual(["d", "c"]);
    });

    test("getLastHistoryEntry", () => {
      expect(getLastHistoryEntry("wiki")?.job_id).toBe("c");
      expect(getLastHistoryEntry("nothing")).toBeNull();
    });
  });
});
