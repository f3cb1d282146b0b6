import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { closeDatabase, initDatabase } from "../../src/db/connection";
import { getDeletionLogs, logDeletion } from "../../src/db/deletion-log-repository";

describe("deletion log repository", () => {
  beforeEach(async () => {
    closeDatabase();
    await initDatabase(":memory:");
  });

  afterEach(() => {
    closeDatabase();
  });

  test("records successes and failures", () => {
    logDeletion({
      archive_name: "guard_wiki_project_2024-01-01_000000_abc123.tar.gz.enc",
      location: "local",
      path: "/archives/guard_wiki_project_2024-01-01_000000_abc123.tar.gz.enc",
      reason: "retention_days",
      success: true,
      error_message: null,
    });
    logDeletion({
      archive_name: "guard_db_project_2024-01-01_000000_def456.tar.gz.enc",
      location: "remote",
      path: "backups/guard_db_project_2024-01-01_000000_def456.tar.gz.enc",
      reason: "manual",
      success: false,
      error_message: "permission denied",
    });

    const logs = getDeletionLogs();
    expect(logs).toHaveLength(2);

    const [latest, first] = logs;
    expect(latest?.location).toBe("remote");
    expect(latest?.reason).toBe("manual");
    expect(latest?.success).toBe(false);
    expect(latest?.error_message).toBe("permission denied");
    expect(first?.success).toBe(true);
    expect(first?.deleted_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  test("respects the limit", () => {
    for (let i = 0; i < 3; i++) {
      logDeletion({
        archive_name: `a${i}`,
        location: "local",
        path: `/archives/a${i}`,
        reason: "retention_days",
        success: true,
        error_message: null,
      });
    }
    expect(getDeletionLogs(2).map((l) => l.archive_name)).toEqual(["a2", "a1"]);
  });
});
