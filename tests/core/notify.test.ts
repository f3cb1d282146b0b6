import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createSinks, Notifier } from "../../src/core/notify/notifier";
import {
  type FetchFn,
  GotifySink,
  gotifyPriority,
  HealthcheckSink,
  type NotificationSink,
  outcomeMessage,
  outcomeTitle,
  WebhookSink,
} from "../../src/core/notify/sinks";
import type { JobOutcome } from "../../src/types";
import { setLogLevel } from "../../src/utils/logger";

function outcome(overrides: Partial<JobOutcome> = {}): JobOutcome {
  return {
    jobId: "job-1",
    target: "project:wiki",
    kind: "project",
    trigger: "schedule",
    status: "success",
    severity: "info",
    startedAt: new Date("2024-05-01T03:00:00Z"),
    finishedAt: new Date("2024-05-01T03:01:05Z"),
    durationMs: 65_000,
    archiveName: "guard_wiki_project_2024-05-01_030000_abc123.tar.gz.enc",
    archiveSizeBytes: 2048,
    remotePath: "guard_wiki_project_2024-05-01_030000_abc123.tar.gz.enc",
    localPath: null,
    errorCode: null,
    errorMessage: null,
    workloads: [{ workload: "wiki", ok: true, severity: "info" }],
    prunedCount: 0,
    ...overrides,
  };
}

function okFetch() {
  return vi.fn<FetchFn>(async () => new Response("ok", { status: 200 }));
}

function requestBody(fetchFn: ReturnType<typeof okFetch>): unknown {
  const init = fetchFn.mock.calls[0]?.[1];
  return typeof init?.body === "string" ? JSON.parse(init.body) : null;
}

describe("notification formatting", () => {
  test("title reflects status and severity", () => {
    expect(outcomeTitle(outcome())).toBe("Backup SUCCESS: project:wiki");
    expect(outcomeTitle(outcome({ status: "partial", severity: "error" }))).toBe("Backup PARTIAL: project:wiki");
    expect(outcomeTitle(outcome({ status: "failed", severity: "critical" }))).toBe("Backup CRITICAL: project:wiki");
  });

  test("message lists archive, failures and pruning", () => {
    const message = outcomeMessage(
      outcome({
        status: "partial",
        severity: "error",
        remotePath: null,
        localPath: "/backups/archives/a.enc",
        workloads: [
          { workload: "wiki", ok: true, severity: "info" },
          { workload: "db", ok: false, severity: "error", errorCode: "CopyError", errorMessage: "disk full" },
        ],
        errorCode: "CopyError",
        errorMessage: "disk full",
        prunedCount: 2,
      }),
    );

    expect(message.split("\n")).toEqual([
      "Job job-1 (project, schedule) finished with status partial in 1m 5s.",
      "Archive: guard_wiki_project_2024-05-01_030000_abc123.tar.gz.enc (2.00 KB)",
      "Kept locally: /backups/archives/a.enc",
      "db: CopyError disk full",
      "Error: CopyError: disk full",
      "Pruned 2 old archive(s).",
    ]);
  });

  test("gotify priority", () => {
    expect(gotifyPriority(outcome())).toBe(5);
    expect(gotifyPriority(outcome(), 3)).toBe(3);
    expect(gotifyPriority(outcome({ status: "failed", severity: "error" }))).toBe(8);
    expect(gotifyPriority(outcome({ status: "partial", severity: "critical" }))).toBe(10);
  });
});

describe("sinks", () => {
  test("gotify posts title, message and priority with the token", async () => {
    const fetchFn = okFetch();
    await new GotifySink({ url: "http://gotify.local/", token: "test token" }, fetchFn).send(
      outcome({ status: "failed", severity: "error" }),
    );

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe("http://gotify.local/message?token=test%20token");
    expect(fetchFn.mock.calls[0]?.[1]?.method).toBe("POST");
    expect(requestBody(fetchFn)).toMatchObject({ title: "Backup FAILED: project:wiki", priority: 8 });
  });

  test("webhook posts the outcome as JSON", async () => {
    const fetchFn = okFetch();
    await new WebhookSink("http://hooks.local/backup", fetchFn).send(outcome());
    expect(fetchFn.mock.calls[0]?.[0]).toBe("http://hooks.local/backup");
    expect(requestBody(fetchFn)).toMatchObject({
      jobId: "job-1",
      status: "success",
      startedAt: "2024-05-01T03:00:00.000Z",
      finishedAt: "2024-05-01T03:01:05.000Z",
    });
  });

  test("healthcheck pings the base URL on success and /fail otherwise", async () => {
    const fetchFn = okFetch();
    const sink = new HealthcheckSink("http://hc.local/ping/abc/", fetchFn);
    await sink.send(outcome());
    await sink.send(outcome({ status: "partial", severity: "error" }));

    expect(fetchFn.mock.calls.map((call) => call[0])).toEqual([
      "http://hc.local/ping/abc",
      "http://hc.local/ping/abc/fail",
    ]);
    expect(fetchFn.mock.calls[0]?.[1]?.method).toBe("GET");
  });

  test("a non-2xx response is an error", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("bad token", { status: 401 }));
    await expect(new WebhookSink("http://hooks.local", fetchFn).send(outcome())).rejects.toThrow(
      "webhook responded 401: bad token",
    );
  });
});

describe("Notifier", () => {
  beforeEach(() => {
    setLogLevel("error");
  });

  afterEach(() => {
    setLogLevel("info");
  });

  test("createSinks builds only configured sinks", () => {
    expect(createSinks({}, okFetch())).toEqual([]);
    const sinks = createSinks(
      {
        gotify: { url: "http://gotify.local", token: "test-token" },
        healthcheck: { url: "http://hc.local/ping/abc" },
      },
      okFetch(),
    );
    expect(sinks.map((s) => s.name)).toEqual(["gotify", "healthcheck"]);
  });

  test("delivers to every sink and reports failures without rejecting", async () => {
    const delivered: string[] = [];
    const ok: NotificationSink = {
      name: "ok",
      send: async (o) => {
        delivered.push(o.jobId);
      },
    };
    const broken: NotificationSink = {
      name: "broken",
      send: async () => {
        throw new Error("connection refused");
      },
    };

    const notifier = new Notifier([broken, ok]);
    expect(notifier.sinkNames).toEqual(["broken", "ok"]);
    const report = await notifier.notify(outcome());

    expect(report).toEqual({
      delivered: ["ok"],
      failed: [{ sink: "broken", message: "connection refused" }],
    });
    expect(delivered).toEqual(["job-1"]);
  });

  test("no sinks is a no-op", async () => {
    expect(await new Notifier([]).notify(outcome())).toEqual({ delivered: [], failed: [] });
  });
});
