/**
 * Notification sinks
 */

import type { GotifyConfig, JobOutcome } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";

export const REQUEST_TIMEOUT_MS = 10_000;

export type FetchFn = typeof fetch;

export interface NotificationSink {
  readonly name: string;
  send(outcome: JobOutcome): Promise<void>;
}

async function ensureOk(response: Response, sink: string): Promise<void> {
  if (!response.ok) {
    const body = await response.text();
    throw new Error(`${sink} responded ${response.status}${body ? `: ${body.slice(0, 200)}` : ""}`);
  }
}

export function outcomeTitle(outcome: JobOutcome): string {
  const label = outcome.severity === "critical" ? "CRITICAL" : outcome.status.toUpperCase();
  return `Backup ${label}: ${outcome.target}`;
}

export function outcomeMessage(outcome: JobOutcome): string {
  const lines = [
    `Job ${outcome.jobId} (${outcome.kind}, ${outcome.trigger}) finished with status ${outcome.status} in ${formatDuration(outcome.durationMs)}.`,
  ];
  if (outcome.archiveName) {
    const size = outcome.archiveSizeBytes !== null ? ` (${formatBytes(outcome.archiveSizeBytes)})` : "";
    lines.push(`Archive: ${outcome.archiveName}${size}`);
  }
  if (outcome.remotePath) lines.push(`Remote: ${outcome.remotePath}`);
  if (outcome.localPath) lines.push(`Kept locally: ${outcome.localPath}`);
  for (const workload of outcome.workloads) {
    if (!workload.ok) {
      lines.push(`${workload.workload}: ${workload.errorCode ?? "Error"} ${workload.errorMessage ?? ""}`.trimEnd());
    }
  }
  if (outcome.errorCode) lines.push(`Error: ${outcome.errorCode}: ${outcome.errorMessage ?? ""}`.trimEnd());
  if (outcome.prunedCount > 0) lines.push(`Pruned ${outcome.prunedCount} old archive(s).`);
  return lines.join("\n");
}

/**
 * Gotify priority: 5 success, 8 failure, 10 when a workload was left stopped
 */
export function gotifyPriority(outcome: JobOutcome, base = 5): number {
  if (outcome.severity === "critical") return 10;
  if (outcome.status !== "success") return 8;
  return base;
}

export class GotifySink implements NotificationSink {
  readonly name = "gotify";

  constructor(
    private readonly config: GotifyConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async send(outcome: JobOutcome): Promise<void> {
    const url = `${this.config.url.replace(/\/+$/, "")}/message?token=${encodeURIComponent(this.config.token)}`;
    const response = await this.fetchFn(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        title: outcomeTitle(outcome),
        message: outcomeMessage(outcome),
        priority: gotifyPriority(outcome, this.config.priority),
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    await ensureOk(response, this.name);
  }
}

export class WebhookSink implements NotificationSink {
  readonly name = "webhook";

  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async send(outcome: JobOutcome): Promise<void> {
    const response = await this.fetchFn(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        ...outcome,
        startedAt: outcome.startedAt.toISOString(),
        finishedAt: outcome.finishedAt.toISOString(),
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    await ensureOk(response, this.name);
  }
}

/**
 * Heartbeat ping: `<url>` on success, `<url>/fail` otherwise
 */
export class HealthcheckSink implements NotificationSink {
  readonly name = "healthcheck";

  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async send(outcome: JobOutcome): Promise<void> {
    const base = this.url.replace(/\/+$/, "");
    const url = outcome.status === "success" ? base : `${base}/fail`;
    const response = await this.fetchFn(url, {
      method: "GET",
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    await ensureOk(response, this.name);
  }
}
