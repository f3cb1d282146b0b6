/**
 * Notifier: fans a job outcome out to every configured sink
 */

import { describeError } from "../../errors";
import type { JobOutcome, NotificationsConfig } from "../../types";
import { createLogger } from "../../utils/logger";
import { type FetchFn, GotifySink, HealthcheckSink, type NotificationSink, WebhookSink } from "./sinks";

const log = createLogger("notify");

export interface NotifyReport {
  delivered: string[];
  failed: { sink: string; message: string }[];
}

export function createSinks(config: NotificationsConfig, fetchFn: FetchFn = fetch): NotificationSink[] {
  const sinks: NotificationSink[] = [];
  if (config.gotify) sinks.push(new GotifySink(config.gotify, fetchFn));
  if (config.webhook) sinks.push(new WebhookSink(config.webhook.url, fetchFn));
  if (config.healthcheck) sinks.push(new HealthcheckSink(config.healthcheck.url, fetchFn));
  return sinks;
}

export class Notifier {
  constructor(private readonly sinks: NotificationSink[]) {}

  get sinkNames(): string[] {
    return this.sinks.map((s) => s.name);
  }

  /**
   * Deliver to all sinks. Never rejects: delivery failures are logged and reported.
   */
  async notify(outcome: JobOutcome): Promise<NotifyReport> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.send(outcome)));
    const report: NotifyReport = { delivered: [], failed: [] };

    results.forEach((result, index) => {
      const sink = this.sinks[index]?.name ?? `sink-${index}`;
      if (result.status === "fulfilled") {
        report.delivered.push(sink);
        log.debug(`Notification delivered via ${sink}`);
      } else {
        const message = describeError(result.reason).message;
        report.failed.push({ sink, message });
        log.warn(`Notification via ${sink} failed: ${message}`);
      }
    });

    return report;
  }
}
