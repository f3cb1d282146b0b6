export { createSinks, Notifier, type NotifyReport } from "./notifier";
export {
  type FetchFn,
  GotifySink,
  gotifyPriority,
  HealthcheckSink,
  type NotificationSink,
  outcomeMessage,
  outcomeTitle,
  REQUEST_TIMEOUT_MS,
  WebhookSink,
} from "./sinks";
