export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
export {
  type JobStatusReport,
  Scheduler,
  type SchedulerStatus,
  type TriggerDefinition,
  type TriggerStatus,
  triggersFromConfig,
} from "./scheduler";
