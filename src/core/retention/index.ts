export {
  entryTimestamp,
  isExpired,
  type PruneFailure,
  type PruneOptions,
  type PruneResult,
  type PruneScope,
  type RetentionDeps,
  RetentionManager,
} from "./retention-manager";
