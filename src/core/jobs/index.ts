export {
  type Archiver,
  CONFIG_EXPORT_DIR,
  type Discoverer,
  type HistoryStore,
  type JobHandle,
  JobRunner,
  type JobRunnerDeps,
  type JobSettings,
  type LocalStore,
  type OutcomeNotifier,
  type Pruner,
  type Snapshotter,
  targetDisplayName,
  toHistoryEntry,
  type Uploader,
} from "./job-runner";
export {
  isProcessAlive,
  LockRegistry,
  type LockRegistryOptions,
  type Release,
  targetKey,
  targetsConflict,
} from "./lock-registry";
