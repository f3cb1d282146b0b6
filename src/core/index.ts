/**
 * Core module exports
 */

// Archive
export {
  type ArchiveContext,
  ArchivePipeline,
  decryptFile,
  encryptFile,
  locateArchive,
  restoreArchive,
  type VerifyResult,
  verifyArchive,
} from "./archive";
// Discovery
export { WorkloadDiscovery } from "./discovery";
// Engine
export { createEngine, type Engine, type EngineOverrides } from "./engine";
// Jobs
export { type JobHandle, JobRunner, LockRegistry, targetKey } from "./jobs";
// Notify
export { createSinks, type NotificationSink, Notifier } from "./notify";
// Portainer
export { PortainerExporter } from "./portainer";
// Retention
export { type PruneResult, type PruneScope, RetentionManager } from "./retention";
// Scheduler
export { parseCron, Scheduler, type TriggerDefinition, triggersFromConfig } from "./scheduler";
// Snapshot
export { SnapshotController } from "./snapshot";
// Sync
export { SyncManager, type UploadConfirmation } from "./sync";
