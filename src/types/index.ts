/**
 * Centralized type exports for backup-guard
 */

// Config types
export type {
  ArchiveConfig,
  DatabaseConfig,
  DockerConfig,
  GotifyConfig,
  GuardConfig,
  LocalStorageConfig,
  NotificationsConfig,
  PortainerConfig,
  RemoteConfig,
  RetentionConfig,
  ScheduleConfig,
} from "./config";
// Database types
export type {
  DeletionLogRecord,
  DeletionReason,
  HistoryEntry,
  HistoryInsert,
  HistoryQuery,
  Migration,
} from "./database";
// Job types
export type {
  Archive,
  BackupJob,
  JobKind,
  JobOutcome,
  JobPhase,
  JobStatus,
  JobTarget,
  JobTrigger,
  Severity,
  WorkloadOutcome,
} from "./job";
// Storage types
export type { RemoteEntry, RemoteStore, RetentionRecord, StorageType } from "./storage";
// Workload types
export type {
  ContainerInfo,
  ContainerMount,
  SnapshotResult,
  SnapshotState,
  Workload,
} from "./workload";
