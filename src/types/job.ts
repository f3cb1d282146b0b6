/**
 * Backup job type definitions
 */

import type { ErrorSeverity } from "../errors";

export type JobKind = "project" | "full" | "config";

export type JobTarget =
  | { kind: "project"; workload: string }
  | { kind: "full" }
  | { kind: "config" };

export type JobTrigger = "schedule" | "manual";

export type JobPhase =
  | "pending"
  | "discovering"
  | "exporting"
  | "snapshotting"
  | "archiving"
  | "uploading"
  | "pruning"
  | "finished";

export type JobStatus = "success" | "partial" | "failed";

export type Severity = "info" | ErrorSeverity;

export interface Archive {
  path: string;
  name: string;
  sizeBytes: number;
  checksum: string;
  createdAt: Date;
  jobId: string;
}

export interface WorkloadOutcome {
  workload: string;
  ok: boolean;
  errorCode?: string;
  errorMessage?: string;
  severity: Severity;
}

export interface BackupJob {
  id: string;
  target: JobTarget;
  trigger: JobTrigger;
  startedAt: Date;
  phase: JobPhase;
  status?: JobStatus;
  errorCode?: string;
  errorMessage?: string;
}

/**
 * Final result of a job, handed to history and notification sinks
 */
export interface JobOutcome {
  jobId: string;
  target: string;
  kind: JobKind;
  trigger: JobTrigger;
  status: JobStatus;
  severity: Severity;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  archiveName: string | null;
  archiveSizeBytes: number | null;
  remotePath: string | null;
  localPath: string | null;
  errorCode: string | null;
  errorMessage: string | null;
  workloads: WorkloadOutcome[];
  prunedCount: number;
}
