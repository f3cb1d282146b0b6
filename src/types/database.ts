/**
 * Database record type definitions
 */

import type { JobKind, JobStatus, JobTrigger, Severity, WorkloadOutcome } from "./job";
import type { StorageType } from "./storage";

export type DeletionReason = "retention_days" | "manual";

export interface HistoryEntry {
  id: number;
  job_id: string;
  target: string;
  kind: JobKind;
  trigger: JobTrigger;
  status: JobStatus;
  severity: Severity;
  started_at: string;
  finished_at: string;
  duration_ms: number;
  archive_name: string | null;
  archive_size_bytes: number | null;
  remote_path: string | null;
  local_path: string | null;
  error_code: string | null;
  error_message: string | null;
  workloads: WorkloadOutcome[];
  pruned_count: number;
}

export type HistoryInsert = Omit<HistoryEntry, "id">;

export interface HistoryQuery {
  target?: string;
  from?: Date;
  to?: Date;
  limit?: number;
}

export interface DeletionLogRecord {
  id: number;
  archive_name: string;
  location: StorageType;
  path: string;
  reason: DeletionReason;
  deleted_at: string;
  success: boolean;
  error_message: string | null;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
