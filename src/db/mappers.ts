/**
 * Database row mapping utilities
 */

import type {
  DeletionLogRecord,
  HistoryEntry,
  HistoryInsert,
  JobKind,
  JobStatus,
  JobTrigger,
  Severity,
  StorageType,
  DeletionReason,
  WorkloadOutcome,
} from "../types";

export type RawHistoryRow = Omit<HistoryEntry, "workloads" | "kind" | "trigger" | "status" | "severity"> & {
  kind: string;
  trigger: string;
  status: string;
  severity: string;
  workloads: string;
};

export type RawDeletionLogRow = Omit<DeletionLogRecord, "success" | "location" | "reason"> & {
  location: string;
  reason: string;
  success: number;
};

const JOB_KINDS: readonly JobKind[] = ["project", "full", "config"];
const JOB_TRIGGERS: readonly JobTrigger[] = ["schedule", "manual"];
const JOB_STATUSES: readonly JobStatus[] = ["success", "partial", "failed"];
const SEVERITIES: readonly Severity[] = ["info", "error", "critical"];
const LOCATIONS: readonly StorageType[] = ["local", "remote"];
const REASONS: readonly DeletionReason[] = ["retention_days", "manual"];

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in database: ${value}`);
  }
  return match;
}

function isWorkloadOutcome(value: unknown): value is WorkloadOutcome {
  if (typeof value !== "object" || value === null) return false;
  return (
    "workload" in value &&
    typeof value.workload === "string" &&
    "ok" in value &&
    typeof value.ok === "boolean" &&
    "severity" in value &&
    typeof value.severity === "string"
  );
}

export function parseWorkloads(raw: string): WorkloadOutcome[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isWorkloadOutcome);
}

export function serializeWorkloads(workloads: WorkloadOutcome[]): string {
  return JSON.stringify(workloads);
}

export function parseHistoryRow(row: RawHistoryRow): HistoryEntry {
  return {
    ...row,
    kind: oneOf(JOB_KINDS, row.kind, "kind"),
    trigger: oneOf(JOB_TRIGGERS, row.trigger, "trigger"),
    status: oneOf(JOB_STATUSES, row.status, "status"),
    severity: oneOf(SEVERITIES, row.severity, "severity"),
    workloads: parseWorkloads(row.workloads),
  };
}

export function serializeHistoryEntry(entry: HistoryInsert): Omit<RawHistoryRow, "id"> {
  return { ...entry, workloads: serializeWorkloads(entry.workloads) };
}

export function parseDeletionLogRow(row: RawDeletionLogRow): DeletionLogRecord {
  return {
    ...row,
    location: oneOf(LOCATIONS, row.location, "location"),
    reason: oneOf(REASONS, row.reason, "reason"),
    success: row.success === 1,
  };
}
