/**
 * Job runner
 *
 * Sequences one backup job: discovery, optional config export, snapshot,
 * archive, upload and retention. Whatever happens, a job ends by writing one
 * history entry, releasing its target lock and notifying once, in that order.
 */

import { existsSync } from "node:fs";
import { mkdir, rm } from "node:fs/promises";
import * as path from "node:path";
import {
  ConfigError,
  ConfigExportError,
  describeError,
  DiscoveryError,
  JobCancelledError,
  RestartFailedError,
  WorkloadNotFoundError,
} from "../../errors";
import type {
  Archive,
  BackupJob,
  HistoryInsert,
  JobOutcome,
  JobStatus,
  JobTarget,
  JobTrigger,
  Severity,
  SnapshotResult,
  Workload,
  WorkloadOutcome,
} from "../../types";
import { generateUUID } from "../../utils/crypto";
import { createLogger } from "../../utils/logger";
import type { ArchiveContext } from "../archive/archive-pipeline";
import type { NotifyReport } from "../notify/notifier";
import type { ConfigExporter } from "../portainer/config-export";
import type { PruneOptions, PruneResult, PruneScope } from "../retention/retention-manager";
import type { SnapshotHooks } from "../snapshot/snapshot-controller";
import type { UploadConfirmation } from "../sync/sync-manager";
import { type LockRegistry, targetKey } from "./lock-registry";

const log = createLogger("job");

export interface Discoverer {
  discover(label: string, projectFilter?: string): Promise<Workload[]>;
}

export interface Snapshotter {
  snapshot(workload: Workload, stagingRoot: string, hooks?: SnapshotHooks): Promise<SnapshotResult>;
}

export interface Archiver {
  archive(stagingPaths: string[], passphrase: string, context: ArchiveContext): Promise<Archive>;
}

export interface Uploader {
  upload(archive: Archive, destinationDir?: string): Promise<UploadConfirmation>;
}

export interface Pruner {
  prune(scope: PruneScope, maxAgeDays: number, options?: PruneOptions): Promise<PruneResult>;
}

export interface LocalStore {
  moveInto(sourcePath: string, archiveName?: string): Promise<string>;
}

export interface HistoryStore {
  append(entry: HistoryInsert): void;
}

export interface OutcomeNotifier {
  notify(outcome: JobOutcome): Promise<NotifyReport>;
}

export interface JobSettings {
  label: string;
  workDir: string;
  passphrase?: string;
  retentionDays: number;
  /** Remote directory for uploads, relative to the remote root */
  remoteDir?: string;
}

export interface JobRunnerDeps {
  locks: LockRegistry;
  discovery: Discoverer;
  snapshot: Snapshotter;
  archive: Archiver;
  /** null when uploads are disabled; archives then go straight to the local store */
  sync: Uploader | null;
  retention: Pruner;
  local: LocalStore;
  history: HistoryStore;
  notifier: OutcomeNotifier;
  exporter: ConfigExporter | null;
  settings: JobSettings;
  generateId?: () => string;
  now?: () => Date;
}

export interface JobHandle {
  job: BackupJob;
  /** Resolves with the outcome once history, lock release and notification are done. Never rejects. */
  done: Promise<JobOutcome>;
  /** Cancel the job; only possible before the first container is stopped */
  cancel(): boolean;
}

interface RunState {
  cancelled: boolean;
  committed: boolean;
  workloads: WorkloadOutcome[];
  archive: Archive | null;
  remotePath: string | null;
  localPath: string | null;
  prunedCount: number;
  configExportError: unknown;
  error: unknown;
}

export function targetDisplayName(target: JobTarget): string {
  switch (target.kind) {
    case "project":
      return target.workload;
    case "full":
      return "all";
    case "config":
      return "config";
  }
}

/**
 * Staging directory of the configuration export. Workload names cannot start
 * with a dot, so it never shares a directory with a workload snapshot.
 */
export const CONFIG_EXPORT_DIR = ".config-export";

export class JobRunner {
  private readonly active = new Map<string, BackupJob>();

  constructor(private readonly deps: JobRunnerDeps) {}

  /**
   * Start a job for `target`. Throws JobAlreadyRunningError synchronously when
   * a conflicting job holds the lock.
   */
  start(target: JobTarget, trigger: JobTrigger): JobHandle {
    const jobId = this.deps.generateId?.() ?? generateUUID();
    const release = this.deps.locks.acquire(target, jobId);

    const job: BackupJob = {
      id: jobId,
      target,
      trigger,
      startedAt: this.now(),
      phase: "pending",
    };
    const state: RunState = {
      cancelled: false,
      committed: false,
      workloads: [],
      archive: null,
      remotePath: null,
      localPath: null,
      prunedCount: 0,
      configExportError: null,
      error: null,
    };

    const key = targetKey(target);
    this.active.set(key, job);
    log.info(`Job ${jobId} started for ${key} (${trigger})`);

    const done = this.execute(job, state, () => {
      this.active.delete(key);
      release();
    });

    return {
      job,
      done,
      cancel: () => {
        if (state.committed || job.phase === "finished") return false;
        state.cancelled = true;
        log.info(`Job ${jobId} cancellation requested`);
        return true;
      },
    };
  }

  /** Would a job for `target` be rejected right now */
  isBusy(target: JobTarget): boolean {
    return this.deps.locks.isBusy(target);
  }

  /** Non-terminal job for a target key, if any */
  getActiveJob(key: string): BackupJob | null {
    return this.active.get(key) ?? null;
  }

  activeJobs(): BackupJob[] {
    return [...this.active.values()];
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date();
  }

  private jobDir(job: BackupJob): string {
    return path.join(this.deps.settings.workDir, job.id);
  }

  private async execute(job: BackupJob, state: RunState, release: () => void): Promise<JobOutcome> {
    try {
      await this.runPhases(job, state);
    } catch (err) {
      state.error = err;
      log.error(`Job ${job.id} failed during ${job.phase}: ${describeError(err).message}`);
    }

    try {
      await this.cleanup(job, state);
    } catch (err) {
      log.error(`Cleanup of job ${job.id} failed`, err);
    }
    const outcome = this.buildOutcome(job, state);
    job.phase = "finished";
    job.status = outcome.status;
    job.errorCode = outcome.errorCode ?? undefined;
    job.errorMessage = outcome.errorMessage ?? undefined;

    try {
      this.deps.history.append(toHistoryEntry(outcome));
    } catch (err) {
      log.error(`Failed to record history for job ${job.id}`, err);
    }
    if (state.archive) {
      this.deps.locks.releaseArchive(state.archive.name);
    }
    release();

    const level = outcome.status === "success" ? "info" : "warn";
    log[level](`Job ${job.id} finished: ${outcome.status} (${outcome.severity})`);
    try {
      await this.deps.notifier.notify(outcome);
    } catch (err) {
      log.error(`Notification for job ${job.id} failed`, err);
    }
    return outcome;
  }

  private async runPhases(job: BackupJob, state: RunState): Promise<void> {
    const { settings } = this.deps;
    const checkCancelled = () => {
      if (state.cancelled) throw new JobCancelledError(job.id);
    };

    if (!settings.passphrase) {
      throw new ConfigError("archive.password (BACKUP_PASSWORD) is required to run a backup job");
    }

    const stagingRoot = path.join(this.jobDir(job), "staging");
    await mkdir(stagingRoot, { recursive: true });
    checkCancelled();

    const stagingPaths =
      job.target.kind === "config"
        ? await this.exportOnly(job, stagingRoot)
        : await this.snapshotWorkloads(job, state, stagingRoot, checkCancelled);

    checkCancelled();
    state.committed = true;

    job.phase = "archiving";
    const archive = await this.deps.archive.archive(stagingPaths, settings.passphrase, {
      jobId: job.id,
      targetName: targetDisplayName(job.target),
      kind: job.target.kind,
      outputDir: this.jobDir(job),
    });
    state.archive = archive;
    this.deps.locks.registerArchive(archive.name, job.id);
    await rm(stagingRoot, { recursive: true, force: true });

    job.phase = "uploading";
    if (this.deps.sync) {
      const confirmation = await this.deps.sync.upload(archive, settings.remoteDir);
      state.remotePath = confirmation.remotePath;
    } else {
      state.localPath = await this.deps.local.moveInto(archive.path, archive.name);
    }

    job.phase = "pruning";
    try {
      const result = await this.deps.retention.prune("all", settings.retentionDays);
      state.prunedCount = result.deleted.length;
    } catch (err) {
      log.warn(`Retention sweep after job ${job.id} failed: ${describeError(err).message}`);
    }
  }

  private async exportOnly(job: BackupJob, stagingRoot: string): Promise<string[]> {
    job.phase = "exporting";
    if (!this.deps.exporter) {
      throw new ConfigExportError("Configuration export is not configured (portainer.url/token)");
    }
    const file = await this.deps.exporter.exportConfig(path.join(stagingRoot, CONFIG_EXPORT_DIR));
    return [path.dirname(file)];
  }

  private async snapshotWorkloads(
    job: BackupJob,
    state: RunState,
    stagingRoot: string,
    checkCancelled: () => void,
  ): Promise<string[]> {
    job.phase = "discovering";
    const filter = job.target.kind === "project" ? job.target.workload : undefined;
    const workloads = await this.deps.discovery.discover(this.deps.settings.label, filter);
    if (job.target.kind === "project" && workloads.length === 0) {
      throw new WorkloadNotFoundError(job.target.workload);
    }
    if (workloads.length === 0) {
      throw new DiscoveryError("No eligible workloads found");
    }

    const stagingPaths: string[] = [];
    let workloadsStaged = 0;
    if (job.target.kind === "full" && this.deps.exporter) {
      job.phase = "exporting";
      try {
        const file = await this.deps.exporter.exportConfig(path.join(stagingRoot, CONFIG_EXPORT_DIR));
        stagingPaths.push(path.dirname(file));
      } catch (err) {
        state.configExportError = err;
        log.warn(`Configuration export skipped: ${describeError(err).message}`);
      }
    }

    checkCancelled();
    job.phase = "snapshotting";
    let firstFailure: unknown = null;

    for (const workload of workloads) {
      try {
        const result = await this.deps.snapshot.snapshot(workload, stagingRoot, {
          onStopCommitted: () => {
            checkCancelled();
            state.committed = true;
          },
        });
        stagingPaths.push(result.stagingPath);
        workloadsStaged++;
        state.workloads.push({ workload: workload.name, ok: true, severity: "info" });
      } catch (err) {
        if (err instanceof JobCancelledError) throw err;

        const { code, message, severity } = describeError(err);
        state.workloads.push({ workload: workload.name, ok: false, errorCode: code, errorMessage: message, severity });
        firstFailure ??= err;
        log.error(`Workload "${workload.name}" failed: ${message}`);

        // Data copied before a failed restart is still archived
        if (err instanceof RestartFailedError && err.stagingPath) {
          stagingPaths.push(err.stagingPath);
          workloadsStaged++;
        }
      }
    }

    if (workloadsStaged === 0) {
      throw firstFailure ?? new DiscoveryError("No workload could be snapshotted");
    }
    return stagingPaths;
  }

  /**
   * Remove the snapshot; keep an archive that did not reach the remote in the local store
   */
  private async cleanup(job: BackupJob, state: RunState): Promise<void> {
    const jobDir = this.jobDir(job);
    await rm(path.join(jobDir, "staging"), { recursive: true, force: true });

    const archive = state.archive;
    if (archive && existsSync(archive.path)) {
      try {
        state.localPath = await this.deps.local.moveInto(archive.path, archive.name);
        log.warn(`Archive ${archive.name} retained locally at ${state.localPath}`);
      } catch (err) {
        state.localPath = archive.path;
        log.error(`Could not move ${archive.name} into the local store; left at ${archive.path}`, err);
        return;
      }
    }

    await rm(jobDir, { recursive: true, force: true });
  }

  private buildOutcome(job: BackupJob, state: RunState): JobOutcome {
    const finishedAt = this.now();
    const failedWorkloads = state.workloads.filter((w) => !w.ok);

    let status: JobStatus;
    let errorCode: string | null = null;
    let errorMessage: string | null = null;
    let severity: Severity = "info";

    if (state.error !== null) {
      const described = describeError(state.error);
      status = "failed";
      errorCode = described.code;
      errorMessage = described.message;
      severity = described.severity;
    } else if (failedWorkloads.length > 0 || state.configExportError !== null) {
      status = "partial";
      const first = failedWorkloads[0];
      if (first) {
        errorCode = first.errorCode ?? null;
        errorMessage = first.errorMessage ?? null;
      } else {
        const described = describeError(state.configExportError);
        errorCode = described.code;
        errorMessage = described.message;
      }
      severity = "error";
    } else {
      status = "success";
    }

    if (state.workloads.some((w) => w.severity === "critical")) {
      severity = "critical";
    }

    return {
      jobId: job.id,
      target: targetKey(job.target),
      kind: job.target.kind,
      trigger: job.trigger,
      status,
      severity,
      startedAt: job.startedAt,
      finishedAt,
      durationMs: finishedAt.getTime() - job.startedAt.getTime(),
      archiveName: state.archive?.name ?? null,
      archiveSizeBytes: state.archive?.sizeBytes ?? null,
      remotePath: state.remotePath,
      localPath: state.localPath,
      errorCode,
      errorMessage,
      workloads: state.workloads,
      prunedCount: state.prunedCount,
    };
  }
}

export function toHistoryEntry(outcome: JobOutcome): HistoryInsert {
  return {
    job_id: outcome.jobId,
    target: outcome.target,
    kind: outcome.kind,
    trigger: outcome.trigger,
    status: outcome.status,
    severity: outcome.severity,
    started_at: outcome.startedAt.toISOString(),
    finished_at: outcome.finishedAt.toISOString(),
    duration_ms: outcome.durationMs,
    archive_name: outcome.archiveName,
    archive_size_bytes: outcome.archiveSizeBytes,
    remote_path: outcome.remotePath,
    local_path: outcome.localPath,
    error_code: outcome.errorCode,
    error_message: outcome.errorMessage,
    workloads: outcome.workloads,
    pruned_count: outcome.prunedCount,
  };
}
