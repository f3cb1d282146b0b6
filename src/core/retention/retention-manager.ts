/**
 * Retention manager: deletes archives older than the configured age
 */

import type { DeletionLogInsert } from "../../db";
import { describeError, PruneEntryError } from "../../errors";
import type { DeletionReason, RemoteEntry, RemoteStore, RetentionRecord, StorageType } from "../../types";
import { createLogger } from "../../utils/logger";
import { isValidArchiveName, parseArchiveName } from "../../utils/naming";
import type { LocalArchiveStore } from "../../storage/local";

const log = createLogger("retention");

const DAY_MS = 24 * 60 * 60 * 1000;

export type PruneScope = StorageType | "all";

export interface PruneOptions {
  dryRun?: boolean;
  reason?: DeletionReason;
  now?: Date;
}

export interface PruneFailure {
  record: RetentionRecord;
  error: PruneEntryError;
}

export interface PruneResult {
  scope: PruneScope;
  dryRun: boolean;
  checked: number;
  candidates: RetentionRecord[];
  deleted: RetentionRecord[];
  skippedInFlight: RetentionRecord[];
  failures: PruneFailure[];
  /** Locations that could not be listed */
  listingErrors: { location: StorageType; message: string }[];
}

export interface RetentionDeps {
  local: LocalArchiveStore;
  remote: RemoteStore | null;
  /** Remote directory holding archives, relative to the remote root */
  remoteDir?: string;
  prefix: string;
  isInFlight: (archiveName: string) => boolean;
  recordDeletion: (entry: DeletionLogInsert) => void;
}

/**
 * Age reference of an entry: modification time, else the time in its name
 */
export function entryTimestamp(entry: RemoteEntry): Date | null {
  if (entry.modTime) return entry.modTime;
  return parseArchiveName(entry.name)?.createdAt ?? null;
}

export function isExpired(timestamp: Date, maxAgeDays: number, now: Date): boolean {
  return timestamp.getTime() < now.getTime() - maxAgeDays * DAY_MS;
}

export class RetentionManager {
  constructor(private readonly deps: RetentionDeps) {}

  async prune(scope: PruneScope, maxAgeDays: number, options: PruneOptions = {}): Promise<PruneResult> {
    const now = options.now ?? new Date();
    const dryRun = options.dryRun ?? false;
    const result: PruneResult = {
      scope,
      dryRun,
      checked: 0,
      candidates: [],
      deleted: [],
      skippedInFlight: [],
      failures: [],
      listingErrors: [],
    };

    const locations: StorageType[] = scope === "all" ? ["local", "remote"] : [scope];
    for (const location of locations) {
      if (location === "remote" && !this.deps.remote) {
        log.debug("Remote disabled, skipping remote retention");
        continue;
      }

      let records: RetentionRecord[];
      try {
        records = await this.listRecords(location);
      } catch (err) {
        const message = describeError(err).message;
        log.error(`Failed to list ${location} archives: ${message}`);
        result.listingErrors.push({ location, message });
        continue;
      }

      result.checked += records.length;
      for (const record of records) {
        if (!isExpired(record.timestamp, maxAgeDays, now)) continue;

        if (this.deps.isInFlight(record.name)) {
          log.info(`Skipping ${record.name}: archive belongs to a running job`);
          result.skippedInFlight.push(record);
          continue;
        }

        result.candidates.push(record);
        if (dryRun) {
          log.info(`[DRY RUN] Would delete ${location} archive ${record.name}`);
          continue;
        }

        await this.deleteRecord(record, options.reason ?? "retention_days", result);
      }
    }

    log.info(
      `Retention sweep (${scope}, ${maxAgeDays}d): ${result.checked} checked, ` +
        `${dryRun ? `${result.candidates.length} candidate(s)` : `${result.deleted.length} deleted`}` +
        (result.failures.length > 0 ? `, ${result.failures.length} failed` : ""),
    );
    return result;
  }

  /**
   * Archives at a location, newest first; names outside the naming pattern are ignored
   */
  async listRecords(location: StorageType): Promise<RetentionRecord[]> {
    const entries = await this.listEntries(location);
    const records: RetentionRecord[] = [];

    for (const entry of entries) {
      if (!isValidArchiveName(entry.name, this.deps.prefix)) continue;
      const timestamp = entryTimestamp(entry);
      if (!timestamp) continue;
      records.push({
        location,
        name: entry.name,
        path: "path" in entry && typeof entry.path === "string" ? entry.path : this.remotePathFor(entry.name),
        timestamp,
        sizeBytes: entry.size,
      });
    }

    return records.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }

  private async listEntries(location: StorageType): Promise<RemoteEntry[]> {
    if (location === "local") {
      return this.deps.local.list();
    }
    return this.deps.remote ? this.deps.remote.list(this.deps.remoteDir ?? "") : [];
  }

  private remotePathFor(name: string): string {
    return this.deps.remoteDir ? `${this.deps.remoteDir.replace(/\/+$/, "")}/${name}` : name;
  }

  private async deleteRecord(record: RetentionRecord, reason: DeletionReason, result: PruneResult): Promise<void> {
    try {
      if (record.location === "local") {
        await this.deps.local.delete(record.path);
      } else if (this.deps.remote) {
        await this.deps.remote.delete(record.path);
      }
      result.deleted.push(record);
      log.info(`Deleted ${record.location} archive ${record.name}`);
      this.record(record, reason, null);
    } catch (err) {
      const error = new PruneEntryError(record.path, err);
      log.error(error.message);
      result.failures.push({ record, error });
      this.record(record, reason, error.message);
    }
  }

  private record(record: RetentionRecord, reason: DeletionReason, errorMessage: string | null): void {
    try {
      this.deps.recordDeletion({
        archive_name: record.name,
        location: record.location,
        path: record.path,
        reason,
        success: errorMessage === null,
        error_message: errorMessage,
      });
    } catch (err) {
      log.warn(`Could not write deletion log for ${record.name}: ${describeError(err).message}`);
    }
  }
}
