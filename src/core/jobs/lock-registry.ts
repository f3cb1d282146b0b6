/**
 * Target lock registry
 *
 * Keys: `project:<name>`, `full`, `config`. A full-system job conflicts with
 * every other target; config-only conflicts with full and itself; a project
 * conflicts with itself and full. Acquisition is synchronous so that two
 * triggers racing in the same tick cannot both succeed.
 *
 * With a lock directory, every held target and in-flight archive is also
 * stamped on disk with the owning pid, so the daemon and one-off CLI runs
 * see each other. Entries of dead processes are removed on sight.
 */

import { linkSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import { JobAlreadyRunningError } from "../../errors";
import type { JobTarget } from "../../types";
import { generateShortId } from "../../utils/crypto";
import { createLogger } from "../../utils/logger";

const log = createLogger("locks");

const LOCK_SUFFIX = ".lock";

export type Release = () => void;

export interface LockRegistryOptions {
  /** Directory shared by every process of this installation */
  dir?: string;
}

interface LockRecord {
  pid: number;
  jobId: string;
}

export function targetKey(target: JobTarget): string {
  switch (target.kind) {
    case "project":
      return `project:${target.workload}`;
    case "full":
      return "full";
    case "config":
      return "config";
  }
}

export function targetsConflict(a: string, b: string): boolean {
  return a === b || a === "full" || b === "full";
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

function isLockRecord(value: unknown): value is LockRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "pid" in value &&
    typeof value.pid === "number" &&
    "jobId" in value &&
    typeof value.jobId === "string"
  );
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user
    return hasCode(err, "EPERM");
  }
}

function parseRecord(raw: string): LockRecord | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isLockRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export class LockRegistry {
  /** target key -> job id */
  private readonly held = new Map<string, string>();
  /** archive name -> job id */
  private readonly inFlight = new Map<string, string>();
  private readonly dir: string | null;

  constructor(options: LockRegistryOptions = {}) {
    this.dir = options.dir ?? null;
  }

  /**
   * Acquire the lock for `target` or throw JobAlreadyRunningError
   */
  acquire(target: JobTarget, jobId: string): Release {
    const key = targetKey(target);
    const conflict = this.heldTargets().find((heldKey) => targetsConflict(key, heldKey));
    if (conflict !== undefined) {
      throw new JobAlreadyRunningError(key, conflict);
    }

    if (this.dir) {
      this.claim(key, jobId);
      // Claim first, then look: of two processes racing for conflicting keys, neither wins
      const shared = this.sharedTargets().find((heldKey) => heldKey !== key && targetsConflict(key, heldKey));
      if (shared !== undefined) {
        this.unclaim(this.lockFile(key), jobId);
        throw new JobAlreadyRunningError(key, shared);
      }
    }

    this.held.set(key, jobId);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (this.held.get(key) === jobId) {
        this.held.delete(key);
        if (this.dir) this.unclaim(this.lockFile(key), jobId);
      }
    };
  }

  isHeld(target: JobTarget): boolean {
    return this.holder(target) !== null;
  }

  /** Job id holding `target`, if any */
  holder(target: JobTarget): string | null {
    const key = targetKey(target);
    const local = this.held.get(key);
    if (local !== undefined) return local;
    return this.dir ? (this.readLive(this.lockFile(key))?.jobId ?? null) : null;
  }

  /**
   * Would acquiring `target` fail right now
   */
  isBusy(target: JobTarget): boolean {
    const key = targetKey(target);
    return this.heldTargets().some((heldKey) => targetsConflict(key, heldKey));
  }

  /** Targets held by this process or, with a lock directory, by any live process */
  heldTargets(): string[] {
    const keys = new Set(this.held.keys());
    for (const key of this.sharedTargets()) keys.add(key);
    return [...keys];
  }

  registerArchive(archiveName: string, jobId: string): void {
    this.inFlight.set(archiveName, jobId);
    if (this.dir) {
      const file = this.archiveFile(archiveName);
      mkdirSync(path.dirname(file), { recursive: true });
      writeFileSync(file, JSON.stringify({ pid: process.pid, jobId }));
    }
  }

  releaseArchive(archiveName: string): void {
    const jobId = this.inFlight.get(archiveName);
    this.inFlight.delete(archiveName);
    if (this.dir && jobId !== undefined) {
      this.unclaim(this.archiveFile(archiveName), jobId);
    }
  }

  isInFlight(archiveName: string): boolean {
    if (this.inFlight.has(archiveName)) return true;
    return this.dir ? this.readLive(this.archiveFile(archiveName)) !== null : false;
  }

  private lockFile(key: string): string {
    return path.join(this.requireDir(), `${encodeURIComponent(key)}${LOCK_SUFFIX}`);
  }

  private archiveFile(archiveName: string): string {
    return path.join(this.requireDir(), "archives", encodeURIComponent(archiveName));
  }

  private requireDir(): string {
    if (this.dir === null) throw new Error("Lock registry has no lock directory");
    return this.dir;
  }

  /**
   * Create the lock file for `key`. The record is written to a temporary file
   * and hard-linked into place, so readers never see a half-written lock.
   */
  private claim(key: string, jobId: string): void {
    const file = this.lockFile(key);
    mkdirSync(this.requireDir(), { recursive: true });
    const tmp = path.join(this.requireDir(), `.${generateShortId()}.${process.pid}.tmp`);
    writeFileSync(tmp, JSON.stringify({ pid: process.pid, jobId }));
    try {
      for (let attempt = 0; attempt < 2; attempt++) {
        try {
          linkSync(tmp, file);
          return;
        } catch (err) {
          if (!hasCode(err, "EEXIST")) throw err;
          const owner = this.readLive(file);
          if (owner !== null) {
            throw new JobAlreadyRunningError(key, `${key} (job ${owner.jobId}, pid ${owner.pid})`);
          }
        }
      }
      throw new JobAlreadyRunningError(key, key);
    } finally {
      rmSync(tmp, { force: true });
    }
  }

  private unclaim(file: string, jobId: string): void {
    if (this.readLive(file)?.jobId === jobId) {
      rmSync(file, { force: true });
    }
  }

  /**
   * Record in `file` if its owner is alive; removes the file otherwise
   */
  private readLive(file: string): LockRecord | null {
    let raw: string;
    try {
      raw = readFileSync(file, "utf8");
    } catch (err) {
      if (hasCode(err, "ENOENT")) return null;
      throw err;
    }

    const record = parseRecord(raw);
    if (record === null || !isProcessAlive(record.pid)) {
      log.warn(`Removing stale lock ${path.basename(file)}${record ? ` of pid ${record.pid}` : ""}`);
      rmSync(file, { force: true });
      return null;
    }
    return record;
  }

  private sharedTargets(): string[] {
    if (!this.dir) return [];
    let names: string[];
    try {
      names = readdirSync(this.dir);
    } catch (err) {
      if (hasCode(err, "ENOENT")) return [];
      throw err;
    }

    const keys: string[] = [];
    for (const name of names) {
      if (!name.endsWith(LOCK_SUFFIX)) continue;
      if (this.readLive(path.join(this.dir, name)) !== null) {
        keys.push(decodeURIComponent(name.slice(0, -LOCK_SUFFIX.length)));
      }
    }
    return keys;
  }
}
