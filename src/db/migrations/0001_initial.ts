import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Append-only job history and archive deletion log",
  up: `
CREATE TABLE job_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id TEXT UNIQUE NOT NULL,
    target TEXT NOT NULL,
    kind TEXT NOT NULL,
    trigger TEXT NOT NULL,
    status TEXT NOT NULL,
    severity TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT NOT NULL,
    duration_ms INTEGER NOT NULL,
    archive_name TEXT,
    archive_size_bytes INTEGER,
    remote_path TEXT,
    local_path TEXT,
    error_code TEXT,
    error_message TEXT,
    workloads TEXT NOT NULL DEFAULT '[]',
    pruned_count INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX idx_job_history_target_started ON job_history(target, started_at DESC);
CREATE INDEX idx_job_history_started ON job_history(started_at DESC);

CREATE TRIGGER job_history_no_update BEFORE UPDATE ON job_history
BEGIN
    SELECT RAISE(ABORT, 'job_history is append-only');
END;

CREATE TRIGGER job_history_no_delete BEFORE DELETE ON job_history
BEGIN
    SELECT RAISE(ABORT, 'job_history is append-only');
END;

CREATE TABLE deletion_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    archive_name TEXT NOT NULL,
    location TEXT NOT NULL,
    path TEXT NOT NULL,
    reason TEXT NOT NULL,
    deleted_at TEXT DEFAULT (datetime('now')),
    success INTEGER NOT NULL,
    error_message TEXT
);

CREATE INDEX idx_deletion_log_deleted_at ON deletion_log(deleted_at DESC);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
