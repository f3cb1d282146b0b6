/**
 * Job history repository
 *
 * History is append-only: the schema rejects UPDATE and DELETE, so the only
 * write here is an insert.
 */

import type { HistoryEntry, HistoryInsert, HistoryQuery } from "../types";
import { getDatabase } from "./connection";
import { parseHistoryRow, type RawHistoryRow, serializeHistoryEntry } from "./mappers";

const DEFAULT_HISTORY_LIMIT = 50;

export function appendHistory(entry: HistoryInsert): HistoryEntry {
  const database = getDatabase();

  database
    .prepare<Omit<RawHistoryRow, "id">>(`
      INSERT INTO job_history (
        job_id, target, kind, trigger, status, severity, started_at, finished_at,
        duration_ms, archive_name, archive_size_bytes, remote_path, local_path,
        error_code, error_message, workloads, pruned_count
      ) VALUES (
        @job_id, @target, @kind, @trigger, @status, @severity, @started_at, @finished_at,
        @duration_ms, @archive_name, @archive_size_bytes, @remote_path, @local_path,
        @error_code, @error_message, @workloads, @pruned_count
      )
    `)
    .run(serializeHistoryEntry(entry));

  const inserted = getHistoryByJobId(entry.job_id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted history entry: ${entry.job_id}`);
  }
  return inserted;
}

export function getHistoryByJobId(jobId: string): HistoryEntry | null {
  const row = getDatabase()
    .prepare<[string], RawHistoryRow>("SELECT * FROM job_history WHERE job_id = ?")
    .get(jobId);

  return row ? parseHistoryRow(row) : null;
}

/**
 * Query history, newest first, optionally filtered by target and start time range
 */
export function queryHistory(query: HistoryQuery = {}): HistoryEntry[] {
  const conditions: string[] = [];
  const params: Record<string, string | number> = {};

  if (query.target !== undefined) {
    conditions.push("target = @target");
    params.target = query.target;
  }
  if (query.from !== undefined) {
    conditions.push("started_at >= @from");
    params.from = query.from.toISOString();
  }
  if (query.to !== undefined) {
    conditions.push("started_at <= @to");
    params.to = query.to.toISOString();
  }
  params.limit = query.limit ?? DEFAULT_HISTORY_LIMIT;

  const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
  const rows = getDatabase()
    .prepare<Record<string, string | number>, RawHistoryRow>(
      `SELECT * FROM job_history ${where} ORDER BY started_at DESC, id DESC LIMIT @limit`,
    )
    .all(params);

  return rows.map(parseHistoryRow);
}

export function getLastHistoryEntry(target: string): HistoryEntry | null {
  return queryHistory({ target, limit: 1 })[0] ?? null;
}
