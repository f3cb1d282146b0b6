/**
 * Deletion log repository
 */

import type { DeletionLogRecord } from "../types";
import { getDatabase } from "./connection";
import { parseDeletionLogRow, type RawDeletionLogRow } from "./mappers";

export type DeletionLogInsert = Omit<DeletionLogRecord, "id" | "deleted_at">;

export function logDeletion(log: DeletionLogInsert): void {
  getDatabase()
    .prepare(
      `INSERT INTO deletion_log (
        archive_name, location, path, reason, success, error_message
      ) VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      log.archive_name,
      log.location,
      log.path,
      log.reason,
      log.success ? 1 : 0,
      log.error_message ?? null,
    );
}

export function getDeletionLogs(limit = 100): DeletionLogRecord[] {
  return getDatabase()
    .prepare<[number], RawDeletionLogRow>(
      "SELECT * FROM deletion_log ORDER BY deleted_at DESC, id DESC LIMIT ?",
    )
    .all(limit)
    .map(parseDeletionLogRow);
}
