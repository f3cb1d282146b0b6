/**
 * Database module exports
 */

// Connection
export { closeDatabase, getDatabase, initDatabase } from "./connection";
export type { DeletionLogInsert } from "./deletion-log-repository";
// Deletion log repository
export { getDeletionLogs, logDeletion } from "./deletion-log-repository";
// History repository
export {
  appendHistory,
  getHistoryByJobId,
  getLastHistoryEntry,
  queryHistory,
} from "./history-repository";
export type { RawDeletionLogRow, RawHistoryRow } from "./mappers";
// Mappers
export { parseDeletionLogRow, parseHistoryRow, parseWorkloads, serializeWorkloads } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
