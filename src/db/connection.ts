/**
 * Database connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { info, warn, error as logError } from "../utils/logger";
import { getCurrentVersion, getLatestVersion, getPendingMigrations, initializeDatabase } from "./migrations";

let db: Database.Database | null = null;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    warn(`Could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

export async function initDatabase(dbPath: string): Promise<Database.Database> {
  if (db) {
    return db;
  }

  if (dbPath !== ":memory:") {
    await mkdir(dirname(dbPath), { recursive: true });
  }

  if (dbPath !== ":memory:" && existsSync(dbPath)) {
    // Open temporarily to check migration status
    const tempDb = new Database(dbPath);
    const currentVersion = getCurrentVersion(tempDb);
    const pending = getPendingMigrations(currentVersion);
    tempDb.close();

    if (pending.length > 0) {
      // Backup before migrations
      const backupPath = `${dbPath}.migration-backup`;
      info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      let opened: Database.Database | null = null;
      try {
        opened = new Database(dbPath);
        initializeDatabase(opened);
        info(`Migrations completed successfully (v${currentVersion} -> v${getLatestVersion()})`);
        await removeFile(backupPath);
        db = opened;
        return opened;
      } catch (err) {
        logError(`Migration failed: ${errorMessage(err)}`);
        info("Rolling back database from backup...");
        opened?.close();

        await copyFile(backupPath, dbPath);
        await removeFile(backupPath);
        throw new Error(`Database migration failed and was rolled back: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }
  }

  // No pending migrations or new database
  const created = new Database(dbPath);
  initializeDatabase(created);
  db = created;
  return created;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
