/**
 * Database connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { getAllMigrations, getCurrentVersion, getPendingMigrations, initializeDatabase } from "./migrations";

export type DB = Database.Database;

const log = logger.child("db");

function isMemoryPath(dbPath: string): boolean {
  return dbPath === ":memory:" || dbPath === "";
}

/**
 * Open (creating if needed) and migrate a database. The caller owns the
 * returned handle and closes it with `closeDatabase`.
 */
export async function openDatabase(dbPath: string): Promise<DB> {
  if (isMemoryPath(dbPath)) {
    const db = new Database(":memory:");
    initializeDatabase(db);
    return db;
  }

  await mkdir(dirname(dbPath), { recursive: true });

  if (existsSync(dbPath)) {
    // Open temporarily to check migration status
    const probe = new Database(dbPath);
    const currentVersion = getCurrentVersion(probe);
    const pending = getPendingMigrations(currentVersion);
    probe.close();

    if (pending.length > 0) {
      const backupPath = `${dbPath}.migration-backup`;
      log.info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      let db: DB | null = null;
      try {
        db = new Database(dbPath);
        initializeDatabase(db);
        log.info(
          `Migrations completed successfully (v${currentVersion} -> v${getAllMigrations().slice(-1)[0]?.version})`,
        );
        await unlink(backupPath);
        return db;
      } catch (err) {
        log.error(`Migration failed: ${errorMessage(err)}`);
        log.info("Rolling back database from backup...");
        db?.close();

        await copyFile(backupPath, dbPath);
        await unlink(backupPath);

        throw new Error(`Database migration failed and was rolled back: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }
  }

  const db = new Database(dbPath);
  initializeDatabase(db);
  return db;
}

export function closeDatabase(db: DB): void {
  if (db.open) {
    db.close();
  }
}
