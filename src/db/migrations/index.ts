import type BetterSqlite3 from "better-sqlite3";
import type { Migration } from "../../types/database";

import { migration as m0001 } from "./0001_initial";

type Database = BetterSqlite3.Database;

const migrations: Migration[] = [m0001];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

export function getCurrentVersion(database: Database): number {
  const table = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_version'",
    )
    .get();
  if (!table) return 0;

  const row = database
    .prepare<[], { version: number | null }>("SELECT MAX(version) as version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

export function runMigrations(database: Database): void {
  const pending = getPendingMigrations(getCurrentVersion(database));
  const record = database.prepare<[number]>("INSERT INTO schema_version (version) VALUES (?)");

  for (const migration of pending) {
    database.transaction(() => {
      database.exec(migration.up);
      record.run(migration.version);
    })();
  }
}

export function initializeDatabase(database: Database): void {
  if (database.name !== ":memory:") {
    database.pragma("journal_mode = WAL");
  }
  database.pragma("foreign_keys = ON");
  database.exec(`
CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
)`);

  runMigrations(database);
}
