import * as path from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
  runMigrations,
} from "../../src/db/migrations";
import { makeTempDir, removeTempDir } from "../helpers/fs";

function names(db: Database.Database, sql: string): string[] {
  return db
    .prepare<[], { name: string }>(sql)
    .all()
    .map((row) => row.name);
}

describe("migrations", () => {
  let tempDir: string;
  let db: Database.Database | undefined;

  beforeEach(async () => {
    tempDir = await makeTempDir("migrations");
  });

  afterEach(async () => {
    db?.close();
    db = undefined;
    await removeTempDir(tempDir);
  });

  function open(name: string): Database.Database {
    db = new Database(path.join(tempDir, name));
    return db;
  }

  describe("getAllMigrations", () => {
    test("returns all migrations", () => {
      const migrations = getAllMigrations();

      expect(migrations.length).toBeGreaterThanOrEqual(1);
      expect(migrations[0]?.version).toBe(1);
      expect(migrations[0]?.name).toBe("initial");
    });

    test("returns migrations sorted by version", () => {
      const versions = getAllMigrations().map((m) => m.version);

      expect(versions).toEqual([...versions].sort((a, b) => a - b));
    });

    test("each migration has required fields", () => {
      for (const migration of getAllMigrations()) {
        expect(migration.version).toBeGreaterThan(0);
        expect(migration.name).toBeTruthy();
        expect(migration.description).toBeTruthy();
        expect(migration.up).toBeTruthy();
      }
    });
  });

  describe("getLatestVersion", () => {
    test("returns version 1 for current migrations", () => {
      expect(getLatestVersion()).toBe(1);
    });
  });

  describe("getPendingMigrations", () => {
    test("returns all migrations when current version is 0", () => {
      expect(getPendingMigrations(0)).toHaveLength(getAllMigrations().length);
    });

    test("returns no migrations when at latest version", () => {
      expect(getPendingMigrations(getLatestVersion())).toHaveLength(0);
    });
  });

  describe("getCurrentVersion", () => {
    test("returns 0 for database without schema_version table", () => {
      expect(getCurrentVersion(open("empty.db"))).toBe(0);
    });

    test("returns max version when multiple versions exist", () => {
      const database = open("multi.db");
      database.exec(`
        CREATE TABLE schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT (datetime('now'))
        );
        INSERT INTO schema_version (version) VALUES (1);
        INSERT INTO schema_version (version) VALUES (2);
      `);

      expect(getCurrentVersion(database)).toBe(2);
    });
  });

  describe("initializeDatabase", () => {
    test("creates all tables on fresh database", () => {
      const database = open("fresh.db");

      initializeDatabase(database);

      const tables = names(database, "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name");
      expect(tables).toContain("file_records");
      expect(tables).toContain("schema_version");
      expect(getCurrentVersion(database)).toBe(getLatestVersion());
    });

    test("creates indexes", () => {
      const database = open("indexed.db");

      initializeDatabase(database);

      const indexes = names(database, "SELECT name FROM sqlite_master WHERE type='index'");
      expect(indexes).toContain("idx_file_records_session");
      expect(indexes).toContain("idx_file_records_checksum");
      expect(indexes).toContain("idx_file_records_size");
    });

    test("enables WAL mode", () => {
      const database = open("wal.db");

      initializeDatabase(database);

      expect(database.pragma("journal_mode", { simple: true })).toBe("wal");
    });

    test("enables foreign keys", () => {
      const database = open("fk.db");

      initializeDatabase(database);

      expect(database.pragma("foreign_keys", { simple: true })).toBe(1);
    });

    test("is idempotent - can be called multiple times", () => {
      const database = open("idempotent.db");

      initializeDatabase(database);
      initializeDatabase(database);

      expect(getCurrentVersion(database)).toBe(getLatestVersion());
    });

    test("works on an in-memory database", () => {
      db = new Database(":memory:");

      initializeDatabase(db);

      expect(names(db, "SELECT name FROM sqlite_master WHERE type='table'")).toContain("file_records");
    });
  });

  describe("runMigrations", () => {
    test("does nothing when already at latest version", () => {
      const database = open("latest.db");
      initializeDatabase(database);

      runMigrations(database);

      expect(getCurrentVersion(database)).toBe(getLatestVersion());
    });
  });

  describe("migration content", () => {
    test("creates file_records table with all columns", () => {
      const database = open("schema.db");
      initializeDatabase(database);

      const columns = names(database, "SELECT name FROM pragma_table_info('file_records')");

      expect(columns).toEqual([
        "id",
        "location",
        "location_key",
        "algorithm",
        "checksum",
        "size",
        "session_id",
        "hostname",
        "recorded_at",
      ]);
    });

    test("keeps one entry per location and algorithm", () => {
      const database = open("unique.db");
      initializeDatabase(database);
      const insert = database.prepare(
        "INSERT INTO file_records (location, location_key, algorithm, checksum) VALUES ('/a', '/a', 'crc32', '000000AA')",
      );

      insert.run();

      expect(() => insert.run()).toThrow(/UNIQUE/);
    });
  });
});
