import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { SELF_SET, VALID_SET } from "../../src/core/compare/match-kind";
import { FileRecord } from "../../src/core/record/file-record";
import { closeDatabase, type DB, openDatabase } from "../../src/db/connection";
import { SqliteRecordStore } from "../../src/db/record-repository";
import type { ChecksumAlgorithm } from "../../src/types";
import { SESSION } from "../helpers/fs";

function rec(location: string, size: number, value?: string, algorithm: ChecksumAlgorithm = "crc32"): FileRecord {
  return new FileRecord({ location, size, checksum: value ? { algorithm, value } : null });
}

describe("SqliteRecordStore", () => {
  let db: DB;
  let store: SqliteRecordStore;

  beforeEach(async () => {
    db = await openDatabase(":memory:");
    store = new SqliteRecordStore(db, { hostname: "test-host" });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  describe("add", () => {
    test("inserts once and reports repeats as unchanged", async () => {
      const record = rec(`/archive/${SESSION}/x.bin`, 100, "000000AA");

      expect(await store.add(record)).toBe("inserted");
      expect(await store.add(record)).toBe("unchanged");
      expect(store.count()).toBe(1);
    });

    test("updates the entry for the same location and algorithm", async () => {
      await store.add(rec(`/archive/${SESSION}/x.bin`, 100, "000000AA"));

      expect(await store.add(rec(`/ARCHIVE/${SESSION}/x.bin`, 120, "000000BB"))).toBe("updated");
      expect(store.count()).toBe(1);

      const row = db
        .prepare<[], { location: string; checksum: string; size: number }>(
          "SELECT location, checksum, size FROM file_records",
        )
        .get();
      expect(row).toEqual({ location: `/ARCHIVE/${SESSION}/x.bin`, checksum: "000000BB", size: 120 });
    });

    test("keeps one entry per algorithm", async () => {
      await store.add(rec(`/archive/${SESSION}/x.bin`, 100, "000000AA"));
      await store.add(rec(`/archive/${SESSION}/x.bin`, 100, "ab".repeat(32), "sha256"));

      expect(store.count()).toBe(2);
    });

    test("skips records without a checksum", async () => {
      expect(await store.add(rec(`/archive/${SESSION}/x.bin`, 100))).toBe("skipped");
      expect(store.count()).toBe(0);
    });

    test("stores the session and hostname", async () => {
      await store.add(rec(`/archive/${SESSION}/x.bin`, 100, "000000AA"));

      const row = db
        .prepare<[], { session_id: string | null; hostname: string | null }>(
          "SELECT session_id, hostname FROM file_records",
        )
        .get();
      expect(row).toEqual({ session_id: SESSION, hostname: "test-host" });
    });
  });

  describe("getMatches", () => {
    const subject = rec(`/local/${SESSION}/x.bin`, 100, "000000AA");

    beforeEach(async () => {
      await store.add(rec(`/archive/${SESSION}/x.bin`, 100, "000000AA"));
      await store.add(rec(`/archive/${SESSION}/other.bin`, 5, "000000CC"));
      await store.add(rec("/archive/1111111111_222222_20230101/x.bin", 100, "000000AA"));
    });

    test("returns related records from the same session", async () => {
      const matches = await store.getMatches(subject);

      expect(matches.map((m) => m.location)).toEqual([`/archive/${SESSION}/x.bin`]);
    });

    test("filters to the requested kinds", async () => {
      const valid = await store.getMatches(subject, VALID_SET);
      const selves = await store.getMatches(subject, SELF_SET);

      expect(valid.map((m) => m.location)).toEqual([`/archive/${SESSION}/x.bin`]);
      expect(selves).toEqual([]);
    });

    test("finds the stored entry for the subject itself", async () => {
      await store.add(subject);

      const selves = await store.getMatches(subject, SELF_SET);

      expect(selves.map((m) => m.location)).toEqual([`/local/${SESSION}/x.bin`]);
    });

    test("matches orphans by checksum", async () => {
      await store.add(rec("/backup/misc/y.bin", 50, "000000DD"));

      const matches = await store.getMatches(rec("/data/misc/y.bin", 50, "000000DD"));

      expect(matches.map((m) => m.location)).toEqual(["/backup/misc/y.bin"]);
    });

    test("matches orphans by size when nothing else matches", async () => {
      await store.add(rec("/backup/misc/y.bin", 50, "000000DD"));

      const matches = await store.getMatches(rec("/data/misc/y.bin", 50));

      expect(matches.map((m) => m.location)).toEqual(["/backup/misc/y.bin"]);
    });

    test("skips stored rows with an unknown algorithm", async () => {
      db.prepare(
        `INSERT INTO file_records (location, location_key, algorithm, checksum, size, session_id)
         VALUES ('/staging/${SESSION}/x.bin', '/staging/${SESSION}/x.bin', 'md5', 'abc', 100, '${SESSION}')`,
      ).run();

      const matches = await store.getMatches(subject);

      expect(matches.map((m) => m.location)).toEqual([`/archive/${SESSION}/x.bin`]);
    });
  });
});
