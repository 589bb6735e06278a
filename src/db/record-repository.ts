/**
 * SQLite-backed record store
 */

import { hostname as osHostname } from "node:os";
import { SELF_SET, VALID_SET, type MatchKindSet } from "../core/compare/match-kind";
import type { FileRecord } from "../core/record/file-record";
import { dedupeRecords, type RecordStore, refineMatches } from "../core/store/record-store";
import type { AddResult, RawFileRecordRow } from "../types";
import type { DB } from "./connection";
import { parseRecordRow, type RecordParams, toRecordParams } from "./mappers";

/** Orphans below this size are not matched on size alone. */
const MIN_SIZE_MATCH_BYTES = 10;

function allIn(kinds: MatchKindSet | undefined, set: MatchKindSet): boolean {
  if (!kinds || kinds.size === 0) return false;
  for (const kind of kinds) {
    if (!set.has(kind)) return false;
  }
  return true;
}

export interface SqliteRecordStoreOptions {
  /** Stored alongside each record (default: this machine's hostname) */
  hostname?: string | null;
}

export class SqliteRecordStore implements RecordStore {
  private readonly hostname: string | null;

  constructor(
    private readonly db: DB,
    options: SqliteRecordStoreOptions = {},
  ) {
    this.hostname = options.hostname === undefined ? osHostname() : options.hostname;
  }

  async add(record: FileRecord): Promise<AddResult> {
    const params = toRecordParams(record, this.hostname);
    if (!params) return "skipped";

    const upsert = this.db.transaction((p: RecordParams): AddResult => {
      const existing = this.db
        .prepare<{ location_key: string; algorithm: string }, { checksum: string; size: number | null }>(
          "SELECT checksum, size FROM file_records WHERE location_key = @location_key AND algorithm = @algorithm",
        )
        .get({ location_key: p.location_key, algorithm: p.algorithm });

      if (existing && existing.checksum === p.checksum && existing.size === p.size) {
        return "unchanged";
      }

      this.db
        .prepare<RecordParams>(`
          INSERT INTO file_records (location, location_key, algorithm, checksum, size, session_id, hostname)
          VALUES (@location, @location_key, @algorithm, @checksum, @size, @session_id, @hostname)
          ON CONFLICT (location_key, algorithm) DO UPDATE SET
            location = excluded.location,
            checksum = excluded.checksum,
            size = excluded.size,
            session_id = excluded.session_id,
            hostname = excluded.hostname,
            recorded_at = datetime('now')
        `)
        .run(p);

      return existing ? "updated" : "inserted";
    });

    return upsert(params);
  }

  async getMatches(subject: FileRecord, kinds?: MatchKindSet): Promise<FileRecord[]> {
    const rows = subject.session ? this.sessionRows(subject, kinds) : this.orphanRows(subject);

    const records: FileRecord[] = [];
    for (const row of rows) {
      const record = parseRecordRow(row);
      if (record) records.push(record);
    }

    return refineMatches(subject, dedupeRecords(records), kinds).map((m) => m.record);
  }

  /** Number of stored entries. */
  count(): number {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM file_records").get();
    return row?.n ?? 0;
  }

  private sessionRows(subject: FileRecord, kinds: MatchKindSet | undefined): RawFileRecordRow[] {
    const session_id = subject.session?.id ?? null;
    const checksum = subject.checksum?.value ?? null;

    if (allIn(kinds, VALID_SET)) {
      if (checksum === null || subject.size === null) return [];
      return this.db
        .prepare<{ session_id: string | null; size: number; checksum: string }, RawFileRecordRow>(
          "SELECT * FROM file_records WHERE session_id = @session_id AND size = @size AND checksum = @checksum",
        )
        .all({ session_id, size: subject.size, checksum });
    }

    if (allIn(kinds, SELF_SET)) {
      return this.db
        .prepare<
          { session_id: string | null; location_key: string | null; size: number | null; checksum: string | null },
          RawFileRecordRow
        >(
          `SELECT * FROM file_records WHERE session_id = @session_id
             AND (location_key = @location_key OR size = @size OR checksum = @checksum)`,
        )
        .all({ session_id, location_key: subject.locationKey, size: subject.size, checksum });
    }

    return this.db
      .prepare<{ session_id: string | null }, RawFileRecordRow>(
        "SELECT * FROM file_records WHERE session_id = @session_id",
      )
      .all({ session_id });
  }

  private orphanRows(subject: FileRecord): RawFileRecordRow[] {
    const direct = this.db
      .prepare<{ location_key: string | null; checksum: string | null }, RawFileRecordRow>(
        "SELECT * FROM file_records WHERE location_key = @location_key OR checksum = @checksum",
      )
      .all({ location_key: subject.locationKey, checksum: subject.checksum?.value ?? null });

    if (direct.length > 0 || subject.size === null || subject.size <= MIN_SIZE_MATCH_BYTES) {
      return direct;
    }

    return this.db
      .prepare<{ size: number }, RawFileRecordRow>("SELECT * FROM file_records WHERE size = @size")
      .all({ size: subject.size });
  }
}
