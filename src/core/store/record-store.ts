/**
 * Record store contract and local match refinement
 */

import type { AddResult } from "../../types";
import { classify } from "../compare/comparator";
import { IGNORED_SET, type MatchKind, type MatchKindSet } from "../compare/match-kind";
import type { FileRecord } from "../record/file-record";

export interface RecordStore {
  /**
   * Insert or update the entry keyed by (location, checksum algorithm).
   * Records without a checksum are not stored.
   */
  add(record: FileRecord): Promise<AddResult>;

  /**
   * Candidate records related to `subject`. Filtering done by the store is
   * coarse; callers classify every candidate again before acting on it.
   */
  getMatches(subject: FileRecord, kinds?: MatchKindSet): Promise<FileRecord[]>;
}

export interface ClassifiedMatch {
  record: FileRecord;
  kind: MatchKind;
}

export function dedupeRecords(records: Iterable<FileRecord>): FileRecord[] {
  const seen = new Map<string, FileRecord>();
  for (const record of records) {
    if (!seen.has(record.identityKey)) {
      seen.set(record.identityKey, record);
    }
  }
  return [...seen.values()];
}

/**
 * Classify each candidate against the subject and keep the requested kinds.
 * Without `kinds`, everything outside IGNORED_SET is kept.
 */
export function refineMatches(
  subject: FileRecord,
  candidates: Iterable<FileRecord>,
  kinds?: MatchKindSet,
): ClassifiedMatch[] {
  const refined: ClassifiedMatch[] = [];
  for (const record of dedupeRecords(candidates)) {
    const kind = classify(subject, record);
    const keep = kinds ? kinds.has(kind) : !IGNORED_SET.has(kind);
    if (keep) refined.push({ record, kind });
  }
  return refined;
}

/**
 * Store matches for `subject`, classified locally.
 */
export async function findMatches(
  store: RecordStore,
  subject: FileRecord,
  kinds?: MatchKindSet,
): Promise<ClassifiedMatch[]> {
  const candidates = await store.getMatches(subject, kinds);
  return refineMatches(subject, candidates, kinds);
}
