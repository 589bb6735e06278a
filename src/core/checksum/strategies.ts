/**
 * Checksum completion strategies
 *
 * Every checksum computed here is written back to the record store so the
 * next lookup for the same file does not have to hash it again.
 */

import type { ChecksumAlgorithm } from "../../types";
import { AmbiguousSelfResolutionError, InvalidRecordError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { type MatchKind, SELF_SET } from "../compare/match-kind";
import type { FileRecord } from "../record/file-record";
import { findMatches, type RecordStore } from "../store/record-store";
import { cheapestAlgorithm } from "./formats";
import type { ChecksumPolicy } from "./policy";

const log = logger.child("checksum");

export interface ChecksumContext {
  store: RecordStore;
  policy: ChecksumPolicy;
}

/**
 * Hash the file now and record the result.
 */
export async function generateChecksum(
  subject: FileRecord,
  ctx: ChecksumContext,
  algorithm: ChecksumAlgorithm = ctx.policy.algorithm,
): Promise<FileRecord> {
  if (!subject.location) {
    throw new InvalidRecordError("Cannot generate a checksum for a record without a location");
  }
  log.info(`Generating ${algorithm} checksum for ${subject.location}`);

  const record = subject.withChecksum(await ctx.policy.compute(subject.location, algorithm));
  await ctx.store.add(record);
  return record;
}

/**
 * Group checksums by algorithm, separating algorithms whose entries disagree.
 */
export function consistentChecksums(records: readonly FileRecord[]): {
  agreed: Map<ChecksumAlgorithm, string>;
  conflicts: Map<ChecksumAlgorithm, string[]>;
} {
  const values = new Map<ChecksumAlgorithm, Set<string>>();
  for (const record of records) {
    if (!record.checksum) continue;
    const set = values.get(record.checksum.algorithm) ?? new Set<string>();
    set.add(record.checksum.value);
    values.set(record.checksum.algorithm, set);
  }

  const agreed = new Map<ChecksumAlgorithm, string>();
  const conflicts = new Map<ChecksumAlgorithm, string[]>();
  for (const [algorithm, set] of values) {
    const [first] = set;
    if (set.size === 1 && first !== undefined) {
      agreed.set(algorithm, first);
    } else {
      conflicts.set(algorithm, [...set]);
    }
  }
  return { agreed, conflicts };
}

/**
 * Take the checksum of a stored entry for the same file, if the store has an
 * unambiguous one. Saves hashing large files again.
 */
export async function exchangeIfChecksumInStore(
  subject: FileRecord,
  ctx: ChecksumContext,
): Promise<FileRecord> {
  if (subject.checksum) return subject;

  const selves = (await findMatches(ctx.store, subject, SELF_SET)).map((m) => m.record);
  if (selves.length === 0) {
    log.debug(`No stored checksum for ${subject.location}`);
    return subject;
  }

  const { agreed, conflicts } = consistentChecksums(selves);
  for (const [algorithm, values] of conflicts) {
    const ambiguity = new AmbiguousSelfResolutionError(subject.location ?? "<no location>", values);
    log.warn(`${ambiguity.message} (ignoring stored ${algorithm} entries)`);
  }

  const preferred = agreed.has(ctx.policy.algorithm)
    ? ctx.policy.algorithm
    : cheapestAlgorithm(agreed.keys());
  const value = preferred ? agreed.get(preferred) : undefined;
  if (!preferred || value === undefined) return subject;

  return subject.withChecksum({ algorithm: preferred, value });
}

/**
 * Hash the subject unless the store already holds a checksum for it.
 */
export async function generateChecksumIfNotInStore(
  subject: FileRecord,
  ctx: ChecksumContext,
): Promise<FileRecord> {
  const probe = subject.checksum ? subject.with({ checksum: null }) : subject;
  const stored = await findMatches(ctx.store, probe, new Set<MatchKind>(["SELF_MISSING_SELF"]));
  if (stored.length > 0) return subject;
  return generateChecksum(subject, ctx);
}
