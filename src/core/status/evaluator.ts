/**
 * Backup status evaluation
 *
 * Status is recomputed from the store and the filesystem on every call and
 * never cached: either may change while a sweep is running.
 */

import { stat } from "node:fs/promises";
import { type Tier, TIERS } from "../../types";
import { AmbiguousSelfResolutionError, errorMessage, isNotFound } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { locationKey } from "../../utils/path";
import { cheapestAlgorithm } from "../checksum/formats";
import type { ChecksumPolicy } from "../checksum/policy";
import { type ChecksumContext, consistentChecksums, generateChecksum } from "../checksum/strategies";
import { classify } from "../compare/comparator";
import {
  INVALID_SET,
  type MatchKind,
  SELF_SET,
  UNCONFIRMED_SET,
  VALID_SET,
} from "../compare/match-kind";
import { type FileRecord, loadFileRecord } from "../record/file-record";
import { type ClassifiedMatch, findMatches, type RecordStore } from "../store/record-store";
import type { BackupLocator } from "./locator";

const log = logger.child("status");

export type ValidStatus = `VALID_ON_${Uppercase<Tier>}`;
export type UnconfirmedStatus = `UNCONFIRMED_ON_${Uppercase<Tier>}`;

export type BackupStatus =
  | "NO_MATCHES"
  | "NO_COPIES_IN_STORE"
  | "NO_BACKUPS_IN_FILESYSTEM"
  | "NO_CHECKSUMS"
  | "POSSIBLE_UNSYNCED"
  | ValidStatus
  | UnconfirmedStatus;

const VALID_STATUS: Record<Tier, ValidStatus> = {
  archive: "VALID_ON_ARCHIVE",
  staging: "VALID_ON_STAGING",
  local: "VALID_ON_LOCAL",
  other: "VALID_ON_OTHER",
};

const UNCONFIRMED_STATUS: Record<Tier, UnconfirmedStatus> = {
  archive: "UNCONFIRMED_ON_ARCHIVE",
  staging: "UNCONFIRMED_ON_STAGING",
  local: "UNCONFIRMED_ON_LOCAL",
  other: "UNCONFIRMED_ON_OTHER",
};

export function validStatus(tier: Tier): ValidStatus {
  return VALID_STATUS[tier];
}

export function unconfirmedStatus(tier: Tier): UnconfirmedStatus {
  return UNCONFIRMED_STATUS[tier];
}

export function isValidStatus(status: BackupStatus): status is ValidStatus {
  return TIERS.some((tier) => VALID_STATUS[tier] === status);
}

export function isUnconfirmedStatus(status: BackupStatus): status is UnconfirmedStatus {
  return TIERS.some((tier) => UNCONFIRMED_STATUS[tier] === status);
}

/** A copy of the subject found at a backup tier location. */
export interface BackupCandidate {
  tier: Tier;
  record: FileRecord;
  /** Best classification of `record` against any of the selves */
  kind: MatchKind;
  /** The self that produced `kind` */
  self: FileRecord;
}

export interface Evaluation {
  subject: FileRecord;
  status: BackupStatus;
  /** Store matches outside IGNORED_SET, classified against the subject */
  matches: ClassifiedMatch[];
  /** The subject plus every store entry for the same file */
  selves: FileRecord[];
  /** Candidates that exist on disk, in tier priority order */
  backups: BackupCandidate[];
  /** The candidate that decided a VALID or UNCONFIRMED status */
  chosen: BackupCandidate | null;
}

export function isDeletionEligible(evaluation: Evaluation): boolean {
  return (
    isValidStatus(evaluation.status) &&
    evaluation.chosen !== null &&
    VALID_SET.has(evaluation.chosen.kind)
  );
}

function kindRank(kind: MatchKind): number {
  if (VALID_SET.has(kind)) return 3;
  if (UNCONFIRMED_SET.has(kind)) return 2;
  if (INVALID_SET.has(kind)) return 1;
  return 0;
}

function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export interface BackupStatusEvaluatorOptions {
  store: RecordStore;
  locator: BackupLocator;
  policy: ChecksumPolicy;
}

export class BackupStatusEvaluator {
  private readonly store: RecordStore;
  private readonly locator: BackupLocator;
  private readonly policy: ChecksumPolicy;

  constructor(options: BackupStatusEvaluatorOptions) {
    this.store = options.store;
    this.locator = options.locator;
    this.policy = options.policy;
  }

  private get checksumContext(): ChecksumContext {
    return { store: this.store, policy: this.policy };
  }

  async evaluate(subject: FileRecord): Promise<Evaluation> {
    const matches = await findMatches(this.store, subject);
    const selves = this.resolveSelves(subject, matches);
    const base: Omit<Evaluation, "status"> = { subject, matches, selves, backups: [], chosen: null };

    if (matches.length === 0) {
      return { ...base, status: "NO_MATCHES" };
    }

    const hasCopies = selves.some((self) =>
      matches.some((m) => {
        const kind = classify(self, m.record);
        return VALID_SET.has(kind) || UNCONFIRMED_SET.has(kind);
      }),
    );
    if (!hasCopies) {
      return { ...base, status: "NO_COPIES_IN_STORE" };
    }

    const backups = await this.findBackups(subject, matches, selves);
    const evaluation: Evaluation = { ...base, backups, status: "NO_BACKUPS_IN_FILESYSTEM" };

    if (backups.length === 0) {
      return evaluation;
    }
    if (!selves.some((s) => s.checksum)) {
      return { ...evaluation, status: "NO_CHECKSUMS" };
    }

    for (const tier of TIERS) {
      const valid = backups.find((b) => b.tier === tier && VALID_SET.has(b.kind));
      if (valid) return { ...evaluation, status: validStatus(tier), chosen: valid };
    }
    for (const tier of TIERS) {
      const unconfirmed = backups.find((b) => b.tier === tier && UNCONFIRMED_SET.has(b.kind));
      if (unconfirmed) return { ...evaluation, status: unconfirmedStatus(tier), chosen: unconfirmed };
    }
    return { ...evaluation, status: "POSSIBLE_UNSYNCED" };
  }

  /**
   * Fill in the checksum that keeps the best unconfirmed backup from being
   * confirmed (or refuted), then evaluate again. A no-op when a valid backup
   * already exists or there is nothing unconfirmed.
   */
  async ensureBackupChecksum(evaluation: Evaluation): Promise<Evaluation> {
    if (evaluation.backups.some((b) => VALID_SET.has(b.kind))) return evaluation;

    const preferred = evaluation.backups.find((b) => UNCONFIRMED_SET.has(b.kind));
    if (!preferred) return evaluation;

    const ctx = this.checksumContext;
    const backup = preferred.record;
    const selfAlgorithms = evaluation.selves.flatMap((s) => (s.checksum ? [s.checksum.algorithm] : []));
    const selfAlgorithm = cheapestAlgorithm(selfAlgorithms);
    let subject = evaluation.subject;

    if (backup.checksum && !selfAlgorithm) {
      subject = await generateChecksum(subject, ctx, backup.checksum.algorithm);
    } else if (selfAlgorithm && backup.checksum?.algorithm !== selfAlgorithm) {
      await generateChecksum(backup, ctx, selfAlgorithm);
    } else if (!backup.checksum && !selfAlgorithm) {
      subject = await generateChecksum(subject, ctx, "crc32");
      await generateChecksum(backup, ctx, "crc32");
    } else {
      return evaluation;
    }

    return this.evaluate(subject);
  }

  /**
   * Final check immediately before a delete: the chosen backup must still
   * exist with the recorded size, match a self's checksum exactly, and be a
   * different physical file from the subject.
   */
  async confirmDeletable(evaluation: Evaluation): Promise<boolean> {
    const { chosen } = evaluation;
    if (!isDeletionEligible(evaluation) || !chosen) return false;

    const { self, record } = chosen;
    if (!VALID_SET.has(classify(self, record))) return false;
    if (!self.checksum || !record.checksum) return false;
    if (self.checksum.algorithm !== record.checksum.algorithm || self.checksum.value !== record.checksum.value) {
      return false;
    }
    if (!record.location) return false;

    try {
      const stats = await stat(record.location);
      if (!stats.isFile() || stats.size !== record.size) return false;
      const { fileId } = evaluation.subject;
      return !fileId || fileId.dev !== stats.dev || fileId.ino !== stats.ino;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  private resolveSelves(subject: FileRecord, matches: ClassifiedMatch[]): FileRecord[] {
    const stored = matches.filter((m) => SELF_SET.has(m.kind)).map((m) => m.record);
    const { conflicts } = consistentChecksums([subject, ...stored]);
    if (conflicts.size === 0) return [subject, ...stored];

    for (const values of conflicts.values()) {
      const ambiguity = new AmbiguousSelfResolutionError(subject.location ?? "<no location>", values);
      log.warn(`${ambiguity.message}; the stored entries are not trusted`);
    }
    return [
      subject,
      ...stored.filter((r) => !r.checksum || !conflicts.has(r.checksum.algorithm)),
    ];
  }

  private async findBackups(
    subject: FileRecord,
    matches: ClassifiedMatch[],
    selves: FileRecord[],
  ): Promise<BackupCandidate[]> {
    const located = new Map<string, { tier: Tier; location: string; stored: FileRecord[] }>();

    for (const { tier, location } of this.locator.locate(subject)) {
      located.set(locationKey(location), { tier, location, stored: [] });
    }
    for (const { record } of matches) {
      if (!record.locationKey || !record.location) continue;
      const entry = located.get(record.locationKey);
      if (entry) {
        entry.stored.push(record);
        continue;
      }
      const tier = this.locator.tierOf(record);
      if (tier) {
        located.set(record.locationKey, { tier, location: record.location, stored: [record] });
      }
    }

    const selfKeys = new Set(selves.map((s) => s.locationKey));
    const candidates: BackupCandidate[] = [];

    for (const [key, entry] of located) {
      if (selfKeys.has(key)) continue;

      let best: BackupCandidate | null = null;
      for (const record of await this.onDisk(entry.location, entry.stored)) {
        if (classify(subject, record) === "SELF") continue;
        for (const self of selves) {
          const kind = classify(self, record);
          if (!best || kindRank(kind) > kindRank(best.kind)) {
            best = { tier: entry.tier, record, kind, self };
          }
        }
      }
      if (best && kindRank(best.kind) > 0) candidates.push(best);
    }

    return candidates.sort((a, b) => tierRank(a.tier) - tierRank(b.tier));
  }

  /**
   * The current state of a backup location. Stored entries are kept while the
   * file still has the stored size; otherwise the file is read again. Either
   * way the records carry the device identity of what is on disk now.
   */
  private async onDisk(location: string, stored: FileRecord[]): Promise<FileRecord[]> {
    try {
      const stats = await stat(location);
      if (!stats.isFile()) return [];

      const fileId = { dev: stats.dev, ino: stats.ino };
      const fresh = stored.filter((r) => r.size === stats.size).map((r) => r.with({ fileId }));
      if (fresh.length > 0) return fresh;

      const record = await loadFileRecord(location, { policy: this.policy });
      if (record.checksum) await this.store.add(record);
      return [record];
    } catch (err) {
      if (isNotFound(err)) {
        log.debug(`Backup no longer on disk: ${location}`);
        return [];
      }
      log.warn(`Could not read backup ${location}: ${errorMessage(err)}`);
      return [];
    }
  }
}
