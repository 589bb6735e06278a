/**
 * Copy orchestration
 *
 * Copy, validate by checksum, and only then (optionally) remove the source.
 * A copy that cannot be validated within the attempt limit leaves both files
 * where they are.
 */

import type { Stats } from "node:fs";
import { copyFile, mkdir, stat, unlink, utimes } from "node:fs/promises";
import * as path from "node:path";
import type { ChecksumAlgorithm } from "../../types";
import {
  errorMessage,
  InvalidRecordError,
  isNotADirectory,
  isNotFound,
  NotFoundError,
  RetryExhaustedError,
  SessionMismatchError,
  toFsError,
} from "../../utils/errors";
import { logger } from "../../utils/logger";
import { joinLocation, normalizeLocation, pathSegments } from "../../utils/path";
import type { ChecksumPolicy } from "../checksum/policy";
import {
  type ChecksumContext,
  consistentChecksums,
  exchangeIfChecksumInStore,
  generateChecksum,
} from "../checksum/strategies";
import { classify } from "../compare/comparator";
import {
  INVALID_SET,
  type MatchKind,
  type MatchKindSet,
  SELF_SET,
  union,
  VALID_SET,
} from "../compare/match-kind";
import { FileRecord, loadFileRecord } from "../record/file-record";
import { parseSession, sessionRelativePath } from "../record/session";
import { findMatches, type RecordStore } from "../store/record-store";

const log = logger.child("copy");

export const DEFAULT_MAX_ATTEMPTS = 3;

/** Entries stored for a destination that is no longer on disk classify as previous versions. */
const CLEARED_DEST_KINDS: MatchKindSet = union(SELF_SET, new Set<MatchKind>(["SELF_PREVIOUS_VERSION"]));

/** Modification times closer than this count as equal (FAT stores 2s steps). */
const MTIME_TOLERANCE_MS = 2000;

export interface CopyOptions {
  /** Put the file under its session folder when the destination has none (default true) */
  addSessionSubdir?: boolean;
  /** Confirm the copy by checksum (default true) */
  validate?: boolean;
  /** Copy even when the destination already looks like a copy (default false) */
  allowRecopy?: boolean;
  /** Delete the source once the copy is validated; implies `validate` (default false) */
  removeSourceOnSuccess?: boolean;
}

export type CopyStatus = "copied" | "validated" | "skipped" | "refused" | "failed";

export interface CopyOutcome {
  status: CopyStatus;
  source: string;
  destination: string;
  attempts: number;
  /** Last classification of the destination against the source */
  classification: MatchKind | null;
  sourceRemoved: boolean;
  reason?: string;
  error?: Error;
}

export interface CopyOrchestratorOptions {
  store: RecordStore;
  policy: ChecksumPolicy;
  maxAttempts?: number;
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (err) {
    if (isNotFound(err) || isNotADirectory(err)) return null;
    throw toFsError(err, filePath, "stat");
  }
}

/** The taxonomy error for a failed filesystem step, as an Error. */
function fsFailure(err: unknown, filePath: string, operation: string): Error {
  const mapped = toFsError(err, filePath, operation);
  return mapped instanceof Error ? mapped : new Error(String(mapped));
}

function looksLikeDirectory(location: string): boolean {
  const ext = path.posix.extname(location);
  return ext === "" || /^\.\d+$/.test(ext);
}

function sameOsStats(a: Stats, b: Stats): boolean {
  return a.size === b.size && Math.abs(a.mtimeMs - b.mtimeMs) < MTIME_TOLERANCE_MS;
}

export class CopyOrchestrator {
  private readonly store: RecordStore;
  private readonly policy: ChecksumPolicy;
  private readonly maxAttempts: number;

  constructor(options: CopyOrchestratorOptions) {
    this.store = options.store;
    this.policy = options.policy;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  private get checksumContext(): ChecksumContext {
    return { store: this.store, policy: this.policy };
  }

  /**
   * Final file path for a copy of `subject` into `destination`, which may be a
   * directory or a file path. Throws SessionMismatchError when the
   * destination belongs to another session.
   */
  async resolveDestination(
    subject: FileRecord,
    destination: string,
    addSessionSubdir = true,
  ): Promise<string> {
    const target = normalizeLocation(destination);
    const destSession = parseSession(target);
    const { session } = subject;

    if (session && destSession && destSession.id !== session.id) {
      throw new SessionMismatchError(session.id, destSession.id);
    }

    const targetStats = await statOrNull(target);
    const isDir = targetStats ? targetStats.isDirectory() : looksLikeDirectory(target);

    let root = isDir ? target : path.posix.dirname(target);
    const sessionId = destSession?.id ?? session?.id ?? null;
    if (addSessionSubdir && sessionId && !pathSegments(root).includes(sessionId)) {
      root = joinLocation(root, sessionId);
    }

    if (!isDir) {
      return joinLocation(root, path.posix.basename(target));
    }
    return joinLocation(root, this.relativePath(subject, root));
  }

  private relativePath(subject: FileRecord, root: string): string {
    const location = subject.location ?? "";
    const name = subject.name ?? path.posix.basename(location);
    const { session } = subject;
    if (!session) return name;

    const segments = pathSegments(location);
    if (subject.subgroupTag) {
      const tagged = `_probe${subject.subgroupTag}`;
      const parents = segments.slice(0, -1);
      for (let i = parents.length - 1; i >= 0; i--) {
        if (parents[i]?.includes(tagged)) {
          return segments.slice(i).join("/");
        }
      }
    }

    const fromSession = sessionRelativePath(location, session);
    if (!pathSegments(root).some((s) => s.includes(session.id))) {
      return fromSession;
    }
    // inside the session folder already: drop the session folder itself
    const rest = pathSegments(fromSession).slice(1);
    return rest.length > 0 ? rest.join("/") : name;
  }

  async copy(subject: FileRecord, destination: string, options: CopyOptions = {}): Promise<CopyOutcome> {
    const removeSource = options.removeSourceOnSuccess ?? false;
    const validate = removeSource || (options.validate ?? true);
    const allowRecopy = options.allowRecopy ?? false;

    if (!subject.location) {
      throw new InvalidRecordError("Cannot copy a record without a location");
    }
    const source = subject.location;
    const finalDest = await this.resolveDestination(subject, destination, options.addSessionSubdir ?? true);

    const outcome: CopyOutcome = {
      status: "failed",
      source,
      destination: finalDest,
      attempts: 0,
      classification: null,
      sourceRemoved: false,
    };

    const destProbe = new FileRecord({ location: finalDest });
    if (destProbe.subgroupTag !== subject.subgroupTag) {
      log.warn(
        `Copy refused, subgroup mismatch: ${source} (${subject.subgroupTag ?? "none"}) -> ${finalDest} (${destProbe.subgroupTag ?? "none"})`,
      );
      return { ...outcome, status: "refused", reason: "subgroup tag mismatch" };
    }

    let sourceRecord = await this.withStoredChecksum(subject);
    const selves = await this.selvesOf(sourceRecord);

    const sourceStats = await statOrNull(source);
    if (!sourceStats) {
      return { ...outcome, error: new NotFoundError(source) };
    }
    const destStats = await statOrNull(finalDest);

    const destRecord = destStats
      ? new FileRecord({ location: finalDest, size: destStats.size })
      : destProbe;
    const destStored = (await findMatches(this.store, destRecord, destStats ? SELF_SET : CLEARED_DEST_KINDS)).map(
      (m) => m.record,
    );
    const priorKinds = selves.flatMap((s) => [destRecord, ...destStored].map((d) => classify(s, d)));
    const priorValid = priorKinds.some((k) => VALID_SET.has(k));
    const priorInvalid = priorKinds.some((k) => INVALID_SET.has(k));

    let doCopy = false;
    if (allowRecopy) {
      doCopy = true;
    } else if (!destStats && priorValid && !priorInvalid) {
      log.info(`Skipping ${source}: a validated copy at ${finalDest} was already cleared`);
      return { ...outcome, status: "skipped", reason: "validated copy previously removed" };
    } else if (!destStats) {
      doCopy = true;
    } else if (sameOsStats(sourceStats, destStats)) {
      if (priorInvalid) {
        doCopy = true;
      } else if (!validate) {
        return { ...outcome, status: "skipped", reason: "destination already matches" };
      }
    } else if (!validate) {
      log.warn(`Destination exists and differs, not overwriting without validation: ${finalDest}`);
      return { ...outcome, status: "skipped", reason: "destination differs" };
    }

    const destDir = path.posix.dirname(finalDest);
    try {
      await mkdir(destDir, { recursive: true });
    } catch (err) {
      const error = fsFailure(err, destDir, "create");
      log.warn(`Cannot create destination folder for ${source}: ${error.message}`);
      return { ...outcome, error };
    }

    let copied = false;
    let kind: MatchKind | null = null;

    while ((doCopy || validate) && outcome.attempts < this.maxAttempts) {
      outcome.attempts++;

      if (doCopy) {
        try {
          log.info(`Copying: ${source} -> ${finalDest}`);
          await copyFile(source, finalDest);
          await utimes(finalDest, sourceStats.atime, sourceStats.mtime);
          copied = true;
        } catch (err) {
          const error = fsFailure(err, finalDest, "copy");
          log.warn(`Copy failed: ${source} -> ${finalDest}: ${error.message}`);
          return { ...outcome, error };
        }
        if (!validate) break;
      }

      const algorithm = this.validationAlgorithm(sourceRecord, selves);
      let dest: FileRecord;
      try {
        dest = await loadFileRecord(finalDest, { autoChecksum: false });
        if (!doCopy) {
          dest = await exchangeIfChecksumInStore(dest, this.checksumContext);
        }
        if (doCopy || dest.checksum?.algorithm !== algorithm) {
          dest = await generateChecksum(dest, this.checksumContext, algorithm);
        }
        if (sourceRecord.checksum?.algorithm !== algorithm) {
          sourceRecord = await generateChecksum(sourceRecord, this.checksumContext, algorithm);
        }
      } catch (err) {
        const error = fsFailure(err, finalDest, "validate");
        log.warn(`Validation failed: ${source} -> ${finalDest}: ${error.message}`);
        return { ...outcome, error };
      }

      kind = classify(sourceRecord, dest);
      outcome.classification = kind;

      if (VALID_SET.has(kind)) {
        log.debug(`Copied and validated: ${source} -> ${finalDest}`);
        break;
      }

      log.info(`Copy validation failed (${kind}), retrying: ${source} -> ${finalDest}`);
      if (INVALID_SET.has(kind)) {
        // source may have changed since its checksum was recorded
        try {
          sourceRecord = await generateChecksum(sourceRecord, this.checksumContext, algorithm);
        } catch (err) {
          const error = fsFailure(err, source, "read");
          log.warn(`Source no longer readable: ${source}: ${error.message}`);
          return { ...outcome, error };
        }
        kind = classify(sourceRecord, dest);
        outcome.classification = kind;
        if (VALID_SET.has(kind)) break;
      }
      doCopy = true;
    }

    const valid = kind !== null && VALID_SET.has(kind);
    if (validate && !valid) {
      const error = new RetryExhaustedError(source, outcome.attempts, kind);
      log.warn(error.message);
      return { ...outcome, error };
    }

    const status: CopyStatus = copied ? "copied" : "validated";
    if (!removeSource || !valid) {
      return { ...outcome, status };
    }

    try {
      await unlink(source);
      log.info(`Deleted source after validated copy: ${source}`);
      return { ...outcome, status, sourceRemoved: true };
    } catch (err) {
      log.error(`Could not delete source ${source}: ${errorMessage(toFsError(err, source, "delete"))}`);
      return { ...outcome, status };
    }
  }

  private async withStoredChecksum(subject: FileRecord): Promise<FileRecord> {
    return subject.checksum ? subject : exchangeIfChecksumInStore(subject, this.checksumContext);
  }

  private async selvesOf(subject: FileRecord): Promise<FileRecord[]> {
    const stored = (await findMatches(this.store, subject, SELF_SET)).map((m) => m.record);
    const { conflicts } = consistentChecksums([subject, ...stored]);
    return [subject, ...stored.filter((r) => !r.checksum || !conflicts.has(r.checksum.algorithm))];
  }

  /** Reuse an algorithm the source already has a checksum for. */
  private validationAlgorithm(source: FileRecord, selves: FileRecord[]): ChecksumAlgorithm {
    if (source.checksum) return source.checksum.algorithm;
    const known = selves.find((s) => s.checksum);
    return known?.checksum?.algorithm ?? this.policy.algorithm;
  }
}
