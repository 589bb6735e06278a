/**
 * File record value type
 */

import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import * as path from "node:path";
import type { Checksum, ChecksumAlgorithm, FileIdentity, SessionContext } from "../../types";
import { InvalidRecordError, toFsError } from "../../utils/errors";
import { locationKey, normalizeLocation } from "../../utils/path";
import { canonicalChecksum } from "../checksum/formats";
import type { ChecksumPolicy } from "../checksum/policy";
import { parseSession } from "./session";

export interface FileRecordInit {
  location?: string | null;
  size?: number | null;
  checksum?: Checksum | null;
  /** Overrides the session parsed from the location */
  session?: SessionContext | null;
  fileId?: FileIdentity | null;
}

const SUBGROUP_PATTERN = /_probe_?([A-F]+|[0-5])/;

/**
 * Subgroup tag from the parent directories, e.g. `_probeABC` gives `ABC`.
 * A single digit 0-5 maps onto the letters A-F.
 */
export function parseSubgroupTag(location: string): string | null {
  const parent = path.posix.dirname(normalizeLocation(location));
  const match = SUBGROUP_PATTERN.exec(parent);
  const tag = match?.[1];
  if (!tag) return null;

  if (/^[0-5]$/.test(tag)) {
    return String.fromCharCode("A".charCodeAt(0) + Number(tag));
  }
  return tag;
}

/**
 * Immutable snapshot of one file: where it is, how big it is and, when known,
 * what its contents hash to.
 */
export class FileRecord {
  readonly location: string | null;
  readonly locationKey: string | null;
  readonly name: string | null;
  readonly size: number | null;
  readonly checksum: Checksum | null;
  readonly session: SessionContext | null;
  readonly subgroupTag: string | null;
  readonly fileId: FileIdentity | null;

  constructor(init: FileRecordInit) {
    const location = init.location ? normalizeLocation(init.location) : null;
    if (!location && !init.checksum) {
      throw new InvalidRecordError("A file record needs a location or a checksum");
    }
    if (init.size != null && (!Number.isInteger(init.size) || init.size < 0)) {
      throw new InvalidRecordError(`Invalid file size: ${init.size}`);
    }

    this.location = location;
    this.locationKey = location ? locationKey(location) : null;
    this.name = location ? path.posix.basename(location) : null;
    this.size = init.size ?? null;
    this.checksum = init.checksum
      ? {
          algorithm: init.checksum.algorithm,
          value: canonicalChecksum(init.checksum.algorithm, init.checksum.value),
        }
      : null;
    this.session = init.session !== undefined ? init.session : location ? parseSession(location) : null;
    this.subgroupTag = location ? parseSubgroupTag(location) : null;
    this.fileId = init.fileId ?? null;

    Object.freeze(this);
  }

  get isOrphan(): boolean {
    return this.session === null;
  }

  /** (checksum, size, location) key used for de-duplication. */
  get identityKey(): string {
    const checksum = this.checksum ? `${this.checksum.algorithm}:${this.checksum.value}` : "-";
    return `${checksum}|${this.size ?? "-"}|${this.locationKey ?? "-"}`;
  }

  equals(other: FileRecord): boolean {
    return this.identityKey === other.identityKey;
  }

  with(changes: Partial<FileRecordInit>): FileRecord {
    return new FileRecord({
      location: this.location,
      size: this.size,
      checksum: this.checksum,
      session: this.session,
      fileId: this.fileId,
      ...changes,
    });
  }

  withChecksum(checksum: Checksum): FileRecord {
    return this.with({ checksum });
  }

  checksumFor(algorithm: ChecksumAlgorithm): string | null {
    return this.checksum?.algorithm === algorithm ? this.checksum.value : null;
  }

  toString(): string {
    const checksum = this.checksum ? ` ${this.checksum.algorithm}:${this.checksum.value}` : "";
    return `${this.location ?? "<no location>"} (${this.size ?? "?"} B${checksum})`;
  }
}

export interface LoadOptions {
  policy?: ChecksumPolicy;
  /** Compute a checksum below the policy's auto threshold (default true) */
  autoChecksum?: boolean;
  checksum?: Checksum | null;
}

/**
 * Build a record from a file on disk. Fails with NotFoundError when the file
 * is inaccessible.
 */
export async function loadFileRecord(location: string, options: LoadOptions = {}): Promise<FileRecord> {
  const normalized = normalizeLocation(location);

  let stats: Stats;
  try {
    stats = await stat(normalized);
  } catch (err) {
    throw toFsError(err, normalized, "stat");
  }
  if (!stats.isFile()) {
    throw new InvalidRecordError(`Not a file: ${normalized}`);
  }

  let record = new FileRecord({
    location: normalized,
    size: stats.size,
    checksum: options.checksum ?? null,
    fileId: { dev: stats.dev, ino: stats.ino },
  });

  const { policy } = options;
  if (policy && !record.checksum && options.autoChecksum !== false && policy.shouldAutoCompute(stats.size)) {
    record = record.withChecksum(await policy.compute(normalized));
  }

  return record;
}
