/**
 * Database row mapping utilities
 */

import { isChecksumAlgorithm } from "../core/checksum/formats";
import { FileRecord } from "../core/record/file-record";
import { parseSession } from "../core/record/session";
import type { RawFileRecordRow } from "../types";
import { InvalidChecksumFormatError } from "../utils/errors";
import { logger } from "../utils/logger";

const log = logger.child("db");

/**
 * Rows with an unknown algorithm or a malformed checksum are skipped rather
 * than failing the whole query.
 */
export function parseRecordRow(row: RawFileRecordRow): FileRecord | null {
  const { algorithm } = row;
  if (!isChecksumAlgorithm(algorithm)) {
    log.warn(`Skipping stored record with unknown algorithm "${algorithm}": ${row.location}`);
    return null;
  }

  try {
    return new FileRecord({
      location: row.location,
      size: row.size,
      checksum: { algorithm, value: row.checksum },
      session: parseSession(row.location) ?? (row.session_id ? parseSession(row.session_id) : null),
    });
  } catch (err) {
    if (err instanceof InvalidChecksumFormatError) {
      log.warn(`Skipping stored record with malformed checksum: ${row.location}`);
      return null;
    }
    throw err;
  }
}

export interface RecordParams {
  location: string;
  location_key: string;
  algorithm: string;
  checksum: string;
  size: number | null;
  session_id: string | null;
  hostname: string | null;
}

/**
 * Null when the record cannot be stored (no location or no checksum).
 */
export function toRecordParams(record: FileRecord, hostname: string | null): RecordParams | null {
  if (!record.location || !record.locationKey || !record.checksum) return null;
  return {
    location: record.location,
    location_key: record.locationKey,
    algorithm: record.checksum.algorithm,
    checksum: record.checksum.value,
    size: record.size,
    session_id: record.session?.id ?? null,
    hostname,
  };
}
