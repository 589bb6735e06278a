/**
 * Session identification from paths
 */

import type { SessionContext } from "../../types";
import { SessionIdentifierMissingError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { joinLocation, pathSegments } from "../../utils/path";

const log = logger.child("session");

/** `<8+ digit id>_<6 digit subject>_<YYYYMMDD>` */
export const SESSION_PATTERN = /(\d{8,})_(\d{6})_(\d{8})/g;

/**
 * Find the session a path belongs to. When a path carries several different
 * session strings the first one wins.
 */
export function parseSession(location: string): SessionContext | null {
  const matches = [...location.matchAll(SESSION_PATTERN)];
  const first = matches[0];
  if (!first) return null;

  const [id, , subjectId, date] = first;
  if (!subjectId || !date) return null;

  const distinct = new Set(matches.map((m) => m[0]));
  if (distinct.size > 1) {
    log.debug(`Multiple session strings in ${location}, using ${id}`, [...distinct]);
  }

  return { id, subjectId, date };
}

export function hasSession(location: string): boolean {
  return parseSession(location) !== null;
}

/**
 * Session date as a UTC Date, or null when the digits are not a real date.
 */
export function sessionDate(session: SessionContext): Date | null {
  const year = Number(session.date.slice(0, 4));
  const month = Number(session.date.slice(4, 6));
  const day = Number(session.date.slice(6, 8));
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Index of the first path segment that contains the session string.
 */
export function sessionSegmentIndex(segments: readonly string[], session: SessionContext): number {
  return segments.findIndex((segment) => segment.includes(session.id));
}

/**
 * Path of a file relative to the parent of its session folder, always
 * starting with the session folder itself:
 * `/data/1234567890_123456_20240115_probeABC/x.bin`
 * becomes `1234567890_123456_20240115/1234567890_123456_20240115_probeABC/x.bin`.
 */
export function sessionRelativePath(location: string, session: SessionContext | null): string {
  if (!session) {
    throw new SessionIdentifierMissingError(location);
  }
  const segments = pathSegments(location);
  const index = sessionSegmentIndex(segments, session);
  if (index < 0) {
    throw new SessionIdentifierMissingError(location);
  }

  const relative = segments.slice(index);
  if (relative[0] !== session.id) {
    relative.unshift(session.id);
  }
  return joinLocation(...relative);
}
