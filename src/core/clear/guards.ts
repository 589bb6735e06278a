/**
 * Safety guards applied before a clear sweep deletes anything
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import * as path from "node:path";
import type { SessionContext } from "../../types";
import { isNotFound, toFsError } from "../../utils/errors";
import { isPathWithinDir, normalizeLocation } from "../../utils/path";
import type { FileRecord } from "../record/file-record";
import { parseSession, sessionDate } from "../record/session";
import type { BackupLocator } from "../status/locator";

const PROBE_LETTERS = /_probe([A-F]+)/;

/** Subgroup letters in a folder's own name: `..._probeABC` gives `ABC`. */
export function probeLettersInName(folder: string): string {
  const name = path.posix.basename(normalizeLocation(folder));
  return PROBE_LETTERS.exec(name)?.[1] ?? "";
}

export interface RawDataGuardOptions {
  locator: BackupLocator;
  rawDataRoots: readonly string[];
  derivedDataSuffix: string;
}

/**
 * A folder of original capture data: it belongs to a session, names at least
 * three subgroups, and lives under one of the raw-data roots.
 */
export function isOriginalRawData(folder: string, rawDataRoots: readonly string[]): boolean {
  if (!parseSession(folder)) return false;
  if (probeLettersInName(folder).length < 3) return false;
  return rawDataRoots.some((root) => isPathWithinDir(folder, root));
}

/**
 * Subgroup letters that already have a derived-data folder
 * (`_probe<letter><suffix>`) in the session's archive folder.
 */
export async function derivedLettersOnArchive(
  session: SessionContext,
  options: RawDataGuardOptions,
): Promise<string> {
  const folder = options.locator.sessionFolder("archive", session);
  if (!folder) return "";

  let entries: Dirent[];
  try {
    entries = await readdir(folder, { withFileTypes: true });
  } catch (err) {
    if (isNotFound(err)) return "";
    throw toFsError(err, folder, "read");
  }

  let letters = "";
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const index = entry.name.indexOf("_probe");
    if (index < 0 || !entry.name.endsWith(options.derivedDataSuffix)) continue;
    const letter = entry.name.slice(index + "_probe".length, entry.name.length - options.derivedDataSuffix.length);
    if (/^[A-F]$/.test(letter)) letters += letter;
  }
  return letters;
}

/**
 * True when the folder holds original capture data and none of its subgroups
 * has derived data on the archive tier yet.
 */
export async function rawDataWithoutDerived(folder: string, options: RawDataGuardOptions): Promise<boolean> {
  const session = parseSession(folder);
  if (!session || !isOriginalRawData(folder, options.rawDataRoots)) return false;

  const derived = await derivedLettersOnArchive(session, options);
  return ![...probeLettersInName(folder)].some((letter) => derived.includes(letter));
}

/**
 * Date a record counts as created on: the session date, or for orphans the
 * file's modification time.
 */
export function logicalDate(record: FileRecord, mtime: Date): Date {
  if (record.session) {
    return sessionDate(record.session) ?? mtime;
  }
  return mtime;
}

/**
 * Whether a file is old enough to clear. Session dates are whole days, so
 * the comparison is made on UTC calendar days.
 */
export function isOldEnough(record: FileRecord, mtime: Date, minAgeDays: number, now: Date = new Date()): boolean {
  if (minAgeDays <= 0) return true;

  const cutoff = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() - minAgeDays);
  const date = logicalDate(record, mtime);
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return day <= cutoff;
}
