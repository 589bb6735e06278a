/**
 * File enumeration for clear and index sweeps
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { errorMessage, isNotFound } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { joinLocation, normalizeLocation } from "../../utils/path";

const log = logger.child("collect");

export interface CollectOptions {
  recursive: boolean;
  /** Path substrings a file must contain (any of). Empty matches everything. */
  include?: readonly string[];
  /** Path substrings that exclude a file */
  exclude?: readonly string[];
}

/** Filters are plain substrings; `*` carries no meaning and is dropped. */
export function normalizeFilters(filters: readonly string[] | undefined): string[] {
  return (filters ?? [])
    .map((f) => f.replace(/\*/g, "").trim().toLowerCase())
    .filter((f) => f.length > 0);
}

export function matchesFilters(
  location: string,
  include: readonly string[],
  exclude: readonly string[],
): boolean {
  const key = location.toLowerCase();
  if (exclude.some((f) => key.includes(f))) return false;
  return include.length === 0 || include.some((f) => key.includes(f));
}

async function listDir(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isNotFound(err)) {
      log.warn(`Folder does not exist: ${dir}`);
    } else {
      log.warn(`Could not read folder ${dir}: ${errorMessage(err)}`);
    }
    return [];
  }
}

/**
 * Files under `folder` that pass the filters, as normalized locations.
 * Symbolic links are not followed.
 */
export async function collectFiles(folder: string, options: CollectOptions): Promise<string[]> {
  const include = normalizeFilters(options.include);
  const exclude = normalizeFilters(options.exclude);
  const files: string[] = [];
  const pending = [normalizeLocation(folder)];

  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    for (const entry of await listDir(dir)) {
      const location = joinLocation(dir, entry.name);
      if (entry.isDirectory()) {
        if (options.recursive) pending.push(location);
      } else if (entry.isFile() && matchesFilters(location, include, exclude)) {
        files.push(location);
      }
    }
  }

  log.debug(`Collected ${files.length} files from ${folder}`);
  return files.sort();
}

/**
 * Every directory below `folder`, deepest first. The folder itself is not
 * included.
 */
export async function collectSubdirectories(folder: string, recursive: boolean): Promise<string[]> {
  const found: string[] = [];
  const pending = [normalizeLocation(folder)];

  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    for (const entry of await listDir(dir)) {
      if (!entry.isDirectory()) continue;
      const location = joinLocation(dir, entry.name);
      found.push(location);
      if (recursive) pending.push(location);
    }
  }

  return found.sort((a, b) => b.split("/").length - a.split("/").length || b.localeCompare(a));
}
