/**
 * Expansion of configured directories into clear targets
 */

import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { joinLocation, locationKey, normalizeLocation } from "../../utils/path";
import { hasSession } from "../record/session";

const log = logger.child("clear");

export interface ClearTarget {
  folder: string;
  includeSubfolders: boolean;
}

export interface ExpandOptions {
  onlySessionFolders?: boolean;
  /** Child folder names (substrings, case-insensitive) left out */
  skipFilters?: readonly string[];
}

/**
 * A session folder is cleared as one recursive target. Any other directory is
 * treated as a repository of session folders: it is cleared on its own,
 * without subfolders, followed by each child folder.
 */
export async function expandClearTargets(
  dirs: readonly string[],
  options: ExpandOptions = {},
): Promise<ClearTarget[]> {
  const skip = (options.skipFilters ?? []).map((f) => f.toLowerCase()).filter((f) => f.length > 0);
  const targets: ClearTarget[] = [];
  const seen = new Set<string>();

  const push = (target: ClearTarget) => {
    const key = `${locationKey(target.folder)}|${target.includeSubfolders}`;
    if (seen.has(key)) return;
    seen.add(key);
    targets.push(target);
  };

  for (const dir of dirs) {
    const folder = normalizeLocation(dir);
    if (hasSession(folder)) {
      push({ folder, includeSubfolders: true });
      continue;
    }

    push({ folder, includeSubfolders: false });

    let entries: Dirent[];
    try {
      entries = await readdir(folder, { withFileTypes: true });
    } catch (err) {
      log.warn(`Could not list ${folder}: ${errorMessage(err)}`);
      continue;
    }

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      if (!entry.isDirectory()) continue;
      const name = entry.name.toLowerCase();
      if (skip.some((f) => name.includes(f))) continue;
      if (options.onlySessionFolders && !hasSession(entry.name)) continue;
      push({ folder: joinLocation(folder, entry.name), includeSubfolders: true });
    }
  }

  return targets;
}
