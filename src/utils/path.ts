/**
 * Path validation and manipulation utilities
 *
 * Locations are compared as forward-slash strings regardless of the host
 * platform, so records written on one machine match records read on another.
 */

import * as path from "node:path";

/**
 * Normalize a path into the canonical location form: forward slashes,
 * `.` and `..` resolved, duplicate separators collapsed, no trailing slash.
 * A leading `//` (network share) is kept.
 */
export function normalizeLocation(location: string): string {
  const unified = location.trim().replace(/\\/g, "/");
  if (unified === "") return "";

  const isUnc = unified.startsWith("//") && !unified.startsWith("///");
  let normalized = path.posix.normalize(unified);

  if (isUnc && !normalized.startsWith("//")) {
    normalized = `/${normalized}`;
  }
  if (normalized.length > 1 && normalized.endsWith("/")) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Case-folded form used for equality and store keys.
 */
export function locationKey(location: string): string {
  return normalizeLocation(location).toLowerCase();
}

export function sameLocation(a: string, b: string): boolean {
  return locationKey(a) === locationKey(b);
}

/**
 * Split a location into its non-empty segments.
 */
export function pathSegments(location: string): string[] {
  return normalizeLocation(location)
    .split("/")
    .filter((s) => s.length > 0);
}

export function joinLocation(...parts: string[]): string {
  return normalizeLocation(parts.filter((p) => p.length > 0).join("/"));
}

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = locationKey(path.resolve(filePath));
  const normalizedDir = locationKey(path.resolve(allowedDir));

  return normalizedPath.startsWith(`${normalizedDir}/`) || normalizedPath === normalizedDir;
}
