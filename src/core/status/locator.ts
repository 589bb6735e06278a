/**
 * Backup tier locations
 */

import { type SessionContext, type Tier, type TierPath, TIERS, type TiersConfig } from "../../types";
import { joinLocation, locationKey } from "../../utils/path";
import type { FileRecord } from "../record/file-record";
import { sessionRelativePath } from "../record/session";

export interface BackupLocator {
  /**
   * Expected location of the record on each tier, in priority order. At most
   * one path per tier; the record's own location is never returned. Nothing
   * is checked on disk.
   */
  locate(record: FileRecord): TierPath[];

  /** The tier whose expected path is the record's own location, if any. */
  tierOf(record: FileRecord): Tier | null;

  /** Where a session's folder lives on a tier. */
  sessionFolder(tier: Tier, session: SessionContext): string | null;
}

/**
 * Locates backups as `<tier root>/<session folder>/<path inside session>`.
 */
export class TierRootLocator implements BackupLocator {
  constructor(private readonly tiers: TiersConfig) {}

  private expected(record: FileRecord): TierPath[] {
    if (!record.location || !record.session) return [];
    const relative = sessionRelativePath(record.location, record.session);

    const paths: TierPath[] = [];
    for (const tier of TIERS) {
      const root = this.tiers[tier];
      if (root) paths.push({ tier, location: joinLocation(root, relative) });
    }
    return paths;
  }

  locate(record: FileRecord): TierPath[] {
    return this.expected(record).filter((p) => locationKey(p.location) !== record.locationKey);
  }

  tierOf(record: FileRecord): Tier | null {
    const own = this.expected(record).find((p) => locationKey(p.location) === record.locationKey);
    return own?.tier ?? null;
  }

  sessionFolder(tier: Tier, session: SessionContext): string | null {
    const root = this.tiers[tier];
    return root ? joinLocation(root, session.id) : null;
  }
}
