/**
 * Clear orchestration
 *
 * Deletes files from a folder once a validated backup exists on one of the
 * tiers. Anything short of a confirmed valid backup keeps the file.
 */

import { rmdir, stat, unlink } from "node:fs/promises";
import type { ClearConfig } from "../../types";
import {
  errorMessage,
  isNotFound,
  isPermissionDenied,
  NotFoundError,
  PermissionDeniedError,
  toFsError,
} from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { normalizeLocation } from "../../utils/path";
import { runPool } from "../../utils/pool";
import type { ChecksumPolicy } from "../checksum/policy";
import { type FileRecord, loadFileRecord } from "../record/file-record";
import {
  type BackupStatus,
  type BackupStatusEvaluator,
  isDeletionEligible,
  isUnconfirmedStatus,
} from "../status/evaluator";
import type { BackupLocator } from "../status/locator";
import { collectFiles, collectSubdirectories } from "./file-collector";
import { isOldEnough, rawDataWithoutDerived } from "./guards";

const log = logger.child("clear");

export const DEFAULT_CONCURRENCY = 8;

export type ClearOptions = Pick<
  ClearConfig,
  | "includeSubfolders"
  | "minAgeDays"
  | "include"
  | "exclude"
  | "skipRawDataCheck"
  | "rawDataRoots"
  | "derivedDataSuffix"
  | "dryRun"
> & {
  /** Fill in missing checksums for unconfirmed backups before deciding (default true) */
  completeChecksums?: boolean;
};

export const DEFAULT_CLEAR_OPTIONS: ClearOptions = {
  includeSubfolders: true,
  minAgeDays: 0,
  include: [],
  exclude: [],
  skipRawDataCheck: false,
  rawDataRoots: [],
  derivedDataSuffix: "_sorted",
  dryRun: false,
  completeChecksums: true,
};

export type SkipReason = "too recent" | "not backed up" | "vanished" | "verification failed";

export interface ClearDeletion {
  location: string;
  size: number;
  status: BackupStatus;
  backup: string | null;
  /** False when the sweep ran as a dry run */
  deleted: boolean;
}

export interface ClearFailure {
  location: string;
  error: string;
}

export interface ClearResult {
  folder: string;
  filesDeleted: number;
  bytesFreed: number;
  checked: number;
  skipped: number;
  /** Set when the whole folder was left alone */
  refused?: string;
  deletions: ClearDeletion[];
  failures: ClearFailure[];
}

type FileOutcome =
  | { kind: "deleted"; deletion: ClearDeletion }
  | { kind: "skipped"; location: string; reason: SkipReason; status?: BackupStatus };

export interface ClearOrchestratorOptions {
  evaluator: BackupStatusEvaluator;
  locator: BackupLocator;
  policy: ChecksumPolicy;
  options?: Partial<ClearOptions>;
  concurrency?: number;
}

export class ClearOrchestrator {
  private readonly evaluator: BackupStatusEvaluator;
  private readonly locator: BackupLocator;
  private readonly policy: ChecksumPolicy;
  private readonly options: ClearOptions;
  private readonly concurrency: number;

  constructor(options: ClearOrchestratorOptions) {
    this.evaluator = options.evaluator;
    this.locator = options.locator;
    this.policy = options.policy;
    this.options = { ...DEFAULT_CLEAR_OPTIONS, ...options.options };
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  async clear(folder: string, overrides: Partial<ClearOptions> = {}): Promise<ClearResult> {
    const options: ClearOptions = { ...this.options, ...overrides };
    const root = normalizeLocation(folder);
    const result: ClearResult = {
      folder: root,
      filesDeleted: 0,
      bytesFreed: 0,
      checked: 0,
      skipped: 0,
      deletions: [],
      failures: [],
    };

    if (
      !options.skipRawDataCheck &&
      (await rawDataWithoutDerived(root, {
        locator: this.locator,
        rawDataRoots: options.rawDataRoots,
        derivedDataSuffix: options.derivedDataSuffix,
      }))
    ) {
      result.refused = "original raw data has no derived data on the archive tier yet";
      log.warn(`Skipped clearing ${root}: ${result.refused}`);
      return result;
    }

    const files = await collectFiles(root, {
      recursive: options.includeSubfolders,
      include: options.include,
      exclude: options.exclude,
    });
    log.info(`Checking ${files.length} files in ${root}${options.dryRun ? " (dry run)" : ""}`);

    const settled = await runPool(files, this.concurrency, (location) => this.clearFile(location, options));

    settled.forEach((outcome, index) => {
      const location = files[index] ?? "";
      result.checked++;
      if (!outcome.ok) {
        result.failures.push({ location, error: errorMessage(outcome.error) });
        return;
      }
      if (outcome.value.kind === "skipped") {
        result.skipped++;
        return;
      }
      const { deletion } = outcome.value;
      result.deletions.push(deletion);
      if (deletion.deleted) {
        result.filesDeleted++;
        result.bytesFreed += deletion.size;
      }
    });

    if (!options.dryRun) {
      await this.removeEmptyDirectories(root, options.includeSubfolders);
    }

    log.info(
      `${result.filesDeleted} files deleted from ${root} | ${formatBytes(result.bytesFreed)} recovered` +
        (result.failures.length > 0 ? ` | ${result.failures.length} failed` : ""),
    );
    return result;
  }

  private async clearFile(location: string, options: ClearOptions): Promise<FileOutcome> {
    let record: FileRecord;
    let mtime: Date;
    try {
      record = await loadFileRecord(location, { policy: this.policy });
      mtime = (await stat(location)).mtime;
    } catch (err) {
      if (err instanceof NotFoundError || isNotFound(err)) {
        return { kind: "skipped", location, reason: "vanished" };
      }
      throw err;
    }

    if (!isOldEnough(record, mtime, options.minAgeDays)) {
      log.debug(`Skipping file less than ${options.minAgeDays} days old: ${location}`);
      return { kind: "skipped", location, reason: "too recent" };
    }

    let evaluation = await this.evaluator.evaluate(record);
    if (options.completeChecksums !== false && isUnconfirmedStatus(evaluation.status)) {
      evaluation = await this.evaluator.ensureBackupChecksum(evaluation);
    }
    if (!isDeletionEligible(evaluation)) {
      log.debug(`Keeping ${location}: ${evaluation.status}`);
      return { kind: "skipped", location, reason: "not backed up", status: evaluation.status };
    }

    // state may have changed since the first evaluation
    const recheck = await this.evaluator.evaluate(evaluation.subject);
    if (!(await this.evaluator.confirmDeletable(recheck))) {
      log.warn(`Backup could not be confirmed immediately before deleting, keeping ${location}`);
      return { kind: "skipped", location, reason: "verification failed", status: recheck.status };
    }

    const size = record.size ?? 0;
    const deletion: ClearDeletion = {
      location,
      size,
      status: recheck.status,
      backup: recheck.chosen?.record.location ?? null,
      deleted: false,
    };

    if (options.dryRun) {
      log.info(`[dry run] would delete ${location} (${recheck.status})`);
      return { kind: "deleted", deletion };
    }

    try {
      await unlink(location);
    } catch (err) {
      if (isNotFound(err)) return { kind: "skipped", location, reason: "vanished" };
      if (isPermissionDenied(err)) {
        const denied = new PermissionDeniedError(location, "delete");
        log.error(denied.message);
        throw denied;
      }
      throw toFsError(err, location, "delete");
    }

    log.info(`DELETED ${location} (${recheck.status})`);
    return { kind: "deleted", deletion: { ...deletion, deleted: true } };
  }

  /**
   * Remove directories left empty below `root`, deepest first. The root
   * itself stays. Directories that are not empty are left alone.
   */
  private async removeEmptyDirectories(root: string, recursive: boolean): Promise<void> {
    for (const dir of await collectSubdirectories(root, recursive)) {
      try {
        await rmdir(dir);
        log.debug(`Removed empty folder ${dir}`);
      } catch (err) {
        log.debug(`Kept folder ${dir}: ${errorMessage(err)}`);
      }
    }
  }
}
