/**
 * Folder indexing: hash files and record them before a clear
 */

import type { AddResult } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { normalizeLocation } from "../../utils/path";
import { runPool } from "../../utils/pool";
import type { ChecksumPolicy } from "../checksum/policy";
import { type ChecksumContext, generateChecksum, generateChecksumIfNotInStore } from "../checksum/strategies";
import { loadFileRecord } from "../record/file-record";
import type { RecordStore } from "../store/record-store";
import { type CollectOptions, collectFiles } from "./file-collector";
import { DEFAULT_CONCURRENCY } from "./orchestrator";

const log = logger.child("index");

export const DEFAULT_REGENERATE_THRESHOLD_BYTES = 1024 * 1024;

export interface FolderIndexerOptions {
  store: RecordStore;
  policy: ChecksumPolicy;
  /** Files up to this size are hashed again even when the store knows them */
  regenerateThresholdBytes?: number;
  concurrency?: number;
  collect?: Partial<CollectOptions>;
}

export interface IndexResult {
  folder: string;
  indexed: number;
  /** Files whose checksum came from the store */
  reused: number;
  failures: { location: string; error: string }[];
}

export class FolderIndexer {
  private readonly ctx: ChecksumContext;
  private readonly regenerateThreshold: number;
  private readonly concurrency: number;
  private readonly collect: CollectOptions;

  constructor(options: FolderIndexerOptions) {
    this.ctx = { store: options.store, policy: options.policy };
    this.regenerateThreshold = options.regenerateThresholdBytes ?? DEFAULT_REGENERATE_THRESHOLD_BYTES;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.collect = { recursive: true, ...options.collect };
  }

  async index(folder: string): Promise<IndexResult> {
    const root = normalizeLocation(folder);
    const files = await collectFiles(root, this.collect);
    log.info(`Adding ${files.length} files in ${root} to the store`);

    const settled = await runPool(files, this.concurrency, (location) => this.indexFile(location));

    const result: IndexResult = { folder: root, indexed: 0, reused: 0, failures: [] };
    settled.forEach((outcome, index) => {
      if (!outcome.ok) {
        const location = files[index] ?? "";
        log.warn(`Could not index ${location}: ${errorMessage(outcome.error)}`);
        result.failures.push({ location, error: errorMessage(outcome.error) });
      } else if (outcome.value === "reused") {
        result.reused++;
      } else {
        result.indexed++;
      }
    });
    return result;
  }

  private async indexFile(location: string): Promise<AddResult | "reused"> {
    const record = await loadFileRecord(location, { autoChecksum: false });

    if ((record.size ?? 0) <= this.regenerateThreshold) {
      await generateChecksum(record, this.ctx);
      return "inserted";
    }
    const hashed = await generateChecksumIfNotInStore(record, this.ctx);
    return hashed.checksum ? "inserted" : "reused";
  }
}
