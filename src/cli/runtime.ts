/**
 * Wiring shared by the commands: store, policy, locator and evaluator built
 * from one config.
 */

import { BackupStatusEvaluator, ChecksumPolicy, TierRootLocator } from "../core";
import { closeDatabase, type DB, openDatabase, SqliteRecordStore } from "../db";
import type { TierkeepConfig } from "../types";
import { logger } from "../utils";

export interface Runtime {
  config: TierkeepConfig;
  db: DB;
  store: SqliteRecordStore;
  policy: ChecksumPolicy;
  locator: TierRootLocator;
  evaluator: BackupStatusEvaluator;
  close(): void;
}

/**
 * Apply the config's logging settings. `verbose` forces debug output.
 */
export function applyLogging(config: TierkeepConfig, verbose = false): void {
  logger.setLevel(verbose ? "debug" : config.logging.level);
  logger.setFile(config.logging.file ?? null);
}

export async function openRuntime(config: TierkeepConfig): Promise<Runtime> {
  const db = await openDatabase(config.database.path);
  const store = new SqliteRecordStore(db);
  const policy = new ChecksumPolicy({
    algorithm: config.checksum.algorithm,
    autoThresholdBytes: config.checksum.autoThresholdBytes,
  });
  const locator = new TierRootLocator(config.tiers);
  const evaluator = new BackupStatusEvaluator({ store, locator, policy });

  return {
    config,
    db,
    store,
    policy,
    locator,
    evaluator,
    close: () => closeDatabase(db),
  };
}
