/**
 * Checksum policy
 */

import type { Checksum, ChecksumAlgorithm } from "../../types";
import { ChecksumSelfTestError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import {
  type ChecksumProvider,
  createDefaultProviders,
  SELF_TEST_INPUT,
  selfTestDigest,
} from "./providers";

const log = logger.child("checksum");

export const DEFAULT_AUTO_THRESHOLD_BYTES = 50 * 1024 * 1024;

export interface ChecksumPolicyOptions {
  /** Algorithm used when none is requested explicitly */
  algorithm: ChecksumAlgorithm;
  autoThresholdBytes?: number;
  providers?: Map<ChecksumAlgorithm, ChecksumProvider>;
}

/**
 * Decides when a checksum is computed and with which provider. A provider is
 * only used after its self-test has passed once.
 */
export class ChecksumPolicy {
  readonly algorithm: ChecksumAlgorithm;
  readonly autoThresholdBytes: number;
  private readonly providers: Map<ChecksumAlgorithm, ChecksumProvider>;
  private readonly verified = new Set<ChecksumAlgorithm>();

  constructor(options: ChecksumPolicyOptions) {
    this.algorithm = options.algorithm;
    this.autoThresholdBytes = options.autoThresholdBytes ?? DEFAULT_AUTO_THRESHOLD_BYTES;
    this.providers = options.providers ?? createDefaultProviders();
  }

  shouldAutoCompute(size: number): boolean {
    return size < this.autoThresholdBytes;
  }

  supports(algorithm: ChecksumAlgorithm): boolean {
    return this.providers.has(algorithm);
  }

  provider(algorithm: ChecksumAlgorithm = this.algorithm): ChecksumProvider {
    const provider = this.providers.get(algorithm);
    if (!provider) {
      throw new Error(`No checksum provider registered for ${algorithm}`);
    }

    if (!this.verified.has(algorithm)) {
      if (!provider.selfTest()) {
        throw new ChecksumSelfTestError(
          algorithm,
          selfTestDigest(algorithm),
          provider.digest(SELF_TEST_INPUT),
        );
      }
      log.debug(`Self-test passed for ${algorithm}`);
      this.verified.add(algorithm);
    }

    return provider;
  }

  async compute(filePath: string, algorithm: ChecksumAlgorithm = this.algorithm): Promise<Checksum> {
    const provider = this.provider(algorithm);
    const started = Date.now();
    const value = await provider.compute(filePath);
    log.debug(`${algorithm} ${value} ${filePath} (${Date.now() - started}ms)`);
    return { algorithm, value };
  }
}
