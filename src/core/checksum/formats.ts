/**
 * Checksum value formats
 */

import { CHECKSUM_ALGORITHMS, type ChecksumAlgorithm } from "../../types";
import { InvalidChecksumFormatError } from "../../utils/errors";

interface ChecksumFormat {
  pattern: RegExp;
  letterCase: "upper" | "lower";
}

const FORMATS: Record<ChecksumAlgorithm, ChecksumFormat> = {
  crc32: { pattern: /^[0-9A-F]{8}$/i, letterCase: "upper" },
  sha256: { pattern: /^[0-9a-f]{64}$/i, letterCase: "lower" },
  sha3_256: { pattern: /^[0-9a-f]{64}$/i, letterCase: "lower" },
};

export function isChecksumAlgorithm(value: unknown): value is ChecksumAlgorithm {
  return CHECKSUM_ALGORITHMS.some((algorithm) => algorithm === value);
}

export function isValidChecksum(algorithm: ChecksumAlgorithm, value: string): boolean {
  return FORMATS[algorithm].pattern.test(value.trim());
}

/**
 * Validate a checksum and return it in the algorithm's canonical letter case.
 */
export function canonicalChecksum(algorithm: ChecksumAlgorithm, value: string): string {
  const trimmed = value.trim();
  const format = FORMATS[algorithm];
  if (!format.pattern.test(trimmed)) {
    throw new InvalidChecksumFormatError(algorithm, value);
  }
  return format.letterCase === "upper" ? trimmed.toUpperCase() : trimmed.toLowerCase();
}

/**
 * Rank of an algorithm by computation cost, lowest first.
 */
export function algorithmCost(algorithm: ChecksumAlgorithm): number {
  return CHECKSUM_ALGORITHMS.indexOf(algorithm);
}

export function cheapestAlgorithm(algorithms: Iterable<ChecksumAlgorithm>): ChecksumAlgorithm | null {
  let best: ChecksumAlgorithm | null = null;
  for (const algorithm of algorithms) {
    if (best === null || algorithmCost(algorithm) < algorithmCost(best)) {
      best = algorithm;
    }
  }
  return best;
}
