/**
 * Checksum providers
 *
 * All providers stream the file in fixed-size chunks so memory use does not
 * grow with file size.
 */

import { createHash } from "node:crypto";
import { type FileHandle, open } from "node:fs/promises";
import { CHECKSUM_ALGORITHMS, type ChecksumAlgorithm } from "../../types";
import { toFsError } from "../../utils/errors";
import { canonicalChecksum, isValidChecksum } from "./formats";

export const CHUNK_SIZE = 1024 * 1024;

export interface ChecksumProvider {
  readonly algorithm: ChecksumAlgorithm;
  compute(filePath: string): Promise<string>;
  digest(data: Uint8Array): string;
  validateFormat(value: string): boolean;
  /** Hash a known input and compare against its published digest. */
  selfTest(): boolean;
}

interface Hasher {
  update(chunk: Uint8Array): void;
  digest(): string;
}

export const SELF_TEST_INPUT = Buffer.from("foo");

const SELF_TEST_DIGESTS: Record<ChecksumAlgorithm, string> = {
  crc32: "8C736521",
  sha256: "2c26b46b68ffc68ff99b453c1d30413413422d706483bfa0f98a5e886266e7ae",
  sha3_256: "76d3bc41c9f588f7fcd0d5bf4718f8f84b1c41b20882703100b9eb9413807c01",
};

export function selfTestDigest(algorithm: ChecksumAlgorithm): string {
  return SELF_TEST_DIGESTS[algorithm];
}

const CRC32_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
})();

function crc32Hasher(): Hasher {
  let crc = 0xffffffff;
  return {
    update(chunk) {
      for (const byte of chunk) {
        crc = (CRC32_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8);
      }
    },
    digest() {
      return ((crc ^ 0xffffffff) >>> 0).toString(16).padStart(8, "0");
    },
  };
}

function nodeHasher(name: string): Hasher {
  const hash = createHash(name);
  return {
    update(chunk) {
      hash.update(chunk);
    },
    digest() {
      return hash.digest("hex");
    },
  };
}

const HASHERS: Record<ChecksumAlgorithm, () => Hasher> = {
  crc32: crc32Hasher,
  sha256: () => nodeHasher("sha256"),
  sha3_256: () => nodeHasher("sha3-256"),
};

async function hashFile(filePath: string, hasher: Hasher, chunkSize: number): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch (err) {
    throw toFsError(err, filePath, "read");
  }

  const buf = Buffer.allocUnsafe(chunkSize);
  try {
    let pos = 0;
    while (true) {
      const { bytesRead } = await handle.read(buf, 0, buf.length, pos);
      if (bytesRead <= 0) break;
      hasher.update(bytesRead === buf.length ? buf : buf.subarray(0, bytesRead));
      pos += bytesRead;
    }
  } finally {
    await handle.close();
  }
}

export function createChecksumProvider(
  algorithm: ChecksumAlgorithm,
  chunkSize: number = CHUNK_SIZE,
): ChecksumProvider {
  const newHasher = HASHERS[algorithm];

  const digest = (data: Uint8Array): string => {
    const hasher = newHasher();
    hasher.update(data);
    return canonicalChecksum(algorithm, hasher.digest());
  };

  return {
    algorithm,
    async compute(filePath) {
      const hasher = newHasher();
      await hashFile(filePath, hasher, chunkSize);
      return canonicalChecksum(algorithm, hasher.digest());
    },
    digest,
    validateFormat: (value) => isValidChecksum(algorithm, value),
    selfTest: () => digest(SELF_TEST_INPUT) === SELF_TEST_DIGESTS[algorithm],
  };
}

export function createDefaultProviders(): Map<ChecksumAlgorithm, ChecksumProvider> {
  const providers = new Map<ChecksumAlgorithm, ChecksumProvider>();
  for (const algorithm of CHECKSUM_ALGORITHMS) {
    providers.set(algorithm, createChecksumProvider(algorithm));
  }
  return providers;
}
