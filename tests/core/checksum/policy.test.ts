import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ChecksumPolicy } from "../../../src/core/checksum/policy";
import { type ChecksumProvider, createChecksumProvider } from "../../../src/core/checksum/providers";
import type { ChecksumAlgorithm } from "../../../src/types";
import { ChecksumSelfTestError } from "../../../src/utils/errors";
import { makeTempDir, removeTempDir, writeTestFile } from "../../helpers/fs";

function brokenProvider(algorithm: ChecksumAlgorithm): ChecksumProvider {
  const real = createChecksumProvider(algorithm);
  return {
    ...real,
    digest: () => "DEADBEEF",
    selfTest: () => false,
  };
}

describe("ChecksumPolicy", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("policy");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  test("auto-computes strictly below the threshold", () => {
    const policy = new ChecksumPolicy({ algorithm: "crc32", autoThresholdBytes: 100 });

    expect(policy.shouldAutoCompute(99)).toBe(true);
    expect(policy.shouldAutoCompute(100)).toBe(false);
  });

  test("computes with the default algorithm unless told otherwise", async () => {
    const file = await writeTestFile(path.join(tempDir, "foo.txt"), "foo");
    const policy = new ChecksumPolicy({ algorithm: "crc32" });

    expect(await policy.compute(file)).toEqual({ algorithm: "crc32", value: "8C736521" });
    expect(await policy.compute(file, "sha256")).toEqual({
      algorithm: "sha256",
      value: "2c26b46b68ffc68ff99b453c1d30413413422d706483bfa0f98a5e886266e7ae",
    });
  });

  test("refuses a provider whose self-test fails", () => {
    const providers = new Map<ChecksumAlgorithm, ChecksumProvider>([["crc32", brokenProvider("crc32")]]);
    const policy = new ChecksumPolicy({ algorithm: "crc32", providers });

    expect(() => policy.provider("crc32")).toThrow(ChecksumSelfTestError);
    expect(() => policy.provider("crc32")).toThrow("expected 8C736521, got DEADBEEF");
  });

  test("reports algorithms without a provider", () => {
    const providers = new Map<ChecksumAlgorithm, ChecksumProvider>([["crc32", createChecksumProvider("crc32")]]);
    const policy = new ChecksumPolicy({ algorithm: "crc32", providers });

    expect(policy.supports("crc32")).toBe(true);
    expect(policy.supports("sha256")).toBe(false);
    expect(() => policy.provider("sha256")).toThrow("No checksum provider registered for sha256");
  });
});
