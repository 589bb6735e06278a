import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import { ConfigError, validateConfig } from "../../src/config/validator";

function withDefaults(overrides: Record<string, unknown>): Record<string, unknown> {
  return { ...structuredClone(DEFAULT_CONFIG), version: "1", ...overrides };
}

describe("validateConfig", () => {
  test("accepts the defaults", () => {
    expect(validateConfig(withDefaults({}))).toEqual({ ...DEFAULT_CONFIG, version: "1" });
  });

  test("rejects a non-object", () => {
    expect(() => validateConfig("version: 1")).toThrow("Config must be an object");
  });

  test("rejects unknown tiers", () => {
    expect(() => validateConfig(withDefaults({ tiers: { cold: "/mnt/cold" } }))).toThrow(
      "tiers.cold is not a tier (expected one of: archive, staging, local, other)",
    );
  });

  test("skips empty tier roots", () => {
    expect(validateConfig(withDefaults({ tiers: { archive: "/mnt/archive", staging: "" } })).tiers).toEqual({
      archive: "/mnt/archive",
    });
  });

  test("rejects unknown checksum algorithms", () => {
    const config = withDefaults({ checksum: { ...DEFAULT_CONFIG.checksum, algorithm: "md5" } });

    expect(() => validateConfig(config)).toThrow("checksum.algorithm must be one of: crc32, sha3_256, sha256");
  });

  test("rejects out of range numbers", () => {
    expect(() => validateConfig(withDefaults({ concurrency: 0 }))).toThrow("concurrency must be an integer >= 1");
    expect(() => validateConfig(withDefaults({ clear: { ...DEFAULT_CONFIG.clear, minAgeDays: 1.5 } }))).toThrow(
      "clear.minAgeDays must be an integer >= 0",
    );
  });

  test("accepts filter lists as arrays or pipe-separated strings", () => {
    const config = validateConfig(
      withDefaults({ clear: { ...DEFAULT_CONFIG.clear, include: ["a", "b"], exclude: " _temp_ |.npx2| " } }),
    );

    expect(config.clear.include).toEqual(["a", "b"]);
    expect(config.clear.exclude).toEqual(["_temp_", ".npx2"]);
  });

  test("rejects non-string filter entries", () => {
    const config = withDefaults({ clear: { ...DEFAULT_CONFIG.clear, include: ["a", 3] } });

    expect(() => validateConfig(config)).toThrow("clear.include[1] must be a string");
  });

  test("rejects unknown log levels", () => {
    expect(() => validateConfig(withDefaults({ logging: { level: "trace" } }))).toThrow(ConfigError);
  });
});
