import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import { buildInlineConfig, extractInlineOptions, mergeInlineConfig } from "../../src/config/inline";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("maps flag names to option names", () => {
      expect(
        extractInlineOptions({
          archive: "/mnt/archive",
          "min-age-days": "7",
          "dry-run": true,
          "no-subfolders": true,
          include: [".bin"],
        }),
      ).toMatchObject({
        archive: "/mnt/archive",
        minAgeDays: "7",
        dryRun: true,
        noSubfolders: true,
        include: [".bin"],
      });
    });
  });

  describe("buildInlineConfig", () => {
    test("returns an empty object without options", () => {
      expect(buildInlineConfig({})).toEqual({});
    });

    test("builds nested sections from flags", () => {
      expect(
        buildInlineConfig({
          database: "./tierkeep.db",
          archive: "/mnt/archive",
          local: "/data",
          algorithm: "crc32",
          minAgeDays: "7",
          exclude: ["_temp_"],
          dryRun: true,
          noSubfolders: true,
          concurrency: "4",
          logLevel: "debug",
        }),
      ).toEqual({
        database: { path: "./tierkeep.db" },
        tiers: { archive: "/mnt/archive", local: "/data" },
        checksum: { algorithm: "crc32" },
        clear: { minAgeDays: 7, exclude: ["_temp_"], dryRun: true, includeSubfolders: false },
        concurrency: 4,
        logging: { level: "debug" },
      });
    });

    test("rejects non-integer numbers", () => {
      expect(() => buildInlineConfig({ minAgeDays: "soon" })).toThrow('--min-age-days must be an integer, got "soon"');
    });
  });

  describe("mergeInlineConfig", () => {
    test("overrides a loaded config", () => {
      const merged = mergeInlineConfig({ ...DEFAULT_CONFIG, version: "1" }, { staging: "/mnt/staging" });

      expect(merged.tiers).toEqual({ staging: "/mnt/staging" });
      expect(merged.clear).toEqual(DEFAULT_CONFIG.clear);
    });
  });
});
