import { describe, expect, test } from "vitest";
import {
  isPathWithinDir,
  joinLocation,
  locationKey,
  normalizeLocation,
  pathSegments,
  sameLocation,
} from "../../src/utils/path";

describe("path utilities", () => {
  describe("normalizeLocation", () => {
    test("unifies separators and drops trailing slashes", () => {
      expect(normalizeLocation("C:\\data\\session\\")).toBe("C:/data/session");
    });

    test("resolves dot segments and duplicate separators", () => {
      expect(normalizeLocation("/data//a/./b/../c.bin")).toBe("/data/a/c.bin");
    });

    test("keeps a network share prefix", () => {
      expect(normalizeLocation("\\\\server\\share\\x.bin")).toBe("//server/share/x.bin");
    });

    test("keeps the root", () => {
      expect(normalizeLocation("/")).toBe("/");
    });
  });

  describe("comparison", () => {
    test("is case-insensitive", () => {
      expect(locationKey("/Data/X.BIN")).toBe("/data/x.bin");
      expect(sameLocation("/Data/X.bin", "/data/x.BIN/")).toBe(true);
      expect(sameLocation("/data/x.bin", "/data/y.bin")).toBe(false);
    });
  });

  describe("segments", () => {
    test("splits into non-empty segments", () => {
      expect(pathSegments("//server/share/x.bin")).toEqual(["server", "share", "x.bin"]);
    });

    test("joins and normalizes", () => {
      expect(joinLocation("/archive/", "", "1234/x.bin")).toBe("/archive/1234/x.bin");
    });
  });

  describe("isPathWithinDir", () => {
    test("accepts nested paths and the directory itself", () => {
      expect(isPathWithinDir("/data/a/b.bin", "/data")).toBe(true);
      expect(isPathWithinDir("/data", "/data")).toBe(true);
    });

    test("rejects siblings with a common prefix", () => {
      expect(isPathWithinDir("/database/x", "/data")).toBe(false);
    });
  });
});
