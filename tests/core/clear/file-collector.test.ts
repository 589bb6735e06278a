import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  collectFiles,
  collectSubdirectories,
  matchesFilters,
  normalizeFilters,
} from "../../../src/core/clear/file-collector";
import { makeTempDir, removeTempDir, writeTestFile } from "../../helpers/fs";

describe("file collector", () => {
  let root: string;

  beforeAll(async () => {
    root = await makeTempDir("collect");
    await writeTestFile(path.join(root, "a.txt"), "a");
    await writeTestFile(path.join(root, "sub", "b.bin"), "b");
    await writeTestFile(path.join(root, "sub", "deep", "c.BIN"), "c");
  });

  afterAll(async () => {
    await removeTempDir(root);
  });

  describe("normalizeFilters", () => {
    test("drops wildcards, blanks and case", () => {
      expect(normalizeFilters([" *.BIN ", "*", ""])).toEqual([".bin"]);
      expect(normalizeFilters(undefined)).toEqual([]);
    });
  });

  describe("matchesFilters", () => {
    test("matches everything without includes", () => {
      expect(matchesFilters("/data/x.bin", [], [])).toBe(true);
    });

    test("lets excludes win over includes", () => {
      expect(matchesFilters("/data/tmp/x.bin", [".bin"], ["tmp"])).toBe(false);
      expect(matchesFilters("/data/x.bin", [".bin"], ["tmp"])).toBe(true);
      expect(matchesFilters("/data/x.txt", [".bin"], [])).toBe(false);
    });
  });

  describe("collectFiles", () => {
    test("walks subfolders when recursive", async () => {
      expect(await collectFiles(root, { recursive: true })).toEqual([
        `${root}/a.txt`,
        `${root}/sub/b.bin`,
        `${root}/sub/deep/c.BIN`,
      ]);
    });

    test("stays in the folder otherwise", async () => {
      expect(await collectFiles(root, { recursive: false })).toEqual([`${root}/a.txt`]);
    });

    test("applies include and exclude filters case-insensitively", async () => {
      expect(await collectFiles(root, { recursive: true, include: ["*.bin"] })).toEqual([
        `${root}/sub/b.bin`,
        `${root}/sub/deep/c.BIN`,
      ]);
      expect(await collectFiles(root, { recursive: true, exclude: ["DEEP"] })).toEqual([
        `${root}/a.txt`,
        `${root}/sub/b.bin`,
      ]);
    });

    test("returns nothing for a missing folder", async () => {
      expect(await collectFiles(path.join(root, "missing"), { recursive: true })).toEqual([]);
    });
  });

  describe("collectSubdirectories", () => {
    test("lists subfolders deepest first without the root", async () => {
      expect(await collectSubdirectories(root, true)).toEqual([`${root}/sub/deep`, `${root}/sub`]);
      expect(await collectSubdirectories(root, false)).toEqual([`${root}/sub`]);
    });
  });
});
