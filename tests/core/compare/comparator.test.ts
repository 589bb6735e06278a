import { describe, expect, test } from "vitest";
import { classify } from "../../../src/core/compare/comparator";
import {
  IGNORED_SET,
  INVALID_SET,
  MATCH_KINDS,
  type MatchKind,
  mirrorMatchKind,
  SELF_SET,
  UNCONFIRMED_SET,
  VALID_SET,
} from "../../../src/core/compare/match-kind";
import { FileRecord, type FileRecordInit } from "../../../src/core/record/file-record";
import type { ChecksumAlgorithm } from "../../../src/types";

const AA = "000000AA";
const BB = "000000BB";
const SHA = "ab".repeat(32);

function rec(location: string, size: number | null, value?: string, algorithm: ChecksumAlgorithm = "crc32"): FileRecord {
  const init: FileRecordInit = { location, size };
  if (value) init.checksum = { algorithm, value };
  return new FileRecord(init);
}

const cases: { name: string; a: FileRecord; b: FileRecord; expected: MatchKind }[] = [
  { name: "identical entry", a: rec("/orig/x.bin", 100, AA), b: rec("/ORIG/x.bin", 100, AA), expected: "SELF" },
  { name: "same place, no checksums", a: rec("/orig/x.bin", 100), b: rec("/orig/x.bin", 100), expected: "SELF" },
  {
    name: "same place, other lacks checksum",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/orig/x.bin", 100),
    expected: "SELF_MISSING_OTHER",
  },
  {
    name: "same place, self lacks checksum",
    a: rec("/orig/x.bin", 100),
    b: rec("/orig/x.bin", 100, AA),
    expected: "SELF_MISSING_SELF",
  },
  {
    name: "same place, different algorithms",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/orig/x.bin", 100, SHA, "sha256"),
    expected: "SELF_CHECKSUM_TYPE_MISMATCH",
  },
  {
    name: "same place, different size",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/orig/x.bin", 120, AA),
    expected: "SELF_PREVIOUS_VERSION",
  },
  {
    name: "same place, different checksum",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/orig/x.bin", 100, BB),
    expected: "SELF_PREVIOUS_VERSION",
  },
  { name: "copy, no checksums", a: rec("/orig/x.bin", 100), b: rec("/backup/x.bin", 100), expected: "COPY_MISSING_BOTH" },
  {
    name: "copy, other lacks checksum",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/x.bin", 100),
    expected: "COPY_MISSING_OTHER",
  },
  {
    name: "copy, self lacks checksum",
    a: rec("/orig/x.bin", 100),
    b: rec("/backup/x.bin", 100, AA),
    expected: "COPY_MISSING_SELF",
  },
  {
    name: "copy, different algorithms",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/x.bin", 100, SHA, "sha256"),
    expected: "COPY_CHECKSUM_TYPE_MISMATCH",
  },
  {
    name: "renamed, checksum unknown",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/y.bin", 100),
    expected: "POSSIBLE_COPY_RENAMED",
  },
  { name: "scenario A", a: rec("/orig/x.bin", 100, AA), b: rec("/backup/x.bin", 100, AA), expected: "VALID_COPY" },
  {
    name: "scenario B",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/y.bin", 100, AA),
    expected: "VALID_COPY_RENAMED",
  },
  {
    name: "scenario C",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/x.bin", 100, BB),
    expected: "COPY_UNSYNCED_OR_CORRUPT_DATA",
  },
  {
    name: "same name, size and checksum differ",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/x.bin", 200, BB),
    expected: "COPY_UNSYNCED_DATA",
  },
  {
    name: "same name and checksum, size differs",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/x.bin", 200, AA),
    expected: "COPY_UNSYNCED_CHECKSUM",
  },
  {
    name: "scenario D",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/z.bin", 200, AA),
    expected: "CHECKSUM_COLLISION",
  },
  { name: "unrelated", a: rec("/orig/x.bin", 100, AA), b: rec("/backup/z.bin", 200, BB), expected: "UNRELATED" },
  { name: "not enough information", a: rec("/orig/x.bin", 100, AA), b: rec("/backup/x.bin", 200), expected: "UNKNOWN" },
  {
    name: "unrelated with different algorithms",
    a: rec("/orig/x.bin", 100, AA),
    b: rec("/backup/z.bin", 200, SHA, "sha256"),
    expected: "UNKNOWN_CHECKSUM_TYPE_MISMATCH",
  },
  {
    name: "copy from another subgroup",
    a: rec("/orig/run_probeA/x.bin", 100, AA),
    b: rec("/backup/run_probeB/x.bin", 100, AA),
    expected: "UNKNOWN",
  },
];

describe("classify", () => {
  test.each(cases)("$name -> $expected", ({ a, b, expected }) => {
    expect(classify(a, b)).toBe(expected);
  });

  test("covers every match kind", () => {
    const covered = new Set(cases.map((c) => c.expected));
    expect(MATCH_KINDS.filter((kind) => !covered.has(kind))).toEqual([]);
  });

  test("swapping operands only mirrors the one-sided missing kinds", () => {
    for (const { a, b } of cases) {
      expect(classify(b, a)).toBe(mirrorMatchKind(classify(a, b)));
    }
  });

  test("is deterministic", () => {
    for (const { a, b } of cases) {
      const first = classify(a, b);
      for (let i = 0; i < 5; i++) {
        expect(classify(a, b)).toBe(first);
      }
    }
  });

  describe("device identity", () => {
    test("a hard link at another path is the same file", () => {
      const a = rec("/orig/x.bin", 100, AA).with({ fileId: { dev: 1, ino: 7 } });
      const b = rec("/mirror/x.bin", 100, AA).with({ fileId: { dev: 1, ino: 7 } });

      expect(classify(a, b)).toBe("SELF");
    });

    test("a replaced file at the same path is a previous version", () => {
      const a = rec("/orig/x.bin", 100, AA).with({ fileId: { dev: 1, ino: 7 } });
      const b = rec("/orig/x.bin", 100, AA).with({ fileId: { dev: 1, ino: 8 } });

      expect(classify(a, b)).toBe("SELF_PREVIOUS_VERSION");
    });
  });
});

describe("match kind sets", () => {
  test("every kind belongs to exactly one set", () => {
    const sets = [SELF_SET, VALID_SET, UNCONFIRMED_SET, INVALID_SET, IGNORED_SET];
    for (const kind of MATCH_KINDS) {
      expect(sets.filter((set) => set.has(kind))).toHaveLength(1);
    }
  });

  test("mirroring twice is the identity", () => {
    for (const kind of MATCH_KINDS) {
      expect(mirrorMatchKind(mirrorMatchKind(kind))).toBe(kind);
    }
  });
});
