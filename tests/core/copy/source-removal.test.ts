import { existsSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { CopyOrchestrator } from "../../../src/core/copy/orchestrator";
import { loadFileRecord } from "../../../src/core/record/file-record";
import { createTestContext, type TestContext } from "../../helpers/context";
import { makeTempDir, removeTempDir, SESSION } from "../../helpers/fs";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, unlink: vi.fn(actual.unlink) };
});

describe("CopyOrchestrator source removal", () => {
  let tempDir: string;
  let ctx: TestContext;

  beforeEach(async () => {
    tempDir = await makeTempDir("copy-remove");
    ctx = await createTestContext(tempDir);
  });

  afterEach(async () => {
    ctx.close();
    await removeTempDir(tempDir);
  });

  test("keeps the validated copy and reports the source as not removed when deleting it fails", async () => {
    const source = await ctx.place("local", "x.bin", "recorded samples");
    const busy = Object.assign(new Error("EBUSY: resource busy or locked"), { code: "EBUSY" });
    vi.mocked(unlink).mockRejectedValueOnce(busy);
    const orchestrator = new CopyOrchestrator({ store: ctx.store, policy: ctx.policy });

    const outcome = await orchestrator.copy(
      await loadFileRecord(source, { policy: ctx.policy }),
      ctx.roots.archive,
      { removeSourceOnSuccess: true },
    );

    expect(outcome.status).toBe("copied");
    expect(outcome.classification).toBe("VALID_COPY");
    expect(outcome.sourceRemoved).toBe(false);
    expect(outcome.error).toBeUndefined();
    expect(existsSync(source)).toBe(true);
    expect(existsSync(`${ctx.roots.archive}/${SESSION}/x.bin`)).toBe(true);
  });
});
