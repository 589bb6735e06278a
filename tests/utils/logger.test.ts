import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import {
  debug,
  error,
  getLogFile,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  setLogFile,
  setLogLevel,
  warn,
} from "../../src/utils/logger";
import { makeTempDir, removeTempDir } from "../helpers/fs";

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleWarnSpy: MockInstance<typeof console.warn>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    setLogFile(null);
    vi.restoreAllMocks();
  });

  function firstLine(spy: MockInstance<typeof console.log>): string {
    return String(spy.mock.calls[0]?.[0]);
  }

  describe("setLogLevel / getLogLevel", () => {
    test("sets and gets log level", () => {
      setLogLevel("debug");
      expect(getLogLevel()).toBe("debug");

      setLogLevel("error");
      expect(getLogLevel()).toBe("error");
    });

    test("recognizes log level names", () => {
      expect(isLogLevel("warn")).toBe(true);
      expect(isLogLevel("verbose")).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  describe("log level filtering", () => {
    test("debug does not log when level is info", () => {
      setLogLevel("info");
      debug("test message");
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    test("info logs when level is info or lower", () => {
      setLogLevel("debug");
      info("test message");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    test("warn goes to console.warn and is hidden at error level", () => {
      setLogLevel("warn");
      warn("shown");
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);

      setLogLevel("error");
      warn("hidden");
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
    });

    test("error always logs", () => {
      setLogLevel("error");
      error("test message");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("message formatting", () => {
    test("includes timestamp, level and message", () => {
      setLogLevel("info");
      info("my specific message");

      const line = firstLine(consoleLogSpy);
      expect(line).toMatch(/\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
      expect(line).toContain("INFO");
      expect(line).toContain("my specific message");
    });

    test("formats object data as JSON", () => {
      setLogLevel("info");
      info("test", { nested: { data: true } });

      expect(firstLine(consoleLogSpy)).toContain('"nested"');
    });

    test("appends the message of an Error", () => {
      setLogLevel("info");
      info("failed:", new Error("disk full"));

      expect(firstLine(consoleLogSpy)).toContain("failed: disk full");
    });
  });

  describe("child loggers", () => {
    test("prefix lines with their scope", () => {
      setLogLevel("info");
      logger.child("clear").info("sweeping");

      expect(firstLine(consoleLogSpy)).toContain("[clear]");
    });

    test("nest scopes", () => {
      setLogLevel("info");
      logger.child("clear").child("guard").warn("refused");

      expect(String(consoleWarnSpy.mock.calls[0]?.[0])).toContain("[clear:guard]");
    });
  });

  describe("log file", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir("logger");
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    test("mirrors lines without color codes", async () => {
      const file = path.join(tempDir, "logs", "tierkeep.log");
      setLogLevel("info");
      setLogFile(file);
      expect(getLogFile()).toBe(file);

      info("written to file");

      const content = await readFile(file, "utf8");
      expect(content).toContain("INFO  written to file\n");
      expect(content).not.toContain("\x1b[");
    });
  });
});
