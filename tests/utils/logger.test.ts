import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  debug,
  error,
  formatMessage,
  getLogLevel,
  info,
  logger,
  scoped,
  setLogLevel,
  warn,
} from "../../src/utils/logger";

function firstLine(spy: typeof console.log): string {
  return String(vi.mocked(spy).mock.calls[0]?.[0]);
}

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;

  beforeEach(() => {
    originalLevel = getLogLevel();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    vi.restoreAllMocks();
  });

  describe("setLogLevel / getLogLevel", () => {
    test("sets and gets log level", () => {
      setLogLevel("debug");
      expect(getLogLevel()).toBe("debug");

      setLogLevel("error");
      expect(getLogLevel()).toBe("error");
    });
  });

  describe("log level filtering", () => {
    test("debug does not log when level is info", () => {
      setLogLevel("info");
      debug("test message");
      expect(console.log).not.toHaveBeenCalled();
    });

    test("info logs when level is info or lower", () => {
      setLogLevel("debug");
      info("test message");
      expect(console.log).toHaveBeenCalledTimes(1);
    });

    test("info does not log when level is warn", () => {
      setLogLevel("warn");
      info("test message");
      expect(console.log).not.toHaveBeenCalled();
    });

    test("warn goes to console.warn", () => {
      setLogLevel("warn");
      warn("test message");
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    test("error always logs", () => {
      setLogLevel("error");
      error("test message");
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });

  describe("formatMessage", () => {
    test("includes timestamp and padded level", () => {
      const line = formatMessage("info", "hello");
      expect(line).toMatch(/\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] INFO /);
      expect(line.endsWith("\x1b[0m hello")).toBe(true);
    });

    test("appends scope and JSON data", () => {
      const line = formatMessage("warn", "slow upload", { attempt: 2 }, "s3");
      expect(line.endsWith('\x1b[0m [s3] slow upload {"attempt":2}')).toBe(true);
    });

    test("renders errors by message", () => {
      const line = formatMessage("error", "failed", new Error("boom"));
      expect(line.endsWith("\x1b[0m failed boom")).toBe(true);
    });
  });

  describe("scoped", () => {
    test("tags every line with the scope", () => {
      setLogLevel("info");
      scoped("backup").info("Starting backup for service: api");

      expect(firstLine(console.log).endsWith("[backup] Starting backup for service: api")).toBe(
        true,
      );
    });

    test("respects the current level", () => {
      setLogLevel("error");
      scoped("backup").warn("ignored");
      expect(console.warn).not.toHaveBeenCalled();
    });
  });

  describe("logger object", () => {
    test("routes each level to its console method", () => {
      setLogLevel("debug");

      logger.debug("debug msg");
      logger.info("info msg");
      logger.warn("warn msg");
      logger.error("error msg");

      expect(console.log).toHaveBeenCalledTimes(2);
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });
  });
});
