import { afterEach, describe, expect, it } from "vitest";
import { LogLevel, configureLogging, getLog } from "./logger.js";

describe("Log", () => {
  afterEach(() => {
    configureLogging({ level: "SILENT" });
  });

  it("follows reconfiguration after it was handed out", () => {
    const log = getLog("Test");
    configureLogging({ level: "ERROR" });
    expect(log.isOk()).toBe(false);
    expect(log.isLoggable(LogLevel.ERROR)).toBe(true);

    configureLogging({ level: "OK" });
    expect(log.isOk()).toBe(true);
  });

  it("falls back to info for unknown levels", () => {
    configureLogging({ level: "chatty" });
    const log = getLog("Test");
    expect(log.isLoggable(LogLevel.INFO)).toBe(true);
    expect(log.isOk()).toBe(false);
  });
});
