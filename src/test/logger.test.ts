import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from "../utils/logger";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogLevel(initialLevel);
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes messages with the component tag", () => {
    const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    setLogLevel("info");
    createLogger("Dispatcher").warn("Skipping a.csv");
    expect(spy).toHaveBeenCalledWith("[Dispatcher] Skipping a.csv");
  });

  it("drops messages below the current level", () => {
    const info = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("error");
    const log = createLogger("CLI");
    log.info("hidden");
    log.error("shown");
    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("[CLI] shown");
  });

  it("stays quiet when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setLogLevel("silent");
    createLogger("CLI").error("nope");
    expect(error).not.toHaveBeenCalled();
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
