import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, info, setLogLevel, warn } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    debug("hidden");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    debug("visible");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("keeps stdout free for the response", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("accepted");
    warn("odd");
    error("broken");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(3);
  });

  it("drops info and warn below the error level", () => {
    setLogLevel("error");
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("quiet");
    warn("quiet");
    error("loud");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("rejects unknown levels", () => {
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
  });
});
