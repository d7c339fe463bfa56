import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "./logger";
import { DEFAULT_CONFIG, loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads debug and default combination from the environment", () => {
    expect(loadConfig({ STRUCTURAL_DEBUG: "TRUE", STRUCTURAL_DEFAULT_COMBO: "Service" })).toEqual({
      debug: true,
      defaultCombo: "Service"
    });
    expect(loadConfig({ STRUCTURAL_DEBUG: "1" }).debug).toBe(true);
    expect(loadConfig({ STRUCTURAL_DEBUG: "no" }).debug).toBe(false);
  });
});

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with component, operation and entity", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("Translator", { debug: false }).warn("skipping", { operation: "translate", entity: "P1" });
    expect(warn).toHaveBeenCalledWith("[Translator] translate 'P1' skipping");
  });

  it("prints info and caught errors only in debug mode", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    createLogger("Quiet", { debug: false }).info("hidden");
    createLogger("Quiet", { debug: false }).caught("hidden", new Error("x"));
    expect(log).not.toHaveBeenCalled();
    expect(debug).not.toHaveBeenCalled();

    const loud = createLogger("Loud", { debug: true });
    loud.info("shown");
    loud.caught("fell back", new RangeError("bad index"), { entity: "M1" });
    expect(log).toHaveBeenCalledWith("[Loud] shown");
    expect(debug).toHaveBeenCalledWith("[Loud] 'M1' fell back (recovered): RangeError: bad index");
  });

  it("always prints errors with their cause", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("Store", { debug: false }).error("build failed", new Error("boom"));
    expect(error).toHaveBeenCalledWith("[Store] build failed: Error: boom");
  });
});
