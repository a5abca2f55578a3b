import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, silentLogger } from "../../src/core/logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createConsoleLogger({ level: "warn" });

    logger.info("ignored");
    logger.warn("kept", { filename: "out.shp" });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[geotool] kept", { filename: "out.shp" });
  });

  it("uses the prefix and omits missing data", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createConsoleLogger({ prefix: "tools" });

    logger.error("Failed to save datasource: disk full");

    expect(error).toHaveBeenCalledWith("[tools] Failed to save datasource: disk full");
  });

  it("writes nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    silentLogger.error("hidden");
    expect(error).not.toHaveBeenCalled();
  });
});
