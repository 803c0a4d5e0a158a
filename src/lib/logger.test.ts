import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should prefix messages and pass extra arguments through", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    createLogger("Engine").warn("short block", 100);

    expect(warn).toHaveBeenCalledWith("[Engine] short block", 100);
  });

  it("should extend the prefix for a child logger", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    vi.stubEnv("NODE_ENV", "test");

    createLogger("Engine").child("Audio").info("ready");

    expect(info).toHaveBeenCalledWith("[Engine:Audio] ready");
  });

  it("should silence debug and info in production", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubEnv("NODE_ENV", "production");

    const logger = createLogger("Power");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Power] shown");
  });

  it("should timestamp errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    createLogger("Audio").error("source failed");

    expect(error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Audio\] source failed$/),
    );
  });
});
