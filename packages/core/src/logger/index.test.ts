import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger } from "./index.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("createLogger", () => {
  it("creates logger with specified level", () => {
    vi.stubEnv("NODE_ENV", "production");
    const logger = createLogger({ level: "debug", pretty: false });
    expect(logger.level).toBe("debug");
  });

  it("is functional with pretty: true", () => {
    vi.stubEnv("NODE_ENV", "production");
    // The pino-pretty transport runs in a worker, so only the level is
    // observable here.
    const logger = createLogger({ level: "info", pretty: true });
    expect(logger.level).toBe("info");
  });

  it("child loggers inherit the level", () => {
    vi.stubEnv("NODE_ENV", "production");
    const logger = createLogger({ level: "warn", pretty: false });
    const child = logger.child({ listener: "tcp" });
    expect(child.level).toBe("warn");
  });

  it("accepts base bindings", () => {
    vi.stubEnv("NODE_ENV", "production");
    const logger = createLogger(
      { level: "error", pretty: false },
      { component: "server" },
    );
    // pino strips pid and hostname from bindings()
    expect(logger.bindings()).toEqual({
      component: "server",
      name: "request-authority",
    });
  });
});
