import { describe, it, expect } from "vitest";
import { ListenerConfigSchema, ServerConfigSchema } from "./server-config.js";

describe("ServerConfigSchema", () => {
  it("defaults to a single loopback tcp listener on 8080", () => {
    const config = ServerConfigSchema.parse({});

    expect(config.listeners).toEqual([
      { transport: "tcp", hostname: "127.0.0.1", port: 8080 },
    ]);
    expect(config.logging).toEqual({ level: "info", pretty: false });
  });

  it("accepts port 0 for an ephemeral bind", () => {
    const listener = ListenerConfigSchema.parse({ transport: "tcp", port: 0 });
    expect(listener).toEqual({
      transport: "tcp",
      hostname: "127.0.0.1",
      port: 0,
    });
  });

  it("tls listeners require certificate and key paths", () => {
    const result = ListenerConfigSchema.safeParse({
      transport: "tls",
      port: 443,
      certPath: "/etc/ssl/cert.pem",
    });
    expect(result.success).toBe(false);
  });

  it("unix listeners require a non-empty path", () => {
    expect(
      ListenerConfigSchema.safeParse({ transport: "unix", path: "" }).success,
    ).toBe(false);
    expect(
      ListenerConfigSchema.parse({ transport: "unix", path: "/tmp/s.sock" }),
    ).toEqual({ transport: "unix", path: "/tmp/s.sock" });
  });

  it("rejects unknown log levels", () => {
    const result = ServerConfigSchema.safeParse({
      logging: { level: "trace" },
    });
    expect(result.success).toBe(false);
  });
});
