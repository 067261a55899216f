import { describe, it, expect } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { ServerConfigSchema } from "@request-authority/core/schemas";
import { startServer } from "./bootstrap.js";
import { requestJson } from "./test-utils.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "ra-bootstrap-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

const logger = pino({ level: "silent" });

describe("startServer", () => {
  it("serves every configured listener", async () => {
    await withTempDir(async (dir) => {
      const socketPath = join(dir, "api.sock");
      const config = ServerConfigSchema.parse({
        listeners: [
          { transport: "tcp", hostname: "127.0.0.1", port: 0 },
          { transport: "unix", path: socketPath },
        ],
      });

      const server = await startServer(config, { logger });
      try {
        expect(server.handles.map((h) => h.listen.streamType)).toEqual([
          "tcp",
          "unix",
        ]);
        expect(server.table.size).toBe(0);

        const tcp = await requestJson({
          host: "127.0.0.1",
          port: server.handles[0].listen.localPort,
          path: "/context",
          headers: { host: "svc.example:9000" },
        });
        const unix = await requestJson({ socketPath, path: "/context" });

        expect((tcp.body as { url: string }).url).toBe(
          "http://svc.example:9000/context",
        );
        expect((unix.body as { host: string }).host).toBe(
          server.handles[1].listen.fallbackHost,
        );
      } finally {
        await server.close();
      }
    });
  });

  it("closes opened listeners when a later one fails", async () => {
    await withTempDir(async (dir) => {
      const config = ServerConfigSchema.parse({
        listeners: [
          { transport: "tcp", hostname: "127.0.0.1", port: 0 },
          {
            transport: "tls",
            hostname: "127.0.0.1",
            port: 0,
            certPath: join(dir, "missing-cert.pem"),
            keyPath: join(dir, "missing-key.pem"),
          },
        ],
      });

      await expect(startServer(config, { logger })).rejects.toMatchObject({
        code: "ENOENT",
      });
    });
  });
});
