import { createRequire } from "node:module";
import { loadConfig } from "@request-authority/core/config";
import { startServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env.REQUEST_AUTHORITY_ROOT_PATH;
  const config = await loadConfig({ rootPath });
  const server = await startServer(config);
  const { logger } = server;

  logger.info(
    {
      version: pkg.version,
      listeners: server.handles.map((handle) => ({
        url: `${handle.listen.scheme}${handle.listen.fallbackHost}/`,
      })),
    },
    "Server started",
  );

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();

    await server.close();
    logger.info("Server stopped");
    process.exit(0);
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
