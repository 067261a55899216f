import { DefaultHttpPropertyExtractor } from "@request-authority/core/http";
import type { HttpPropertyExtractor } from "@request-authority/core/http";
import { createLogger, type Logger } from "@request-authority/core/logger";
import { ResourceTable } from "@request-authority/core/resources";
import type { ServerConfig } from "@request-authority/core/schemas";
import type { Hono } from "hono";
import { createApp } from "./app.js";
import { ConnectionRegistry } from "./connections.js";
import type { AppEnv } from "./env.js";
import { openListener, serveListener, type ServeHandle } from "./serve.js";

export interface ServerContext {
  app: Hono<AppEnv>;
  logger: Logger;
  config: ServerConfig;
  table: ResourceTable;
  handles: ServeHandle[];
  close: () => Promise<void>;
}

export interface StartServerOptions {
  logger?: Logger;
  /** Replaces the default resource-table backed extractor. */
  extractor?: HttpPropertyExtractor;
}

/**
 * Opens every configured listener and serves the app on each of them.
 */
export async function startServer(
  config: ServerConfig,
  options?: StartServerOptions,
): Promise<ServerContext> {
  const logger = options?.logger ?? createLogger(config.logging);
  const extractor = options?.extractor ?? new DefaultHttpPropertyExtractor();
  const connections = new ConnectionRegistry();
  const table = new ResourceTable();
  const app = createApp({ logger, extractor, connections });

  const handles: ServeHandle[] = [];
  try {
    for (const listenerConfig of config.listeners) {
      const rid = await openListener(table, listenerConfig);
      handles.push(
        serveListener({
          table,
          rid,
          extractor,
          connections,
          fetch: app.fetch,
          logger,
        }),
      );
    }
  } catch (err) {
    await Promise.all(handles.map((handle) => handle.close()));
    for (const [rid] of table.names()) {
      table.close(rid);
    }
    throw err;
  }

  return {
    app,
    logger,
    config,
    table,
    handles,
    close: async () => {
      await Promise.all(handles.map((handle) => handle.close()));
    },
  };
}
