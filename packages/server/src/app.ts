import { Hono } from "hono";
import { RequestContextError } from "@request-authority/core/errors";
import type { HttpPropertyExtractor } from "@request-authority/core/http";
import type { Logger } from "@request-authority/core/logger";
import type { ConnectionRegistry } from "./connections.js";
import type { AppEnv } from "./env.js";
import { createAccessLogMiddleware } from "./middleware/access-log.js";
import { createRequestContextMiddleware } from "./middleware/request-context.js";

export interface AppDeps {
  logger: Logger;
  extractor: HttpPropertyExtractor;
  connections: ConnectionRegistry;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", createAccessLogMiddleware(deps.logger));
  app.use(
    "*",
    createRequestContextMiddleware({
      extractor: deps.extractor,
      connections: deps.connections,
    }),
  );

  // Diagnostics: what the server believes this request targets.
  app.get("/context", (c) => {
    const ctx = c.get("requestContext");
    return c.json({
      url: ctx?.url ?? null,
      scheme: ctx?.scheme ?? null,
      authority: ctx?.authority ?? null,
      host: ctx?.host ?? null,
      listen: ctx?.listen ?? null,
      connection: ctx?.connection ?? null,
    });
  });

  app.onError((err, c) => {
    if (err instanceof RequestContextError) {
      deps.logger.warn({ err }, err.message);
      return c.json(err.toJSON(), 500);
    }

    deps.logger.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  app.notFound((c) => {
    return c.json(
      {
        error: {
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
