import type { MiddlewareHandler } from "hono";
import type { Logger } from "@request-authority/core/logger";
import type { AppEnv } from "../env.js";

/**
 * One info line per request, written after the response is produced.
 */
export function createAccessLogMiddleware(
  logger: Logger,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startedAt = performance.now();
    await next();

    const ctx = c.get("requestContext");
    logger.info(
      {
        method: c.req.method,
        url: ctx?.url ?? c.req.url,
        status: c.res.status,
        authority: ctx?.authority ?? null,
        transport: ctx?.connection.streamType,
        peerAddress: ctx?.connection.peerAddress,
        peerPort: ctx?.connection.peerPort,
        durationMs: Math.round(performance.now() - startedAt),
      },
      "request",
    );
  };
}
