/**
 * Attaches the request context (scheme, authority, absolute URL and the
 * connection's properties) to every request as `c.var.requestContext`.
 *
 * Requires the Node bindings from @hono/node-server: the socket is looked
 * up in the connection registry filled in when it was accepted.
 */

import type { MiddlewareHandler } from "hono";
import { UnknownConnectionError } from "@request-authority/core/errors";
import {
  parseRequestTarget,
  type HttpPropertyExtractor,
} from "@request-authority/core/http";
import { nodeHeaderLookup } from "../adapters/headers.js";
import type { ConnectionRegistry } from "../connections.js";
import { createRequestContext } from "../context.js";
import type { AppEnv } from "../env.js";

export interface RequestContextDeps {
  extractor: HttpPropertyExtractor;
  connections: ConnectionRegistry;
}

export function createRequestContextMiddleware(
  deps: RequestContextDeps,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.env.incoming;
    const entry = deps.connections.get(incoming.socket);
    if (entry === undefined) {
      throw new UnknownConnectionError({
        remoteAddress: incoming.socket.remoteAddress ?? null,
      });
    }

    c.set(
      "requestContext",
      createRequestContext(
        deps.extractor,
        entry,
        parseRequestTarget(incoming.url ?? "/"),
        nodeHeaderLookup(incoming),
      ),
    );
    await next();
  };
}
