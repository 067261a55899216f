/**
 * Serves Hono applications on listeners taken from a resource table.
 *
 * Listen properties are computed once per listener, connection properties
 * once per accepted socket; the request-context middleware then only
 * resolves the request's own authority.
 */

import { createServer as createHttpServer } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import type { Server as NetServer, Socket } from "node:net";
import { readFile, unlink } from "node:fs/promises";
import { getRequestListener } from "@hono/node-server";
import { expandHomePath } from "@request-authority/core/config";
import { RequestContextError } from "@request-authority/core/errors";
import type {
  HttpListenProperties,
  HttpPropertyExtractor,
} from "@request-authority/core/http";
import type { Logger } from "@request-authority/core/logger";
import type {
  ResourceId,
  ResourceTable,
} from "@request-authority/core/resources";
import type { ListenerConfig } from "@request-authority/core/schemas";
import type { NetworkStreamType } from "@request-authority/core/transport";
import { peerAddressFromSocket } from "./adapters/address.js";
import {
  NodeListenerResource,
  NodeStreamResource,
  type NodeHttpServer,
} from "./adapters/resources.js";
import type { ConnectionRegistry } from "./connections.js";

type FetchCallback = Parameters<typeof getRequestListener>[0];

export interface ServeListenerOptions {
  table: ResourceTable;
  rid: ResourceId;
  extractor: HttpPropertyExtractor;
  connections: ConnectionRegistry;
  fetch: FetchCallback;
  logger: Logger;
}

export interface ServeHandle {
  readonly listen: HttpListenProperties;
  readonly server: NodeHttpServer;
  /** Hands an accepted stream from the resource table to this server. */
  serveConnection(table: ResourceTable, rid: ResourceId): void;
  close(): Promise<void>;
}

function bind(
  server: NetServer,
  listen: (callback: () => void) => void,
): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    listen(() => {
      server.removeListener("error", reject);
      resolve();
    });
  });
}

async function removeStaleSocket(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err: unknown) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
      throw err;
    }
  }
}

/**
 * Creates and binds a Node server for one configured listener and
 * registers it in the resource table.
 */
export async function openListener(
  table: ResourceTable,
  config: ListenerConfig,
): Promise<ResourceId> {
  switch (config.transport) {
    case "tcp": {
      const server = createHttpServer();
      await bind(server, (cb) => server.listen(config.port, config.hostname, cb));
      return table.add(new NodeListenerResource(server, "tcp"));
    }
    case "tls": {
      const [cert, key] = await Promise.all([
        readFile(expandHomePath(config.certPath)),
        readFile(expandHomePath(config.keyPath)),
      ]);
      const server = createHttpsServer({ cert, key });
      await bind(server, (cb) => server.listen(config.port, config.hostname, cb));
      return table.add(new NodeListenerResource(server, "tls"));
    }
    case "unix": {
      const path = expandHomePath(config.path);
      await removeStaleSocket(path);
      const server = createHttpServer();
      await bind(server, (cb) => server.listen(path, cb));
      return table.add(new NodeListenerResource(server, "unix"));
    }
  }
}

function connectionEvent(
  streamType: NetworkStreamType,
): "connection" | "secureConnection" {
  return streamType === "tls" ? "secureConnection" : "connection";
}

/**
 * Takes the listener `rid` from the table and serves `fetch` on it.
 */
export function serveListener(options: ServeListenerOptions): ServeHandle {
  const { extractor, connections } = options;
  const listener = extractor.getNetworkStreamListenerForRid(
    options.table,
    options.rid,
  );
  if (!(listener instanceof NodeListenerResource)) {
    listener.close();
    throw new RequestContextError(
      "UNSUPPORTED_LISTENER",
      `Listener ${options.rid} is not backed by a Node server`,
      { rid: options.rid, name: listener.name },
    );
  }

  const server = listener.server;
  const events: NetServer = server;
  const listen = extractor.listenProperties(
    listener.streamType,
    listener.localAddress(),
  );
  const logger = options.logger.child({
    transport: listen.streamType,
    fallbackHost: listen.fallbackHost,
  });

  events.on(connectionEvent(listen.streamType), (socket: Socket) => {
    const peer = peerAddressFromSocket(socket, listen.streamType);
    if (peer === undefined) {
      logger.debug("Connection closed before it could be registered");
      return;
    }
    const connection = extractor.connectionProperties(listen, peer);
    connections.register(socket, { listen, connection });
    logger.debug({ connection }, "Connection accepted");
  });
  events.on("request", getRequestListener(options.fetch));

  logger.info({ localPort: listen.localPort ?? null }, "Listening");

  return {
    listen,
    server,
    serveConnection(table: ResourceTable, rid: ResourceId): void {
      const stream = extractor.getNetworkStreamForRid(table, rid);
      if (!(stream instanceof NodeStreamResource)) {
        stream.close();
        throw new RequestContextError(
          "UNSUPPORTED_STREAM",
          `Stream ${rid} is not backed by a Node socket`,
          { rid, name: stream.name },
        );
      }
      // TLS servers handshake on "connection" and report
      // "secureConnection" themselves.
      events.emit("connection", stream.socket);
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        events.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info("Listener closed");
          resolve();
        });
        server.closeIdleConnections();
      });
    },
  };
}
