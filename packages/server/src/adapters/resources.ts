import type { Server as HttpServer } from "node:http";
import type { Server as HttpsServer } from "node:https";
import type { Socket } from "node:net";
import {
  LISTENER_RESOURCE_NAMES,
  STREAM_RESOURCE_NAMES,
} from "@request-authority/core/resources";
import type {
  NetworkStream,
  NetworkStreamAddress,
  NetworkStreamListener,
  NetworkStreamType,
} from "@request-authority/core/transport";
import {
  addressFromServer,
  localAddressFromSocket,
  peerAddressFromSocket,
} from "./address.js";

export type NodeHttpServer = HttpServer | HttpsServer;

function requireAddress(
  addr: NetworkStreamAddress | undefined,
  side: "local" | "peer",
): NetworkStreamAddress {
  if (addr === undefined) {
    throw new Error(`Socket has no ${side} address, it is already closed`);
  }
  return addr;
}

/** A bound `node:http` / `node:https` server held in a resource table. */
export class NodeListenerResource implements NetworkStreamListener {
  readonly name: string;

  constructor(
    readonly server: NodeHttpServer,
    readonly streamType: NetworkStreamType,
  ) {
    this.name = LISTENER_RESOURCE_NAMES[streamType];
  }

  localAddress(): NetworkStreamAddress {
    return addressFromServer(this.server);
  }

  close(): void {
    this.server.close();
  }
}

/**
 * An accepted socket held in a resource table until a server adopts it.
 * Unix sockets carry the listener's path since Node does not expose it on
 * the accepted socket.
 */
export class NodeStreamResource implements NetworkStream {
  readonly name: string;

  constructor(
    readonly socket: Socket,
    readonly streamType: NetworkStreamType,
    private readonly unixPath: string | null = null,
  ) {
    this.name = STREAM_RESOURCE_NAMES[streamType];
  }

  localAddress(): NetworkStreamAddress {
    if (this.streamType === "unix") {
      return { family: "unix", path: this.unixPath };
    }
    return requireAddress(
      localAddressFromSocket(this.socket, this.streamType),
      "local",
    );
  }

  peerAddress(): NetworkStreamAddress {
    return requireAddress(
      peerAddressFromSocket(this.socket, this.streamType),
      "peer",
    );
  }

  close(): void {
    this.socket.destroy();
  }
}
