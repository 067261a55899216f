import type { Socket } from "node:net";
import type {
  HttpConnectionProperties,
  HttpListenProperties,
} from "@request-authority/core/http";

export interface ConnectionEntry {
  readonly listen: HttpListenProperties;
  readonly connection: HttpConnectionProperties;
}

/**
 * Properties computed when a socket was accepted, looked up again for
 * every request on it. Entries go away with their socket.
 */
export class ConnectionRegistry {
  private readonly entries = new WeakMap<Socket, ConnectionEntry>();

  register(socket: Socket, entry: ConnectionEntry): void {
    this.entries.set(socket, entry);
  }

  get(socket: Socket): ConnectionEntry | undefined {
    return this.entries.get(socket);
  }
}
