import type { Server, Socket } from "node:net";
import {
  ipAddress,
  unixAddress,
  type NetworkStreamAddress,
  type NetworkStreamType,
} from "@request-authority/core/transport";

/** Bound address of a listening server. Throws if it is not listening. */
export function addressFromServer(server: Server): NetworkStreamAddress {
  const addr = server.address();
  if (addr === null) {
    throw new Error("Server is not listening");
  }
  if (typeof addr === "string") {
    return unixAddress(addr);
  }
  return ipAddress(addr.address, addr.port);
}

/**
 * Peer address of an accepted socket. Unix peers are unnamed. Undefined
 * when the socket was closed before its address could be read.
 */
export function peerAddressFromSocket(
  socket: Socket,
  streamType: NetworkStreamType,
): NetworkStreamAddress | undefined {
  if (streamType === "unix") {
    return unixAddress(null);
  }
  const { remoteAddress, remotePort } = socket;
  if (remoteAddress === undefined || remotePort === undefined) {
    return undefined;
  }
  return ipAddress(remoteAddress, remotePort);
}

export function localAddressFromSocket(
  socket: Socket,
  streamType: NetworkStreamType,
): NetworkStreamAddress | undefined {
  if (streamType === "unix") {
    // Node does not report the bound path on accepted unix sockets.
    return unixAddress(null);
  }
  const { localAddress, localPort } = socket;
  if (localAddress === undefined || localPort === undefined) {
    return undefined;
  }
  return ipAddress(localAddress, localPort);
}
