/**
 * Transport-level types shared by every layer of request-context resolution.
 *
 * | Stream type | Medium                          | Default port |
 * |-------------|---------------------------------|--------------|
 * | tcp         | plain TCP                       | 80           |
 * | tls         | TLS-wrapped TCP                 | 443          |
 * | unix        | Unix domain socket (a file path) | none         |
 */

import type { Resource } from "../resources/table.js";

export type NetworkStreamType = "tcp" | "tls" | "unix";

export interface IpStreamAddress {
  readonly family: "ip";
  /** Bare IP address, IPv6 without brackets. */
  readonly hostname: string;
  readonly port: number;
}

export interface UnixStreamAddress {
  readonly family: "unix";
  /**
   * Socket file path. `null` for unnamed sockets (the usual peer of a
   * Unix listener); raw bytes when the OS path was not decoded.
   */
  readonly path: string | Uint8Array | null;
}

export type NetworkStreamAddress = IpStreamAddress | UnixStreamAddress;

/** A bound listener held in a resource table. */
export interface NetworkStreamListener extends Resource {
  readonly streamType: NetworkStreamType;
  localAddress(): NetworkStreamAddress;
}

/** An accepted connection held in a resource table. */
export interface NetworkStream extends Resource {
  readonly streamType: NetworkStreamType;
  localAddress(): NetworkStreamAddress;
  peerAddress(): NetworkStreamAddress;
}

export function ipAddress(hostname: string, port: number): IpStreamAddress {
  return { family: "ip", hostname, port };
}

export function unixAddress(
  path: string | Uint8Array | null,
): UnixStreamAddress {
  return { family: "unix", path };
}
