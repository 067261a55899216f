/**
 * Listener, connection and request properties.
 *
 * Each record is computed once for its scope and frozen: listen properties
 * live as long as the listener, connection properties as long as the
 * connection. Requests only pay for the host lookup.
 */

import { reqHostFromAddr } from "../transport/address.js";
import {
  reqSchemeFromStreamType,
  type RequestScheme,
} from "../transport/scheme.js";
import type {
  NetworkStreamAddress,
  NetworkStreamType,
} from "../transport/types.js";
import type { HeaderLookup } from "./headers.js";
import { reqHost } from "./host.js";
import type { RequestTarget } from "./uri.js";

export interface HttpListenProperties {
  readonly streamType: NetworkStreamType;
  readonly scheme: RequestScheme;
  /** Host to use when a request names none. */
  readonly fallbackHost: string;
  /** Undefined for unix listeners. */
  readonly localPort?: number;
}

export interface HttpConnectionProperties {
  readonly streamType: NetworkStreamType;
  /** Peer IP without loopback rewriting, or "unix". */
  readonly peerAddress: string;
  readonly peerPort?: number;
  readonly localPort?: number;
}

export interface HttpRequestProperties {
  /** Bare `host[:port]`; undefined means use the listener's fallback host. */
  readonly authority?: string;
}

function portOf(addr: NetworkStreamAddress): number | undefined {
  return addr.family === "ip" ? addr.port : undefined;
}

export function listenProperties(
  streamType: NetworkStreamType,
  localAddress: NetworkStreamAddress,
): HttpListenProperties {
  return Object.freeze({
    streamType,
    scheme: reqSchemeFromStreamType(streamType),
    fallbackHost: reqHostFromAddr(streamType, localAddress),
    localPort: portOf(localAddress),
  });
}

export function connectionProperties(
  listen: HttpListenProperties,
  peerAddress: NetworkStreamAddress,
): HttpConnectionProperties {
  return Object.freeze({
    streamType: listen.streamType,
    peerAddress: peerAddress.family === "ip" ? peerAddress.hostname : "unix",
    peerPort: portOf(peerAddress),
    localPort: listen.localPort,
  });
}

export function requestProperties(
  connection: HttpConnectionProperties,
  target: RequestTarget,
  headers: HeaderLookup,
): HttpRequestProperties {
  return Object.freeze({
    authority: reqHost(
      target,
      headers,
      connection.streamType,
      connection.localPort,
    ),
  });
}
