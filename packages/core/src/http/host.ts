import type { NetworkStreamType } from "../transport/types.js";
import { isDefaultPort } from "../transport/address.js";
import { HOST, decodeHeaderBytes, type HeaderLookup } from "./headers.js";
import type { RequestTarget } from "./uri.js";

/**
 * Determines the authority a request targets.
 *
 * Returns `undefined` when nothing in the request names one; callers then
 * use the listener's fallback host.
 *
 * Precedence:
 * 1. Unix sockets never have one; the socket path is the only target.
 * 2. An absolute-form authority, rare but authoritative. Its port (the
 *    listener's port when it has none) is dropped when it is the default
 *    for the transport.
 * 3. The Host header, decoded byte-for-byte.
 */
export function reqHost(
  target: RequestTarget,
  headers: HeaderLookup,
  streamType: NetworkStreamType,
  localPort?: number,
): string | undefined {
  if (streamType === "unix") {
    return undefined;
  }

  const authority = target.authority;
  if (authority !== undefined) {
    const port = authority.port ?? localPort;
    if (port !== undefined && isDefaultPort(streamType, port)) {
      return authority.host;
    }
    return authority.raw;
  }

  // Most requests end up here.
  const host = headers.get(HOST);
  if (host === null || host === undefined) {
    return undefined;
  }
  return typeof host === "string" ? host : decodeHeaderBytes(host);
}
