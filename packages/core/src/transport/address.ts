/**
 * Fallback host derivation from a listener's bound address.
 *
 * When a request carries neither an absolute-form authority nor a Host
 * header, the URL we synthesize for it uses this value. Loopback and
 * wildcard binds are reported as "localhost"; conventional ports are
 * elided.
 */

import { BlockList, isIPv6 } from "node:net";
import type { NetworkStreamAddress, NetworkStreamType } from "./types.js";

const DEFAULT_PORTS: Readonly<Record<NetworkStreamType, number | undefined>> =
  {
    tcp: 80,
    tls: 443,
    unix: undefined,
  };

const LOCAL_IPV4 = new BlockList();
LOCAL_IPV4.addSubnet("127.0.0.0", 8, "ipv4");
LOCAL_IPV4.addAddress("0.0.0.0", "ipv4");

// Kept apart from the IPv4 rules: a BlockList matches IPv4-mapped IPv6
// addresses (::ffff:127.0.0.1) against its IPv4 entries.
const LOCAL_IPV6 = new BlockList();
LOCAL_IPV6.addAddress("::1", "ipv6");
LOCAL_IPV6.addAddress("::", "ipv6");

const utf8 = new TextDecoder("utf-8", { fatal: true });
const encoder = new TextEncoder();

/** True when `port` is 80 on tcp or 443 on tls. */
export function isDefaultPort(
  streamType: NetworkStreamType,
  port: number,
): boolean {
  return DEFAULT_PORTS[streamType] === port;
}

/** Loopback (127.0.0.0/8, ::1) or unspecified (0.0.0.0, ::). */
export function isLocalIp(hostname: string): boolean {
  return isIPv6(hostname)
    ? LOCAL_IPV6.check(hostname, "ipv6")
    : LOCAL_IPV4.check(hostname, "ipv4");
}

/** `ip:port`, with IPv6 addresses bracketed. */
export function formatIpPort(hostname: string, port: number): string {
  return isIPv6(hostname) ? `[${hostname}]:${port}` : `${hostname}:${port}`;
}

function isAsciiAlphanumeric(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) ||
    (byte >= 0x41 && byte <= 0x5a) ||
    (byte >= 0x61 && byte <= 0x7a)
  );
}

/**
 * Percent-encodes every byte except ASCII letters and digits, so the
 * result is a single opaque token safe to use as a URL host.
 */
export function percentEncodeNonAlphanumeric(
  input: string | Uint8Array,
): string {
  const bytes = typeof input === "string" ? encoder.encode(input) : input;
  let out = "";
  for (const byte of bytes) {
    out += isAsciiAlphanumeric(byte)
      ? String.fromCharCode(byte)
      : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return out;
}

function socketPathText(path: string | Uint8Array | null): string {
  if (path === null) return "";
  if (typeof path === "string") return path;
  try {
    return utf8.decode(path);
  } catch {
    // Not representable as text: the socket gets an empty host token.
    return "";
  }
}

/**
 * Computes the fallback host for a listener bound to `addr`.
 */
export function reqHostFromAddr(
  streamType: NetworkStreamType,
  addr: NetworkStreamAddress,
): string {
  switch (addr.family) {
    case "ip": {
      const local = isLocalIp(addr.hostname);
      if (isDefaultPort(streamType, addr.port)) {
        return local ? "localhost" : addr.hostname;
      }
      return local
        ? `localhost:${addr.port}`
        : formatIpPort(addr.hostname, addr.port);
    }
    case "unix":
      return percentEncodeNonAlphanumeric(socketPathText(addr.path));
  }
}
