import type { NetworkStreamType } from "./types.js";

export type RequestScheme = "http://" | "https://" | "http+unix://";

/**
 * URL scheme prefix for requests arriving on a stream type.
 *
 * Unix sockets follow httpie's `http+unix://{percent-encoded path}/`
 * convention.
 */
export function reqSchemeFromStreamType(
  streamType: NetworkStreamType,
): RequestScheme {
  switch (streamType) {
    case "tcp":
      return "http://";
    case "tls":
      return "https://";
    case "unix":
      return "http+unix://";
  }
}
