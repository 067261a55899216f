import type {
  HeaderLookup,
  HttpConnectionProperties,
  HttpListenProperties,
  HttpPropertyExtractor,
  RequestTarget,
} from "@request-authority/core/http";
import type { RequestScheme } from "@request-authority/core/transport";
import type { ConnectionEntry } from "./connections.js";

export interface RequestContext {
  readonly scheme: RequestScheme;
  /** Authority named by the request itself, if any. */
  readonly authority?: string;
  /** Authority, or the listener's fallback host. */
  readonly host: string;
  /** Absolute URL of the request. */
  readonly url: string;
  readonly listen: HttpListenProperties;
  readonly connection: HttpConnectionProperties;
}

export function createRequestContext(
  extractor: HttpPropertyExtractor,
  entry: ConnectionEntry,
  target: RequestTarget,
  headers: HeaderLookup,
): RequestContext {
  const { listen, connection } = entry;
  const { authority } = extractor.requestProperties(connection, target, headers);
  const host = authority ?? listen.fallbackHost;
  // Authority-form and asterisk-form targets have no path of their own.
  const path = target.path.startsWith("/") ? target.path : "/";

  return {
    scheme: listen.scheme,
    authority,
    host,
    url: `${listen.scheme}${host}${path}`,
    listen,
    connection,
  };
}
