/**
 * Minimal HTTP request-target parsing (RFC 9112 §3.2).
 *
 * Only the pieces host resolution needs are extracted: the authority, if
 * the client sent one, and the path that follows it.
 */

export interface Authority {
  /** Authority text exactly as received, userinfo and port included. */
  readonly raw: string;
  /** Host without userinfo or port; IPv6 literals keep their brackets. */
  readonly host: string;
  readonly port?: number;
}

export interface RequestTarget {
  readonly authority?: Authority;
  /** Path and query. Empty for authority-form (CONNECT) targets. */
  readonly path: string;
}

const SCHEME_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:\/\//;
const DECIMAL = /^[0-9]{1,5}$/;

export function parseAuthority(raw: string): Authority {
  const hostPort = raw.slice(raw.lastIndexOf("@") + 1);

  // Port separator is the last colon outside an IPv6 literal.
  const bracketEnd = hostPort.lastIndexOf("]");
  const colon = hostPort.lastIndexOf(":");
  if (colon === -1 || colon < bracketEnd) {
    return { raw, host: hostPort };
  }

  const portText = hostPort.slice(colon + 1);
  const port = Number(portText);
  if (!DECIMAL.test(portText) || port > 65535) {
    return { raw, host: hostPort };
  }
  return { raw, host: hostPort.slice(0, colon), port };
}

/**
 * Parses the request target of a request line.
 *
 * - origin-form `/path?q` and asterisk-form `*` have no authority
 * - absolute-form `http://host:port/path` yields authority and path
 * - authority-form `host:port` (CONNECT) yields an authority only
 */
export function parseRequestTarget(raw: string): RequestTarget {
  if (raw.startsWith("/") || raw === "*") {
    return { path: raw };
  }

  const scheme = SCHEME_PREFIX.exec(raw);
  if (scheme !== null) {
    const rest = raw.slice(scheme[0].length);
    const end = rest.search(/[/?#]/);
    const authorityText = end === -1 ? rest : rest.slice(0, end);
    const path = end === -1 ? "/" : rest.slice(end);
    return {
      authority: parseAuthority(authorityText),
      path: path.startsWith("/") ? path : `/${path}`,
    };
  }

  return { authority: parseAuthority(raw), path: "" };
}
