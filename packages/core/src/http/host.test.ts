import { describe, it, expect } from "vitest";
import type { HeaderLookup } from "./headers.js";
import { reqHost } from "./host.js";
import { parseRequestTarget } from "./uri.js";

function headers(values: Record<string, string | Uint8Array>): HeaderLookup {
  return {
    get: (name) => values[name.toLowerCase()],
  };
}

const none = headers({});

describe("reqHost", () => {
  it("unix sockets never resolve a host", () => {
    expect(
      reqHost(
        parseRequestTarget("http://example.com/"),
        headers({ host: "example.org" }),
        "unix",
      ),
    ).toBeUndefined();
    expect(
      reqHost(parseRequestTarget("/"), headers({ host: "example.org" }), "unix"),
    ).toBeUndefined();
  });

  it("elides the default port from a tcp authority", () => {
    expect(
      reqHost(parseRequestTarget("http://example.com:80/"), none, "tcp", 80),
    ).toBe("example.com");
  });

  it("keeps a non-default port verbatim", () => {
    expect(
      reqHost(parseRequestTarget("http://example.com:8080/"), none, "tcp", 80),
    ).toBe("example.com:8080");
  });

  it("elides 443 on tls but not on tcp", () => {
    expect(
      reqHost(parseRequestTarget("https://example.com:443/"), none, "tls", 443),
    ).toBe("example.com");
    expect(
      reqHost(parseRequestTarget("http://example.com:443/"), none, "tcp", 8080),
    ).toBe("example.com:443");
  });

  it("an authority without a port falls back to the listener port", () => {
    const target = parseRequestTarget("http://user@example.com/");
    expect(reqHost(target, none, "tcp", 80)).toBe("example.com");
    expect(reqHost(target, none, "tcp", 8080)).toBe("user@example.com");
  });

  it("the authority outranks the Host header", () => {
    expect(
      reqHost(
        parseRequestTarget("http://a.example:8080/"),
        headers({ host: "b.example" }),
        "tcp",
        8080,
      ),
    ).toBe("a.example:8080");
  });

  it("an empty authority host still wins", () => {
    expect(
      reqHost(
        parseRequestTarget("http://:8080/"),
        headers({ host: "b.example" }),
        "tcp",
        80,
      ),
    ).toBe(":8080");
  });

  it("uses the Host header for origin-form requests", () => {
    expect(
      reqHost(parseRequestTarget("/"), headers({ host: "example.com:3000" }), "tcp", 3000),
    ).toBe("example.com:3000");
  });

  it("Host header is returned as sent, default port included", () => {
    expect(
      reqHost(parseRequestTarget("/"), headers({ host: "example.com:80" }), "tcp", 80),
    ).toBe("example.com:80");
  });

  it("decodes non-UTF-8 header bytes one byte per character", () => {
    const bytes = new Uint8Array([0x68, 0xe9, 0x80, 0xff]);
    const host = reqHost(parseRequestTarget("/"), headers({ host: bytes }), "tls", 443);

    expect(host).toBe("h\u00e9\u0080\u00ff");
    expect(host).toHaveLength(bytes.length);
  });

  it("decodes ASCII header bytes as text", () => {
    const bytes = new TextEncoder().encode("example.com");
    expect(
      reqHost(parseRequestTarget("/"), headers({ host: bytes }), "tcp", 80),
    ).toBe("example.com");
  });

  it("works with WHATWG Headers", () => {
    const h = new Headers({ Host: "example.net" });
    expect(reqHost(parseRequestTarget("/"), h, "tcp", 80)).toBe("example.net");
  });

  it("returns undefined when nothing names a host", () => {
    expect(reqHost(parseRequestTarget("/"), none, "tcp", 80)).toBeUndefined();
    expect(
      reqHost(parseRequestTarget("/"), new Headers(), "tls", 443),
    ).toBeUndefined();
  });
});
