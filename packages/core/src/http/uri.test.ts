import { describe, it, expect } from "vitest";
import { parseAuthority, parseRequestTarget } from "./uri.js";

describe("parseAuthority", () => {
  it("splits host and port", () => {
    expect(parseAuthority("example.com:8080")).toEqual({
      raw: "example.com:8080",
      host: "example.com",
      port: 8080,
    });
  });

  it("host without port", () => {
    expect(parseAuthority("example.com")).toEqual({
      raw: "example.com",
      host: "example.com",
    });
  });

  it("strips userinfo from host but not from raw", () => {
    expect(parseAuthority("user:pw@example.com:81")).toEqual({
      raw: "user:pw@example.com:81",
      host: "example.com",
      port: 81,
    });
  });

  it("keeps IPv6 brackets", () => {
    expect(parseAuthority("[::1]:8080")).toEqual({
      raw: "[::1]:8080",
      host: "[::1]",
      port: 8080,
    });
    expect(parseAuthority("[2001:db8::1]")).toEqual({
      raw: "[2001:db8::1]",
      host: "[2001:db8::1]",
    });
  });

  it("leaves an unparsable port in the host", () => {
    expect(parseAuthority("example.com:http")).toEqual({
      raw: "example.com:http",
      host: "example.com:http",
    });
    expect(parseAuthority("example.com:99999")).toEqual({
      raw: "example.com:99999",
      host: "example.com:99999",
    });
  });

  it("empty host is allowed", () => {
    expect(parseAuthority(":80")).toEqual({ raw: ":80", host: "", port: 80 });
  });
});

describe("parseRequestTarget", () => {
  it("origin-form has no authority", () => {
    expect(parseRequestTarget("/a/b?c=1")).toEqual({ path: "/a/b?c=1" });
  });

  it("asterisk-form has no authority", () => {
    expect(parseRequestTarget("*")).toEqual({ path: "*" });
  });

  it("absolute-form yields authority and path", () => {
    expect(parseRequestTarget("http://example.com:8080/x?y")).toEqual({
      authority: { raw: "example.com:8080", host: "example.com", port: 8080 },
      path: "/x?y",
    });
  });

  it("absolute-form without a path defaults to /", () => {
    expect(parseRequestTarget("https://example.com")).toEqual({
      authority: { raw: "example.com", host: "example.com" },
      path: "/",
    });
  });

  it("absolute-form with only a query gets a leading slash", () => {
    expect(parseRequestTarget("http://example.com?q=1")).toEqual({
      authority: { raw: "example.com", host: "example.com" },
      path: "/?q=1",
    });
  });

  it("authority-form has an empty path", () => {
    expect(parseRequestTarget("example.com:443")).toEqual({
      authority: { raw: "example.com:443", host: "example.com", port: 443 },
      path: "",
    });
  });
});
