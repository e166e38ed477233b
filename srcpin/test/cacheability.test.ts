import { describe, expect, it } from "vitest";
import { assertCacheable, parseCacheControl, parseHttpDate, volatilityReason } from "../src/http/cacheability.js";
import { VolatileContentError } from "../src/errors.js";
import { extractVaryHeaders } from "../src/http/vary.js";

const NOW = Date.UTC(2026, 0, 15, 12, 0, 0);

function reason(headers: Record<string, string>): string | null {
  return volatilityReason(new Headers(headers), NOW);
}

describe("parseCacheControl", () => {
  it("reads the directives pinning cares about", () => {
    expect(parseCacheControl("public, max-age=600, s-maxage=60")).toEqual({
      noStore: false,
      noCache: false,
      private: false,
      maxAge: 600,
      sMaxAge: 60,
    });
    expect(parseCacheControl("private, no-cache")).toEqual({ noStore: false, noCache: true, private: true });
  });

  it("returns null when a lifetime is not delta-seconds", () => {
    expect(parseCacheControl("no-store, max-age=abc")).toBeNull();
    expect(parseCacheControl("public, s-maxage=-1")).toBeNull();
  });
});

describe("parseHttpDate", () => {
  it("parses the three HTTP date formats", () => {
    const expected = Date.UTC(1994, 10, 6, 8, 49, 37);
    expect(parseHttpDate("Sun, 06 Nov 1994 08:49:37 GMT")).toBe(expected);
    expect(parseHttpDate("Sunday, 06-Nov-94 08:49:37 GMT")).toBe(expected);
    expect(parseHttpDate("Sun Nov  6 08:49:37 1994")).toBe(expected);
  });

  it("returns null for anything else", () => {
    expect(parseHttpDate("0")).toBeNull();
    expect(parseHttpDate("1994-11-06T08:49:37Z")).toBeNull();
    expect(parseHttpDate("Sun, 06 Foo 1994 08:49:37 GMT")).toBeNull();
  });
});

describe("volatilityReason", () => {
  it("flags Pragma: no-cache", () => {
    expect(reason({ pragma: "no-cache" })).toBe("Pragma: no-cache");
  });

  it("flags no-store before no-cache", () => {
    expect(reason({ "cache-control": "no-cache, no-store" })).toBe("Cache-Control: no-store");
    expect(reason({ "cache-control": "no-cache" })).toBe("Cache-Control: no-cache");
  });

  it("uses s-maxage over max-age", () => {
    expect(reason({ "cache-control": "max-age=0, s-maxage=600" })).toBeNull();
    expect(reason({ "cache-control": "max-age=600, s-maxage=0" })).toBe("Cache-Control: max-age=0 (immediately stale)");
  });

  it("does not treat private or short lifetimes as volatile", () => {
    expect(reason({ "cache-control": "private, max-age=1" })).toBeNull();
  });

  it("ignores a malformed Cache-Control header", () => {
    expect(reason({ "cache-control": "no-store, max-age=abc" })).toBeNull();
  });

  it("flags Expires strictly before now", () => {
    expect(reason({ expires: "Thu, 15 Jan 2026 11:59:59 GMT" })).toBe("Expires header indicates already expired content");
    expect(reason({ expires: "Thu, 15 Jan 2026 12:00:00 GMT" })).toBeNull();
    expect(reason({ expires: "-1" })).toBeNull();
  });

  it("accepts responses with no caching headers", () => {
    expect(reason({})).toBeNull();
  });
});

describe("assertCacheable", () => {
  it("throws VolatileContentError carrying the reason", () => {
    expect(() => assertCacheable("https://example.com/a", new Headers({ "cache-control": "no-store" }), NOW)).toThrow(
      new VolatileContentError("https://example.com/a", "Cache-Control: no-store"),
    );
  });
});

describe("extractVaryHeaders", () => {
  const request = new Headers({ "User-Agent": "srcpin/0.1.0", Accept: "application/octet-stream" });

  it("keeps the sent headers the response varies by", () => {
    expect(extractVaryHeaders(request, new Headers({ vary: "Accept, Accept-Encoding" }))).toEqual({
      accept: "application/octet-stream",
    });
  });

  it("keeps nothing for Vary: * or no Vary", () => {
    expect(extractVaryHeaders(request, new Headers({ vary: "*" }))).toEqual({});
    expect(extractVaryHeaders(request, new Headers())).toEqual({});
  });

  it("skips names that are not header tokens", () => {
    expect(extractVaryHeaders(request, new Headers({ vary: "User Agent, user-agent" }))).toEqual({
      "user-agent": "srcpin/0.1.0",
    });
  });
});
