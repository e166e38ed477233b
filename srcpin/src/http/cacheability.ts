import { parse } from "@tusbar/cache-control";
import { VolatileContentError } from "../errors.js";

export type CacheControl = {
  noStore: boolean;
  noCache: boolean;
  private: boolean;
  maxAge?: number;
  sMaxAge?: number;
};

function seconds(value: number | null | undefined): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function hasDirective(header: string, name: string): boolean {
  return new RegExp(`(?:^|,)\\s*${name}\\s*=`, "i").test(header);
}

/**
 * Read the directives pinning cares about from a response Cache-Control header.
 * Returns null when the header is malformed: the parser rejects it, or a
 * lifetime is present but not a delta-seconds value.
 */
export function parseCacheControl(header: string): CacheControl | null {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(header);
  } catch {
    return null;
  }
  const maxAge = seconds(parsed.maxAge);
  const sMaxAge = seconds(parsed.sharedMaxAge);
  if ((maxAge === undefined && hasDirective(header, "max-age")) || (sMaxAge === undefined && hasDirective(header, "s-maxage"))) {
    return null;
  }
  return {
    noStore: parsed.noStore === true,
    noCache: parsed.noCache === true,
    private: parsed.private === true,
    maxAge,
    sMaxAge,
  };
}

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

// IMF-fixdate: Sun, 06 Nov 1994 08:49:37 GMT
const IMF_FIXDATE = /^[A-Za-z]{3}, (\d{2}) ([A-Za-z]{3}) (\d{4}) (\d{2}):(\d{2}):(\d{2}) GMT$/;
// RFC 850: Sunday, 06-Nov-94 08:49:37 GMT
const RFC850_DATE = /^[A-Za-z]+, (\d{2})-([A-Za-z]{3})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) GMT$/;
// asctime: Sun Nov  6 08:49:37 1994
const ASCTIME_DATE = /^[A-Za-z]{3} ([A-Za-z]{3}) ([ \d]\d) (\d{2}):(\d{2}):(\d{2}) (\d{4})$/;

function utc(year: number, month: string, day: number, h: string, m: string, s: string): number | null {
  const monthIndex = MONTHS.indexOf(month.toLowerCase());
  if (monthIndex === -1) return null;
  const ms = Date.UTC(year, monthIndex, day, Number(h), Number(m), Number(s));
  return Number.isNaN(ms) ? null : ms;
}

/** Parse the three date formats HTTP allows. Anything else yields null. */
export function parseHttpDate(value: string): number | null {
  const v = value.trim();

  let m = IMF_FIXDATE.exec(v);
  if (m) return utc(Number(m[3]), m[2], Number(m[1]), m[4], m[5], m[6]);

  m = RFC850_DATE.exec(v);
  if (m) {
    // Two-digit years: 70-99 are 19xx, the rest 20xx.
    const yy = Number(m[3]);
    return utc(yy >= 70 ? 1900 + yy : 2000 + yy, m[2], Number(m[1]), m[4], m[5], m[6]);
  }

  m = ASCTIME_DATE.exec(v);
  if (m) return utc(Number(m[6]), m[1], Number(m[2].trim()), m[3], m[4], m[5]);

  return null;
}

/**
 * Decide whether a response's caching headers rule out pinning.
 * Returns the reason, or null when the content may be pinned.
 *
 * `private` and short non-zero lifetimes are not signals: they describe cache
 * scope and CDN freshness, not content that changes.
 */
export function volatilityReason(headers: Headers, now: number = Date.now()): string | null {
  const pragma = headers.get("pragma");
  if (pragma && pragma.toLowerCase().includes("no-cache")) {
    return "Pragma: no-cache";
  }

  const cacheControl = headers.get("cache-control");
  if (cacheControl) {
    const cc = parseCacheControl(cacheControl);
    if (cc) {
      if (cc.noStore) return "Cache-Control: no-store";
      if (cc.noCache) return "Cache-Control: no-cache";

      const effectiveMaxAge = cc.sMaxAge ?? cc.maxAge;
      if (effectiveMaxAge === 0) {
        return "Cache-Control: max-age=0 (immediately stale)";
      }
    }
  }

  const expires = headers.get("expires");
  if (expires) {
    const at = parseHttpDate(expires);
    if (at !== null && at < now) {
      return "Expires header indicates already expired content";
    }
  }

  return null;
}

export function assertCacheable(url: string, headers: Headers, now?: number): void {
  const reason = volatilityReason(headers, now);
  if (reason) throw new VolatileContentError(url, reason);
}
