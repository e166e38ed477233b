import { createHash } from "node:crypto";
import { AuthError, FatalError, errorMessage } from "../errors.js";
import type { ChecksumResult } from "../types/results.js";
import { assertCacheable } from "./cacheability.js";
import { extractVaryHeaders } from "./vary.js";

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Receives byte counts as the body streams in. */
export type ByteSink = (bytes: number) => void;

/** Called once a download starts, with the declared length (-1 when unknown). */
export type ProgressFactory = (declaredLength: number) => ByteSink;

export type StrategyContext = {
  url: URL;
  /** The literal URL; what errors and results report. */
  rawUrl: string;
  fetch: FetchFn;
  userAgent: string;
  githubApiUrl: string;
  githubToken?: string;
  /** Run-wide cancellation. */
  signal: AbortSignal;
  timeoutMs: number;
  progress?: ProgressFactory;
};

export type StrategyOutcome =
  | { status: "resolved"; result: ChecksumResult }
  | { status: "next"; reason: string };

/**
 * One way of obtaining a checksum. Returns "next" when it does not apply or
 * could not produce a usable sha256; throws when resolution must stop.
 */
export type ChecksumStrategy = (ctx: StrategyContext) => Promise<StrategyOutcome>;

const SHA256_HEX = /^[0-9a-fA-F]{64}$/;
const SHA256_DIGEST = /^sha256:[0-9a-f]{64}$/;
const STD_BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;
const URL_BASE64 = /^[A-Za-z0-9_-]+={0,2}$/;

function next(reason: string): StrategyOutcome {
  return { status: "next", reason };
}

function resolved(result: ChecksumResult): StrategyOutcome {
  return { status: "resolved", result };
}

function requestSignal(ctx: StrategyContext): AbortSignal {
  return AbortSignal.any([ctx.signal, AbortSignal.timeout(ctx.timeoutMs)]);
}

/** Throws when the run was cancelled, so a strategy never falls through after an abort. */
function throwIfAborted(ctx: StrategyContext, err?: unknown): void {
  if (ctx.signal.aborted) {
    throw new FatalError(`resolution of ${ctx.rawUrl} cancelled`, { cause: err ?? ctx.signal.reason });
  }
}

function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403;
}

/** Decode a base64 (standard, then URL-safe) SHA-256 value to hex. Null unless it is 32 bytes. */
export function decodeBase64ToHex(b64: string): string | null {
  const value = b64.trim();
  let buf: Buffer;
  if (STD_BASE64.test(value)) buf = Buffer.from(value, "base64");
  else if (URL_BASE64.test(value)) buf = Buffer.from(value, "base64url");
  else return null;
  return buf.length === 32 ? buf.toString("hex") : null;
}

/** `/owner/repo/releases/download/tag/asset` → its parts, or null. */
export function parseGitHubReleaseUrl(url: URL): { owner: string; repo: string; tag: string; asset: string } | null {
  if (url.hostname !== "github.com" || !url.pathname.includes("/releases/download/")) return null;
  const parts = url.pathname.replace(/^\//, "").split("/");
  if (parts.length < 6 || parts[2] !== "releases" || parts[3] !== "download") return null;
  let tag: string;
  let asset: string;
  try {
    tag = decodeURIComponent(parts[4]);
    asset = decodeURIComponent(parts.slice(5).join("/"));
  } catch {
    return null;
  }
  return { owner: parts[0], repo: parts[1], tag, asset };
}

type ReleaseAsset = { name: string; digest: string | null };

function readAssets(body: unknown): ReleaseAsset[] | null {
  if (typeof body !== "object" || body === null || !("assets" in body) || !Array.isArray(body.assets)) return null;
  const assets: ReleaseAsset[] = [];
  for (const item of body.assets) {
    if (typeof item !== "object" || item === null || !("name" in item) || typeof item.name !== "string") continue;
    const digest = "digest" in item && typeof item.digest === "string" ? item.digest : null;
    assets.push({ name: item.name, digest });
  }
  return assets;
}

/**
 * GitHub release assets: the releases API publishes a sha256 digest per asset,
 * so nothing needs downloading. A 404 is not taken as an auth signal: GitHub
 * answers 404 both for private releases and for missing tags.
 */
export const githubReleaseStrategy: ChecksumStrategy = async (ctx) => {
  const release = parseGitHubReleaseUrl(ctx.url);
  if (!release) return next("not a GitHub release download URL");

  const { owner, repo, tag, asset } = release;
  const apiUrl = `${ctx.githubApiUrl.replace(/\/+$/, "")}/repos/${owner}/${repo}/releases/tags/${encodeURIComponent(tag)}`;
  const headers = new Headers({
    "User-Agent": ctx.userAgent,
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
  });
  if (ctx.githubToken) headers.set("Authorization", `Bearer ${ctx.githubToken}`);

  let res: Response;
  try {
    res = await ctx.fetch(apiUrl, { method: "GET", headers, signal: requestSignal(ctx) });
  } catch (err) {
    throwIfAborted(ctx, err);
    return next(`GitHub API request failed: ${errorMessage(err)}`);
  }

  if (isAuthStatus(res.status)) {
    await res.body?.cancel();
    throw new AuthError(ctx.rawUrl, res.status);
  }
  if (res.status !== 200) {
    await res.body?.cancel();
    return next(`GitHub API request failed: HTTP ${res.status}`);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throwIfAborted(ctx, err);
    return next(`failed to decode GitHub API response: ${errorMessage(err)}`);
  }

  const assets = readAssets(body);
  if (!assets) return next("GitHub API response has no assets list");

  const match = assets.find((a) => a.name === asset && a.digest !== null);
  if (!match || match.digest === null) return next(`asset ${asset} not found or has no digest`);
  if (!SHA256_DIGEST.test(match.digest)) return next(`asset ${asset} digest is not sha256: ${match.digest}`);

  return resolved({ kind: "http", url: ctx.rawUrl, checksum: match.digest, headers: {} });
};

/**
 * HEAD request and server-supplied checksums: S3's x-amz-checksum-sha256
 * (asked for with x-amz-checksum-mode), or an ETag that is itself a sha256.
 * Cacheability is checked before any checksum is looked at.
 */
export const headChecksumStrategy: ChecksumStrategy = async (ctx) => {
  const reqHeaders = new Headers({
    "User-Agent": ctx.userAgent,
    "X-Amz-Checksum-Mode": "ENABLED",
  });

  let res: Response;
  try {
    res = await ctx.fetch(ctx.url, { method: "HEAD", headers: reqHeaders, signal: requestSignal(ctx) });
  } catch (err) {
    throwIfAborted(ctx, err);
    return next(`HEAD request failed: ${errorMessage(err)}`);
  }
  await res.body?.cancel();

  if (isAuthStatus(res.status)) throw new AuthError(ctx.rawUrl, res.status);
  if (res.status !== 200) return next(`HEAD request failed: HTTP ${res.status}`);

  assertCacheable(ctx.rawUrl, res.headers);

  let checksum: string;
  if (res.headers.get("server") === "AmazonS3") {
    const encoded = res.headers.get("x-amz-checksum-sha256");
    const hex = encoded ? decodeBase64ToHex(encoded) : null;
    if (!hex) return next("no SHA-256 checksum found in S3 headers");
    checksum = `sha256:${hex}`;
  } else {
    const etag = (res.headers.get("etag") ?? "").replace(/^"|"$/g, "");
    if (!SHA256_HEX.test(etag)) return next("no usable checksum found in headers");
    checksum = `sha256:${etag.toLowerCase()}`;
  }

  return resolved({
    kind: "http",
    url: ctx.rawUrl,
    checksum,
    headers: extractVaryHeaders(reqHeaders, res.headers),
  });
};

function declaredLength(headers: Headers): number {
  const encoding = headers.get("content-encoding");
  // The body is decoded on the way in, so a compressed length says nothing about it.
  if (encoding && encoding.toLowerCase() !== "identity") return -1;
  const raw = headers.get("content-length");
  if (raw === null || !/^\d+$/.test(raw.trim())) return -1;
  return Number.parseInt(raw.trim(), 10);
}

/** Download the body and hash it. Always the last strategy: it never returns "next". */
export const fullBodyStrategy: ChecksumStrategy = async (ctx) => {
  const reqHeaders = new Headers({ "User-Agent": ctx.userAgent });

  let res: Response;
  try {
    res = await ctx.fetch(ctx.url, { method: "GET", headers: reqHeaders, signal: requestSignal(ctx) });
  } catch (err) {
    throwIfAborted(ctx, err);
    throw new FatalError(`GET ${ctx.rawUrl} failed: ${errorMessage(err)}`, { cause: err });
  }

  if (isAuthStatus(res.status)) {
    await res.body?.cancel();
    throw new AuthError(ctx.rawUrl, res.status);
  }
  if (res.status !== 200) {
    await res.body?.cancel();
    throw new FatalError(`GET request failed: HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ""}`);
  }

  try {
    assertCacheable(ctx.rawUrl, res.headers);
  } catch (err) {
    await res.body?.cancel();
    throw err;
  }

  const declared = declaredLength(res.headers);
  const sink = ctx.progress?.(declared);
  const hash = createHash("sha256");
  let received = 0;
  let readError: unknown;

  if (res.body) {
    const reader = res.body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        hash.update(value);
        received += value.byteLength;
        sink?.(value.byteLength);
      }
    } catch (err) {
      readError = err;
    } finally {
      reader.releaseLock();
    }
  }

  if (readError !== undefined) throwIfAborted(ctx, readError);
  if (declared >= 0 && received !== declared) {
    throw new FatalError(`content length mismatch: server declared ${declared} bytes but sent ${received}`, {
      cause: readError,
    });
  }
  if (readError !== undefined) {
    throw new FatalError(`failed to read response body: ${errorMessage(readError)}`, { cause: readError });
  }

  return resolved({
    kind: "http",
    url: ctx.rawUrl,
    checksum: `sha256:${hash.digest("hex")}`,
    headers: extractVaryHeaders(reqHeaders, res.headers),
  });
};

/** The strategies in the order they are tried. */
export const DEFAULT_STRATEGIES: readonly ChecksumStrategy[] = [
  githubReleaseStrategy,
  headChecksumStrategy,
  fullBodyStrategy,
];
