import { FatalError } from "../errors.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { ChecksumResult } from "../types/results.js";
import { userAgent } from "../version.js";
import {
  DEFAULT_STRATEGIES,
  type ChecksumStrategy,
  type FetchFn,
  type ProgressFactory,
  type StrategyContext,
} from "./strategies.js";

export type HttpChecksumClientOptions = {
  fetch?: FetchFn;
  strategies?: readonly ChecksumStrategy[];
  githubApiUrl?: string;
  /** Raises the releases API rate limit; never needed for correctness. */
  githubToken?: string;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
};

export const DEFAULT_HTTP_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Resolves an HTTP(S) URL to a sha256 checksum, trying the cheapest strategy
 * first. Stateless apart from its options, so one instance serves every task.
 */
export class HttpChecksumClient {
  private readonly fetchFn: FetchFn;
  private readonly strategies: readonly ChecksumStrategy[];
  private readonly githubApiUrl: string;
  private readonly githubToken?: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(opts: HttpChecksumClientOptions = {}) {
    this.fetchFn = opts.fetch ?? ((input, init) => fetch(input, init));
    this.strategies = opts.strategies ?? DEFAULT_STRATEGIES;
    this.githubApiUrl = opts.githubApiUrl ?? "https://api.github.com";
    this.githubToken = opts.githubToken || undefined;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.userAgent = opts.userAgent ?? userAgent();
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Resolve `rawUrl`. Rejects with AuthError or VolatileContentError when the
   * reference should be skipped, FatalError otherwise.
   */
  async resolve(rawUrl: string, opts: { signal?: AbortSignal; progress?: ProgressFactory } = {}): Promise<ChecksumResult> {
    let url: URL;
    try {
      url = new URL(rawUrl);
    } catch (err) {
      throw new FatalError(`invalid URL: ${rawUrl}`, { cause: err });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new FatalError(`unsupported URL scheme ${url.protocol} in ${rawUrl}`);
    }

    const ctx: StrategyContext = {
      url,
      rawUrl,
      fetch: this.fetchFn,
      userAgent: this.userAgent,
      githubApiUrl: this.githubApiUrl,
      githubToken: this.githubToken,
      signal: opts.signal ?? new AbortController().signal,
      timeoutMs: this.timeoutMs,
      progress: opts.progress,
    };

    for (const strategy of this.strategies) {
      if (ctx.signal.aborted) {
        throw new FatalError(`resolution of ${rawUrl} cancelled`, { cause: ctx.signal.reason });
      }
      const outcome = await strategy(ctx);
      if (outcome.status === "resolved") {
        this.logger.debug("CHECKSUM_STRATEGY", `${rawUrl}: resolved by ${strategy.name}`, { url: rawUrl, strategy: strategy.name });
        return outcome.result;
      }
      this.logger.debug("CHECKSUM_STRATEGY_NEXT", `${rawUrl}: ${strategy.name} skipped (${outcome.reason})`, {
        url: rawUrl,
        strategy: strategy.name,
        reason: outcome.reason,
      });
    }

    throw new FatalError(`no checksum strategy could resolve ${rawUrl}`);
  }
}
