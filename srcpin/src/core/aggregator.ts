import {
  addGitChecksumRule,
  addHttpChecksumRule,
  addPinRule,
  newPolicy,
  type Policy,
} from "../policy/policy.js";
import type { ChecksumResult, CommitResult, PinResult, ResolutionResult } from "../types/results.js";

type Indexed<T> = { orderIndex: number; result: T };

function byOrder<T>(a: Indexed<T>, b: Indexed<T>): number {
  return a.orderIndex - b.orderIndex;
}

/**
 * Buckets results as tasks finish, in whatever order that happens, and turns
 * them into a policy ordered by each task's collector index.
 *
 * `add` runs to completion on the event loop, so concurrent tasks never
 * interleave inside it.
 */
export class ResultAggregator {
  private readonly images: Indexed<PinResult>[] = [];
  private readonly http: Indexed<ChecksumResult>[] = [];
  private readonly git: Indexed<CommitResult>[] = [];

  add(orderIndex: number, result: ResolutionResult): void {
    switch (result.kind) {
      case "image":
        this.images.push({ orderIndex, result });
        break;
      case "http":
        this.http.push({ orderIndex, result });
        break;
      case "git":
        this.git.push({ orderIndex, result });
        break;
    }
  }

  count(): number {
    return this.images.length + this.http.length + this.git.length;
  }

  /** Image rules first, then HTTP, then git; each group in collector order. */
  buildPolicy(): Policy {
    const policy = newPolicy();
    for (const { result } of [...this.images].sort(byOrder)) {
      addPinRule(policy, result.original, result.pinned);
    }
    for (const { result } of [...this.http].sort(byOrder)) {
      addHttpChecksumRule(policy, result.url, result.checksum, result.headers);
    }
    for (const { result } of [...this.git].sort(byOrder)) {
      addGitChecksumRule(policy, result.url, result.commit);
    }
    return policy;
  }
}
