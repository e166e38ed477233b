import { classifyError, type PinError } from "../errors.js";
import { silentLogger, type Logger } from "../log/logger.js";
import type { Policy } from "../policy/policy.js";
import { displayLabel, noProgress, type ProgressReporter, type TaskProgress } from "../progress/reporter.js";
import type { ProgressFactory } from "../http/strategies.js";
import type { SourceKind, Task, TaskSet } from "../types/references.js";
import type { ChecksumResult, CommitResult, PinResult, ResolutionResult } from "../types/results.js";
import { ResultAggregator } from "./aggregator.js";
import { nextRunState, type RunState } from "./state-machine.js";

export type ImageResolverLike = {
  resolve(original: string, opts: { signal?: AbortSignal }): Promise<PinResult>;
};

export type HttpResolverLike = {
  resolve(url: string, opts: { signal?: AbortSignal; progress?: ProgressFactory }): Promise<ChecksumResult>;
};

export type GitResolverLike = {
  resolve(url: string, opts: { signal?: AbortSignal }): Promise<CommitResult>;
};

export type Resolvers = {
  image: ImageResolverLike;
  http: HttpResolverLike;
  git: GitResolverLike;
};

/** A reference left out of the policy, with the reason it was skipped. */
export type SkippedReference = {
  kind: SourceKind;
  reference: string;
  reason: "auth" | "volatile";
  message: string;
};

export type RunOutcome =
  | { ok: true; state: "completed"; policy: Policy; resolved: number; skipped: SkippedReference[] }
  | { ok: false; state: "aborted"; error: RunError };

/**
 * Why a run was aborted. `RESOLUTION_FAILED` names the first reference that
 * failed; `CANCELLED` means the caller's signal fired before any task failed, including
 * while tasks were still in flight.
 */
export type RunError =
  | { code: "RESOLUTION_FAILED"; message: string; reference: string; kind: SourceKind }
  | { code: "CANCELLED"; message: string };

const FAILURE_PREFIX: Record<SourceKind, string> = {
  image: "failed to pin image",
  http: "failed to get checksum for",
  git: "failed to get commit checksum for",
};

type Fatal = { kind: SourceKind; reference: string; error: PinError };

/**
 * Runs every task concurrently, one async unit per task.
 *
 * Skippable failures (authentication, volatile content) are logged and left
 * out of the policy. The first fatal failure aborts the run's shared signal;
 * units not yet started return without doing I/O and in-flight requests are
 * cancelled. The outcome is reported only after every unit has settled.
 */
export class PinOrchestrator {
  private readonly resolvers: Resolvers;
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;
  private current: RunState = "collecting";

  constructor(opts: { resolvers: Resolvers; logger?: Logger; progress?: ProgressReporter }) {
    this.resolvers = opts.resolvers;
    this.logger = opts.logger ?? silentLogger;
    this.progress = opts.progress ?? noProgress;
  }

  get state(): RunState {
    return this.current;
  }

  async run(tasks: TaskSet, opts: { signal?: AbortSignal } = {}): Promise<RunOutcome> {
    if (this.current !== "collecting") {
      throw new Error(`orchestrator already ran (state: ${this.current})`);
    }

    const controller = new AbortController();
    const onExternalAbort = () => controller.abort(opts.signal?.reason);
    if (opts.signal?.aborted) controller.abort(opts.signal.reason);
    else opts.signal?.addEventListener("abort", onExternalAbort, { once: true });

    const aggregator = new ResultAggregator();
    const skipped: SkippedReference[] = [];
    const fatals: Fatal[] = [];

    const unit = async (
      kind: SourceKind,
      task: Task,
      work: (signal: AbortSignal, progress: TaskProgress) => Promise<ResolutionResult>,
    ): Promise<void> => {
      const signal = controller.signal;
      if (signal.aborted) return;

      const reference = task.reference.original;
      const progress = this.progress.task(kind, displayLabel(kind, reference));
      progress.start();
      try {
        const result = await work(signal, progress);
        aggregator.add(task.orderIndex, result);
        progress.done();
        this.logger.debug("RESOLVED", `${reference} resolved`, { kind, reference });
      } catch (err) {
        progress.fail();
        // Failures after the run was aborted come from the abort itself.
        if (signal.aborted) return;
        const error = classifyError(err);
        switch (error.kind) {
          case "auth":
            this.logger.warn("SKIPPED_AUTH", `skipping ${reference}: ${error.message}`, { kind, reference });
            skipped.push({ kind, reference, reason: "auth", message: error.message });
            return;
          case "volatile":
            this.logger.warn("SKIPPED_VOLATILE", `skipping ${reference}: ${error.message}`, { kind, reference });
            skipped.push({ kind, reference, reason: "volatile", message: error.message });
            return;
          case "fatal":
            fatals.push({ kind, reference, error });
            if (fatals.length === 1) controller.abort(error);
            this.current = nextRunState(this.current, "fatal");
            return;
        }
      }
    };

    const units: Promise<void>[] = [];
    this.current = nextRunState(this.current, "dispatch");
    for (const task of tasks.images) {
      units.push(unit("image", task, (signal) => this.resolvers.image.resolve(task.reference.original, { signal })));
    }
    for (const task of tasks.http) {
      units.push(
        unit("http", task, (signal, progress) =>
          this.resolvers.http.resolve(task.reference.original, {
            signal,
            progress: (declared) => {
              progress.total(declared);
              return (bytes) => progress.advance(bytes);
            },
          }),
        ),
      );
    }
    for (const task of tasks.git) {
      units.push(unit("git", task, (signal) => this.resolvers.git.resolve(task.reference.original, { signal })));
    }

    try {
      await Promise.all(units);
    } finally {
      opts.signal?.removeEventListener("abort", onExternalAbort);
    }

    const fatal = fatals.at(0);
    // An external abort with no task failing still ends the run.
    if (!fatal && controller.signal.aborted) {
      this.current = nextRunState(this.current, "fatal");
    }
    this.current = nextRunState(this.current, "settled");

    if (this.current === "aborted") {
      const error: RunError = fatal
        ? {
            code: "RESOLUTION_FAILED",
            message: `${FAILURE_PREFIX[fatal.kind]} ${fatal.reference}: ${fatal.error.message}`,
            reference: fatal.reference,
            kind: fatal.kind,
          }
        : { code: "CANCELLED", message: "run cancelled" };
      return { ok: false, state: "aborted", error };
    }

    return {
      ok: true,
      state: "completed",
      policy: aggregator.buildPolicy(),
      resolved: aggregator.count(),
      skipped,
    };
  }
}
