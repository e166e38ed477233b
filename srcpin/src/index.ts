export { TaskCollector } from "./core/collector.js";
export { ResultAggregator } from "./core/aggregator.js";
export { PinOrchestrator, type Resolvers, type RunOutcome, type RunError, type SkippedReference } from "./core/orchestrator.js";
export { nextRunState, isTerminal, type RunState, type RunEvent } from "./core/state-machine.js";
export { AuthError, VolatileContentError, FatalError, PinError, classifyError, isSkippable, type ErrorKind } from "./errors.js";
export { HttpChecksumClient, type HttpChecksumClientOptions } from "./http/client.js";
export {
  DEFAULT_STRATEGIES,
  githubReleaseStrategy,
  headChecksumStrategy,
  fullBodyStrategy,
  type ChecksumStrategy,
  type FetchFn,
  type StrategyContext,
  type StrategyOutcome,
} from "./http/strategies.js";
export { volatilityReason, parseCacheControl } from "./http/cacheability.js";
export { extractVaryHeaders } from "./http/vary.js";
export { GitCommitResolver, selectCommit, type GitClientFactory } from "./git/commit-resolver.js";
export { parseGitUrl, type GitRemoteRef } from "./git/remote-url.js";
export { ImageResolver } from "./image/resolver.js";
export { parseImageReference, formatImageReference, hasDigest, type ImageName } from "./image/reference.js";
export { mapToMirror, MIRRORS, type MirrorName } from "./image/mirrors.js";
export { CraneRegistryClient, RegistryLookupError, type RegistryClient } from "./registry/client.js";
export {
  newPolicy,
  addPinRule,
  addHttpChecksumRule,
  addGitChecksumRule,
  serializePolicy,
  type Policy,
  type Rule,
} from "./policy/policy.js";
export { loadReferences, toManifestReferences, type ReferencesDocument } from "./input/references.js";
export { createLogger, createMemoryLogger, type Logger, type Diagnostic } from "./log/logger.js";
export { createLineProgress, noProgress, type ProgressReporter, type TaskProgress } from "./progress/reporter.js";
export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { pin, type PinOptions, type PinDeps, type PinCommandResult } from "./commands/pin.js";
export type * from "./types/references.js";
export type * from "./types/results.js";
export type { SrcpinConfig } from "./types/config.js";
