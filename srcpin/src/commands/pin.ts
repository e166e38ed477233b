import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { TaskCollector } from "../core/collector.js";
import { PinOrchestrator, type SkippedReference } from "../core/orchestrator.js";
import { errorMessage } from "../errors.js";
import { GitCommitResolver, type GitClientFactory } from "../git/commit-resolver.js";
import { HttpChecksumClient } from "../http/client.js";
import type { FetchFn } from "../http/strategies.js";
import type { MirrorName } from "../image/mirrors.js";
import { ImageResolver } from "../image/resolver.js";
import { loadReferences } from "../input/references.js";
import { createLogger, diag, type Diagnostic, type LogFormat, type Logger } from "../log/logger.js";
import { serializePolicy, type Policy } from "../policy/policy.js";
import { createLineProgress, noProgress } from "../progress/reporter.js";
import { CraneRegistryClient, type RegistryClient } from "../registry/client.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type PinOptions = {
  references: string[];
  output?: string;
  stdout?: boolean;
  /** Overrides `registry.prefer` from config. */
  prefer?: MirrorName;
  configDir?: string;
  envName?: string;
  format?: LogFormat;
  progress?: boolean;
  signal?: AbortSignal;
};

/** Seams for tests: everything that would reach outside the process. */
export type PinDeps = {
  fetch?: FetchFn;
  gitClient?: GitClientFactory;
  registry?: RegistryClient;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  schemaDir?: string;
  writeStdout?: (text: string) => void;
  writeStderr?: (line: string) => void;
};

export type PinCommandResult =
  | { ok: true; policy: Policy; resolved: number; skipped: SkippedReference[]; outputPath: string | null }
  | { ok: false; exitCode: ExitCode; errors: Diagnostic[] };

function fail(exitCode: ExitCode, errors: Diagnostic[]): PinCommandResult {
  return { ok: false, exitCode, errors };
}

/**
 * Resolve every reference in the given documents and write the policy.
 * Diagnostics go to the logger; the policy goes to the output file or stdout.
 */
export async function pin(opts: PinOptions, deps: PinDeps = {}): Promise<PinCommandResult> {
  if (opts.references.length === 0) {
    return fail(EXIT.INVALID_ARGS, [diag("error", "NO_REFERENCES", "at least one references file is required")]);
  }
  if (opts.output && opts.stdout) {
    return fail(EXIT.INVALID_ARGS, [diag("error", "OUTPUT_CONFLICT", "--output and --stdout cannot be used together")]);
  }

  let rawConfig: Record<string, unknown>;
  try {
    rawConfig = loadConfig({ envName: opts.envName, configDir: opts.configDir, env: deps.env });
  } catch (e) {
    return fail(EXIT.INVALID_INPUT, [diag("error", "CONFIG_READ_FAILED", `Failed to load config: ${errorMessage(e)}`)]);
  }
  const checked = await validateConfig(rawConfig);
  if (!checked.valid) {
    return fail(EXIT.INVALID_INPUT, [diag("error", "CONFIG_INVALID", `Config invalid: ${checked.errors}`)]);
  }
  const config = checked.config;

  const format = opts.format ?? "human";
  const logger = deps.logger ?? createLogger({ format, level: config.log.level, write: deps.writeStderr });

  let schemas: SchemaRegistry;
  try {
    schemas = await createRegistry(deps.schemaDir);
  } catch (e) {
    return fail(EXIT.INVALID_INPUT, [diag("error", "SCHEMA_DIR_MISSING", errorMessage(e))]);
  }
  const loaded = await loadReferences(opts.references, schemas);
  if (!loaded.ok) return fail(EXIT.INVALID_INPUT, loaded.errors);

  const collector = new TaskCollector();
  for (const manifest of loaded.manifests) collector.collect(manifest);

  const preferred = opts.prefer ?? (config.registry.prefer === "none" ? undefined : config.registry.prefer);
  const orchestrator = new PinOrchestrator({
    resolvers: {
      image: new ImageResolver({
        registry: deps.registry ?? new CraneRegistryClient({ bin: config.registry.crane_bin }),
        prefer: preferred,
        logger,
      }),
      http: new HttpChecksumClient({
        fetch: deps.fetch,
        githubApiUrl: config.http.github_api_url,
        githubToken: config.github?.token,
        timeoutMs: config.http.timeout_ms,
        logger,
      }),
      git: new GitCommitResolver({ client: deps.gitClient, defaultTimeoutMs: config.git.timeout_ms }),
    },
    logger,
    progress: opts.progress ? createLineProgress({ format, write: deps.writeStderr }) : noProgress,
  });

  if (collector.isEmpty()) {
    logger.info("NOTHING_TO_PIN", "no references need pinning");
  }

  const outcome = await orchestrator.run(collector.tasks(), { signal: opts.signal });
  if (!outcome.ok) {
    const { message, ...details } = outcome.error;
    return fail(EXIT.RESOLUTION_FAILED, [diag("error", "RUN_ABORTED", message, { details })]);
  }

  const text = serializePolicy(outcome.policy);
  let outputPath: string | null = null;
  if (opts.output) {
    outputPath = path.resolve(opts.output);
    try {
      fs.writeFileSync(outputPath, text, "utf8");
    } catch (e) {
      return fail(EXIT.RESOLUTION_FAILED, [
        diag("error", "OUTPUT_WRITE_FAILED", `Failed to write policy: ${errorMessage(e)}`, { path: outputPath }),
      ]);
    }
  } else {
    (deps.writeStdout ?? ((t: string) => process.stdout.write(t)))(text);
  }

  logger.info("POLICY_WRITTEN", `pinned ${outcome.resolved} reference(s), skipped ${outcome.skipped.length}`, {
    resolved: outcome.resolved,
    skipped: outcome.skipped.length,
    output: outputPath ?? "stdout",
  });

  return { ok: true, policy: outcome.policy, resolved: outcome.resolved, skipped: outcome.skipped, outputPath };
}
