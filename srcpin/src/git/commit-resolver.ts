import { simpleGit } from "simple-git";
import { FatalError, errorMessage } from "../errors.js";
import type { CommitResult } from "../types/results.js";
import { parseGitUrl } from "./remote-url.js";

/** The part of simple-git the resolver needs. */
export type LsRemoteClient = {
  listRemote(args: string[]): Promise<string>;
};

export type GitClientFactory = (opts: { signal: AbortSignal }) => LsRemoteClient;

export const DEFAULT_GIT_TIMEOUT_MS = 30_000;

const COMMIT_SHA = /^[0-9a-fA-F]{40}$/;

const defaultGitClient: GitClientFactory = ({ signal }) =>
  simpleGit({ abort: signal }).env({ ...process.env, GIT_TERMINAL_PROMPT: "0" });

/**
 * Pick the commit out of `git ls-remote` output. For annotated tags the
 * remote lists the tag object and then `<ref>^{}`, the commit it points to;
 * the tag object's own hash is not a commit, so the dereferenced line wins.
 */
export function selectCommit(output: string, ref: string): string {
  const lines = output.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
  if (lines.length === 0) {
    throw new FatalError(`no commit found for ref ${ref}`);
  }

  let commit = "";
  for (const line of lines) {
    const fields = line.split(/\s+/);
    if (fields.length < 2) continue;
    const [sha, refName] = fields;
    if (refName.endsWith("^{}")) {
      commit = sha;
      break;
    }
    if (commit === "") commit = sha;
  }

  if (commit === "") {
    throw new FatalError("unexpected git ls-remote output format");
  }
  if (commit.length !== 40) {
    throw new FatalError(`invalid commit SHA length: ${commit.length}`);
  }
  if (!COMMIT_SHA.test(commit)) {
    throw new FatalError("invalid commit SHA format: not hexadecimal");
  }
  return commit.toLowerCase();
}

/**
 * Resolves `<remote>#<ref>` to the 40-hex commit the ref points at, without
 * cloning.
 */
export class GitCommitResolver {
  private readonly createClient: GitClientFactory;
  private readonly defaultTimeoutMs: number;

  constructor(opts: { client?: GitClientFactory; defaultTimeoutMs?: number } = {}) {
    this.createClient = opts.client ?? defaultGitClient;
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
  }

  async resolve(rawUrl: string, opts: { signal?: AbortSignal; timeoutMs?: number } = {}): Promise<CommitResult> {
    const { remote, ref } = parseGitUrl(rawUrl);
    if (remote === "") throw new FatalError(`git URL has no remote: ${rawUrl}`);

    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

    let output: string;
    try {
      output = await this.createClient({ signal }).listRemote([remote, ref, `${ref}^{}`]);
    } catch (err) {
      if (opts.signal?.aborted) {
        throw new FatalError(`resolution of ${rawUrl} cancelled`, { cause: err });
      }
      if (timeout.aborted) {
        throw new FatalError(`git ls-remote ${remote} timed out after ${timeoutMs}ms`, { cause: err });
      }
      throw new FatalError(`git ls-remote failed: ${errorMessage(err)}`, { cause: err });
    }

    return { kind: "git", url: rawUrl, commit: selectCommit(output, ref) };
  }
}
