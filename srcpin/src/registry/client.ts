import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { FatalError, errorMessage } from "../errors.js";

const pExecFile = promisify(execFile);

export type LookupFailure = "not_found" | "unauthorized" | "other";

/** A failed manifest lookup. `reason` lets mirror lookups fall back. */
export class RegistryLookupError extends FatalError {
  constructor(
    readonly image: string,
    readonly reason: LookupFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Turns an image reference into its manifest digest. The wire protocol lives behind this. */
export type RegistryClient = {
  getDigest(image: string, opts?: { signal?: AbortSignal }): Promise<string>;
};

export type ExecFn = (
  file: string,
  args: string[],
  opts: { signal?: AbortSignal },
) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFn = async (file, args, opts) => {
  const { stdout, stderr } = await pExecFile(file, args, { signal: opts.signal, encoding: "utf8", maxBuffer: 1024 * 1024 });
  return { stdout, stderr };
};

const NOT_FOUND = /MANIFEST_UNKNOWN|NAME_UNKNOWN|NOT_FOUND|not found|status code 404\b/i;
const UNAUTHORIZED = /UNAUTHORIZED|DENIED|authentication required|status code 40[13]\b/i;

export function classifyLookupFailure(stderr: string): LookupFailure {
  if (UNAUTHORIZED.test(stderr)) return "unauthorized";
  if (NOT_FOUND.test(stderr)) return "not_found";
  return "other";
}

function stderrOf(err: unknown): string {
  if (typeof err === "object" && err !== null && "stderr" in err && typeof err.stderr === "string") return err.stderr;
  return "";
}

/**
 * Registry client backed by `crane digest`, which speaks the distribution
 * protocol and reads the usual docker credential helpers.
 */
export class CraneRegistryClient implements RegistryClient {
  private readonly bin: string;
  private readonly exec: ExecFn;

  constructor(opts: { bin?: string; exec?: ExecFn } = {}) {
    this.bin = opts.bin ?? "crane";
    this.exec = opts.exec ?? defaultExec;
  }

  async getDigest(image: string, opts: { signal?: AbortSignal } = {}): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.bin, ["digest", image], { signal: opts.signal }));
    } catch (err) {
      const stderr = stderrOf(err).trim();
      const detail = stderr || errorMessage(err);
      throw new RegistryLookupError(image, classifyLookupFailure(detail), `failed to get digest for ${image}: ${detail}`, {
        cause: err,
      });
    }
    return stdout.trim();
  }
}
