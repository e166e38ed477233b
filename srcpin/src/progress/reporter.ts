import prettyBytes from "pretty-bytes";
import type { SourceKind } from "../types/references.js";
import type { LogFormat } from "../log/logger.js";

/** Progress of one task. A side channel only: nothing reads it back. */
export type TaskProgress = {
  start(): void;
  /** Declared download size; -1 when unknown. */
  total(bytes: number): void;
  advance(bytes: number): void;
  done(): void;
  fail(): void;
};

export type ProgressReporter = {
  task(kind: SourceKind, label: string): TaskProgress;
};

const NOOP_TASK: TaskProgress = {
  start: () => undefined,
  total: () => undefined,
  advance: () => undefined,
  done: () => undefined,
  fail: () => undefined,
};

export const noProgress: ProgressReporter = {
  task: () => NOOP_TASK,
};

export function truncateLeft(s: string, maxLen: number): string {
  if (maxLen <= 0) return "";
  if (s.length <= maxLen) return s;
  if (maxLen <= 3) return s.slice(0, maxLen);
  return "..." + s.slice(s.length - (maxLen - 3));
}

/**
 * Short display name for a reference. HTTP URLs show only the last path
 * segment so query-string credentials never reach the terminal.
 */
export function displayLabel(kind: SourceKind, original: string, maxLen = 40): string {
  let label = original;
  if (kind === "http") {
    try {
      const { pathname } = new URL(original);
      label = pathname.split("/").filter((p) => p.length > 0).pop() ?? "/";
    } catch {
      label = original;
    }
  }
  return truncateLeft(label, maxLen);
}

/**
 * One line per task state change: started, then finished or failed with the
 * byte count for downloads.
 */
export function createLineProgress(opts: {
  format?: LogFormat;
  write?: (line: string) => void;
} = {}): ProgressReporter {
  const format = opts.format ?? "human";
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));

  return {
    task(kind, label) {
      let declared = -1;
      let received = 0;
      const emit = (event: "started" | "done" | "failed") => {
        if (format === "jsonl") {
          write(JSON.stringify({ level: "info", code: "PROGRESS", kind, label, event, bytes: received, total: declared }));
          return;
        }
        let line = `${kind.padEnd(5)} ${label} ${event}`;
        if (event !== "started" && received > 0) {
          line += declared > 0 ? ` (${prettyBytes(received)} / ${prettyBytes(declared)})` : ` (${prettyBytes(received)})`;
        }
        write(line);
      };
      return {
        start: () => emit("started"),
        total: (bytes) => {
          declared = bytes;
        },
        advance: (bytes) => {
          received += bytes;
        },
        done: () => emit("done"),
        fail: () => emit("failed"),
      };
    },
  };
}
