export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "human" | "jsonl";

/** One log record. Also the shape of every `--format jsonl` line. */
export type Diagnostic = {
  level: LogLevel;
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type Logger = {
  debug(code: string, message: string, details?: Record<string, unknown>): void;
  info(code: string, message: string, details?: Record<string, unknown>): void;
  warn(code: string, message: string, details?: Record<string, unknown>): void;
  error(code: string, message: string, details?: Record<string, unknown>): void;
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function diag(
  level: LogLevel,
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function formatDiagnostic(d: Diagnostic, format: LogFormat): string {
  if (format === "jsonl") return JSON.stringify(d);
  return `${d.level}: ${d.message}`;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_PRIORITY;
}

/** Build a logger over any record sink. Records below `level` are dropped. */
export function loggerFromSink(sink: (d: Diagnostic) => void, level: LogLevel = "info"): Logger {
  const min = LEVEL_PRIORITY[level];
  const emit = (lvl: LogLevel) => (code: string, message: string, details?: Record<string, unknown>) => {
    if (LEVEL_PRIORITY[lvl] < min) return;
    sink(details ? diag(lvl, code, message, { details }) : diag(lvl, code, message));
  };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/** Logger writing one line per record, to stderr unless told otherwise. */
export function createLogger(opts: {
  format?: LogFormat;
  level?: LogLevel;
  write?: (line: string) => void;
} = {}): Logger {
  const format = opts.format ?? "human";
  const write = opts.write ?? ((line: string) => process.stderr.write(line + "\n"));
  return loggerFromSink((d) => write(formatDiagnostic(d, format)), opts.level ?? "info");
}

export type MemoryLogger = Logger & { records: Diagnostic[] };

/** Keeps every record in memory. */
export function createMemoryLogger(level: LogLevel = "debug"): MemoryLogger {
  const records: Diagnostic[] = [];
  return Object.assign(loggerFromSink((d) => records.push(d), level), { records });
}

export const silentLogger: Logger = loggerFromSink(() => undefined, "error");
