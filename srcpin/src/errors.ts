export type ErrorKind = "auth" | "volatile" | "fatal";

/**
 * Base class for every error a resolver raises on purpose.
 * `kind` decides whether the orchestrator skips the reference or aborts the run.
 */
export abstract class PinError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The resource needs credentials the tool does not have. */
export class AuthError extends PinError {
  readonly kind = "auth";

  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`authentication required for ${url} (HTTP ${status})`);
  }
}

/** The serving headers say the content must not be cached, so a pin would not hold. */
export class VolatileContentError extends PinError {
  readonly kind = "volatile";

  constructor(
    readonly url: string,
    readonly reason: string,
  ) {
    super(`volatile content at ${url} (${reason})`);
  }
}

export class FatalError extends PinError {
  readonly kind = "fatal";
}

export function isSkippable(err: unknown): err is AuthError | VolatileContentError {
  return err instanceof AuthError || err instanceof VolatileContentError;
}

/** Map anything thrown to a classified error. Unknown values are fatal. */
export function classifyError(err: unknown): PinError {
  if (err instanceof PinError) return err;
  if (err instanceof Error) return new FatalError(err.message, { cause: err });
  return new FatalError(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
