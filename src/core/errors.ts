/**
 * Error taxonomy.
 *
 * Everything the engine throws on purpose is an EngineError with a
 * stable code. The HTTP layer maps codes to status + message; the
 * message shown to the user never includes internal detail.
 */

export type ErrorCode =
  | 'permission_denied'
  | 'unknown_provider'
  | 'prompt_too_long'
  | 'blocked_by_force_mode'
  | 'not_found'
  | 'invalid_input'
  | 'persistence_error'
  | 'upstream_unavailable';

export abstract class EngineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: 400 | 403 | 404 | 409 | 500 | 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** What the caller sees. Subclasses with internal detail override this. */
  get publicMessage(): string {
    return this.message;
  }
}

export class PermissionDenied extends EngineError {
  readonly code = 'permission_denied';
  readonly status = 403;

  constructor() {
    super('Permission denied');
  }
}

export class UnknownProvider extends EngineError {
  readonly code = 'unknown_provider';
  readonly status = 400;

  constructor(readonly candidate: string) {
    super(`Unknown provider: ${candidate}`);
  }
}

export class PromptTooLong extends EngineError {
  readonly code = 'prompt_too_long';
  readonly status = 400;

  constructor(readonly length: number, readonly max: number) {
    super(`System prompt is too long (${length} > ${max} characters)`);
  }
}

export class BlockedByForceMode extends EngineError {
  readonly code = 'blocked_by_force_mode';
  readonly status = 409;

  constructor() {
    super('The default system prompt is currently enforced by an administrator');
  }
}

/** Same message whether the record is missing or belongs to someone else. */
export class NotFound extends EngineError {
  readonly code = 'not_found';
  readonly status = 404;

  constructor() {
    super('Not found');
  }
}

export class InvalidInput extends EngineError {
  readonly code = 'invalid_input';
  readonly status = 400;
}

export class PersistenceError extends EngineError {
  readonly code = 'persistence_error';
  readonly status = 500;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(detail, options);
  }

  get publicMessage(): string {
    return 'Something went wrong while processing the request';
  }
}

export class UpstreamUnavailable extends EngineError {
  readonly code = 'upstream_unavailable';
  readonly status = 502;

  constructor(readonly provider: string, options?: { cause?: unknown }) {
    super(`Inference call to ${provider} failed`, options);
  }

  get publicMessage(): string {
    return 'The AI backend is unavailable right now. Try again later.';
  }
}

/** Operator-facing one-liner, including the cause chain. */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const parts = [`${error.name}: ${error.message}`];
  let cause: unknown = error.cause;
  while (cause instanceof Error) {
    parts.push(`caused by ${cause.name}: ${cause.message}`);
    cause = cause.cause;
  }
  return parts.join(' <- ');
}
