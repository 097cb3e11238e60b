import { ErrorCode, ErrorCodes } from './error-codes';

/**
 * Base class for expected domain failures.
 * Services throw these; FactoryErrorFilter maps them to HTTP responses.
 */
export abstract class FactoryError extends Error {
  abstract readonly code: ErrorCode;
  /** True when the same request may succeed later without changes. */
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed or oversized request. No side effects. */
export class InvalidInputError extends FactoryError {
  readonly code = ErrorCodes.INVALID_INPUT;
  readonly retryable = false;
}

/** Admission denied. No port allocated, no runtime call made. */
export class ResourceExhaustedError extends FactoryError {
  readonly code = ErrorCodes.RESOURCE_EXHAUSTED;
  readonly retryable = true;

  constructor(readonly reason: string) {
    super(`Cannot create server: ${reason}`, { reason });
  }
}

export class NoPortAvailableError extends FactoryError {
  readonly code = ErrorCodes.NO_PORT_AVAILABLE;
  readonly retryable = true;

  constructor(rangeStart: number, rangeEnd: number) {
    super(`No port available in range ${rangeStart}-${rangeEnd}`, { rangeStart, rangeEnd });
  }
}

export class BuildFailedError extends FactoryError {
  readonly code = ErrorCodes.BUILD_FAILED;
  readonly retryable = false;

  constructor(cause: string) {
    super(`Image build failed: ${cause}`, { cause });
  }
}

export class LaunchFailedError extends FactoryError {
  readonly code = ErrorCodes.LAUNCH_FAILED;
  readonly retryable = true;

  constructor(cause: string) {
    super(`Container launch failed: ${cause}`, { cause });
  }
}

export class NotFoundError extends FactoryError {
  readonly code = ErrorCodes.NOT_FOUND;
  readonly retryable = false;

  constructor(kind: string, id: string) {
    super(`${kind} not found: ${id}`, { id });
  }
}

/** Liveness entry existed but its heartbeat window lapsed; pending eviction. */
export class GoneError extends FactoryError {
  readonly code = ErrorCodes.GONE;
  readonly retryable = false;

  constructor(kind: string, id: string) {
    super(`${kind} is inactive: ${id}`, { id });
  }
}

/** Message of an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
