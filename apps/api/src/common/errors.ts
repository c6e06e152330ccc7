import { BadRequestException, InternalServerErrorException } from '@nestjs/common';
import { isAxiosError } from 'axios';
import { ZodError } from 'zod';

// AbortSignal.timeout() aborts with a DOMException named TimeoutError.
export function isTimeoutError(cause: unknown): boolean {
  return typeof cause === 'object' && cause !== null && 'name' in cause && cause.name === 'TimeoutError';
}

export function describeCause(cause: unknown): string {
  if (isTimeoutError(cause)) return 'timed out';
  if (isAxiosError(cause)) {
    return cause.response ? `${cause.message} (status ${cause.response.status})` : cause.message;
  }
  if (cause instanceof ZodError) {
    return cause.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
  }
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** Client fault: unknown currency, unparseable date, inverted range. Raised before any I/O. */
export class InvalidParameterError extends BadRequestException {
  constructor(readonly field: string, reason: string) {
    super({ statusCode: 400, error: 'VALIDATION_FAILED', field, message: `invalid ${field}: ${reason}` });
  }
}

/** Client fault: the provider answered but does not quote this pair. */
export class RateNotOfferedError extends BadRequestException {
  constructor(readonly base: string, readonly second: string) {
    super({
      statusCode: 400,
      error: 'RATE_NOT_OFFERED',
      message: `cannot find rate for '${second}' against '${base}'`,
    });
  }
}

/**
 * Server fault in the cache, the store or an upstream call. The message leads
 * with the operation that failed; the original error stays on `cause`.
 */
export class DependencyError extends InternalServerErrorException {
  readonly timedOut: boolean;

  constructor(readonly operation: string, cause: unknown) {
    super(
      { statusCode: 500, error: 'DEPENDENCY_FAILURE', message: `${operation}: ${describeCause(cause)}` },
      { cause },
    );
    this.timedOut = isTimeoutError(cause);
  }
}
