/**
 * Failure taxonomy for backend operations.
 *
 * None of these escape a client operation: the client classifies whatever it
 * caught, records it on the span and in the log, and returns its sentinel.
 * `LokiNotInitializedError` is the one error meant to reach callers.
 */

import axios from 'axios';
import { ZodError } from 'zod';

export type LokiFailureKind = 'transport' | 'timeout' | 'rejected' | 'codec';

export abstract class LokiError extends Error {
  abstract readonly kind: LokiFailureKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Connection refused, DNS or TLS failure, reset socket, cancelled request.
 */
export class TransportError extends LokiError {
  readonly kind = 'transport';

  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class TimeoutError extends LokiError {
  readonly kind = 'timeout';

  constructor(
    public readonly timeoutMs: number | undefined,
    options?: { cause?: unknown }
  ) {
    super(timeoutMs === undefined ? 'Request timed out' : `Request timed out after ${timeoutMs}ms`, options);
  }
}

/**
 * The backend answered with a status other than the one the operation
 * expects. The body is kept for diagnostics only.
 */
export class BackendRejectionError extends LokiError {
  readonly kind = 'rejected';

  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`${status} - ${body}`);
  }
}

export class CodecError extends LokiError {
  readonly kind = 'codec';
}

export class LokiNotInitializedError extends Error {
  constructor(message = 'Loki integration not initialized. Call initialize() first.') {
    super(message);
    this.name = 'LokiNotInitializedError';
  }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function classifyError(error: unknown, timeoutMs?: number): LokiError {
  if (error instanceof LokiError) {
    return error;
  }

  if (axios.isCancel(error)) {
    return new TransportError('Request cancelled', 'ERR_CANCELED', { cause: error });
  }

  if (axios.isAxiosError(error)) {
    if (error.code && TIMEOUT_CODES.has(error.code)) {
      return new TimeoutError(timeoutMs, { cause: error });
    }
    return new TransportError(error.message, error.code, { cause: error });
  }

  if (error instanceof ZodError || error instanceof SyntaxError) {
    return new CodecError(error.message, { cause: error });
  }

  if (error instanceof Error) {
    return new TransportError(error.message, undefined, { cause: error });
  }

  return new TransportError(String(error));
}
