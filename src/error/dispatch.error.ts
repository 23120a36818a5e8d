/**
 * Dispatch Errors
 *
 * Per-request failures. Each one maps to an HTTP status and stays isolated
 * to the dispatch that raised it.
 */

import type { HttpMethod } from '../type/http.type.ts';

export type DispatchErrorCode =
  | 'UNBOUND_ROUTE'
  | 'METHOD_NOT_ALLOWED'
  | 'BAD_REQUEST'
  | 'PAYLOAD_TOO_LARGE'
  | 'HANDLER_FAILED'
  | 'HANDLER_TIMEOUT'
  | 'MALFORMED_RESPONSE';

export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: DispatchErrorCode,
    public readonly status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

export class UnboundRouteError extends DispatchError {
  constructor(path: string) {
    super(`No route for ${path}`, 'UNBOUND_ROUTE', 404);
    this.name = 'UnboundRouteError';
  }
}

export class MethodNotAllowedError extends DispatchError {
  constructor(method: string, path: string, public readonly allowed: readonly HttpMethod[]) {
    super(`${method} not allowed on ${path}`, 'METHOD_NOT_ALLOWED', 405);
    this.name = 'MethodNotAllowedError';
  }
}

export class BadRequestError extends DispatchError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'BAD_REQUEST', 400, options);
    this.name = 'BadRequestError';
  }
}

export class PayloadTooLargeError extends DispatchError {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`, 'PAYLOAD_TOO_LARGE', 413);
    this.name = 'PayloadTooLargeError';
  }
}

/** The handler threw or rejected. The original failure is the cause. */
export class HandlerExecutionError extends DispatchError {
  constructor(pattern: string, cause: unknown) {
    super(`Handler for ${pattern} failed: ${describe(cause)}`, 'HANDLER_FAILED', 500, { cause });
    this.name = 'HandlerExecutionError';
  }
}

export class HandlerTimeoutError extends DispatchError {
  constructor(pattern: string, public readonly timeoutMs: number) {
    super(`Handler for ${pattern} timed out after ${timeoutMs}ms`, 'HANDLER_TIMEOUT', 500);
    this.name = 'HandlerTimeoutError';
  }
}

/** The handler returned something that is not a valid response. */
export class MalformedResponseError extends DispatchError {
  constructor(pattern: string, public readonly issues: readonly string[]) {
    super(`Handler for ${pattern} returned a malformed response: ${issues.join('; ')}`, 'MALFORMED_RESPONSE', 500);
    this.name = 'MalformedResponseError';
  }
}

/** The connection went away while a response was pending or being written. */
export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
