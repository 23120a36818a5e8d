/**
 * Dispatcher
 *
 * Turns one RawRequest into one SerializedResponse:
 *
 *   Received → Matched | NotFound | MethodNotAllowed
 *            → Invoking → Completed | Failed
 *            → Serialized
 *
 * Every failure stays inside its own dispatch and ends as a well-formed
 * 4xx/5xx. Raw failure details only leave through events, never through the
 * response body, unless `verboseErrors` is set.
 *
 * The dispatcher holds no per-request state: the tree is read-only and each
 * call owns its request, controller, and response.
 */

import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import {
  DispatchError,
  HandlerExecutionError,
  HandlerTimeoutError,
  MalformedResponseError,
  MethodNotAllowedError,
  TransportError,
  UnboundRouteError,
} from '../error/dispatch.error.ts';
import { parseQuery, readBody, RouteRequest, toHeaders } from '../http/request.ts';
import { serializeResponse, statusResponse } from '../http/response.ts';
import { allowedMethods } from '../route/route-tree.util.ts';
import { matchRoute, normalizePath } from '../route/route.matcher.ts';
import type { DispatchEvent, DispatchEventListener } from '../type/event.type.ts';
import type { Handler, RawRequest, SerializedResponse } from '../type/http.type.ts';
import { isHttpMethod } from '../type/http.type.ts';
import { logger } from '../type/logger.type.ts';
import type { RouteMatch, RouteTree } from '../type/route-tree.type.ts';

export const DEFAULT_MAX_BODY_SIZE = 1024 * 1024;

export interface DispatcherOptions {
  /** Largest accepted request body in bytes (default: 1 MiB). */
  maxBodySize?: number;
  /** Per-handler timeout. No timeout when unset. */
  handlerTimeoutMs?: number;
  /** Put error messages in 4xx/5xx bodies instead of the reason phrase. */
  verboseErrors?: boolean;
  /** Server header added to every response. */
  serverName?: string;
}

export interface DispatchContext {
  /** Aborts when the client goes away. */
  signal?: AbortSignal;
  /** Id to use for this dispatch (generated when absent). */
  requestId?: string;
}

const REASON_PHRASES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  413: 'Payload Too Large',
  500: 'Internal Server Error',
};

type InvokeOutcome =
  | { kind: 'returned'; value: unknown }
  | { kind: 'threw'; error: unknown }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'cancelled' };

interface RequestInfo {
  requestId: string;
  method: string;
  path: string;
}

/** Resolves once the signal aborts. */
function whenAborted(signal: AbortSignal): Promise<InvokeOutcome> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve({ kind: 'cancelled' });
      return;
    }
    signal.addEventListener('abort', () => resolve({ kind: 'cancelled' }), { once: true });
  });
}

export class Dispatcher {
  private readonly listeners = new Set<DispatchEventListener>();
  private readonly maxBodySize: number;

  constructor(
    readonly tree: RouteTree,
    private readonly options: DispatcherOptions = {},
  ) {
    this.maxBodySize = options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
  }

  /**
   * Add a listener for dispatch events. Returns an unsubscribe function.
   */
  addEventListener(listener: DispatchEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Emit an event to listeners. A throwing listener is logged and skipped.
   */
  emit(event: DispatchEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (e) {
        logger.error('Dispatch event listener error', e);
      }
    }
  }

  /**
   * Dispatch one request. Resolves to the response to write, or `null`
   * when the client disconnected and nothing must be written.
   */
  async dispatch(raw: RawRequest, context: DispatchContext = {}): Promise<SerializedResponse | null> {
    const started = performance.now();
    const info: RequestInfo = {
      requestId: context.requestId ?? randomUUID(),
      method: raw.method.toUpperCase(),
      path: normalizePath(raw.path),
    };

    this.emit({ type: 'request.received', ...info, remoteAddress: raw.remoteAddress });

    const response = await this.resolve(raw, info, context.signal);

    if (response === null || context.signal?.aborted) {
      this.emit({ type: 'request.cancelled', ...info });
      return null;
    }

    this.emit({
      type: 'response.sent',
      ...info,
      status: response.status,
      durationMs: performance.now() - started,
    });
    return response;
  }

  // ── Pipeline ─────────────────────────────────────────────────────────

  private async resolve(
    raw: RawRequest,
    info: RequestInfo,
    signal: AbortSignal | undefined,
  ): Promise<SerializedResponse | null> {
    const match = matchRoute(this.tree, info.path);
    if (!match) {
      this.emit({ type: 'route.notFound', ...info });
      return this.errorResponse(new UnboundRouteError(info.path));
    }

    const handler = isHttpMethod(info.method) ? match.node.handlers.get(info.method) : undefined;
    if (!handler) {
      const allowed = allowedMethods(match.node);
      this.emit({ type: 'route.methodNotAllowed', ...info, allowed });
      return this.errorResponse(new MethodNotAllowedError(info.method, info.path, allowed), [
        ['allow', allowed.join(', ')],
      ]);
    }

    this.emit({ type: 'route.matched', ...info, pattern: match.pattern, params: match.params });

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    try {
      return await this.invokeMatched(raw, info, match, handler, controller);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async invokeMatched(
    raw: RawRequest,
    info: RequestInfo,
    match: RouteMatch,
    handler: Handler,
    controller: AbortController,
  ): Promise<SerializedResponse | null> {
    if (controller.signal.aborted) return null;

    let request: RouteRequest;
    try {
      const headers = toHeaders(raw.headers);
      const body = await readBody(raw.body, this.maxBodySize);
      request = new RouteRequest({
        id: info.requestId,
        method: info.method,
        path: info.path,
        pattern: match.pattern,
        headers,
        query: parseQuery(raw.query),
        params: match.params,
        body,
        signal: controller.signal,
        remoteAddress: raw.remoteAddress,
      });
    } catch (error) {
      if (controller.signal.aborted) return null;
      if (error instanceof DispatchError) {
        this.emit({ type: 'request.rejected', ...info, status: error.status, reason: error.message });
        return this.errorResponse(error);
      }
      throw new TransportError('Failed to read request body', { cause: error });
    }

    const outcome = await this.invoke(handler, request, controller);

    switch (outcome.kind) {
      case 'cancelled':
        return null;

      case 'timeout': {
        const error = new HandlerTimeoutError(match.pattern, outcome.timeoutMs);
        controller.abort(error);
        this.emit({ type: 'handler.timeout', ...info, pattern: match.pattern, timeoutMs: outcome.timeoutMs });
        return this.errorResponse(error);
      }

      case 'threw': {
        // Handlers may reject a request with a 4xx DispatchError (e.g. request.json()).
        if (outcome.error instanceof DispatchError && outcome.error.status < 500) {
          this.emit({ type: 'request.rejected', ...info, status: outcome.error.status, reason: outcome.error.message });
          return this.errorResponse(outcome.error);
        }
        const error = new HandlerExecutionError(match.pattern, outcome.error);
        this.emit({ type: 'handler.failed', ...info, pattern: match.pattern, error: outcome.error });
        return this.errorResponse(error);
      }

      case 'returned': {
        const result = serializeResponse(outcome.value, { serverName: this.options.serverName });
        if (result.ok) return result.response;

        const error = new MalformedResponseError(match.pattern, result.issues);
        this.emit({ type: 'response.malformed', ...info, pattern: match.pattern, issues: result.issues });
        return this.errorResponse(error);
      }
    }
  }

  /**
   * Run the handler, racing it against the optional timeout and the abort
   * signal. A handler left behind by a timeout or a disconnect keeps running
   * to completion, but its result is discarded.
   */
  private async invoke(handler: Handler, request: RouteRequest, controller: AbortController): Promise<InvokeOutcome> {
    const running = (async () => handler(request))().then(
      (value): InvokeOutcome => ({ kind: 'returned', value }),
      (error: unknown): InvokeOutcome => ({ kind: 'threw', error }),
    );
    const contenders: Promise<InvokeOutcome>[] = [running, whenAborted(controller.signal)];

    const { handlerTimeoutMs } = this.options;
    let timer: ReturnType<typeof setTimeout> | undefined;
    if (handlerTimeoutMs !== undefined) {
      contenders.push(
        new Promise((resolve) => {
          timer = setTimeout(() => resolve({ kind: 'timeout', timeoutMs: handlerTimeoutMs }), handlerTimeoutMs);
        }),
      );
    }

    try {
      return await Promise.race(contenders);
    } finally {
      clearTimeout(timer);
    }
  }

  private errorResponse(error: DispatchError, headers: Array<[string, string]> = []): SerializedResponse {
    const message = this.options.verboseErrors
      ? error.message
      : REASON_PHRASES[error.status] ?? 'Error';
    return statusResponse(error.status, message, headers, { serverName: this.options.serverName });
  }
}
