/**
 * Dispatch Events
 *
 * Structured events emitted by the dispatcher and server loop. The core
 * emits them; listeners decide how to format or persist them.
 */

import type { HttpMethod } from './http.type.ts';

interface BaseEvent {
  /** Per-dispatch id, also exposed as RouteRequest.id. */
  requestId: string;
  method: string;
  path: string;
}

export type DispatchEvent =
  | (BaseEvent & { type: 'request.received'; remoteAddress?: string })
  | (BaseEvent & { type: 'route.matched'; pattern: string; params: Readonly<Record<string, string>> })
  | (BaseEvent & { type: 'route.notFound' })
  | (BaseEvent & { type: 'route.methodNotAllowed'; allowed: readonly HttpMethod[] })
  | (BaseEvent & { type: 'handler.failed'; pattern: string; error: unknown })
  | (BaseEvent & { type: 'handler.timeout'; pattern: string; timeoutMs: number })
  | (BaseEvent & { type: 'response.malformed'; pattern: string; issues: readonly string[] })
  | (BaseEvent & { type: 'request.rejected'; status: number; reason: string })
  | (BaseEvent & { type: 'request.cancelled' })
  | (BaseEvent & { type: 'request.abandoned' })
  | (BaseEvent & { type: 'response.sent'; status: number; durationMs: number });

export type DispatchEventType = DispatchEvent['type'];

export type DispatchEventListener = (event: DispatchEvent) => void;
