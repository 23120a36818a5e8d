/**
 * HTTP Types
 *
 * The closed method enumeration, handler signature, and the shapes the
 * transport exchanges with the dispatcher.
 */

import type { RouteRequest } from '../http/request.ts';
import type { RouteResponse } from '../http/response.ts';

/** Methods a handler module may bind, in canonical (Allow header) order. */
export const HTTP_METHODS = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'CONNECT',
  'OPTIONS',
  'TRACE',
  'PATCH',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/** Anything the Headers constructor accepts. */
export type HeadersLike = ConstructorParameters<typeof Headers>[0];

/** Plain-object response accepted in place of a RouteResponse. */
export interface ResponseLike {
  status: number;
  headers?: HeadersLike;
  body?: unknown;
}

export type HandlerResult = RouteResponse | ResponseLike;

/** A bound handler: one request in, one response out. */
export type Handler = (request: RouteRequest) => Promise<HandlerResult> | HandlerResult;

/** Request description delivered by a transport. */
export interface RawRequest {
  method: string;
  /** Path without the query string. */
  path: string;
  /** Raw query string, without the leading `?`. */
  query: string;
  /** Header lines in arrival order. */
  headers: ReadonlyArray<readonly [string, string]>;
  body: AsyncIterable<Uint8Array> | Uint8Array;
  /** Peer address, when the transport knows it. */
  remoteAddress?: string;
}

/** What the dispatcher hands back to the transport for writing. */
export interface SerializedResponse {
  status: number;
  /** Ordered header lines; repeated names (Set-Cookie) stay separate. */
  headers: Array<[string, string]>;
  body: Uint8Array;
}
