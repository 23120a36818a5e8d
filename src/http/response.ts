/**
 * Route Response
 *
 * What a handler returns, and how the dispatcher turns it into bytes.
 *
 * Handlers return either a RouteResponse or a plain `{ status, headers?, body? }`
 * object. Both are checked against the same schema before serialization;
 * anything else is a contract violation reported as MalformedResponseError.
 */

import { z } from 'zod';
import type { HeadersLike, SerializedResponse } from '../type/http.type.ts';

export interface RouteResponseInit {
  status?: number;
  headers?: HeadersLike;
  /** Cookie name → value. The value may carry attributes ("v; Path=/; HttpOnly"). */
  cookies?: Record<string, string>;
}

export type ResponseBody = string | Uint8Array | null;

const TEXT_TYPE = 'text/plain; charset=utf-8';
const JSON_TYPE = 'application/json; charset=utf-8';
const BINARY_TYPE = 'application/octet-stream';

export class RouteResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly body: ResponseBody;
  readonly cookies: Readonly<Record<string, string>>;

  constructor(body: ResponseBody = null, init: RouteResponseInit = {}) {
    this.status = init.status ?? 200;
    this.headers = new Headers(init.headers);
    this.body = body;
    this.cookies = Object.freeze({ ...init.cookies });
    Object.freeze(this);
  }

  /** Plain-text response. */
  static text(body: string, init: RouteResponseInit = {}): RouteResponse {
    const headers = new Headers(init.headers);
    if (!headers.has('content-type')) headers.set('content-type', TEXT_TYPE);
    return new RouteResponse(body, { ...init, headers });
  }

  /** JSON response. The value is serialized immediately. */
  static json(value: unknown, init: RouteResponseInit = {}): RouteResponse {
    const headers = new Headers(init.headers);
    if (!headers.has('content-type')) headers.set('content-type', JSON_TYPE);
    return new RouteResponse(JSON.stringify(value) ?? 'null', { ...init, headers });
  }

  /** Response without a body (e.g. 204). */
  static empty(status = 204, init: RouteResponseInit = {}): RouteResponse {
    return new RouteResponse(null, { ...init, status });
  }
}

// ── Validation ─────────────────────────────────────────────────────────

const headersSchema = z.union([
  z.instanceof(Headers),
  z.array(z.tuple([z.string(), z.string()])),
  z.record(z.string(), z.string()),
]);

/**
 * JSON data as a handler would write it: primitives, arrays, and objects
 * whose prototype is Object.prototype or null. Class instances (Response,
 * Map, streams, promises) and cycles are rejected. `undefined` members are
 * dropped by JSON.stringify and pass.
 */
function isJsonData(value: unknown, ancestors: Set<object> = new Set()): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value !== 'object' || ancestors.has(value)) return false;

  const items: unknown[] | undefined = Array.isArray(value) ? value : plainValues(value);
  if (!items) return false;

  ancestors.add(value);
  const ok = items.every((item) => isJsonData(item, ancestors));
  ancestors.delete(value);
  return ok;
}

function plainValues(value: object): unknown[] | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) return undefined;
  return Object.values(value);
}

const bodySchema = z.custom<string | Uint8Array | null | object | number | boolean>(
  (value) => value instanceof Uint8Array || isJsonData(value),
  { message: 'must be a string, Uint8Array, null or plain JSON data' },
);

const responseSchema = z.object({
  status: z.number().int().min(100).max(599),
  headers: headersSchema.optional(),
  body: bodySchema.optional(),
  cookies: z.record(z.string(), z.string()).optional(),
});

export type SerializeResult =
  | { ok: true; response: SerializedResponse }
  | { ok: false; issues: string[] };

export interface SerializeOptions {
  /** Value for the Server header, when not set by the handler. */
  serverName?: string;
}

const encoder = new TextEncoder();

/** Statuses that never carry a body or a Content-Length. */
function isBodiless(status: number): boolean {
  return status < 200 || status === 204 || status === 304;
}

function encodeBody(body: unknown): { bytes: Uint8Array; type?: string } {
  if (body === undefined || body === null) return { bytes: new Uint8Array() };
  if (typeof body === 'string') return { bytes: encoder.encode(body), type: TEXT_TYPE };
  if (body instanceof Uint8Array) return { bytes: body, type: BINARY_TYPE };

  return { bytes: encoder.encode(JSON.stringify(body)), type: JSON_TYPE };
}

/**
 * Validate a handler's return value and serialize it into header lines and
 * body bytes. Never throws: contract violations come back as `issues`.
 */
export function serializeResponse(value: unknown, options: SerializeOptions = {}): SerializeResult {
  if (typeof value === 'object' && value !== null && !(value instanceof RouteResponse) && !plainValues(value)) {
    return { ok: false, issues: ['response: must be a RouteResponse or a plain object'] };
  }

  const parsed = responseSchema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`),
    };
  }

  const { status, cookies } = parsed.data;
  let headers: Headers;
  let encoded: { bytes: Uint8Array; type?: string };

  try {
    headers = new Headers(parsed.data.headers);
    encoded = encodeBody(parsed.data.body);
  } catch (error) {
    return { ok: false, issues: [error instanceof Error ? error.message : String(error)] };
  }

  const bodiless = isBodiless(status);
  const body = bodiless ? new Uint8Array() : encoded.bytes;

  if (encoded.type && !bodiless && !headers.has('content-type')) {
    headers.set('content-type', encoded.type);
  }
  if (!bodiless && !headers.has('content-length')) {
    headers.set('content-length', String(body.byteLength));
  }
  if (options.serverName && !headers.has('server')) {
    headers.set('server', options.serverName);
  }

  const lines: Array<[string, string]> = [];
  for (const [name, headerValue] of headers) {
    lines.push([name, headerValue]);
  }
  for (const [name, cookieValue] of Object.entries(cookies ?? {})) {
    lines.push(['set-cookie', `${name}=${cookieValue}`]);
  }

  return { ok: true, response: { status, headers: lines, body } };
}

/** Build a plain-text response for a status the dispatcher produces itself. */
export function statusResponse(
  status: number,
  message: string,
  headers: Array<[string, string]> = [],
  options: SerializeOptions = {},
): SerializedResponse {
  const body = encoder.encode(message);
  const lines: Array<[string, string]> = [
    ['content-type', TEXT_TYPE],
    ['content-length', String(body.byteLength)],
    ...headers,
  ];
  if (options.serverName) lines.push(['server', options.serverName]);
  return { status, headers: lines, body };
}
