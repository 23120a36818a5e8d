/**
 * Route Request
 *
 * The typed, frozen envelope a handler receives. Built fresh for every
 * dispatch from the transport's RawRequest plus the matched params.
 */

import { BadRequestError, PayloadTooLargeError } from '../error/dispatch.error.ts';

/** Read-only view of request headers (case-insensitive lookups). */
export type ReadonlyHeaders = Pick<Headers, 'get' | 'has' | 'forEach' | 'entries' | 'keys' | 'values'>;

export type QueryParams = Readonly<Record<string, readonly string[]>>;

export interface RouteRequestInit {
  id: string;
  method: string;
  path: string;
  /** Pattern of the matched route (e.g. "/users/:id"). */
  pattern: string;
  headers: Headers;
  query: QueryParams;
  params: Readonly<Record<string, string>>;
  body: Uint8Array;
  signal: AbortSignal;
  remoteAddress?: string;
}

const decoder = new TextDecoder();

export class RouteRequest {
  readonly id: string;
  readonly method: string;
  readonly path: string;
  readonly pattern: string;
  readonly headers: ReadonlyHeaders;
  readonly query: QueryParams;
  readonly params: Readonly<Record<string, string>>;
  readonly cookies: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
  /** Aborted when the client disconnects or the handler times out. */
  readonly signal: AbortSignal;
  readonly remoteAddress: string | undefined;

  constructor(init: RouteRequestInit) {
    this.id = init.id;
    this.method = init.method;
    this.path = init.path;
    this.pattern = init.pattern;
    this.headers = init.headers;
    this.query = init.query;
    this.params = init.params;
    this.cookies = parseCookies(init.headers.get('cookie'));
    this.body = init.body;
    this.signal = init.signal;
    this.remoteAddress = init.remoteAddress;
    Object.freeze(this);
  }

  /** First value of a query parameter. */
  queryValue(key: string): string | undefined {
    return this.query[key]?.[0];
  }

  /** Body decoded as UTF-8. */
  text(): string {
    return decoder.decode(this.body);
  }

  /** Body parsed as JSON. Throws BadRequestError (400) on malformed input. */
  json(): unknown {
    try {
      return JSON.parse(this.text());
    } catch (error) {
      throw new BadRequestError('Malformed JSON body', { cause: error });
    }
  }
}

/**
 * Parse a raw query string into a multi-valued mapping.
 * Values keep their arrival order; "a=1&a=2" → { a: ["1", "2"] }.
 */
export function parseQuery(raw: string): QueryParams {
  const grouped = new Map<string, string[]>();
  for (const [key, value] of new URLSearchParams(raw)) {
    const values = grouped.get(key);
    if (values) {
      values.push(value);
    } else {
      grouped.set(key, [value]);
    }
  }
  return Object.freeze(
    Object.fromEntries([...grouped].map(([key, values]) => [key, Object.freeze(values)])),
  );
}

/** Parse a Cookie header into name → value. Later duplicates are ignored. */
export function parseCookies(header: string | null): Readonly<Record<string, string>> {
  const cookies: Array<[string, string]> = [];
  const seen = new Set<string>();
  if (!header) return Object.freeze({});

  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    const name = part.slice(0, eq).trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    cookies.push([name, part.slice(eq + 1).trim()]);
  }

  return Object.freeze(Object.fromEntries(cookies));
}

/**
 * Build a Headers object from ordered header lines. Repeated names are
 * combined with ", ". Throws BadRequestError on an invalid name or value.
 */
export function toHeaders(lines: ReadonlyArray<readonly [string, string]>): Headers {
  const headers = new Headers();
  for (const [name, value] of lines) {
    try {
      headers.append(name, value);
    } catch (error) {
      throw new BadRequestError(`Invalid header "${name}"`, { cause: error });
    }
  }
  return headers;
}

/**
 * Read a request body fully, failing fast once `limit` bytes are exceeded.
 */
export async function readBody(
  body: AsyncIterable<Uint8Array> | Uint8Array,
  limit: number,
): Promise<Uint8Array> {
  if (body instanceof Uint8Array) {
    if (body.byteLength > limit) throw new PayloadTooLargeError(limit);
    return body;
  }

  const chunks: Uint8Array[] = [];
  let size = 0;
  for await (const chunk of body) {
    size += chunk.byteLength;
    if (size > limit) throw new PayloadTooLargeError(limit);
    chunks.push(chunk);
  }

  const result = new Uint8Array(size);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

/**
 * Split a request target ("/a/b?x=1#frag") into path and raw query.
 * The fragment, which clients should never send, is dropped.
 */
export function splitTarget(target: string): { path: string; query: string } {
  const hash = target.indexOf('#');
  const withoutHash = hash === -1 ? target : target.slice(0, hash);
  const q = withoutHash.indexOf('?');
  if (q === -1) return { path: withoutHash || '/', query: '' };
  return { path: withoutHash.slice(0, q) || '/', query: withoutHash.slice(q + 1) };
}
