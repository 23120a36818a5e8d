/**
 * Unit tests for Route Response serialization
 */

import { describe, expect, test } from 'vitest';
import { RouteResponse, serializeResponse, statusResponse } from '../../src/http/response.ts';
import type { SerializedResponse } from '../../src/type/http.type.ts';

function serialized(value: unknown, serverName?: string): SerializedResponse {
  const result = serializeResponse(value, { serverName });
  if (!result.ok) throw new Error(result.issues.join('; '));
  return result.response;
}

function text(response: SerializedResponse): string {
  return new TextDecoder().decode(response.body);
}

describe('serializeResponse', () => {
  test('JSON response', () => {
    const response = serialized(RouteResponse.json({ a: 1 }));
    expect(response.status).toBe(200);
    expect(response.headers).toEqual([
      ['content-length', '7'],
      ['content-type', 'application/json; charset=utf-8'],
    ]);
    expect(text(response)).toBe('{"a":1}');
  });

  test('text response with a status', () => {
    const response = serialized(RouteResponse.text('hi', { status: 201 }));
    expect(response.status).toBe(201);
    expect(response.headers).toEqual([
      ['content-length', '2'],
      ['content-type', 'text/plain; charset=utf-8'],
    ]);
  });

  test('plain object with an object body is sent as JSON', () => {
    const response = serialized({ status: 200, body: { ok: true } });
    expect(text(response)).toBe('{"ok":true}');
    expect(response.headers).toContainEqual(['content-type', 'application/json; charset=utf-8']);
  });

  test('binary body', () => {
    const response = serialized({ status: 200, body: new Uint8Array([1, 2, 3]) });
    expect(response.headers).toEqual([
      ['content-length', '3'],
      ['content-type', 'application/octet-stream'],
    ]);
  });

  test('handler content-type is kept', () => {
    const response = serialized({ status: 200, headers: { 'Content-Type': 'text/html' }, body: '<p>hi</p>' });
    expect(response.headers).toEqual([
      ['content-length', '9'],
      ['content-type', 'text/html'],
    ]);
  });

  test('204 has no body and no content-length', () => {
    const response = serialized(RouteResponse.empty());
    expect(response.status).toBe(204);
    expect(response.headers).toEqual([]);
    expect(response.body.byteLength).toBe(0);
  });

  test('server name and cookies', () => {
    const response = serialized(RouteResponse.text('ok', { cookies: { sid: 'abc; Path=/; HttpOnly' } }), 'pathwise');
    expect(response.headers).toEqual([
      ['content-length', '2'],
      ['content-type', 'text/plain; charset=utf-8'],
      ['server', 'pathwise'],
      ['set-cookie', 'sid=abc; Path=/; HttpOnly'],
    ]);
  });
});

describe('serializeResponse contract violations', () => {
  test('a bare string is not a response', () => {
    expect(serializeResponse('oops')).toEqual({ ok: false, issues: ['response: Expected object, received string'] });
  });

  test('status out of range', () => {
    expect(serializeResponse({ status: 700 })).toEqual({
      ok: false,
      issues: ['status: Number must be less than or equal to 599'],
    });
  });

  test('missing status', () => {
    expect(serializeResponse({ body: 'hi' })).toEqual({ ok: false, issues: ['status: Required'] });
  });

  test('body that cannot be serialized', () => {
    expect(serializeResponse({ status: 200, body: () => 'x' })).toEqual({
      ok: false,
      issues: ['body: must be a string, Uint8Array, null or plain JSON data'],
    });
  });

  test('class instances are not JSON bodies', () => {
    const bodies: unknown[] = [
      new Map([['a', 1]]),
      Promise.resolve('late'),
      new ReadableStream(),
      new Date(0),
      { nested: new Set([1]) },
      [1, new Map()],
    ];
    for (const body of bodies) {
      expect(serializeResponse({ status: 200, body })).toEqual({
        ok: false,
        issues: ['body: must be a string, Uint8Array, null or plain JSON data'],
      });
    }
  });

  test('non-finite numbers and cycles are rejected', () => {
    const cyclic: Record<string, unknown> = { name: 'loop' };
    cyclic.self = cyclic;
    for (const body of [Number.NaN, { n: Infinity }, cyclic]) {
      expect(serializeResponse({ status: 200, body }).ok).toBe(false);
    }
  });

  test('a web Response is not a handler result', () => {
    expect(serializeResponse(new Response('hi'))).toEqual({
      ok: false,
      issues: ['response: must be a RouteResponse or a plain object'],
    });
    expect(serializeResponse(new Response(null, { status: 204 }))).toEqual({
      ok: false,
      issues: ['response: must be a RouteResponse or a plain object'],
    });
  });

  test('plain JSON data with a null prototype is accepted', () => {
    const body: Record<string, unknown> = Object.create(null);
    body.ok = true;
    body.skipped = undefined;
    const response = serialized({ status: 200, body: [body, 1, 'two', null] });
    expect(text(response)).toBe('[{"ok":true},1,"two",null]');
  });
});

test('statusResponse - plain text with extra headers in order', () => {
  const response = statusResponse(405, 'Method Not Allowed', [['allow', 'GET']], { serverName: 'pathwise' });
  expect(response.headers).toEqual([
    ['content-type', 'text/plain; charset=utf-8'],
    ['content-length', '18'],
    ['allow', 'GET'],
    ['server', 'pathwise'],
  ]);
  expect(new TextDecoder().decode(response.body)).toBe('Method Not Allowed');
});
