/**
 * Integration tests: node:http transport
 *
 * Starts a real server on 127.0.0.1 with an ephemeral port, routes from
 * test/fixtures/api, and talks to it with fetch().
 */

import { fileURLToPath } from 'node:url';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { NodeHttpTransport } from '../../runtime/node/node-http.transport.ts';
import { createRouteServer, type RouteServer } from '../../server/route.server.ts';

const routesDir = fileURLToPath(new URL('../fixtures/api', import.meta.url));

let server: RouteServer;
let baseUrl: string;

beforeAll(async () => {
  const transport = new NodeHttpTransport();
  server = await createRouteServer(
    { routesDir, serverName: 'pathwise-test', maxBodySize: 1024 },
    { transport },
  );
  await server.listen('127.0.0.1', 0);
  baseUrl = `http://127.0.0.1:${transport.address()?.port}`;
});

afterAll(async () => {
  await server.stop();
});

describe('node:http server', () => {
  test('GET / returns the home text', async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(res.headers.get('server')).toBe('pathwise-test');
    expect(await res.text()).toBe('home');
  });

  test('dynamic segment', async () => {
    const res = await fetch(`${baseUrl}/users/42`);

    expect(await res.json()).toEqual({ id: '42' });
  });

  test('catch-all segment', async () => {
    const res = await fetch(`${baseUrl}/files/a/b.txt?download=1`);

    expect(await res.json()).toEqual({ path: 'a/b.txt' });
  });

  test('POST with a JSON body', async () => {
    const res = await fetch(`${baseUrl}/users`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ name: 'Grace' }),
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ id: 'new', name: 'Grace' });
  });

  test('DELETE returns 204', async () => {
    const res = await fetch(`${baseUrl}/users/42`, { method: 'DELETE' });

    expect(res.status).toBe(204);
    expect(await res.text()).toBe('');
  });

  test('unbound method is 405 with Allow', async () => {
    const res = await fetch(`${baseUrl}/users`, { method: 'DELETE' });

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET, POST');
    expect(await res.text()).toBe('Method Not Allowed');
  });

  test('unknown path is 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Not Found');
  });

  test('oversized body is 413', async () => {
    const res = await fetch(`${baseUrl}/users`, { method: 'POST', body: 'x'.repeat(2048) });

    expect(res.status).toBe(413);
    expect(await res.text()).toBe('Payload Too Large');
  });
});
