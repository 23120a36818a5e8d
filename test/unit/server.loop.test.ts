/**
 * Unit tests for Server Loop
 *
 * Runs the loop over the in-memory transport: concurrent dispatch,
 * client disconnects, graceful drain and abandonment at shutdown.
 */

import { afterEach, describe, expect, test } from 'vitest';
import { Dispatcher } from '../../src/dispatch/dispatcher.ts';
import { TransportError } from '../../src/error/dispatch.error.ts';
import type { RouteRequest } from '../../src/http/request.ts';
import { RouteResponse } from '../../src/http/response.ts';
import type { DispatchEvent } from '../../src/type/event.type.ts';
import type { SerializedResponse } from '../../src/type/http.type.ts';
import { buildRouteTree } from '../../runtime/memory/memory.source.ts';
import { MemoryTransport } from '../../runtime/memory/memory.transport.ts';
import { ServerLoop } from '../../server/server.loop.ts';

function text(response: SerializedResponse | null): string {
  return response ? new TextDecoder().decode(response.body) : '';
}

/** A promise plus its resolver, for holding handlers at a known point. */
function gate<T = void>(): { promise: Promise<T>; open: (value: T) => void } {
  let open: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

let loop: ServerLoop | undefined;

afterEach(async () => {
  await loop?.stop();
  loop = undefined;
});

async function startLoop(
  handlers: Record<string, Record<string, unknown>>,
  drainTimeoutMs = 1000,
): Promise<{ transport: MemoryTransport; events: DispatchEvent[]; loop: ServerLoop }> {
  const dispatcher = new Dispatcher(await buildRouteTree(handlers));
  const events: DispatchEvent[] = [];
  dispatcher.addEventListener((event) => events.push(event));

  const transport = new MemoryTransport();
  loop = new ServerLoop(dispatcher, transport, { drainTimeoutMs });
  await loop.start('127.0.0.1', 0);
  return { transport, events, loop };
}

describe('ServerLoop', () => {
  test('serves requests from the transport', async () => {
    const { transport } = await startLoop({ '/route.ts': { GET: () => RouteResponse.text('home') } });

    const response = await transport.send({ path: '/' });

    expect(response?.status).toBe(200);
    expect(text(response)).toBe('home');
  });

  test('a slow request does not hold up a fast one', async () => {
    const slow = gate();
    const order: string[] = [];
    const { transport } = await startLoop({
      '/slow/route.ts': {
        GET: async () => {
          await slow.promise;
          return RouteResponse.text('slow');
        },
      },
      '/fast/route.ts': { GET: () => RouteResponse.text('fast') },
    });

    const slowResponse = transport.send({ path: '/slow' }).then((r) => order.push(text(r)));
    const fastResponse = transport.send({ path: '/fast' }).then((r) => order.push(text(r)));

    await fastResponse;
    slow.open();
    await slowResponse;

    expect(order).toEqual(['fast', 'slow']);
  });

  test('cannot start twice', async () => {
    const { loop: running } = await startLoop({ '/route.ts': { GET: () => RouteResponse.text('x') } });

    await expect(running.start('127.0.0.1', 0)).rejects.toThrow('Server loop cannot start from state "running"');
  });

  test('disconnected client gets nothing and the dispatch is cancelled', async () => {
    const started = gate();
    const { transport, events } = await startLoop({
      '/wait/route.ts': {
        GET: (req: RouteRequest) =>
          new Promise((resolve) => {
            started.open();
            req.signal.addEventListener('abort', () => resolve(RouteResponse.text('gone')));
          }),
      },
    });

    const exchange = transport.open({ path: '/wait' });
    await started.promise;
    exchange.disconnect();

    expect(await exchange.response).toBeNull();
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(events.at(-1)?.type).toBe('request.cancelled');
  });

  test('a request body that fails mid-stream abandons the exchange', async () => {
    let handled = false;
    const { transport, events, loop: running } = await startLoop({
      '/upload/route.ts': {
        POST: () => {
          handled = true;
          return RouteResponse.text('stored');
        },
      },
    });

    async function* broken(): AsyncGenerator<Uint8Array> {
      yield new TextEncoder().encode('{"part":');
      throw new Error('stream broke');
    }

    const response = await transport.send({ method: 'POST', path: '/upload', body: broken() });

    expect(response).toBeNull();
    expect(handled).toBe(false);
    expect(events.at(-1)).toMatchObject({ type: 'request.abandoned', method: 'POST', path: '/upload' });
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(running.inFlightCount).toBe(0);
  });
});

describe('ServerLoop.stop', () => {
  test('drains in-flight requests', async () => {
    const started = gate();
    const release = gate();
    const { transport, loop: running } = await startLoop({
      '/work/route.ts': {
        GET: async () => {
          started.open();
          await release.promise;
          return RouteResponse.text('done');
        },
      },
    });

    const response = transport.send({ path: '/work' });
    await started.promise;
    expect(running.inFlightCount).toBe(1);

    const stopping = running.stop();
    release.open();

    expect(await stopping).toEqual({ completed: 1, abandoned: 0 });
    expect(text(await response)).toBe('done');
    expect(running.inFlightCount).toBe(0);
  });

  test('a second stop during the drain shares the first result', async () => {
    const started = gate();
    const release = gate();
    const { transport, loop: running } = await startLoop({
      '/work/route.ts': {
        GET: async () => {
          started.open();
          await release.promise;
          return RouteResponse.text('done');
        },
      },
    });

    const response = transport.send({ path: '/work' });
    await started.promise;

    const first = running.stop();
    const second = running.stop();
    release.open();

    expect(second).toBe(first);
    expect(await second).toEqual({ completed: 1, abandoned: 0 });
    expect(text(await response)).toBe('done');
  });

  test('abandons requests still running after the drain timeout', async () => {
    const started = gate();
    const { transport, events, loop: running } = await startLoop(
      {
        '/stuck/route.ts': {
          GET: (req: RouteRequest) =>
            new Promise((resolve) => {
              started.open();
              req.signal.addEventListener('abort', () => resolve(RouteResponse.text('late')));
            }),
        },
      },
      20,
    );

    const response = transport.send({ path: '/stuck' });
    await started.promise;

    expect(await running.stop()).toEqual({ completed: 0, abandoned: 1 });
    expect(await response).toBeNull();
    expect(events.some((e) => e.type === 'request.abandoned' && e.path === '/stuck')).toBe(true);
  });

  test('stops accepting new requests', async () => {
    const { transport, loop: running } = await startLoop({ '/route.ts': { GET: () => RouteResponse.text('x') } });

    expect(transport.isListening).toBe(true);
    await running.stop();

    expect(running.running).toBe(false);
    expect(transport.isListening).toBe(false);
    expect(() => transport.send({ path: '/' })).toThrow(TransportError);
  });

  test('stop without start reports nothing', async () => {
    const idle = new ServerLoop(new Dispatcher(await buildRouteTree({})), new MemoryTransport());

    expect(await idle.stop()).toEqual({ completed: 0, abandoned: 0 });
  });
});
