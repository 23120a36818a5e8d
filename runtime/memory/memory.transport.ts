/**
 * In-Memory Transport
 *
 * A Transport with no sockets. Requests are injected with `send()` or
 * `open()` and their responses come back as promises, so the whole
 * accept → dispatch → respond path runs inside one process.
 */

import { TransportError } from '../../src/error/dispatch.error.ts';
import { splitTarget } from '../../src/http/request.ts';
import type { RawRequest, SerializedResponse } from '../../src/type/http.type.ts';
import { AsyncQueue } from '../../src/util/async-queue.util.ts';
import type { Exchange, Transport } from '../../server/transport.type.ts';

export interface MemoryRequestInit {
  method?: string;
  /** Request target; may carry a query string ("/users?page=2"). */
  path: string;
  headers?: Record<string, string> | Array<[string, string]>;
  body?: string | Uint8Array | AsyncIterable<Uint8Array>;
  remoteAddress?: string;
}

export interface OpenExchange {
  /** Resolves with the written response, or null when none was written. */
  readonly response: Promise<SerializedResponse | null>;
  /** Simulate the client going away. */
  disconnect(): void;
}

const encoder = new TextEncoder();

function toRawRequest(init: MemoryRequestInit): RawRequest {
  const { path, query } = splitTarget(init.path);
  const headers = Array.isArray(init.headers) ? init.headers : Object.entries(init.headers ?? {});
  const body = typeof init.body === 'string' ? encoder.encode(init.body) : init.body ?? new Uint8Array();
  return {
    method: init.method ?? 'GET',
    path,
    query,
    headers,
    body,
    remoteAddress: init.remoteAddress ?? '127.0.0.1',
  };
}

export class MemoryTransport implements Transport {
  private queue = new AsyncQueue<Exchange>();
  private listening = false;

  constructor() {
    this.queue.end();
  }

  get isListening(): boolean {
    return this.listening;
  }

  listen(_address: string, _port: number): Promise<void> {
    if (this.listening) {
      return Promise.reject(new TransportError('Transport is already listening'));
    }
    this.queue = new AsyncQueue<Exchange>();
    this.listening = true;
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.listening = false;
    this.queue.end();
    return Promise.resolve();
  }

  [Symbol.asyncIterator](): AsyncIterator<Exchange> {
    return this.queue[Symbol.asyncIterator]();
  }

  /** Inject a request and wait for its response. */
  send(init: MemoryRequestInit): Promise<SerializedResponse | null> {
    return this.open(init).response;
  }

  /** Inject a request, keeping a handle to disconnect it. */
  open(init: MemoryRequestInit): OpenExchange {
    const controller = new AbortController();
    let settle: (response: SerializedResponse | null) => void = () => {};
    let settled = false;
    const response = new Promise<SerializedResponse | null>((resolve) => {
      settle = (value) => {
        if (settled) return;
        settled = true;
        resolve(value);
      };
    });

    const exchange: Exchange = {
      request: toRawRequest(init),
      signal: controller.signal,
      respond: (written) => {
        if (settled || controller.signal.aborted) {
          return Promise.reject(new TransportError('Connection closed before response was written'));
        }
        settle(written);
        return Promise.resolve();
      },
      abandon: () => {
        controller.abort(new TransportError('Request abandoned'));
        settle(null);
      },
    };

    const disconnect = () => {
      controller.abort(new TransportError('Client disconnected'));
      settle(null);
    };

    if (!this.queue.push(exchange)) {
      throw new TransportError('Transport is not listening');
    }
    return { response, disconnect };
  }
}
