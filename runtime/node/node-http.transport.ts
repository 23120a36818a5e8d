/**
 * Node HTTP Transport
 *
 * Adapts node:http to the Transport interface. Each incoming request is
 * queued as an Exchange; the server loop pulls them with `for await`.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { TransportError } from '../../src/error/dispatch.error.ts';
import { splitTarget } from '../../src/http/request.ts';
import type { RawRequest, SerializedResponse } from '../../src/type/http.type.ts';
import { logger } from '../../src/type/logger.type.ts';
import { AsyncQueue } from '../../src/util/async-queue.util.ts';
import type { Exchange, Transport } from '../../server/transport.type.ts';

const encoder = new TextEncoder();

/**
 * Request body as an async iterable. It has no `return()`, so a consumer
 * that stops early (413) leaves the stream and its socket intact.
 */
class RequestBody implements AsyncIterable<Uint8Array> {
  started = false;
  finished = false;

  constructor(private readonly req: IncomingMessage) {}

  /** Reading began but stopped before the end of the body. */
  get partial(): boolean {
    return this.started && !this.finished;
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    const source: AsyncIterator<unknown> = this.req[Symbol.asyncIterator]();
    return {
      next: async (): Promise<IteratorResult<Uint8Array>> => {
        this.started = true;
        const result = await source.next();
        if (result.done) {
          this.finished = true;
          return { done: true, value: undefined };
        }
        const chunk = result.value;
        return { done: false, value: chunk instanceof Uint8Array ? chunk : encoder.encode(String(chunk)) };
      },
    };
  }
}

function headerPairs(raw: readonly string[]): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    pairs.push([raw[i], raw[i + 1]]);
  }
  return pairs;
}

function toRawRequest(req: IncomingMessage, body: RequestBody): RawRequest {
  const { path, query } = splitTarget(req.url ?? '/');
  return {
    method: req.method ?? 'GET',
    path,
    query,
    headers: headerPairs(req.rawHeaders),
    body,
    remoteAddress: req.socket.remoteAddress,
  };
}

export class NodeHttpTransport implements Transport {
  private server?: Server;
  private queue = new AsyncQueue<Exchange>();
  private closing = false;

  /** Address actually bound (useful with port 0). */
  address(): AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  async listen(address: string, port: number): Promise<void> {
    if (this.server) throw new TransportError('Transport is already listening');

    this.queue = new AsyncQueue<Exchange>();
    this.closing = false;
    const server = createServer((req, res) => this.accept(req, res));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, address, () => {
        server.off('error', reject);
        resolve();
      });
    });
  }

  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();

    this.closing = true;
    this.queue.end();
    // Stops listening now; the callback fires once open connections end.
    server.close((err) => {
      if (err) logger.warn(`HTTP server close: ${err.message}`);
    });
    server.closeIdleConnections();
    this.server = undefined;
    return Promise.resolve();
  }

  [Symbol.asyncIterator](): AsyncIterator<Exchange> {
    return this.queue[Symbol.asyncIterator]();
  }

  private accept(req: IncomingMessage, res: ServerResponse): void {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort(new TransportError('Client disconnected'));
      }
    });

    const body = new RequestBody(req);
    const exchange: Exchange = {
      request: toRawRequest(req, body),
      signal: controller.signal,
      respond: (response) => this.write(res, response, body.partial),
      abandon: () => {
        controller.abort(new TransportError('Request abandoned'));
        res.destroy();
      },
    };

    if (!this.queue.push(exchange)) {
      res.destroy();
    }
  }

  private write(res: ServerResponse, response: SerializedResponse, bodyUnread: boolean): Promise<void> {
    if (res.destroyed || res.writableEnded) {
      return Promise.reject(new TransportError('Connection closed before response was written'));
    }

    const flat: string[] = [];
    for (const [name, value] of response.headers) flat.push(name, value);
    // The rest of a partly read body cannot be skipped on a kept-alive socket.
    if (this.closing || bodyUnread) flat.push('connection', 'close');

    return new Promise((resolve, reject) => {
      res.once('error', (err) => reject(new TransportError('Failed to write response', { cause: err })));
      res.writeHead(response.status, flat);
      res.end(response.body, () => resolve());
    });
  }
}
