/**
 * Server Loop
 *
 * Pulls exchanges from a transport and dispatches each one as an
 * independent unit of work. Completion order is whatever the handlers make
 * it; nothing here waits on one request before accepting the next.
 *
 * Shutdown is cooperative: `stop()` stops accepting, waits up to
 * `drainTimeoutMs` for in-flight dispatches, then abandons and reports the
 * ones still running.
 */

import { randomUUID } from 'node:crypto';
import type { Dispatcher } from '../src/dispatch/dispatcher.ts';
import { TransportError } from '../src/error/dispatch.error.ts';
import { normalizePath } from '../src/route/route.matcher.ts';
import { logger } from '../src/type/logger.type.ts';
import type { Exchange, Transport } from './transport.type.ts';

export const DEFAULT_DRAIN_TIMEOUT_MS = 10_000;

export interface ServerLoopOptions {
  /** How long stop() waits for in-flight requests (default: 10s). */
  drainTimeoutMs?: number;
}

export interface StopResult {
  /** In-flight requests that finished during the drain. */
  completed: number;
  /** Requests still running when the drain bound expired. */
  abandoned: number;
}

type LoopState = 'idle' | 'running' | 'stopping' | 'stopped';

interface InFlight {
  readonly exchange: Exchange;
  readonly requestId: string;
  task?: Promise<void>;
}

export class ServerLoop {
  private readonly inFlight = new Set<InFlight>();
  private readonly drainTimeoutMs: number;
  private state: LoopState = 'idle';
  private accepting?: Promise<void>;
  private stopping?: Promise<StopResult>;

  constructor(
    readonly dispatcher: Dispatcher,
    private readonly transport: Transport,
    options: ServerLoopOptions = {},
  ) {
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
  }

  /** Number of dispatches currently running. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  get running(): boolean {
    return this.state === 'running';
  }

  /**
   * Start listening and accepting. Resolves once the transport listens;
   * accepting continues in the background until stop().
   */
  async start(address: string, port: number): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error(`Server loop cannot start from state "${this.state}"`);
    }
    await this.transport.listen(address, port);
    this.state = 'running';
    this.accepting = this.accept();
    logger.info(`Listening on http://${address}:${port}`);
  }

  /**
   * Stop accepting, drain in-flight requests, abandon what is left.
   * Later calls share the first call's result.
   */
  stop(): Promise<StopResult> {
    if (this.stopping) return this.stopping;
    if (this.state !== 'running') {
      return Promise.resolve({ completed: 0, abandoned: 0 });
    }
    this.state = 'stopping';
    this.stopping = this.shutdown();
    return this.stopping;
  }

  // ── Private ───────────────────────────────────────────────────────────

  private async shutdown(): Promise<StopResult> {
    await this.transport.close();
    await this.accepting;

    const pending = [...this.inFlight];
    const drained = await this.drain(pending);

    const leftovers = drained ? [] : [...this.inFlight];
    for (const entry of leftovers) {
      this.abandon(entry, `not finished after ${this.drainTimeoutMs}ms drain`);
    }

    this.state = 'stopped';
    logger.info(`Server stopped (${pending.length - leftovers.length} drained, ${leftovers.length} abandoned)`);
    return { completed: pending.length - leftovers.length, abandoned: leftovers.length };
  }

  private async accept(): Promise<void> {
    try {
      for await (const exchange of this.transport) {
        this.track(exchange);
      }
    } catch (e) {
      logger.error('Transport stopped yielding requests', e);
    }
  }

  private track(exchange: Exchange): void {
    const entry: InFlight = { exchange, requestId: randomUUID() };
    this.inFlight.add(entry);
    entry.task = this.serve(entry).finally(() => this.inFlight.delete(entry));
  }

  /**
   * Dispatch one exchange and write its response. Never rejects: a failed
   * body read or write abandons the exchange.
   */
  private async serve(entry: InFlight): Promise<void> {
    const { exchange, requestId } = entry;
    const { method, path } = exchange.request;
    try {
      const response = await this.dispatcher.dispatch(exchange.request, {
        signal: exchange.signal,
        requestId,
      });
      if (response === null || exchange.signal.aborted) return;
      await exchange.respond(response);
    } catch (e) {
      const error = e instanceof TransportError
        ? e
        : new TransportError(`Failed to serve ${method} ${path}`, { cause: e });
      logger.error(`${method} ${path}: ${error.message}`, error.cause ?? error);
      this.abandon(entry, error.message);
    }
  }

  /** Resolves true when every task settles within the drain bound. */
  private async drain(entries: readonly InFlight[]): Promise<boolean> {
    if (entries.length === 0) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.drainTimeoutMs);
    });
    const settled = Promise.allSettled(entries.map((entry) => entry.task)).then(() => true as const);

    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private abandon({ exchange, requestId }: InFlight, reason: string): void {
    const method = exchange.request.method.toUpperCase();
    const path = normalizePath(exchange.request.path);
    exchange.abandon();
    this.dispatcher.emit({ type: 'request.abandoned', requestId, method, path });
    logger.warn(`Abandoned ${method} ${path}: ${reason}`);
  }
}
