/**
 * Transport
 *
 * What the server loop needs from the layer that owns sockets and wire
 * parsing. A transport yields one Exchange per parsed request and writes
 * back whatever the dispatcher produces.
 */

import type { RawRequest, SerializedResponse } from '../src/type/http.type.ts';

export interface Exchange {
  readonly request: RawRequest;

  /** Aborts when the client disconnects before a response is written. */
  readonly signal: AbortSignal;

  /** Write the response. Rejects with TransportError when the connection is gone. */
  respond(response: SerializedResponse): Promise<void>;

  /** Drop the exchange without a response (used at shutdown). Aborts `signal`. */
  abandon(): void;
}

/**
 * Source of exchanges. Iteration yields exchanges until `close()` is called.
 */
export interface Transport extends AsyncIterable<Exchange> {
  /** Start accepting requests on the given address. */
  listen(address: string, port: number): Promise<void>;

  /** Stop accepting requests and end iteration. Exchanges already yielded stay usable. */
  close(): Promise<void>;
}
