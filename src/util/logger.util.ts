/**
 * Logger Utility
 *
 * Console-backed Logger and the listener that turns dispatch events into
 * access-log lines:
 *
 *   [pathwise] 14:02:11 GET /users/42 → 200 (3.1ms)
 */

import type { DispatchEvent, DispatchEventListener } from '../type/event.type.ts';
import type { Logger } from '../type/logger.type.ts';

const PREFIX = '[pathwise]';

export interface ConsoleLoggerOptions {
  /** Suppress info lines (warnings and errors are always shown). */
  quiet?: boolean;
}

/** Logger that writes prefixed lines to the console. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info(msg: string): void {
      if (options.quiet) return;
      console.log(PREFIX, msg);
    },
    warn(msg: string): void {
      console.warn(PREFIX, msg);
    },
    error(msg: string, error?: unknown): void {
      if (error !== undefined) {
        console.error(PREFIX, msg, error);
      } else {
        console.error(PREFIX, msg);
      }
    },
  };
}

function clock(): string {
  return new Date().toTimeString().slice(0, 8);
}

/** Format an event as a single log line, or null for events not worth a line. */
export function formatEvent(event: DispatchEvent): string | null {
  const request = `${event.method} ${event.path}`;
  switch (event.type) {
    case 'response.sent':
      return `${request} → ${event.status} (${event.durationMs.toFixed(1)}ms)`;
    case 'handler.failed':
      return `${request} handler ${event.pattern} failed`;
    case 'handler.timeout':
      return `${request} handler ${event.pattern} timed out after ${event.timeoutMs}ms`;
    case 'response.malformed':
      return `${request} handler ${event.pattern} returned a malformed response: ${event.issues.join('; ')}`;
    case 'request.rejected':
      return `${request} rejected with ${event.status}: ${event.reason}`;
    case 'request.cancelled':
      return `${request} cancelled by client`;
    case 'request.abandoned':
      return `${request} abandoned at shutdown`;
    default:
      return null;
  }
}

/** Route dispatch events to a Logger at the matching level. */
export function loggingListener(target: Logger): DispatchEventListener {
  return (event) => {
    const line = formatEvent(event);
    if (line === null) return;

    switch (event.type) {
      case 'handler.failed':
        target.error(`${clock()} ${line}`, event.error);
        return;
      case 'handler.timeout':
      case 'response.malformed':
        target.error(`${clock()} ${line}`);
        return;
      case 'request.abandoned':
      case 'request.cancelled':
        target.warn(`${clock()} ${line}`);
        return;
      default:
        target.info(`${clock()} ${line}`);
    }
  };
}
