/**
 * Logger Interface
 *
 * Minimal pluggable logger. Structurally compatible with console and with
 * most structured loggers, so any of them can be passed to setLogger().
 *
 * Default: no-op. Call setLogger() at startup to wire one in.
 */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, error?: unknown): void;
}

const noop = () => {};

/** Module-level logger. Always callable — defaults to no-op. */
export const logger: Logger = { info: noop, warn: noop, error: noop };

/** Replace the logger implementation. Call once at startup. */
export function setLogger(impl: Logger): void {
  logger.info = impl.info.bind(impl);
  logger.warn = impl.warn.bind(impl);
  logger.error = impl.error.bind(impl);
}
