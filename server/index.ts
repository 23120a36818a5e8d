export { createRouteServer, type RouteServer, type RouteServerOptions } from './route.server.ts';
export {
  ConfigError,
  DEFAULT_ROUTES_DIR,
  loadConfig,
  parseConfig,
  type ServerConfig,
  type ServerConfigInput,
  serverConfigSchema,
} from './server.config.ts';
export { DEFAULT_DRAIN_TIMEOUT_MS, ServerLoop, type ServerLoopOptions, type StopResult } from './server.loop.ts';
export type { Exchange, Transport } from './transport.type.ts';
