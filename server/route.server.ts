/**
 * Route Server
 *
 * Wires the pieces together: config → compiled route tree → dispatcher →
 * server loop over a transport. Node's filesystem and node:http are used
 * unless other implementations are passed in.
 *
 * @example
 * ```ts
 * setLogger(createConsoleLogger());
 * const server = await createRouteServer({ routesDir: './api' });
 * await server.listen('0.0.0.0', 8080);
 * process.on('SIGTERM', () => server.stop());
 * ```
 */

import { Dispatcher } from '../src/dispatch/dispatcher.ts';
import { compileRoutes } from '../src/route/route.compiler.ts';
import { logger } from '../src/type/logger.type.ts';
import type { RouteSource } from '../src/type/route-source.type.ts';
import type { RouteTree } from '../src/type/route-tree.type.ts';
import { loggingListener } from '../src/util/logger.util.ts';
import { NodeFsRouteSource } from '../runtime/node/node-fs.source.ts';
import { NodeHttpTransport } from '../runtime/node/node-http.transport.ts';
import { parseConfig, type ServerConfig, type ServerConfigInput } from './server.config.ts';
import { ServerLoop, type StopResult } from './server.loop.ts';
import type { Transport } from './transport.type.ts';

export interface RouteServerOptions {
  /** Where route directories and handler modules come from (default: routesDir on disk). */
  source?: RouteSource;
  /** Where exchanges come from (default: node:http). */
  transport?: Transport;
}

export interface RouteServer {
  readonly config: ServerConfig;
  readonly tree: RouteTree;
  readonly dispatcher: Dispatcher;
  readonly loop: ServerLoop;
  listen(address: string, port: number): Promise<void>;
  stop(): Promise<StopResult>;
}

/** Log the compiled route table, one line per pattern. */
function logRoutes(tree: RouteTree): void {
  if (tree.routes.length === 0) {
    logger.warn('No routes found');
    return;
  }
  const width = Math.max(...tree.routes.map((route) => route.pattern.length));
  logger.info(`${tree.routes.length} route(s):`);
  for (const route of tree.routes) {
    logger.info(`  ${route.pattern.padEnd(width)}  ${route.methods.join(', ')}`);
  }
}

/**
 * Create a route server. Compiles the routes directory eagerly, so an
 * ambiguous or malformed tree fails here rather than on first request.
 */
export async function createRouteServer(
  input: ServerConfigInput = {},
  options: RouteServerOptions = {},
): Promise<RouteServer> {
  const config = parseConfig(input);

  const source = options.source ?? new NodeFsRouteSource(config.routesDir);
  const tree = await compileRoutes(source, { handlerFileName: config.handlerFileName });
  logRoutes(tree);

  const dispatcher = new Dispatcher(tree, {
    maxBodySize: config.maxBodySize,
    handlerTimeoutMs: config.handlerTimeoutMs,
    verboseErrors: config.verboseErrors,
    serverName: config.serverName,
  });
  dispatcher.addEventListener(loggingListener(logger));

  const loop = new ServerLoop(dispatcher, options.transport ?? new NodeHttpTransport(), {
    drainTimeoutMs: config.drainTimeoutMs,
  });

  return {
    config,
    tree,
    dispatcher,
    loop,
    listen: (address, port) => loop.start(address, port),
    stop: () => loop.stop(),
  };
}
