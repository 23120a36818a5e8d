/**
 * pathwise
 *
 * Filesystem-routed HTTP dispatch: route tree compilation, matching, and
 * the per-request dispatcher. Runtime-neutral.
 *
 * For the server side, use the sub-exports:
 *   pathwise/server           — server loop, config, createRouteServer()
 *   pathwise/runtime/node     — node:fs route source, node:http transport
 *   pathwise/runtime/memory   — in-memory route source and transport
 */

// Types
export type { Handler, HandlerResult, HeadersLike, HttpMethod, RawRequest, ResponseLike, SerializedResponse } from './type/http.type.ts';
export { HTTP_METHODS, isHttpMethod } from './type/http.type.ts';

export type { RouteMatch, RouteNode, RouteSegment, RouteSummary, RouteTree } from './type/route-tree.type.ts';
export type { DirEntry, RouteSource } from './type/route-source.type.ts';
export { RouteSourceError } from './type/route-source.type.ts';

export type { DispatchEvent, DispatchEventListener, DispatchEventType } from './type/event.type.ts';

// Logging
export { type Logger, logger, setLogger } from './type/logger.type.ts';
export { type ConsoleLoggerOptions, createConsoleLogger, formatEvent, loggingListener } from './util/logger.util.ts';

// Errors
export {
  type RouteAmbiguityCode,
  RouteAmbiguityError,
  RouteCompileError,
  type RouteDefinitionCode,
  RouteDefinitionError,
} from './error/route.error.ts';
export {
  BadRequestError,
  DispatchError,
  type DispatchErrorCode,
  HandlerExecutionError,
  HandlerTimeoutError,
  MalformedResponseError,
  MethodNotAllowedError,
  PayloadTooLargeError,
  TransportError,
  UnboundRouteError,
} from './error/dispatch.error.ts';

// Routing
export { type CompileOptions, compileRoutes, DEFAULT_HANDLER_FILE_NAME, HANDLER_FILE_EXTENSIONS } from './route/route.compiler.ts';
export { matchRoute, normalizePath } from './route/route.matcher.ts';

// HTTP
export { type QueryParams, type ReadonlyHeaders, RouteRequest } from './http/request.ts';
export { type ResponseBody, RouteResponse, type RouteResponseInit, serializeResponse } from './http/response.ts';

// Dispatch
export { DEFAULT_MAX_BODY_SIZE, type DispatchContext, Dispatcher, type DispatcherOptions } from './dispatch/dispatcher.ts';
