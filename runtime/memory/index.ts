export { buildRouteTree, MemoryRouteSource, type RouteFiles } from './memory.source.ts';
export { MemoryTransport, type MemoryRequestInit, type OpenExchange } from './memory.transport.ts';
