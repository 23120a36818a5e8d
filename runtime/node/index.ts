export { NodeFsRouteSource } from './node-fs.source.ts';
export { NodeHttpTransport } from './node-http.transport.ts';
