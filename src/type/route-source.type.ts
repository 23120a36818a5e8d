/**
 * Route Source
 *
 * Abstraction over the project layout the route compiler reads. Lets the
 * compiler work against the real filesystem or an in-memory declaration.
 * Paths are slash-separated and rooted at the source's own root ("/").
 */

export interface DirEntry {
  name: string;
  isFile: boolean;
  isDirectory: boolean;
}

export interface RouteSource {
  /** Read directory entries. Throws RouteSourceError('NOT_FOUND') for a missing directory. */
  readDir(path: string): AsyncIterable<DirEntry>;

  /** Load a handler file and return its module namespace (export name → value). */
  loadModule(path: string): Promise<Record<string, unknown>>;
}

export class RouteSourceError extends Error {
  constructor(
    message: string,
    public readonly code: 'NOT_FOUND' | 'PERMISSION_DENIED' | 'UNKNOWN',
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RouteSourceError';
  }
}
