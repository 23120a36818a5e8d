/**
 * In-Memory Route Source
 *
 * Declares a route layout in code as a flat map of file path → module
 * exports. Directories are implied by the paths:
 *
 * ```ts
 * const tree = await buildRouteTree({
 *   '/route.ts': { GET: home },
 *   '/users/[id]/route.ts': { GET: showUser, DELETE: removeUser },
 * });
 * ```
 */

import { compileRoutes, type CompileOptions } from '../../src/route/route.compiler.ts';
import type { DirEntry, RouteSource } from '../../src/type/route-source.type.ts';
import { RouteSourceError } from '../../src/type/route-source.type.ts';
import type { RouteTree } from '../../src/type/route-tree.type.ts';

export type RouteFiles = Record<string, Record<string, unknown>>;

export class MemoryRouteSource implements RouteSource {
  private readonly dirs = new Map<string, Map<string, DirEntry>>([['/', new Map()]]);
  private readonly modules = new Map<string, Record<string, unknown>>();

  constructor(files: RouteFiles) {
    for (const [rawPath, exports] of Object.entries(files)) {
      const path = rawPath.startsWith('/') ? rawPath : `/${rawPath}`;
      const parts = path.slice(1).split('/');

      // Every prefix is a directory; the last part is the file
      let dir = '/';
      for (const name of parts.slice(0, -1)) {
        this.entriesOf(dir).set(name, { name, isFile: false, isDirectory: true });
        dir = dir === '/' ? `/${name}` : `${dir}/${name}`;
        this.entriesOf(dir);
      }

      const fileName = parts[parts.length - 1];
      this.entriesOf(dir).set(fileName, { name: fileName, isFile: true, isDirectory: false });
      this.modules.set(path, exports);
    }
  }

  async *readDir(path: string): AsyncIterable<DirEntry> {
    const normalized = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
    const entries = this.dirs.get(normalized);
    if (!entries) {
      throw new RouteSourceError(`Directory not found: ${path}`, 'NOT_FOUND');
    }
    for (const entry of entries.values()) yield entry;
  }

  loadModule(path: string): Promise<Record<string, unknown>> {
    const mod = this.modules.get(path);
    if (!mod) {
      return Promise.reject(new RouteSourceError(`File not found: ${path}`, 'NOT_FOUND'));
    }
    return Promise.resolve(mod);
  }

  private entriesOf(dir: string): Map<string, DirEntry> {
    let entries = this.dirs.get(dir);
    if (!entries) {
      entries = new Map();
      this.dirs.set(dir, entries);
    }
    return entries;
  }
}

/** Compile a route tree from an in-code file map. */
export function buildRouteTree(files: RouteFiles, options: CompileOptions = {}): Promise<RouteTree> {
  return compileRoutes(new MemoryRouteSource(files), options);
}
