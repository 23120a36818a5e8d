/**
 * Node Filesystem Route Source
 *
 * Reads the routes directory with node:fs and loads handler files with
 * dynamic import(). Source paths ("/users/[id]/route.ts") are resolved
 * against the root directory given to the constructor.
 */

import { opendir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { DirEntry, RouteSource } from '../../src/type/route-source.type.ts';
import { RouteSourceError } from '../../src/type/route-source.type.ts';

/** Map node:fs error codes to RouteSourceError codes. */
function mapErrorCode(err: unknown): 'NOT_FOUND' | 'PERMISSION_DENIED' | 'UNKNOWN' {
  const code = err instanceof Error && 'code' in err ? err.code : undefined;
  if (code === 'ENOENT' || code === 'ENOTDIR') return 'NOT_FOUND';
  if (code === 'EACCES' || code === 'EPERM') return 'PERMISSION_DENIED';
  return 'UNKNOWN';
}

function isModuleNamespace(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export class NodeFsRouteSource implements RouteSource {
  readonly root: string;

  constructor(root: string) {
    const abs = resolve(root);
    this.root = abs.endsWith('/') ? abs.slice(0, -1) : abs;
  }

  async *readDir(path: string): AsyncIterable<DirEntry> {
    const fullPath = this.root + path;
    let dir;
    try {
      dir = await opendir(fullPath);
    } catch (error) {
      const code = mapErrorCode(error);
      throw new RouteSourceError(
        code === 'NOT_FOUND' ? `Directory not found: ${fullPath}` : `${error}`,
        code,
        { cause: error },
      );
    }

    for await (const entry of dir) {
      yield {
        name: entry.name,
        isFile: entry.isFile(),
        isDirectory: entry.isDirectory(),
      };
    }
  }

  async loadModule(path: string): Promise<Record<string, unknown>> {
    const mod: unknown = await import(pathToFileURL(this.root + path).href);
    if (!isModuleNamespace(mod)) {
      throw new RouteSourceError(`Not a module: ${this.root + path}`, 'UNKNOWN');
    }
    return mod;
  }
}
