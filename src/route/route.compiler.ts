/**
 * Route Compiler
 *
 * Walks a RouteSource and builds the immutable RouteNode tree.
 *
 * Directory conventions:
 * - `users/` → static segment "users"
 * - `[id]/` → dynamic segment, binds one path segment to `id`
 * - `[...path]/` → catch-all, binds the rest of the path to `path`
 * - `_private/`, `.hidden/` → ignored
 *
 * A directory's handler file (`route.ts` by default) exports one function
 * per HTTP method (`export async function GET(req) {...}`). It binds those
 * methods on the directory's own node; the file is not a path segment.
 *
 * Every structural problem is fatal. Entries are visited in sorted order so
 * the same layout always yields the same tree and the same error.
 */

import { RouteDefinitionError } from '../error/route.error.ts';
import type { Handler } from '../type/http.type.ts';
import { isHttpMethod } from '../type/http.type.ts';
import type { RouteTree } from '../type/route-tree.type.ts';
import type { DirEntry, RouteSource } from '../type/route-source.type.ts';
import { RouteSourceError } from '../type/route-source.type.ts';
import {
  attachChild,
  createDraft,
  createTree,
  parseSegment,
  type RouteNodeDraft,
} from './route-tree.util.ts';

export const DEFAULT_HANDLER_FILE_NAME = 'route';

/** Extensions a handler file may carry. */
export const HANDLER_FILE_EXTENSIONS = ['ts', 'mts', 'js', 'mjs'] as const;

/** Export names that declare a method binding. */
const METHOD_EXPORT = /^[A-Z]+$/;

export interface CompileOptions {
  /** Base name of the per-directory handler file (default: "route"). */
  handlerFileName?: string;
}

function isHandler(value: unknown): value is Handler {
  return typeof value === 'function';
}

function isHandlerFile(name: string, baseName: string): boolean {
  return HANDLER_FILE_EXTENSIONS.some((ext) => name === `${baseName}.${ext}`);
}

function isIgnored(name: string): boolean {
  return name.startsWith('.') || name.startsWith('_');
}

function childPath(dir: string, name: string): string {
  return dir.endsWith('/') ? `${dir}${name}` : `${dir}/${name}`;
}

/** Read a directory fully and sort its entries by name. */
async function readSorted(source: RouteSource, dir: string): Promise<DirEntry[]> {
  const entries: DirEntry[] = [];
  for await (const entry of source.readDir(dir)) {
    entries.push(entry);
  }
  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function loadHandlerModule(source: RouteSource, path: string): Promise<Record<string, unknown>> {
  try {
    return await source.loadModule(path);
  } catch (error) {
    throw new RouteDefinitionError(`Failed to load handler file ${path}`, 'MODULE_LOAD_FAILED', path, {
      cause: error,
    });
  }
}

/** Bind every method export of a handler module onto a node. */
function bindModule(node: RouteNodeDraft, mod: Record<string, unknown>, path: string): void {
  for (const name of Object.keys(mod).sort()) {
    if (!METHOD_EXPORT.test(name)) continue;

    if (!isHttpMethod(name)) {
      throw new RouteDefinitionError(`Unknown method export "${name}" in ${path}`, 'UNKNOWN_METHOD', path);
    }

    const value = mod[name];
    if (!isHandler(value)) {
      throw new RouteDefinitionError(`Export "${name}" in ${path} is not a function`, 'INVALID_HANDLER', path);
    }

    const previous = node.boundBy.get(name);
    if (previous !== undefined) {
      throw new RouteDefinitionError(
        `Method ${name} for ${node.pattern} is bound twice (${previous}, ${path})`,
        'DUPLICATE_METHOD',
        path,
      );
    }

    node.handlers.set(name, value);
    node.boundBy.set(name, path);
  }
}

async function compileDirectory(
  source: RouteSource,
  dir: string,
  node: RouteNodeDraft,
  ancestors: readonly RouteNodeDraft[],
  handlerFileName: string,
): Promise<void> {
  const entries = await readSorted(source, dir);
  await compileEntries(source, dir, entries, node, ancestors, handlerFileName);
}

async function compileEntries(
  source: RouteSource,
  dir: string,
  entries: readonly DirEntry[],
  node: RouteNodeDraft,
  ancestors: readonly RouteNodeDraft[],
  handlerFileName: string,
): Promise<void> {
  const lineage = [...ancestors, node];

  for (const entry of entries) {
    if (!entry.isFile || !isHandlerFile(entry.name, handlerFileName)) continue;
    const path = childPath(dir, entry.name);
    bindModule(node, await loadHandlerModule(source, path), path);
  }

  for (const entry of entries) {
    if (!entry.isDirectory || isIgnored(entry.name)) continue;
    const path = childPath(dir, entry.name);
    const child = attachChild(node, parseSegment(entry.name, path), path, lineage);
    await compileDirectory(source, path, child, lineage, handlerFileName);
  }
}

/**
 * Compile a route tree from a source. Throws a RouteCompileError subclass
 * on the first structural problem; no partial tree is ever returned.
 */
export async function compileRoutes(source: RouteSource, options: CompileOptions = {}): Promise<RouteTree> {
  const handlerFileName = options.handlerFileName ?? DEFAULT_HANDLER_FILE_NAME;
  const root = createDraft({ kind: 'static', value: '' }, '/', '/');

  let entries: DirEntry[];
  try {
    entries = await readSorted(source, '/');
  } catch (error) {
    if (error instanceof RouteSourceError && error.code === 'NOT_FOUND') {
      throw new RouteDefinitionError('Routes directory not found', 'ROOT_NOT_FOUND', '/', { cause: error });
    }
    throw error;
  }

  await compileEntries(source, '/', entries, root, [], handlerFileName);
  return createTree(root);
}
