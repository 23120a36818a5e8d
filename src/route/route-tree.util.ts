/**
 * Route Tree Utilities
 *
 * Pure functions for building a RouteNode tree from directory names.
 * The compiler works on mutable RouteNodeDraft values, then freezes them
 * into RouteNode in one pass.
 */

import { RouteAmbiguityError, RouteDefinitionError } from '../error/route.error.ts';
import type { Handler, HttpMethod } from '../type/http.type.ts';
import { HTTP_METHODS } from '../type/http.type.ts';
import type { RouteNode, RouteSegment, RouteSummary, RouteTree } from '../type/route-tree.type.ts';

const PARAM_NAME = /^[A-Za-z_$][\w$-]*$/;

/** Mutable node used during compilation. */
export interface RouteNodeDraft {
  segment: RouteSegment;
  pattern: string;
  /** Source directory, for error messages. */
  source: string;
  children: Map<string, RouteNodeDraft>;
  dynamic?: RouteNodeDraft;
  catchAll?: RouteNodeDraft;
  handlers: Map<HttpMethod, Handler>;
  /** Handler file that bound each method, for duplicate reports. */
  boundBy: Map<HttpMethod, string>;
}

/**
 * Classify a directory name.
 *
 * - "[...name]" → catch-all
 * - "[name]" → dynamic
 * - anything else → static literal
 */
export function parseSegment(name: string, source: string): RouteSegment {
  if (!name.startsWith('[') || !name.endsWith(']')) {
    if (name.includes('[') || name.includes(']')) {
      throw new RouteDefinitionError(`Malformed segment "${name}" in ${source}`, 'INVALID_SEGMENT', source);
    }
    return { kind: 'static', value: name };
  }

  const inner = name.slice(1, -1);
  const kind = inner.startsWith('...') ? 'catchAll' : 'dynamic';
  const param = kind === 'catchAll' ? inner.slice(3) : inner;

  if (!PARAM_NAME.test(param)) {
    throw new RouteDefinitionError(`Invalid parameter name in "${name}" (${source})`, 'INVALID_SEGMENT', source);
  }

  return { kind, param };
}

/** Render a segment the way it appears in a route pattern. */
export function formatSegment(segment: RouteSegment): string {
  switch (segment.kind) {
    case 'static':
      return segment.value;
    case 'dynamic':
      return `:${segment.param}`;
    case 'catchAll':
      return `*${segment.param}`;
  }
}

export function joinPattern(parent: string, segment: RouteSegment): string {
  const part = formatSegment(segment);
  return parent === '/' ? `/${part}` : `${parent}/${part}`;
}

export function createDraft(segment: RouteSegment, pattern: string, source: string): RouteNodeDraft {
  return {
    segment,
    pattern,
    source,
    children: new Map(),
    handlers: new Map(),
    boundBy: new Map(),
  };
}

/** Params already bound on the branch from the root down to (and including) a node. */
export function branchParams(ancestors: readonly RouteNodeDraft[]): Set<string> {
  const params = new Set<string>();
  for (const node of ancestors) {
    if (node.segment.kind !== 'static') params.add(node.segment.param);
  }
  return params;
}

/**
 * Attach a child for a directory entry, enforcing the sibling rules:
 * one dynamic child, one catch-all child, no param name reused on a branch.
 */
export function attachChild(
  parent: RouteNodeDraft,
  segment: RouteSegment,
  source: string,
  ancestors: readonly RouteNodeDraft[],
): RouteNodeDraft {
  if (parent.segment.kind === 'catchAll') {
    throw new RouteAmbiguityError(
      `Catch-all segment ${parent.pattern} must be the last segment of its branch (found ${source})`,
      'CATCH_ALL_NOT_TERMINAL',
      parent.source,
    );
  }

  if (segment.kind !== 'static' && branchParams(ancestors).has(segment.param)) {
    throw new RouteAmbiguityError(
      `Parameter "${segment.param}" is bound twice on ${joinPattern(parent.pattern, segment)}`,
      'DUPLICATE_PARAM',
      source,
    );
  }

  const child = createDraft(segment, joinPattern(parent.pattern, segment), source);

  switch (segment.kind) {
    case 'static':
      parent.children.set(segment.value, child);
      return child;
    case 'dynamic':
      if (parent.dynamic) {
        throw new RouteAmbiguityError(
          `Multiple dynamic segments under ${parent.pattern}: ` +
            `${formatSegment(parent.dynamic.segment)}, ${formatSegment(segment)}`,
          'AMBIGUOUS_DYNAMIC',
          parent.source,
        );
      }
      parent.dynamic = child;
      return child;
    case 'catchAll':
      if (parent.catchAll) {
        throw new RouteAmbiguityError(
          `Multiple catch-all segments under ${parent.pattern}: ` +
            `${formatSegment(parent.catchAll.segment)}, ${formatSegment(segment)}`,
          'AMBIGUOUS_CATCH_ALL',
          parent.source,
        );
      }
      parent.catchAll = child;
      return child;
  }
}

/**
 * Read-only view over a Map. Object.freeze leaves a Map's entries writable,
 * so frozen nodes hold these instead; there is no set, delete or clear.
 */
export class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  readonly #map: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.#map = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.#map.size;
  }

  get(key: K): V | undefined {
    return this.#map.get(key);
  }

  has(key: K): boolean {
    return this.#map.has(key);
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    for (const [key, value] of this.#map) callback.call(thisArg, value, key, this);
  }

  keys(): IterableIterator<K> {
    return this.#map.keys();
  }

  values(): IterableIterator<V> {
    return this.#map.values();
  }

  entries(): IterableIterator<[K, V]> {
    return this.#map.entries();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.#map[Symbol.iterator]();
  }
}

/** Convert a draft tree into frozen RouteNodes with sorted static children. */
export function freezeNode(draft: RouteNodeDraft): RouteNode {
  const children = new Map<string, RouteNode>();
  for (const key of [...draft.children.keys()].sort()) {
    const child = draft.children.get(key);
    if (child) children.set(key, freezeNode(child));
  }

  const handlers = new Map<HttpMethod, Handler>();
  for (const method of HTTP_METHODS) {
    const handler = draft.handlers.get(method);
    if (handler) handlers.set(method, handler);
  }

  return Object.freeze({
    segment: Object.freeze({ ...draft.segment }),
    pattern: draft.pattern,
    children: new FrozenMap(children),
    dynamic: draft.dynamic ? freezeNode(draft.dynamic) : undefined,
    catchAll: draft.catchAll ? freezeNode(draft.catchAll) : undefined,
    handlers: new FrozenMap(handlers),
  });
}

/** Collect every node with bindings, sorted by pattern. */
export function summarizeRoutes(root: RouteNode): RouteSummary[] {
  const routes: RouteSummary[] = [];

  function walk(node: RouteNode): void {
    if (node.handlers.size > 0) {
      routes.push(Object.freeze({ pattern: node.pattern, methods: Object.freeze([...node.handlers.keys()]) }));
    }
    for (const child of node.children.values()) walk(child);
    if (node.dynamic) walk(node.dynamic);
    if (node.catchAll) walk(node.catchAll);
  }

  walk(root);
  return routes.sort((a, b) => (a.pattern < b.pattern ? -1 : a.pattern > b.pattern ? 1 : 0));
}

export function createTree(root: RouteNodeDraft): RouteTree {
  const frozen = freezeNode(root);
  return Object.freeze({ root: frozen, routes: Object.freeze(summarizeRoutes(frozen)) });
}

/** Methods bound at a node, in canonical order. */
export function allowedMethods(node: RouteNode): HttpMethod[] {
  return [...node.handlers.keys()];
}
