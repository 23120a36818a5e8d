/**
 * Route Matcher
 *
 * Resolves a pathname against a compiled RouteNode tree in O(depth).
 *
 * At every level the children are tried in a fixed order:
 * static → dynamic (:param) → catch-all (*param). The first rule that
 * applies wins and is never revisited, so a path naming an existing static
 * directory is never captured by a dynamic or catch-all sibling.
 */

import type { RouteMatch, RouteNode, RouteTree } from '../type/route-tree.type.ts';

/** Try decodeURIComponent, return the original segment on malformed input. */
function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Normalize a pathname: ensure a leading slash and strip a single trailing
 * slash (except for the bare root).
 */
export function normalizePath(pathname: string): string {
  if (!pathname.startsWith('/')) {
    pathname = '/' + pathname;
  }
  if (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  return pathname;
}

/**
 * Split a normalized pathname into decoded segments.
 * The root path yields no segments.
 */
export function splitSegments(pathname: string): string[] {
  if (pathname === '/') return [];
  return pathname.substring(1).split('/').map(safeDecode);
}

function paramName(node: RouteNode): string {
  return node.segment.kind === 'static' ? node.segment.value : node.segment.param;
}

/**
 * Match a normalized pathname. Returns undefined when no branch matches or
 * when the node reached has no handler bindings.
 */
export function matchRoute(tree: RouteTree, pathname: string): RouteMatch | undefined {
  const segments = splitSegments(pathname);
  const bound: Array<[string, string]> = [];
  let node = tree.root;

  for (let index = 0; index < segments.length; index++) {
    const segment = segments[index];

    // 1. Static child
    const staticChild = node.children.get(segment);
    if (staticChild) {
      node = staticChild;
      continue;
    }

    // 2. Dynamic child (never binds an empty segment)
    if (node.dynamic && segment !== '') {
      bound.push([paramName(node.dynamic), segment]);
      node = node.dynamic;
      continue;
    }

    // 3. Catch-all consumes everything that is left
    if (node.catchAll) {
      bound.push([paramName(node.catchAll), segments.slice(index).join('/')]);
      node = node.catchAll;
      break;
    }

    return undefined;
  }

  if (node.handlers.size === 0) return undefined;

  return { node, pattern: node.pattern, params: Object.freeze(Object.fromEntries(bound)) };
}
