/**
 * Route Tree
 *
 * In-memory tree that mirrors the route directory layout. Each node is one
 * URL segment. Built once by the compiler, then frozen and shared read-only
 * by every concurrent dispatch.
 */

import type { Handler, HttpMethod } from './http.type.ts';

export type RouteSegment =
  | { readonly kind: 'static'; readonly value: string }
  | { readonly kind: 'dynamic'; readonly param: string }
  | { readonly kind: 'catchAll'; readonly param: string };

/** A single node in the route tree. */
export interface RouteNode {
  readonly segment: RouteSegment;

  /** URL pattern for this node (e.g. "/users/:id/files/*path"). */
  readonly pattern: string;

  /** Static children keyed by exact segment, in sorted order. */
  readonly children: ReadonlyMap<string, RouteNode>;

  /** Single-segment param child (from a [param] directory). */
  readonly dynamic?: RouteNode;

  /** Terminal catch-all child (from a [...param] directory). Never has children. */
  readonly catchAll?: RouteNode;

  /** Method bindings from the directory's handler file. Empty for pure path segments. */
  readonly handlers: ReadonlyMap<HttpMethod, Handler>;
}

/** One servable route, for diagnostics. */
export interface RouteSummary {
  readonly pattern: string;
  readonly methods: readonly HttpMethod[];
}

export interface RouteTree {
  readonly root: RouteNode;
  /** Every node with bindings, sorted by pattern. */
  readonly routes: readonly RouteSummary[];
}

/** Result of matching a pathname against the tree. */
export interface RouteMatch {
  readonly node: RouteNode;
  readonly pattern: string;
  readonly params: Readonly<Record<string, string>>;
}
