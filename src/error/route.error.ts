/**
 * Route Compile Errors
 *
 * Raised while building the route tree. All of them are fatal: the server
 * never starts with a partial or inconsistent tree.
 */

export type RouteAmbiguityCode =
  | 'AMBIGUOUS_DYNAMIC'
  | 'AMBIGUOUS_CATCH_ALL'
  | 'CATCH_ALL_NOT_TERMINAL'
  | 'DUPLICATE_PARAM';

export type RouteDefinitionCode =
  | 'ROOT_NOT_FOUND'
  | 'INVALID_SEGMENT'
  | 'UNKNOWN_METHOD'
  | 'INVALID_HANDLER'
  | 'DUPLICATE_METHOD'
  | 'MODULE_LOAD_FAILED';

export class RouteCompileError extends Error {
  constructor(
    message: string,
    public readonly code: RouteAmbiguityCode | RouteDefinitionCode,
    /** Source path of the offending directory or file. */
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RouteCompileError';
  }
}

/** Two routes could claim the same request, or a catch-all is not terminal. */
export class RouteAmbiguityError extends RouteCompileError {
  declare readonly code: RouteAmbiguityCode;

  constructor(message: string, code: RouteAmbiguityCode, path: string) {
    super(message, code, path);
    this.name = 'RouteAmbiguityError';
  }
}

/** A directory or handler file breaks the naming or export conventions. */
export class RouteDefinitionError extends RouteCompileError {
  declare readonly code: RouteDefinitionCode;

  constructor(message: string, code: RouteDefinitionCode, path: string, options?: ErrorOptions) {
    super(message, code, path, options);
    this.name = 'RouteDefinitionError';
  }
}
