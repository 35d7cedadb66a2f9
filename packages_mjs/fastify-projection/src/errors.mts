/**
 * Integration-level errors
 */

/**
 * A per-user endpoint was reached without an identity. The request is
 * rejected rather than served from a shared cache entry.
 */
export class UserContextRequiredError extends Error {
  readonly code = 'USER_CONTEXT_REQUIRED';
  readonly statusCode = 401;
  readonly path: string;

  constructor(path: string) {
    super(`User context caching requires an authenticated user: ${path}`);
    this.name = 'UserContextRequiredError';
    this.path = path;
  }
}

/**
 * The identity header disagrees with the authenticated user
 */
export class UserContextMismatchError extends Error {
  readonly code = 'USER_CONTEXT_MISMATCH';
  readonly statusCode = 403;
  readonly path: string;

  constructor(path: string) {
    super(`User context header does not match authenticated user: ${path}`);
    this.name = 'UserContextMismatchError';
    this.path = path;
  }
}

/**
 * Configuration failed validation
 */
export class ProjectionConfigError extends Error {
  readonly code = 'PROJECTION_CONFIG_INVALID';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid projection configuration: ${issues.join('; ')}`);
    this.name = 'ProjectionConfigError';
    this.issues = issues;
  }
}
