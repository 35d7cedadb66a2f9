/**
 * Projection error taxonomy
 *
 * Every error here is request-scoped: the caller aborts the projection and
 * returns the matching payload. None of them are retried or downgraded to a
 * partial result.
 */

import type { ProjectionErrorCode, ProjectionErrorPayload, ProjectionErrorBody } from './types.mjs';

/**
 * Base class for client-input projection failures
 */
export abstract class ProjectionError extends Error {
  abstract readonly code: ProjectionErrorCode;
  /** Dotted path of the offending field ('' when not applicable) */
  readonly path: string;
  /** Suggested HTTP status */
  readonly statusCode: number;

  protected constructor(message: string, path: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.path = path;
    this.statusCode = statusCode;
  }
}

/**
 * Directive text does not match the grammar
 */
export class ProjectionSyntaxError extends ProjectionError {
  readonly code = 'INVALID_PROJECTION_SYNTAX' as const;
  /** 0-based offset into the original directive */
  readonly position: number;
  readonly directive: string;
  readonly reason: string;

  constructor(directive: string, position: number, reason: string) {
    super(`Invalid projection syntax at position ${position}: ${reason}`, '', 400);
    this.directive = directive;
    this.position = position;
    this.reason = reason;
  }
}

/**
 * Requested field does not exist in the document
 */
export class MissingFieldError extends ProjectionError {
  readonly code = 'MISSING_FIELD' as const;

  constructor(path: string, statusCode: number = 400) {
    super(`Requested field does not exist in response: ${path}`, path, statusCode);
  }
}

/**
 * Requested field is outside the endpoint allow-list
 */
export class FieldNotAllowedError extends ProjectionError {
  readonly code = 'FIELD_NOT_ALLOWED' as const;

  constructor(path: string, statusCode: number = 400) {
    super(`Field is not allowed for projection: ${path}`, path, statusCode);
  }
}

/**
 * Traversal went deeper than the configured limit
 */
export class MaxDepthExceededError extends ProjectionError {
  readonly code = 'MAX_DEPTH_EXCEEDED' as const;
  readonly maxDepth: number;
  readonly actualDepth: number;

  constructor(path: string, maxDepth: number, actualDepth: number, statusCode: number = 400) {
    super(
      `Projection depth ${actualDepth} exceeds maximum allowed depth of ${maxDepth} at path: ${path}`,
      path,
      statusCode
    );
    this.maxDepth = maxDepth;
    this.actualDepth = actualDepth;
  }
}

/**
 * Traversal revisited a path it is already inside
 */
export class CycleDetectedError extends ProjectionError {
  readonly code = 'CYCLE_DETECTED' as const;

  constructor(path: string, statusCode: number = 500) {
    super(`Cyclic reference detected at path: ${path}`, path, statusCode);
  }
}

/**
 * Programming-contract violation (blank field name, missing subtree, bad limits).
 * Not a client error and never mapped to a projection payload.
 */
export class ProjectionContractError extends Error {
  readonly code = 'PROJECTION_CONTRACT_VIOLATION';

  constructor(message: string) {
    super(message);
    this.name = 'ProjectionContractError';
  }
}

/**
 * Narrow an unknown thrown value to a projection error
 */
export function isProjectionError(error: unknown): error is ProjectionError {
  return error instanceof ProjectionError;
}

/**
 * Build the caller-facing error payload
 */
export function toErrorPayload(error: ProjectionError, traceId?: string): ProjectionErrorPayload {
  const body: ProjectionErrorBody = {
    code: error.code,
    message: error.message,
    path: error.path,
  };

  if (error instanceof ProjectionSyntaxError) {
    body.position = error.position;
  }
  if (traceId) {
    body.traceId = traceId;
  }

  return { error: body };
}
