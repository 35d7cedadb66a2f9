/**
 * Types for field-projection package
 */

/**
 * JSON scalar value
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * JSON object with string keys
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Any JSON-compatible value a projection can walk
 */
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

/**
 * Options for a per-request traversal guard
 */
export interface TraversalOptions {
  /** Maximum nesting depth a projection may descend into. Default: 5 */
  maxDepth?: number;
  /** Reject revisiting an exact path during one traversal. Default: true */
  cycleDetection?: boolean;
  /** Identifier echoed in error payloads and logs */
  traceId?: string;
}

/**
 * Options for the JSON projector
 */
export interface ProjectorOptions {
  /** Array length at which element projection switches to compiled instructions. Default: 64 */
  arrayThreshold?: number;
}

/**
 * Error codes produced by the projection engine
 */
export type ProjectionErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_PROJECTION_SYNTAX'
  | 'MAX_DEPTH_EXCEEDED'
  | 'CYCLE_DETECTED'
  | 'FIELD_NOT_ALLOWED';

/**
 * Error body handed back to the caller for serialization
 */
export interface ProjectionErrorBody {
  code: ProjectionErrorCode;
  message: string;
  /** Dotted field path; empty for syntax errors */
  path: string;
  /** Character offset into the directive (syntax errors only) */
  position?: number;
  traceId?: string;
}

/**
 * Serialized error payload
 */
export interface ProjectionErrorPayload {
  error: ProjectionErrorBody;
}
