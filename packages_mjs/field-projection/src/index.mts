/**
 * @fieldcast/field-projection
 *
 * Strict, client-driven field selection over JSON documents:
 * - Directive parser (`id,name,profile(avatar,bio)`)
 * - Immutable field-selection trees with pre-compiled instructions
 * - Per-request traversal guard (depth limit, cycle detection)
 * - Endpoint allow-lists
 * - JSON projector with closed-world semantics
 *
 * @example
 * ```typescript
 * import { parseProjection, JsonProjector, TraversalContext } from '@fieldcast/field-projection';
 *
 * const tree = parseProjection('id,profile(avatar)');
 * const projector = new JsonProjector();
 *
 * projector.project(
 *   { id: 1, name: 'x', profile: { avatar: 'a.png', bio: '...' } },
 *   tree,
 *   TraversalContext.create({ maxDepth: 5 })
 * );
 * // => { id: 1, profile: { avatar: 'a.png' } }
 * ```
 */

// Types
export type {
  JsonPrimitive,
  JsonObject,
  JsonValue,
  TraversalOptions,
  ProjectorOptions,
  ProjectionErrorCode,
  ProjectionErrorBody,
  ProjectionErrorPayload,
} from './types.mjs';

// Errors
export {
  ProjectionError,
  ProjectionSyntaxError,
  MissingFieldError,
  FieldNotAllowedError,
  MaxDepthExceededError,
  CycleDetectedError,
  ProjectionContractError,
  isProjectionError,
  toErrorPayload,
} from './errors.mjs';

// Tree and parser
export { ProjectionTree, ProjectionTreeBuilder, type FieldInstruction } from './tree.mjs';
export { parseProjection, DEFAULT_MAX_NESTING, type ParseOptions } from './parser.mjs';

// Traversal
export { TraversalContext, DEFAULT_MAX_DEPTH } from './context.mjs';

// Allow-list
export { AllowlistValidator, mergeProjectionTrees } from './allowlist.mjs';

// Projector
export {
  JsonProjector,
  createJsonProjector,
  DEFAULT_ARRAY_THRESHOLD,
  type ResponseProjector,
} from './projector.mjs';
