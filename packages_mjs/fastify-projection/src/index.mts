/**
 * @fieldcast/fastify-projection
 *
 * Fastify integration for field projection:
 * - Configuration with defaults, merge and `PROJECTION_*` environment loading
 * - Projection pipeline (cache, conditional requests, allow-list, projection)
 * - Projectable route handlers with ETag / Last-Modified / 304 support
 * - Cache eviction after writes
 * - pino logging
 */

// Plugin
export {
  fastifyProjection,
  default,
  type FastifyProjectionOptions,
  type FastifyProjection,
} from './plugin.mjs';

// Configuration
export {
  DEFAULT_PROJECTION_CONFIG,
  mergeProjectionConfig,
  loadProjectionConfigFromEnv,
  loadProjectionConfigFromEnvFile,
  type ProjectionConfig,
  type ResolvedProjectionConfig,
  type ProjectionCacheSettings,
  type ProjectionErrorStatusConfig,
  type ProjectionEnv,
} from './config.mjs';

// Errors
export { UserContextRequiredError, UserContextMismatchError, ProjectionConfigError } from './errors.mjs';

// Logging
export { createLogger, type ProjectionLoggerOptions } from './logger.mjs';

// Endpoints and handlers
export { compileEndpoint, type ProjectionEndpointOptions, type CompiledEndpoint } from './endpoint.mjs';
export {
  createProjectableHandler,
  type DocumentHandler,
  type UserIdentityResolver,
  type ProjectableContext,
} from './handler.mjs';
export { withCacheEviction, type RouteHandler } from './eviction.mjs';
export { defaultUserIdentity, headerValue, splitUrl, routeParams } from './request.mjs';

// Pipeline
export {
  ProjectionPipeline,
  LoadedResponse,
  createTraceId,
  type ProjectionRequest,
  type ProjectionResult,
  type DocumentLoader,
  type ProjectionPipelineOptions,
} from './pipeline.mjs';
