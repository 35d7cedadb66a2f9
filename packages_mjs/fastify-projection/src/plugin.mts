/**
 * Fastify plugin for field projection
 *
 * Registers one projection cache and pipeline per application.
 */
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import type { ResponseProjector } from '@fieldcast/field-projection';
import { ProjectionCache, type ProjectionCacheStore } from '@fieldcast/cache-projection';
import { mergeProjectionConfig, type ProjectionConfig, type ResolvedProjectionConfig } from './config.mjs';
import type { ProjectionEndpointOptions } from './endpoint.mjs';
import { withCacheEviction, type RouteHandler } from './eviction.mjs';
import { createProjectableHandler, type DocumentHandler, type UserIdentityResolver } from './handler.mjs';
import { ProjectionPipeline } from './pipeline.mjs';
import { defaultUserIdentity } from './request.mjs';

/**
 * Plugin options
 */
export interface FastifyProjectionOptions {
  config?: ProjectionConfig;
  /** Shared cache; not closed with the application */
  cache?: ProjectionCache;
  /** Store for the plugin-created cache */
  store?: ProjectionCacheStore;
  projector?: ResponseProjector;
  /** Default: authenticated `request.user.id`, else the configured identity header */
  resolveUserIdentity?: UserIdentityResolver;
}

export interface FastifyProjection {
  readonly config: ResolvedProjectionConfig;
  readonly cache: ProjectionCache;
  readonly pipeline: ProjectionPipeline;
  projectable(
    options: ProjectionEndpointOptions,
    handler: DocumentHandler
  ): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply>;
  invalidates<T>(templates: readonly string[], handler: RouteHandler<T>): RouteHandler<T>;
}

declare module 'fastify' {
  interface FastifyInstance {
    projection: FastifyProjection;
  }
}

/**
 * Fastify plugin for field projection
 *
 * @example
 * ```typescript
 * import Fastify from 'fastify';
 * import fastifyProjection from '@fieldcast/fastify-projection';
 *
 * const fastify = Fastify({ logger: true });
 * await fastify.register(fastifyProjection, { config: { cache: { defaultTtlMs: 30000 } } });
 *
 * fastify.get(
 *   '/users/:id',
 *   fastify.projection.projectable({ allowedFields: ['id,name,profile(avatar)'] }, loadUser)
 * );
 * fastify.put('/users/:id', fastify.projection.invalidates(['/users/{id}', '/users'], updateUser));
 * ```
 */
const fastifyProjectionPlugin: FastifyPluginAsync<FastifyProjectionOptions> = async (
  fastify: FastifyInstance,
  options: FastifyProjectionOptions
) => {
  if (fastify.hasDecorator('projection')) {
    throw new Error(`Decorator 'projection' already exists`);
  }

  const config = mergeProjectionConfig(options.config);
  const ownsCache = options.cache === undefined;
  const cache = options.cache ?? new ProjectionCache(config.cache, options.store, fastify.log);
  const pipeline = new ProjectionPipeline({
    config,
    cache,
    logger: fastify.log,
    projector: options.projector,
  });
  const resolveUserIdentity = options.resolveUserIdentity ?? defaultUserIdentity;

  const projection: FastifyProjection = {
    config,
    cache,
    pipeline,
    projectable: (endpoint, handler) =>
      createProjectableHandler({ config, pipeline, resolveUserIdentity }, endpoint, handler),
    invalidates: (templates, handler) => withCacheEviction(cache, templates, handler),
  };

  fastify.decorate('projection', projection);

  fastify.addHook('onClose', async () => {
    if (ownsCache) {
      await cache.close();
      fastify.log.info('Projection cache closed');
    }
  });

  fastify.log.debug(
    { headerName: config.headerName, cacheEnabled: config.cache.enabled },
    'Field projection registered'
  );
};

export const fastifyProjection = fp(fastifyProjectionPlugin, {
  name: '@fieldcast/fastify-projection',
  fastify: '5.x',
});

export default fastifyProjection;
