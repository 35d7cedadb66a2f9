/**
 * Cache eviction after successful writes
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ProjectionCache } from '@fieldcast/cache-projection';
import { routeParams } from './request.mjs';

export type RouteHandler<T> = (request: FastifyRequest, reply: FastifyReply) => Promise<T> | T;

/**
 * Wrap a write handler so that, once it resolves with a non-error status,
 * cached documents for the given path templates are evicted. `{name}`
 * placeholders are filled from the route params; unfilled ones match any
 * single segment.
 *
 * @example
 * fastify.put('/users/:id', withCacheEviction(cache, ['/users/{id}', '/users'], updateUser));
 */
export function withCacheEviction<T>(
  cache: ProjectionCache,
  templates: readonly string[],
  handler: RouteHandler<T>
): RouteHandler<T> {
  return async (request, reply) => {
    const result = await handler(request, reply);

    if (reply.statusCode >= 400 || templates.length === 0) {
      return result;
    }

    const removed = await cache.evictPaths(templates, routeParams(request));
    request.log.debug({ templates, removed }, 'Evicted projection cache entries');
    return result;
  };
}
