/**
 * Projectable route handlers
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { JsonValue } from '@fieldcast/field-projection';
import { formatEtag, formatHttpDate } from '@fieldcast/cache-projection';
import type { ResolvedProjectionConfig } from './config.mjs';
import { compileEndpoint, type ProjectionEndpointOptions } from './endpoint.mjs';
import { UserContextMismatchError, UserContextRequiredError } from './errors.mjs';
import { LoadedResponse, type ProjectionPipeline, type ProjectionResult } from './pipeline.mjs';
import { headerValue, splitUrl } from './request.mjs';

export type DocumentHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<JsonValue> | JsonValue;

export type UserIdentityResolver = (request: FastifyRequest, headerName: string) => string | undefined;

export interface ProjectableContext {
  config: ResolvedProjectionConfig;
  pipeline: ProjectionPipeline;
  resolveUserIdentity: UserIdentityResolver;
}

function setValidators(reply: FastifyReply, etag: string | undefined, lastModified: number | undefined): void {
  if (etag !== undefined) {
    reply.header('etag', formatEtag(etag));
  }
  if (lastModified !== undefined) {
    reply.header('last-modified', formatHttpDate(lastModified));
  }
}

function contentTypeFor(mediaType: string): string {
  return mediaType.includes('charset=') ? mediaType : `${mediaType}; charset=utf-8`;
}

/**
 * Turn a document-returning handler into a route handler that caches the
 * full document and answers with the requested projection. When the handler
 * sets a status outside 2xx, its body is sent as is and nothing is cached.
 */
export function createProjectableHandler(
  context: ProjectableContext,
  options: ProjectionEndpointOptions,
  handler: DocumentHandler
): (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply> {
  const endpoint = compileEndpoint(options);
  const { config, pipeline, resolveUserIdentity } = context;

  return async function projectableRoute(request, reply) {
    const { path, query } = splitUrl(request.url);

    let result: ProjectionResult;
    try {
      result = await pipeline.execute(
        {
          method: request.method,
          path,
          query,
          directive: headerValue(request, config.headerName),
          userIdentity: endpoint.userContext
            ? resolveUserIdentity(request, config.cache.userIdHeader)
            : undefined,
          ifNoneMatch: headerValue(request, 'if-none-match'),
          ifModifiedSince: headerValue(request, 'if-modified-since'),
        },
        endpoint,
        async () => {
          const body = await handler(request, reply);
          return new LoadedResponse(reply.statusCode, body);
        }
      );
    } catch (error) {
      if (error instanceof UserContextRequiredError || error instanceof UserContextMismatchError) {
        request.log.error({ code: error.code, path: error.path }, error.message);
        return reply.code(error.statusCode).send({ error: { code: error.code, message: error.message } });
      }
      throw error;
    }

    reply.header('vary', config.headerName);

    switch (result.kind) {
      case 'passthrough':
        return reply
          .code(result.statusCode)
          .type(contentTypeFor(endpoint.mediaType))
          .send(JSON.stringify(result.body));
      case 'not-modified':
        setValidators(reply, result.etag, result.lastModified);
        return reply.code(304).send();
      case 'error':
        return reply.code(result.statusCode).send(result.payload);
      case 'ok':
        setValidators(reply, result.etag, result.lastModified);
        return reply.type(contentTypeFor(endpoint.mediaType)).send(JSON.stringify(result.body));
    }
  };
}
