/**
 * Helpers for reading projection inputs off a Fastify request
 */

import type { FastifyRequest } from 'fastify';
import { UserContextMismatchError } from './errors.mjs';

/**
 * First value of a request header (case-insensitive)
 */
export function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Split `request.url` into path and raw query
 */
export function splitUrl(url: string): { path: string; query: string } {
  const index = url.indexOf('?');
  if (index < 0) {
    return { path: url, query: '' };
  }
  return { path: url.slice(0, index), query: url.slice(index + 1) };
}

/**
 * Route params as a plain record; empty when the route has none
 */
export function routeParams(request: FastifyRequest): Record<string, unknown> {
  const params: unknown = request.params;
  if (typeof params !== 'object' || params === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(params));
}

function authenticatedUserId(request: FastifyRequest): string | undefined {
  if (!('user' in request)) {
    return undefined;
  }
  const user: unknown = request.user;
  if (typeof user !== 'object' || user === null || !('id' in user)) {
    return undefined;
  }
  const id: unknown = user.id;
  if (typeof id === 'string' && id !== '') {
    return id;
  }
  if (typeof id === 'number') {
    return String(id);
  }
  return undefined;
}

/**
 * Caller identity for per-user caching: the authenticated user's id when an
 * auth layer set `request.user`, otherwise the identity header.
 *
 * @throws UserContextMismatchError when both are present and disagree
 */
export function defaultUserIdentity(request: FastifyRequest, headerName: string): string | undefined {
  const authenticated = authenticatedUserId(request);
  const header = headerValue(request, headerName)?.trim() || undefined;

  if (authenticated !== undefined) {
    if (header !== undefined && header !== authenticated) {
      throw new UserContextMismatchError(splitUrl(request.url).path);
    }
    return authenticated;
  }
  return header;
}
