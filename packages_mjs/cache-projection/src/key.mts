/**
 * Cache key composition
 *
 * Format: `METHOD:/path?sorted&query[@userIdentity]`
 *
 * The query is split on `&`, blank tokens dropped and the rest sorted, so
 * parameter order never splits the cache. `@` inside a path is percent-encoded
 * so the identity suffix stays unambiguous.
 */

import { ProjectionContractError } from '@fieldcast/field-projection';

/**
 * Normalize a request path: trimmed, leading `/`, no trailing `/` except root
 */
export function normalizePath(path: string | null | undefined): string {
  let normalized = (path ?? '').trim();
  if (normalized === '') {
    return '/';
  }
  if (!normalized.startsWith('/')) {
    normalized = `/${normalized}`;
  }
  if (normalized.length > 1 && normalized.endsWith('/')) {
    normalized = normalized.slice(0, -1);
  }
  return normalized.replaceAll('@', '%40');
}

/**
 * Normalize a raw query string (without the leading `?`)
 */
export function normalizeQuery(query: string | null | undefined): string {
  if (!query || query.trim() === '') {
    return '';
  }
  const raw = query.startsWith('?') ? query.slice(1) : query;
  return raw
    .split('&')
    .filter((param) => param.trim() !== '')
    .sort()
    .join('&');
}

/**
 * Recover the path part of a composed key string
 */
export function extractPathFromKey(key: string): string {
  const colonIndex = key.indexOf(':');
  const rest = colonIndex < 0 ? key : key.slice(colonIndex + 1);

  let end = rest.length;
  for (const separator of ['?', '@']) {
    const index = rest.indexOf(separator);
    if (index >= 0 && index < end) {
      end = index;
    }
  }
  return rest.slice(0, end);
}

export class CacheKey {
  readonly method: string;
  readonly path: string;
  readonly query: string;
  readonly userIdentity?: string;
  readonly value: string;

  private constructor(method: string, path: string, query: string, userIdentity?: string) {
    this.method = method;
    this.path = path;
    this.query = query;
    this.userIdentity = userIdentity;

    let value = `${method}:${path}`;
    if (query !== '') {
      value += `?${query}`;
    }
    if (userIdentity !== undefined) {
      value += `@${userIdentity}`;
    }
    this.value = value;
    Object.freeze(this);
  }

  static of(
    method: string,
    path: string | null | undefined,
    query?: string | null,
    userIdentity?: string | null
  ): CacheKey {
    if (typeof method !== 'string' || method.trim() === '') {
      throw new ProjectionContractError('method must not be null or blank');
    }
    const identity = userIdentity === null || userIdentity === undefined || userIdentity === '' ? undefined : userIdentity;
    return new CacheKey(method.trim().toUpperCase(), normalizePath(path), normalizeQuery(query), identity);
  }

  equals(other: CacheKey): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
