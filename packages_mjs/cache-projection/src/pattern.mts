/**
 * Path-template patterns for cache eviction
 *
 * `/users/{id}/orders` compiles to `^/users/(?<id>[^/]+)/orders$`.
 */

import { normalizePath } from './key.mjs';

const PLACEHOLDER = /\{([^}]+)\}/g;
const GROUP_NAME = /^[A-Za-z][A-Za-z0-9]*$/;

export function hasPlaceholders(template: string): boolean {
  return /\{[^}]+\}/.test(template);
}

/**
 * Reduce a placeholder name to a valid capture-group name: ASCII letters and
 * digits only, starting with a letter (a `p` is prefixed otherwise).
 * Returns null when nothing usable remains.
 */
export function sanitizeGroupName(name: string | null | undefined): string | null {
  if (!name) {
    return null;
  }

  let sanitized = name.replace(/[^A-Za-z0-9]/g, '');
  if (sanitized === '') {
    return null;
  }
  if (!/^[A-Za-z]/.test(sanitized)) {
    sanitized = `p${sanitized}`;
  }

  return GROUP_NAME.test(sanitized) ? sanitized : null;
}

export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a path template to an anchored pattern over normalized paths
 */
export function buildPathPattern(template: string): RegExp {
  const normalized = normalizePath(template);
  const usedNames = new Set<string>();
  let source = '^';
  let lastEnd = 0;

  for (const match of normalized.matchAll(PLACEHOLDER)) {
    const start = match.index ?? 0;
    source += escapeRegExp(normalized.slice(lastEnd, start));

    const name = sanitizeGroupName(match[1]);
    if (name !== null && !usedNames.has(name)) {
      usedNames.add(name);
      source += `(?<${name}>[^/]+)`;
    } else {
      source += '([^/]+)';
    }

    lastEnd = start + match[0].length;
  }

  source += escapeRegExp(normalized.slice(lastEnd));
  source += '$';
  return new RegExp(source);
}

/**
 * Substitute `{name}` placeholders from route params. Placeholders without a
 * value are left in place.
 */
export function resolvePathVariables(
  template: string,
  params: Readonly<Record<string, unknown>> | null | undefined
): string {
  if (!params) {
    return template;
  }

  return template.replace(PLACEHOLDER, (placeholder: string, name: string) => {
    if (!Object.hasOwn(params, name)) {
      return placeholder;
    }
    const value = params[name];
    if (value === null || value === undefined) {
      return placeholder;
    }
    return String(value);
  });
}
