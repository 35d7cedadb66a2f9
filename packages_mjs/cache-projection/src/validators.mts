/**
 * Conditional-request validators: ETag and Last-Modified
 */

import { createHash } from 'node:crypto';
import type { JsonValue } from '@fieldcast/field-projection';

/**
 * Compact JSON with object keys sorted by code unit order; array order is kept
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  const members = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${members.join(',')}}`;
}

/**
 * MD5 hex digest of the document's canonical JSON, so key order does not
 * change the tag
 */
export function generateEtag(document: JsonValue): string {
  return createHash('md5').update(canonicalJson(document), 'utf8').digest('hex');
}

/**
 * Trim, drop a `W/` weak prefix and strip surrounding double quotes.
 * Returns null for blank input.
 */
export function normalizeEtag(etag: string | null | undefined): string | null {
  if (!etag || etag.trim() === '') {
    return null;
  }

  let normalized = etag.trim();
  if (normalized.startsWith('W/')) {
    normalized = normalized.slice(2).trim();
  }
  if (normalized.length >= 2 && normalized.startsWith('"') && normalized.endsWith('"')) {
    normalized = normalized.slice(1, -1);
  }
  return normalized;
}

/**
 * Match a stored tag against an If-None-Match value (single tag, list or `*`)
 */
export function matchesIfNoneMatch(storedEtag: string, header: string | null | undefined): boolean {
  if (!header || header.trim() === '') {
    return false;
  }
  if (header.trim() === '*') {
    return true;
  }
  return header.split(',').some((member) => normalizeEtag(member) === storedEtag);
}

/**
 * Strong ETag header value
 */
export function formatEtag(etag: string): string {
  return `"${etag}"`;
}

/**
 * Parse an HTTP date to Unix ms; null when absent or unparseable
 */
export function parseHttpDate(value: string | null | undefined): number | null {
  if (!value || value.trim() === '') {
    return null;
  }
  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? null : timestamp;
}

/**
 * IMF-fixdate form of a Unix ms timestamp
 */
export function formatHttpDate(timestamp: number): string {
  return new Date(timestamp).toUTCString();
}

/**
 * True when the client's copy is at least as new as the server's, compared
 * at whole-second precision.
 */
export function isNotModifiedSince(lastModified: number, clientTimestamp: number): boolean {
  return Math.floor(clientTimestamp / 1000) >= Math.floor(lastModified / 1000);
}
