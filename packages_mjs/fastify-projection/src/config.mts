/**
 * Projection configuration: defaults, merge and environment loading
 */

import { readFile } from 'node:fs/promises';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_MAX_DEPTH, DEFAULT_ARRAY_THRESHOLD } from '@fieldcast/field-projection';
import {
  DEFAULT_PROJECTION_CACHE_CONFIG,
  mergeProjectionCacheConfig,
  type ProjectionCacheConfig,
} from '@fieldcast/cache-projection';
import { ProjectionConfigError } from './errors.mjs';

/**
 * HTTP statuses for errors whose status is deployment-specific
 */
export interface ProjectionErrorStatusConfig {
  /** Default: 400 */
  missingFieldStatus?: number;
  /** Default: 400 */
  maxDepthStatus?: number;
  /** Default: 500 */
  cycleStatus?: number;
}

/**
 * Cache settings plus the per-user identity header
 */
export interface ProjectionCacheSettings extends ProjectionCacheConfig {
  /** Header carrying the caller identity. Default: X-User-Id */
  userIdHeader?: string;
}

export interface ProjectionConfig {
  /** Master switch. Default: true */
  enabled?: boolean;
  /** Request header carrying the directive. Default: X-Response-Fields */
  headerName?: string;
  /** Default: 5 */
  maxDepth?: number;
  /** Default: true */
  cycleDetection?: boolean;
  /** Attach a short trace id to errors and logs. Default: true */
  traceIds?: boolean;
  /** Default: 64 */
  arrayThreshold?: number;
  cache?: ProjectionCacheSettings;
  errors?: ProjectionErrorStatusConfig;
}

export interface ResolvedProjectionConfig {
  enabled: boolean;
  headerName: string;
  maxDepth: number;
  cycleDetection: boolean;
  traceIds: boolean;
  arrayThreshold: number;
  cache: Required<ProjectionCacheSettings>;
  errors: Required<ProjectionErrorStatusConfig>;
}

export const DEFAULT_PROJECTION_CONFIG: ResolvedProjectionConfig = {
  enabled: true,
  headerName: 'X-Response-Fields',
  maxDepth: DEFAULT_MAX_DEPTH,
  cycleDetection: true,
  traceIds: true,
  arrayThreshold: DEFAULT_ARRAY_THRESHOLD,
  cache: {
    ...DEFAULT_PROJECTION_CACHE_CONFIG,
    userIdHeader: 'X-User-Id',
  },
  errors: {
    missingFieldStatus: 400,
    maxDepthStatus: 400,
    cycleStatus: 500,
  },
};

/**
 * Merge user config with defaults
 */
export function mergeProjectionConfig(config?: ProjectionConfig): ResolvedProjectionConfig {
  if (!config) {
    return {
      ...DEFAULT_PROJECTION_CONFIG,
      cache: { ...DEFAULT_PROJECTION_CONFIG.cache },
      errors: { ...DEFAULT_PROJECTION_CONFIG.errors },
    };
  }

  return {
    enabled: config.enabled ?? DEFAULT_PROJECTION_CONFIG.enabled,
    headerName: config.headerName ?? DEFAULT_PROJECTION_CONFIG.headerName,
    maxDepth: config.maxDepth ?? DEFAULT_PROJECTION_CONFIG.maxDepth,
    cycleDetection: config.cycleDetection ?? DEFAULT_PROJECTION_CONFIG.cycleDetection,
    traceIds: config.traceIds ?? DEFAULT_PROJECTION_CONFIG.traceIds,
    arrayThreshold: config.arrayThreshold ?? DEFAULT_PROJECTION_CONFIG.arrayThreshold,
    cache: {
      ...mergeProjectionCacheConfig(config.cache),
      userIdHeader: config.cache?.userIdHeader ?? DEFAULT_PROJECTION_CONFIG.cache.userIdHeader,
    },
    errors: {
      missingFieldStatus: config.errors?.missingFieldStatus ?? DEFAULT_PROJECTION_CONFIG.errors.missingFieldStatus,
      maxDepthStatus: config.errors?.maxDepthStatus ?? DEFAULT_PROJECTION_CONFIG.errors.maxDepthStatus,
      cycleStatus: config.errors?.cycleStatus ?? DEFAULT_PROJECTION_CONFIG.errors.cycleStatus,
    },
  };
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];

const envBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform((value) => TRUE_VALUES.includes(value));

const envInteger = (min: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'Expected a non-negative integer')
    .transform(Number)
    .pipe(z.number().int().min(min).max(Number.MAX_SAFE_INTEGER));

const envHeaderName = z
  .string()
  .trim()
  .regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/, 'Expected an HTTP header name');

const ProjectionEnvSchema = z.object({
  PROJECTION_ENABLED: envBoolean.optional(),
  PROJECTION_HEADER_NAME: envHeaderName.optional(),
  PROJECTION_MAX_DEPTH: envInteger(0).optional(),
  PROJECTION_CYCLE_DETECTION: envBoolean.optional(),
  PROJECTION_TRACE_IDS: envBoolean.optional(),
  PROJECTION_ARRAY_THRESHOLD: envInteger(1).optional(),
  PROJECTION_CACHE_ENABLED: envBoolean.optional(),
  PROJECTION_CACHE_DEFAULT_TTL_MS: envInteger(0).optional(),
  PROJECTION_CACHE_COLLECTION_TTL_MS: envInteger(0).optional(),
  PROJECTION_CACHE_MAX_ENTRIES: envInteger(1).optional(),
  PROJECTION_CACHE_HARD_MAX_TTL_MS: envInteger(0).optional(),
  PROJECTION_CACHE_CONDITIONAL: envBoolean.optional(),
  PROJECTION_CACHE_MANUAL_EVICTION: envBoolean.optional(),
  PROJECTION_CACHE_USER_ID_HEADER: envHeaderName.optional(),
});

export type ProjectionEnv = Readonly<Record<string, string | undefined>>;

/**
 * Build a configuration from `PROJECTION_*` variables.
 * Unset variables keep their defaults.
 *
 * @throws ProjectionConfigError listing every invalid variable
 */
export function loadProjectionConfigFromEnv(env: ProjectionEnv = process.env): ResolvedProjectionConfig {
  const result = ProjectionEnvSchema.safeParse(env);
  if (!result.success) {
    throw new ProjectionConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = result.data;
  return mergeProjectionConfig({
    enabled: values.PROJECTION_ENABLED,
    headerName: values.PROJECTION_HEADER_NAME,
    maxDepth: values.PROJECTION_MAX_DEPTH,
    cycleDetection: values.PROJECTION_CYCLE_DETECTION,
    traceIds: values.PROJECTION_TRACE_IDS,
    arrayThreshold: values.PROJECTION_ARRAY_THRESHOLD,
    cache: {
      enabled: values.PROJECTION_CACHE_ENABLED,
      defaultTtlMs: values.PROJECTION_CACHE_DEFAULT_TTL_MS,
      collectionTtlMs: values.PROJECTION_CACHE_COLLECTION_TTL_MS,
      maxEntries: values.PROJECTION_CACHE_MAX_ENTRIES,
      hardMaxTtlMs: values.PROJECTION_CACHE_HARD_MAX_TTL_MS,
      conditional: values.PROJECTION_CACHE_CONDITIONAL,
      manualEviction: values.PROJECTION_CACHE_MANUAL_EVICTION,
      userIdHeader: values.PROJECTION_CACHE_USER_ID_HEADER,
    },
  });
}

/**
 * Read `PROJECTION_*` variables from a dotenv file. Variables already set in
 * `env` take precedence over the file.
 */
export async function loadProjectionConfigFromEnvFile(
  filePath: string,
  env: ProjectionEnv = process.env
): Promise<ResolvedProjectionConfig> {
  const content = await readFile(filePath, 'utf-8');
  const parsed = dotenv.parse(content);

  const merged: Record<string, string | undefined> = { ...parsed };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  return loadProjectionConfigFromEnv(merged);
}
