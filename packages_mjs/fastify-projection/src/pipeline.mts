/**
 * Projection pipeline
 *
 * cache lookup -> load on miss -> conditional check -> parse -> allow-list
 * -> project. Runs once per request; the full document is what gets cached.
 */

import { randomUUID } from 'node:crypto';
import type pino from 'pino';
import {
  JsonProjector,
  TraversalContext,
  isProjectionError,
  parseProjection,
  toErrorPayload,
  type JsonValue,
  type ProjectionError,
  type ProjectionErrorPayload,
  type ResponseProjector,
} from '@fieldcast/field-projection';
import {
  CacheKey,
  isNotModifiedSince,
  matchesIfNoneMatch,
  parseHttpDate,
  type CachedDocument,
  type ProjectionCache,
} from '@fieldcast/cache-projection';
import type { ResolvedProjectionConfig } from './config.mjs';
import type { CompiledEndpoint } from './endpoint.mjs';
import { UserContextRequiredError } from './errors.mjs';

export interface ProjectionRequest {
  method: string;
  path: string;
  /** Raw query string without `?` */
  query?: string | null;
  directive?: string | null;
  userIdentity?: string | null;
  ifNoneMatch?: string | null;
  ifModifiedSince?: string | null;
  /** Overrides the endpoint media type */
  contentType?: string | null;
  traceId?: string;
}

export type ProjectionResult =
  | {
      kind: 'passthrough';
      statusCode: number;
      body: JsonValue;
    }
  | {
      kind: 'ok';
      body: JsonValue;
      etag?: string;
      lastModified?: number;
      cacheHit: boolean;
      traceId?: string;
    }
  | {
      kind: 'not-modified';
      etag?: string;
      lastModified?: number;
    }
  | {
      kind: 'error';
      statusCode: number;
      payload: ProjectionErrorPayload;
    };

/**
 * A loaded body together with the status the route produced. Bodies with a
 * status outside 2xx are passed through: never cached, validated or projected.
 */
export class LoadedResponse {
  constructor(
    readonly statusCode: number,
    readonly body: JsonValue
  ) {}

  get successful(): boolean {
    return this.statusCode >= 200 && this.statusCode < 300;
  }
}

export type DocumentLoader = () =>
  | Promise<JsonValue | LoadedResponse>
  | JsonValue
  | LoadedResponse;

type ResolvedDocument =
  | { kind: 'document'; document: JsonValue; entry: CachedDocument | null; cacheHit: boolean }
  | { kind: 'passthrough'; response: LoadedResponse };

async function load(loadDocument: DocumentLoader): Promise<JsonValue | LoadedResponse> {
  const loaded = await loadDocument();
  if (loaded instanceof LoadedResponse && loaded.successful) {
    return loaded.body;
  }
  return loaded;
}

function passthrough(response: LoadedResponse): ProjectionResult {
  return { kind: 'passthrough', statusCode: response.statusCode, body: response.body };
}

export interface ProjectionPipelineOptions {
  config: ResolvedProjectionConfig;
  cache: ProjectionCache;
  logger: pino.BaseLogger;
  projector?: ResponseProjector;
}

/**
 * Short request-scoped identifier for correlating errors with logs
 */
export function createTraceId(): string {
  return randomUUID().slice(0, 8);
}

export class ProjectionPipeline {
  private readonly config: ResolvedProjectionConfig;
  private readonly cache: ProjectionCache;
  private readonly logger: pino.BaseLogger;
  private readonly projector: ResponseProjector;

  constructor(options: ProjectionPipelineOptions) {
    this.config = options.config;
    this.cache = options.cache;
    this.logger = options.logger;
    this.projector = options.projector ?? new JsonProjector({ arrayThreshold: options.config.arrayThreshold });
  }

  /**
   * Errors thrown by `loadDocument` propagate unchanged, as do
   * user-context rejections. A non-2xx `LoadedResponse` comes back as a
   * `passthrough` result.
   */
  async execute(
    request: ProjectionRequest,
    endpoint: CompiledEndpoint,
    loadDocument: DocumentLoader
  ): Promise<ProjectionResult> {
    if (!this.config.enabled) {
      const loaded = await load(loadDocument);
      if (loaded instanceof LoadedResponse) {
        return passthrough(loaded);
      }
      return { kind: 'ok', body: loaded, cacheHit: false };
    }

    const traceId = request.traceId ?? (this.config.traceIds ? createTraceId() : undefined);
    const key = this.buildKey(request, endpoint);
    const resolved = await this.resolveDocument(key, loadDocument, endpoint);

    if (resolved.kind === 'passthrough') {
      this.logger.debug(
        { path: request.path, statusCode: resolved.response.statusCode, traceId },
        'Passing through unsuccessful response'
      );
      return passthrough(resolved.response);
    }

    const { document, entry, cacheHit } = resolved;

    if (entry && this.isNotModified(request, entry)) {
      this.logger.debug({ path: request.path, traceId }, 'Not modified');
      return { kind: 'not-modified', etag: entry.etag, lastModified: entry.lastModified };
    }

    const validators = { etag: entry?.etag, lastModified: entry?.lastModified };
    const directive = request.directive;

    if (!directive || directive.trim() === '') {
      return { kind: 'ok', body: document, cacheHit, traceId, ...validators };
    }

    try {
      const tree = parseProjection(directive);
      endpoint.allowlist?.validate(tree);

      const mediaType = request.contentType ?? endpoint.mediaType;
      if (!this.projector.supports(mediaType)) {
        this.logger.warn({ mediaType, traceId }, 'Unsupported content type for projection');
        return { kind: 'ok', body: document, cacheHit, traceId, ...validators };
      }

      const context = TraversalContext.create({
        maxDepth: this.config.maxDepth,
        cycleDetection: this.config.cycleDetection,
        traceId,
      });
      const body = this.projector.project(document, tree, context) ?? null;

      this.logger.debug({ path: request.path, cacheHit, traceId }, 'Projected response');
      return { kind: 'ok', body, cacheHit, traceId, ...validators };
    } catch (error) {
      if (!isProjectionError(error)) {
        throw error;
      }
      this.logger.warn({ code: error.code, path: error.path, traceId }, `Projection failed: ${error.message}`);
      return {
        kind: 'error',
        statusCode: this.statusFor(error),
        payload: toErrorPayload(error, traceId),
      };
    }
  }

  private async resolveDocument(
    key: CacheKey,
    loadDocument: DocumentLoader,
    endpoint: CompiledEndpoint
  ): Promise<ResolvedDocument> {
    if (!this.cache.enabled) {
      const loaded = await load(loadDocument);
      return loaded instanceof LoadedResponse
        ? { kind: 'passthrough', response: loaded }
        : { kind: 'document', document: loaded, entry: null, cacheHit: false };
    }

    const cached = await this.cache.get(key);
    if (cached) {
      this.logger.debug({ key: key.value }, 'Cache hit');
      return { kind: 'document', document: cached.document, entry: cached, cacheHit: true };
    }

    this.logger.debug({ key: key.value }, 'Cache miss');
    const document = await load(loadDocument);
    if (document instanceof LoadedResponse) {
      return { kind: 'passthrough', response: document };
    }
    if (document === null) {
      return { kind: 'document', document, entry: null, cacheHit: false };
    }

    const entry = await this.cache.put(key, document, {
      ttlMs: endpoint.ttlMs,
      collection: endpoint.collection,
    });
    return { kind: 'document', document, entry, cacheHit: false };
  }

  private buildKey(request: ProjectionRequest, endpoint: CompiledEndpoint): CacheKey {
    if (!endpoint.userContext) {
      return CacheKey.of(request.method, request.path, request.query);
    }
    if (!request.userIdentity || request.userIdentity.trim() === '') {
      throw new UserContextRequiredError(request.path);
    }
    return CacheKey.of(request.method, request.path, request.query, request.userIdentity);
  }

  private isNotModified(request: ProjectionRequest, entry: CachedDocument): boolean {
    if (!this.cache.conditional) {
      return false;
    }

    if (request.ifNoneMatch) {
      return entry.etag !== undefined && matchesIfNoneMatch(entry.etag, request.ifNoneMatch);
    }

    const since = parseHttpDate(request.ifModifiedSince);
    return since !== null && entry.lastModified !== undefined && isNotModifiedSince(entry.lastModified, since);
  }

  private statusFor(error: ProjectionError): number {
    switch (error.code) {
      case 'MISSING_FIELD':
        return this.config.errors.missingFieldStatus;
      case 'MAX_DEPTH_EXCEEDED':
        return this.config.errors.maxDepthStatus;
      case 'CYCLE_DETECTED':
        return this.config.errors.cycleStatus;
      default:
        return error.statusCode;
    }
  }
}
