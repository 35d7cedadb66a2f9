/**
 * Per-route projection options
 */

import { AllowlistValidator } from '@fieldcast/field-projection';

export interface ProjectionEndpointOptions {
  /** Explicit cache TTL; when unset or <= 0 the cache policy decides */
  ttlMs?: number;
  /** Route returns a collection (shorter cache TTL) */
  collection?: boolean;
  /** Cache per caller identity; requests without one are rejected */
  userContext?: boolean;
  /** Permitted fields in directive syntax, e.g. `['id,name', 'profile(avatar)']` */
  allowedFields?: readonly string[];
  /** Media type of the route's response. Default: application/json */
  mediaType?: string;
}

export interface CompiledEndpoint {
  readonly ttlMs: number;
  readonly collection: boolean;
  readonly userContext: boolean;
  readonly mediaType: string;
  readonly allowlist: AllowlistValidator | null;
}

/**
 * Resolve defaults and build the allow-list once, at route registration
 */
export function compileEndpoint(options: ProjectionEndpointOptions = {}): CompiledEndpoint {
  return Object.freeze({
    ttlMs: options.ttlMs ?? 0,
    collection: options.collection ?? false,
    userContext: options.userContext ?? false,
    mediaType: options.mediaType ?? 'application/json',
    allowlist: AllowlistValidator.fromFieldSpecs(options.allowedFields),
  });
}
