/**
 * Per-request traversal guard
 *
 * Tracks the descent path, enforces the depth limit and rejects revisiting
 * an exact path. The dotted path string is only materialized when asked for.
 * One instance per projection call; never shared between requests.
 */

import type { TraversalOptions } from './types.mjs';
import { CycleDetectedError, MaxDepthExceededError, ProjectionContractError } from './errors.mjs';

export const DEFAULT_MAX_DEPTH = 5;

function assertFieldName(fieldName: string): void {
  if (typeof fieldName !== 'string' || fieldName.trim() === '') {
    throw new ProjectionContractError('fieldName must not be null or blank');
  }
}

export class TraversalContext {
  readonly maxDepth: number;
  readonly cycleDetection: boolean;
  readonly traceId?: string;

  private readonly stack: string[] = [];
  private readonly visited = new Set<string>();

  constructor(options: TraversalOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
      throw new ProjectionContractError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
    }

    this.maxDepth = maxDepth;
    this.cycleDetection = options.cycleDetection ?? true;
    this.traceId = options.traceId;
  }

  static create(options?: TraversalOptions): TraversalContext {
    return new TraversalContext(options);
  }

  get depth(): number {
    return this.stack.length;
  }

  get currentPath(): string {
    return this.stack.join('.');
  }

  /**
   * Push a field onto the path. Both checks run before any state changes,
   * so a rejected descend leaves the context exactly as it was.
   */
  descend(fieldName: string): void {
    assertFieldName(fieldName);

    const newDepth = this.stack.length + 1;
    if (newDepth > this.maxDepth) {
      throw new MaxDepthExceededError(this.buildPath(fieldName), this.maxDepth, newDepth);
    }

    if (this.cycleDetection) {
      const prospectivePath = this.buildPath(fieldName);
      if (this.visited.has(prospectivePath)) {
        throw new CycleDetectedError(prospectivePath);
      }
      this.visited.add(prospectivePath);
    }

    this.stack.push(fieldName);
  }

  /**
   * Pop the innermost field. No-op on an empty stack.
   */
  ascend(): void {
    if (this.stack.length === 0) {
      return;
    }

    if (this.cycleDetection) {
      this.visited.delete(this.currentPath);
    }

    this.stack.pop();
  }

  /**
   * Path the context would have after descending into `fieldName`
   */
  buildPath(fieldName: string): string {
    assertFieldName(fieldName);
    if (this.stack.length === 0) {
      return fieldName;
    }
    return `${this.currentPath}.${fieldName}`;
  }
}
