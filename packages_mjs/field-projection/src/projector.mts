/**
 * JSON response projector
 *
 * Walks a document alongside a field-selection tree and keeps only the
 * requested fields. Strict: a requested field absent from the document fails
 * the whole projection.
 */

import type { JsonObject, JsonValue, ProjectorOptions } from './types.mjs';
import type { TraversalContext } from './context.mjs';
import type { FieldInstruction, ProjectionTree } from './tree.mjs';
import { MissingFieldError } from './errors.mjs';

export const DEFAULT_ARRAY_THRESHOLD = 64;

const JSON_MEDIA_TYPE = 'application/json';

/**
 * Projection mechanism, isolated from caching and transport
 */
export interface ResponseProjector {
  /**
   * Filter `document` down to the fields in `tree`.
   * A null document or an empty tree returns the document unchanged.
   */
  project(
    document: JsonValue | undefined,
    tree: ProjectionTree,
    context: TraversalContext
  ): JsonValue | undefined;

  /**
   * Whether responses of this media type can be projected
   */
  supports(mediaType: string | null | undefined): boolean;
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// defineProperty keeps names like __proto__ as plain own fields
function setField(target: JsonObject, name: string, value: JsonValue): void {
  Object.defineProperty(target, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export class JsonProjector implements ResponseProjector {
  readonly arrayThreshold: number;

  constructor(options: ProjectorOptions = {}) {
    this.arrayThreshold = options.arrayThreshold ?? DEFAULT_ARRAY_THRESHOLD;
  }

  project(
    document: JsonValue | undefined,
    tree: ProjectionTree,
    context: TraversalContext
  ): JsonValue | undefined {
    if (document === null || document === undefined || tree.isEmpty()) {
      return document;
    }
    return this.projectNode(document, tree, context);
  }

  supports(mediaType: string | null | undefined): boolean {
    if (!mediaType) {
      return false;
    }
    const normalized = mediaType.toLowerCase();
    const essence = normalized.split(';')[0].trim();
    return normalized.includes(JSON_MEDIA_TYPE) || essence.endsWith('+json');
  }

  private projectNode(node: JsonValue, tree: ProjectionTree, context: TraversalContext): JsonValue {
    if (Array.isArray(node)) {
      return this.projectArray(node, tree, context);
    }
    if (isJsonObject(node)) {
      return this.projectObject(node, tree, context);
    }
    return node;
  }

  private projectArray(array: JsonValue[], tree: ProjectionTree, context: TraversalContext): JsonValue[] {
    if (array.length < this.arrayThreshold) {
      return array.map((element) => this.projectNode(element, tree, context));
    }

    const instructions = tree.compile();
    const result: JsonValue[] = new Array(array.length);
    for (let i = 0; i < array.length; i++) {
      const element = array[i];
      result[i] = isJsonObject(element)
        ? this.projectCompiled(element, instructions, context)
        : this.projectNode(element, tree, context);
    }
    return result;
  }

  private projectObject(object: JsonObject, tree: ProjectionTree, context: TraversalContext): JsonObject {
    const result: JsonObject = {};

    for (const fieldName of tree.names()) {
      if (!Object.hasOwn(object, fieldName)) {
        throw new MissingFieldError(context.buildPath(fieldName));
      }

      const value = object[fieldName];
      const childTree = tree.get(fieldName);

      if (childTree === undefined || childTree.isEmpty()) {
        setField(result, fieldName, value);
      } else {
        setField(result, fieldName, this.projectChild(fieldName, value, childTree, context));
      }
    }

    return result;
  }

  private projectCompiled(
    object: JsonObject,
    instructions: readonly FieldInstruction[],
    context: TraversalContext
  ): JsonObject {
    const result: JsonObject = {};

    for (const { fieldName, childTree, isLeaf } of instructions) {
      if (!Object.hasOwn(object, fieldName)) {
        throw new MissingFieldError(context.buildPath(fieldName));
      }

      const value = object[fieldName];
      setField(
        result,
        fieldName,
        isLeaf ? value : this.projectChild(fieldName, value, childTree, context)
      );
    }

    return result;
  }

  private projectChild(
    fieldName: string,
    value: JsonValue,
    childTree: ProjectionTree,
    context: TraversalContext
  ): JsonValue {
    context.descend(fieldName);
    try {
      return this.projectNode(value, childTree, context);
    } finally {
      context.ascend();
    }
  }
}

/**
 * Create a JSON projector
 */
export function createJsonProjector(options?: ProjectorOptions): JsonProjector {
  return new JsonProjector(options);
}
