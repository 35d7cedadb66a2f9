/**
 * Endpoint allow-list for projection requests
 */

import { FieldNotAllowedError } from './errors.mjs';
import { parseProjection } from './parser.mjs';
import { ProjectionTree } from './tree.mjs';

/**
 * Union of two permitted trees. A field nested on either side keeps the
 * union of its children; a field that is a leaf on both sides stays a leaf.
 */
export function mergeProjectionTrees(left: ProjectionTree, right: ProjectionTree): ProjectionTree {
  const builder = ProjectionTree.builder();

  for (const [name, child] of left.entries()) {
    builder.addChild(name, child);
  }

  for (const [name, child] of right.entries()) {
    const existing = builder.get(name);
    if (existing === undefined) {
      builder.addChild(name, child);
    } else if (!existing.isEmpty() || !child.isEmpty()) {
      builder.addChild(name, mergeProjectionTrees(existing, child));
    }
  }

  return builder.build();
}

/**
 * Validates requested trees against the fields an endpoint permits.
 *
 * A bare leaf permission grants the whole value, so a leaf request for a
 * permitted field always passes, whatever the document holds there. Asking
 * to descend into a field that is only permitted as a leaf is rejected.
 */
export class AllowlistValidator {
  private constructor(private readonly permitted: ProjectionTree) {}

  /**
   * Build a validator from field specs in directive syntax.
   * Returns null when there is nothing to enforce.
   */
  static fromFieldSpecs(fieldSpecs: readonly string[] | null | undefined): AllowlistValidator | null {
    if (!fieldSpecs || fieldSpecs.length === 0) {
      return null;
    }

    let permitted = ProjectionTree.empty();
    for (const spec of fieldSpecs) {
      permitted = mergeProjectionTrees(permitted, parseProjection(spec));
    }

    return new AllowlistValidator(permitted);
  }

  get allowedFields(): ProjectionTree {
    return this.permitted;
  }

  /**
   * @throws FieldNotAllowedError on the first violation, in the requested tree's order
   */
  validate(requested: ProjectionTree): void {
    this.validateLevel(requested, this.permitted, '');
  }

  private validateLevel(requested: ProjectionTree, permitted: ProjectionTree, parentPath: string): void {
    for (const [fieldName, requestedChild] of requested.entries()) {
      const fieldPath = parentPath === '' ? fieldName : `${parentPath}.${fieldName}`;
      const permittedChild = permitted.get(fieldName);

      if (permittedChild === undefined) {
        throw new FieldNotAllowedError(fieldPath);
      }

      if (!requestedChild.isEmpty()) {
        if (permittedChild.isEmpty()) {
          throw new FieldNotAllowedError(fieldPath);
        }
        this.validateLevel(requestedChild, permittedChild, fieldPath);
      }
    }
  }
}
