/**
 * Field-selection tree
 *
 * Structure for the directive "id,name,profile(avatar,bio)":
 *
 *   ROOT
 *   |-- id
 *   |-- name
 *   +-- profile
 *       |-- avatar
 *       +-- bio
 *
 * Trees are immutable once built and safe to share between requests.
 */

import { ProjectionContractError } from './errors.mjs';

/**
 * Pre-computed step for one field of a tree level
 */
export interface FieldInstruction {
  readonly fieldName: string;
  readonly childTree: ProjectionTree;
  readonly isLeaf: boolean;
}

function assertFieldName(fieldName: string): void {
  if (typeof fieldName !== 'string' || fieldName.trim() === '') {
    throw new ProjectionContractError('fieldName must not be null or blank');
  }
}

/**
 * Immutable tree of requested fields
 */
export class ProjectionTree {
  private static readonly EMPTY = new ProjectionTree(new Map());

  private readonly children: ReadonlyMap<string, ProjectionTree>;
  private readonly instructions: readonly FieldInstruction[];

  private constructor(children: Map<string, ProjectionTree>) {
    this.children = children;
    this.instructions = Object.freeze(
      Array.from(children, ([fieldName, childTree]) =>
        Object.freeze({ fieldName, childTree, isLeaf: childTree.isEmpty() })
      )
    );
    Object.freeze(this);
  }

  /**
   * The "no projection" tree, also used for leaves
   */
  static empty(): ProjectionTree {
    return ProjectionTree.EMPTY;
  }

  static builder(): ProjectionTreeBuilder {
    return new ProjectionTreeBuilder();
  }

  /** @internal */
  static fromChildren(children: ReadonlyMap<string, ProjectionTree>): ProjectionTree {
    if (children.size === 0) {
      return ProjectionTree.EMPTY;
    }
    return new ProjectionTree(new Map(children));
  }

  has(fieldName: string): boolean {
    return this.children.has(fieldName);
  }

  get(fieldName: string): ProjectionTree | undefined {
    return this.children.get(fieldName);
  }

  names(): string[] {
    return Array.from(this.children.keys());
  }

  entries(): IterableIterator<[string, ProjectionTree]> {
    return this.children.entries();
  }

  get size(): number {
    return this.children.size;
  }

  isEmpty(): boolean {
    return this.children.size === 0;
  }

  isLeaf(): boolean {
    return this.isEmpty();
  }

  /**
   * Ordered instruction list, computed once at construction
   */
  compile(): readonly FieldInstruction[] {
    return this.instructions;
  }

  /**
   * Structural equality, including field order
   */
  equals(other: ProjectionTree): boolean {
    if (this === other) return true;
    if (this.size !== other.size) return false;

    const mine = this.instructions;
    const theirs = other.instructions;
    for (let i = 0; i < mine.length; i++) {
      if (mine[i].fieldName !== theirs[i].fieldName) return false;
      if (!mine[i].childTree.equals(theirs[i].childTree)) return false;
    }
    return true;
  }

  /**
   * Canonical directive text; parsing it yields an equal tree
   */
  toDirective(): string {
    return this.instructions
      .map(({ fieldName, childTree, isLeaf }) =>
        isLeaf ? fieldName : `${fieldName}(${childTree.toDirective()})`
      )
      .join(',');
  }

  /**
   * ASCII rendering for debugging
   */
  format(): string {
    return `ROOT\n${this.formatLevel('')}`;
  }

  private formatLevel(prefix: string): string {
    let out = '';
    this.instructions.forEach(({ fieldName, childTree }, index) => {
      const isLast = index === this.instructions.length - 1;
      out += `${prefix}${isLast ? '+-- ' : '|-- '}${fieldName}\n`;
      if (!childTree.isEmpty()) {
        out += childTree.formatLevel(prefix + (isLast ? '    ' : '|   '));
      }
    });
    return out;
  }

  toString(): string {
    return this.toDirective();
  }
}

/**
 * Accumulates fields for one tree level. Re-adding a name replaces its
 * subtree in place (last write wins, first position kept).
 */
export class ProjectionTreeBuilder {
  private readonly children = new Map<string, ProjectionTree>();

  addLeaf(fieldName: string): this {
    return this.addChild(fieldName, ProjectionTree.empty());
  }

  addChild(fieldName: string, subtree: ProjectionTree): this {
    assertFieldName(fieldName);
    if (!(subtree instanceof ProjectionTree)) {
      throw new ProjectionContractError('subtree must not be null');
    }
    this.children.set(fieldName, subtree);
    return this;
  }

  has(fieldName: string): boolean {
    return this.children.has(fieldName);
  }

  get(fieldName: string): ProjectionTree | undefined {
    return this.children.get(fieldName);
  }

  build(): ProjectionTree {
    return ProjectionTree.fromChildren(this.children);
  }
}
