/**
 * Recursive descent parser for projection directives
 *
 * Grammar:
 *   projection := field (',' field)*
 *   field      := name | name '(' projection ')'
 *   name       := [A-Za-z_][A-Za-z0-9_]*
 *
 * Whitespace is skipped around commas, parentheses and at both ends. Error
 * positions are offsets into the directive exactly as received. Nesting is
 * bounded so a deep directive fails as a syntax error instead of exhausting
 * the call stack.
 */

import { ProjectionSyntaxError } from './errors.mjs';
import { ProjectionTree, type ProjectionTreeBuilder } from './tree.mjs';

const END = '';

/** Deepest parenthesis nesting a directive may use */
export const DEFAULT_MAX_NESTING = 64;

export interface ParseOptions {
  /** Default: DEFAULT_MAX_NESTING */
  maxNesting?: number;
}

function isNameStart(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isNameContinue(ch: string): boolean {
  return isNameStart(ch) || (ch >= '0' && ch <= '9');
}

function isWhitespace(ch: string): boolean {
  return ch !== END && /\s/.test(ch);
}

class DirectiveParser {
  private position = 0;
  private nesting = 0;

  constructor(
    private readonly input: string,
    private readonly maxNesting: number
  ) {}

  parseProjection(): ProjectionTree {
    const builder = ProjectionTree.builder();
    this.skipWhitespace();
    this.parseField(builder);

    while (this.peek() === ',') {
      this.consume(',');
      this.parseField(builder);
    }

    return builder.build();
  }

  expectEnd(): void {
    const ch = this.peek();
    if (ch !== END) {
      this.fail(`Unexpected character '${ch}' after valid projection`);
    }
  }

  private parseField(builder: ProjectionTreeBuilder): void {
    const name = this.parseName();

    if (this.peek() === '(') {
      if (this.nesting >= this.maxNesting) {
        this.fail(`Nesting exceeds maximum of ${this.maxNesting} levels`);
      }
      this.consume('(');
      if (this.peek() === ')') {
        this.fail(`Empty parentheses after field '${name}'`);
      }
      this.nesting++;
      const subtree = this.parseProjection();
      this.nesting--;
      this.consume(')');
      builder.addChild(name, subtree);
    } else {
      builder.addLeaf(name);
    }
  }

  private parseName(): string {
    this.skipWhitespace();
    const start = this.position;

    if (start >= this.input.length) {
      this.fail('Expected field name but reached end of input');
    }

    const first = this.input[start];
    if (!isNameStart(first)) {
      this.fail(`Invalid field name start character: '${first}'`);
    }

    this.position++;
    while (this.position < this.input.length && isNameContinue(this.input[this.position])) {
      this.position++;
    }

    return this.input.slice(start, this.position);
  }

  private peek(): string {
    this.skipWhitespace();
    return this.position < this.input.length ? this.input[this.position] : END;
  }

  private consume(expected: string): void {
    const actual = this.peek();
    if (actual === END) {
      this.fail(`Expected '${expected}' but reached end of input`);
    }
    if (actual !== expected) {
      this.fail(`Expected '${expected}' but found '${actual}'`);
    }
    this.position++;
  }

  private skipWhitespace(): void {
    while (this.position < this.input.length && isWhitespace(this.input[this.position])) {
      this.position++;
    }
  }

  private fail(reason: string): never {
    throw new ProjectionSyntaxError(this.input, this.position, reason);
  }
}

/**
 * Parse a directive into a field-selection tree.
 * Absent or blank directives yield the empty tree.
 *
 * @throws ProjectionSyntaxError on any grammar violation or nesting deeper
 * than `maxNesting`
 */
export function parseProjection(
  directive: string | null | undefined,
  options: ParseOptions = {}
): ProjectionTree {
  if (directive === null || directive === undefined || directive.trim() === '') {
    return ProjectionTree.empty();
  }

  const parser = new DirectiveParser(directive, options.maxNesting ?? DEFAULT_MAX_NESTING);
  const tree = parser.parseProjection();
  parser.expectEnd();
  return tree;
}
