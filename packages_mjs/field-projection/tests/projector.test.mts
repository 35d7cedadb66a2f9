/**
 * Tests for JsonProjector
 */

import { describe, it, expect } from 'vitest';
import { JsonProjector, createJsonProjector, DEFAULT_ARRAY_THRESHOLD } from '../src/projector.mjs';
import { TraversalContext } from '../src/context.mjs';
import { MaxDepthExceededError, MissingFieldError } from '../src/errors.mjs';
import { parseProjection } from '../src/parser.mjs';
import { ProjectionTree } from '../src/tree.mjs';
import type { JsonObject, JsonValue } from '../src/types.mjs';

const user: JsonObject = {
  id: 7,
  name: 'Ada',
  email: 'ada@example.test',
  profile: { avatar: 'ada.png', bio: 'Writes programs', location: null },
  tags: ['admin', 'ops'],
  orders: [
    { id: 'o-1', total: 12.5, items: [{ sku: 'A1', qty: 2 }] },
    { id: 'o-2', total: 4, items: [] },
  ],
};

function project(document: JsonValue, directive: string, maxDepth = 5): JsonValue | undefined {
  return new JsonProjector().project(document, parseProjection(directive), TraversalContext.create({ maxDepth }));
}

function missingPath(document: JsonValue, directive: string): string | undefined {
  try {
    project(document, directive);
  } catch (error) {
    if (error instanceof MissingFieldError) {
      return error.path;
    }
    throw error;
  }
  return undefined;
}

describe('JsonProjector', () => {
  describe('project', () => {
    it('should keep only the requested top-level fields', () => {
      expect(project(user, 'id,name')).toEqual({ id: 7, name: 'Ada' });
    });

    it('should follow the requested order', () => {
      expect(JSON.stringify(project(user, 'name,id'))).toBe('{"name":"Ada","id":7}');
    });

    it('should project nested objects', () => {
      expect(project(user, 'id,profile(avatar)')).toEqual({ id: 7, profile: { avatar: 'ada.png' } });
    });

    it('should return a leaf value whole', () => {
      expect(project(user, 'profile')).toEqual({ profile: user.profile });
      expect(project(user, 'tags')).toEqual({ tags: ['admin', 'ops'] });
    });

    it('should project every element of a nested array', () => {
      expect(project(user, 'orders(id,items(sku))')).toEqual({
        orders: [
          { id: 'o-1', items: [{ sku: 'A1' }] },
          { id: 'o-2', items: [] },
        ],
      });
    });

    it('should project a top-level array', () => {
      const list: JsonValue = [
        { id: 1, name: 'a' },
        { id: 2, name: 'b' },
      ];
      expect(project(list, 'id')).toEqual([{ id: 1 }, { id: 2 }]);
    });

    it('should keep primitives inside projected arrays', () => {
      const document: JsonValue = { values: [1, 'two', null, { id: 3, x: 0 }] };
      expect(project(document, 'values(id)')).toEqual({ values: [1, 'two', null, { id: 3 }] });
    });

    it('should keep present null values', () => {
      expect(project(user, 'profile(location)')).toEqual({ profile: { location: null } });
    });

    it('should keep a null value under a nested request', () => {
      expect(project({ profile: null }, 'profile(avatar)')).toEqual({ profile: null });
    });

    it('should keep a primitive value under a nested request', () => {
      expect(project({ count: 3 }, 'count(value)')).toEqual({ count: 3 });
    });

    it('should return the document unchanged for an empty tree', () => {
      const projector = createJsonProjector();
      expect(projector.project(user, ProjectionTree.empty(), TraversalContext.create())).toBe(user);
    });

    it('should return null and undefined documents unchanged', () => {
      const projector = new JsonProjector();
      const tree = parseProjection('id');
      expect(projector.project(null, tree, TraversalContext.create())).toBeNull();
      expect(projector.project(undefined, tree, TraversalContext.create())).toBeUndefined();
    });

    it('should not modify the source document', () => {
      const source: JsonObject = { id: 1, nested: { a: 1, b: 2 } };
      project(source, 'nested(a)');
      expect(source).toEqual({ id: 1, nested: { a: 1, b: 2 } });
    });

    it('should keep a field named __proto__ as an own field', () => {
      const document: JsonValue = JSON.parse('{"__proto__":{"x":1},"id":1}');
      expect(JSON.stringify(project(document, '__proto__'))).toBe('{"__proto__":{"x":1}}');
    });
  });

  describe('missing fields', () => {
    it('should fail on a missing top-level field', () => {
      expect(missingPath(user, 'id,phone')).toBe('phone');
    });

    it('should report the dotted path of a missing nested field', () => {
      expect(missingPath({ profile: { avatar: 'a.png' } }, 'profile(bio)')).toBe('profile.bio');
    });

    it('should fail when any array element lacks the field', () => {
      expect(missingPath({ items: [{ sku: 'A' }, { qty: 1 }] }, 'items(sku)')).toBe('items.sku');
    });

    it('should fail on an empty object', () => {
      expect(missingPath({}, 'id')).toBe('id');
    });

    it('should not match inherited properties', () => {
      expect(missingPath({ id: 1 }, 'toString')).toBe('toString');
    });

    it('should carry the message and status', () => {
      expect(() => project(user, 'phone')).toThrow('Requested field does not exist in response: phone');
      expect(new MissingFieldError('phone').statusCode).toBe(400);
    });
  });

  describe('depth', () => {
    const deep: JsonValue = { a: { b: { c: { d: 1 } } } };

    it('should project up to the depth limit', () => {
      expect(project(deep, 'a(b(c))', 2)).toEqual({ a: { b: { c: { d: 1 } } } });
    });

    it('should reject trees deeper than the limit', () => {
      expect(() => project(deep, 'a(b(c(d)))', 2)).toThrow(MaxDepthExceededError);
    });

    it('should not count leaf fields toward depth', () => {
      expect(project(deep, 'a', 0)).toEqual(deep);
    });

    it('should leave the context at the root after a failure', () => {
      const context = TraversalContext.create();
      expect(() =>
        new JsonProjector().project({ a: { b: {} } }, parseProjection('a(b(c))'), context)
      ).toThrow(MissingFieldError);
      expect(context.depth).toBe(0);
      expect(context.currentPath).toBe('');
    });
  });

  describe('large arrays', () => {
    const rows: JsonValue[] = Array.from({ length: 10 }, (_, i) => ({
      id: i,
      label: `row-${i}`,
      meta: { owner: `u${i}`, hidden: true },
    }));

    it('should produce the same result above and below the threshold', () => {
      const tree = parseProjection('id,meta(owner)');
      const compiled = new JsonProjector({ arrayThreshold: 2 }).project(rows, tree, TraversalContext.create());
      const plain = new JsonProjector({ arrayThreshold: 1000 }).project(rows, tree, TraversalContext.create());

      expect(compiled).toEqual(plain);
      expect(compiled).toEqual(rows.map((_, i) => ({ id: i, meta: { owner: `u${i}` } })));
    });

    it('should report missing fields on the compiled path', () => {
      const broken: JsonValue[] = [{ id: 1 }, { id: 2 }, { other: 3 }];
      expect(() =>
        new JsonProjector({ arrayThreshold: 2 }).project(broken, parseProjection('id'), TraversalContext.create())
      ).toThrow('Requested field does not exist in response: id');
    });

    it('should use the default threshold', () => {
      expect(new JsonProjector().arrayThreshold).toBe(DEFAULT_ARRAY_THRESHOLD);
      expect(DEFAULT_ARRAY_THRESHOLD).toBe(64);
    });
  });

  describe('supports', () => {
    const projector = new JsonProjector();

    it.each([
      'application/json',
      'application/json; charset=utf-8',
      'Application/JSON',
      'application/problem+json',
      'application/vnd.api+json; version=1',
    ])('should support %s', (mediaType) => {
      expect(projector.supports(mediaType)).toBe(true);
    });

    it.each(['text/html', 'application/xml', '', null, undefined])('should not support %s', (mediaType) => {
      expect(projector.supports(mediaType)).toBe(false);
    });
  });
});
