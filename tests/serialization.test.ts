import { describe, it, expect, vi } from 'vitest';
import {
  filterValue,
  serializePartial,
  selectFields,
  createPathPredicate,
  parseFields,
  toPath,
  FieldsSyntaxException,
  type PathSegment,
} from '../src/index';

const feed = {
  kind: 'list',
  items: [
    { title: 't', id: 1, extra: 'x' },
    { title: 'u', id: 2, extra: 'y' },
  ],
};

describe('selectFields', () => {
  it('should select nested fields of array elements', () => {
    expect(selectFields(feed, 'kind,items(title,id)')).toEqual({
      kind: 'list',
      items: [
        { title: 't', id: 1 },
        { title: 'u', id: 2 },
      ],
    });
  });

  it('should emit containers on the way to a selected leaf', () => {
    const value = { a: { b: { c: 1, d: 2 }, e: 3 }, f: 4 };
    expect(selectFields(value, 'a/b/c')).toEqual({ a: { b: { c: 1 } } });
  });

  it('should emit a selected container even when no child survives', () => {
    expect(selectFields({ a: { b: 1 } }, 'a(x)')).toEqual({ a: {} });
  });

  it('should keep whole subtrees under a wildcard or a leaf', () => {
    const value = { a: { x: 1, y: { z: 2 } }, b: { q: 1 }, c: 2 };
    expect(selectFields(value, 'a(*),b')).toEqual({ a: { x: 1, y: { z: 2 } }, b: { q: 1 } });
  });

  it('should keep everything for a missing or blank selector', () => {
    expect(selectFields(feed, undefined)).toEqual(feed);
    expect(selectFields(feed, '  ')).toEqual(feed);
  });

  it('should honor ignoreCase', () => {
    expect(selectFields(feed, 'KIND', { ignoreCase: true })).toEqual({ kind: 'list' });
    expect(selectFields(feed, 'KIND')).toEqual({});
  });

  it('should throw FieldsSyntaxException for a malformed selector', () => {
    expect(() => selectFields(feed, 'items(title')).toThrow(FieldsSyntaxException);

    try {
      selectFields(feed, 'items(title');
    } catch (err) {
      expect(err).toBeInstanceOf(FieldsSyntaxException);
      expect(err).toMatchObject({
        status: 400,
        code: 'INVALID_FIELDS',
        selector: 'items(title',
        position: 11,
        message: "Invalid fields selector: Missing ')' at position 11",
      });
    }
  });

  it('should keep everything for a malformed selector when parse errors are ignored', () => {
    expect(selectFields(feed, 'items(title', { ignoreParseErrors: true })).toEqual(feed);
  });

  it('should pass parser limits through', () => {
    expect(() => selectFields(feed, 'a/b/c', { maxDepth: 1 })).toThrow(
      "Invalid fields selector: Maximum nesting depth of 1 exceeded at position 3"
    );
  });
});

describe('filterValue', () => {
  it('should ask the predicate once per property with the full path', () => {
    const seen: string[] = [];
    const predicate = (path: readonly PathSegment[]) => {
      seen.push(path.map((s) => (s.kind === 'index' ? `[${s.index}]` : s.name)).join('/'));
      return true;
    };

    filterValue({ a: { b: 1 }, list: [{ c: 2 }] }, predicate);

    expect(seen).toEqual(['a', 'a/b', 'list', 'list/[0]/c']);
  });

  it('should not ask the predicate below an omitted property', () => {
    const predicate = vi.fn((path: readonly PathSegment[]) => path.length === 1 && path[0].kind === 'property' && path[0].name === 'keep');

    const result = filterValue({ keep: 1, drop: { nested: 2 } }, predicate);

    expect(result).toEqual({ keep: 1 });
    expect(predicate).toHaveBeenCalledTimes(2);
  });

  it('should skip values JSON cannot encode without asking the predicate', () => {
    const predicate = vi.fn(() => true);

    const result = filterValue({ a: undefined, b: 1, f: () => 1, s: Symbol('s') }, predicate);

    expect(result).toEqual({ b: 1 });
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(predicate).toHaveBeenCalledWith(toPath(['b']));
  });

  it('should encode unsupported array elements as null', () => {
    expect(filterValue([1, undefined, () => 0], () => true)).toEqual([1, null, null]);
  });

  it('should apply toJSON before filtering', () => {
    const createdAt = new Date('2024-01-02T03:04:05.000Z');
    const money = {
      toJSON: (key: string) => ({ amount: 5, currency: 'EUR', key }),
    };
    const { selection } = parseFieldsOrThrow('createdAt,price(amount,key)');

    expect(filterValue({ createdAt, price: money, other: 1 }, createPathPredicate(selection))).toEqual({
      createdAt: '2024-01-02T03:04:05.000Z',
      price: { amount: 5, key: 'price' },
    });
  });

  it('should keep a parsed __proto__ key as an own property', () => {
    const parsed: unknown = JSON.parse('{"__proto__":{"x":1},"a":1,"b":2}');

    const result = selectFields(parsed, '__proto__,a');

    expect(JSON.stringify(result)).toBe('{"__proto__":{"x":1},"a":1}');
    expect(Object.getPrototypeOf(result)).toBe(Object.prototype);
  });

  it('should keep null values of selected fields', () => {
    expect(selectFields({ a: null, b: 1 }, 'a')).toEqual({ a: null });
  });

  it('should walk nested arrays', () => {
    expect(selectFields({ matrix: [[{ v: 1, w: 2 }]] }, 'matrix(v)')).toEqual({
      matrix: [[{ v: 1 }]],
    });
  });

  it('should filter a root array element by element', () => {
    expect(selectFields([{ id: 1, name: 'a' }, { id: 2, name: 'b' }], 'id')).toEqual([
      { id: 1 },
      { id: 2 },
    ]);
  });

  it('should allow shared references that are not cycles', () => {
    const shared = { id: 1 };
    expect(filterValue({ a: shared, b: shared }, () => true)).toEqual({ a: { id: 1 }, b: { id: 1 } });
  });

  it('should reject circular structures', () => {
    const node: Record<string, unknown> = { id: 1 };
    node.self = node;

    expect(() => filterValue(node, () => true)).toThrow(
      new TypeError('Converting circular structure to JSON at self')
    );
  });
});

describe('serializePartial', () => {
  it('should encode the filtered value', () => {
    const { selection } = parseFieldsOrThrow('kind,items(title,id)');

    expect(serializePartial(feed, createPathPredicate(selection))).toBe(
      '{"kind":"list","items":[{"title":"t","id":1},{"title":"u","id":2}]}'
    );
  });

  it('should pass indentation through', () => {
    expect(serializePartial({ a: 1, b: 2 }, (path) => path.length === 1 && path[0].kind === 'property' && path[0].name === 'a', 2)).toBe(
      '{\n  "a": 1\n}'
    );
  });
});

function parseFieldsOrThrow(text: string) {
  const result = parseFields(text);
  if (result.status !== 'present') {
    throw new Error(`Expected a selection for '${text}'`);
  }
  return result;
}
