import { FieldsSyntaxException } from '../core/exceptions';
import { createPathPredicate, formatPath, indexSegment, propertySegment } from '../fields/matcher';
import { parseFields } from '../fields/parser';
import type { PathPredicate, PathSegment } from '../fields/types';
import type { SelectFieldsOptions } from './types';

const includeAll: PathPredicate = () => true;

/**
 * Prepare a JSON-ready copy of `value`, keeping only the properties the
 * predicate accepts.
 *
 * The predicate is asked once per object property, with the full path from
 * the root. Array elements are always kept and contribute an index segment
 * to the paths below them. Values are converted with `toJSON()` first, so
 * dates become strings exactly as `JSON.stringify` would render them.
 *
 * @example
 * ```ts
 * const predicate = createPathPredicate(selection);
 * filterValue({ kind: 'list', items: [{ title: 't', extra: 'x' }] }, predicate);
 * ```
 */
export function filterValue(value: unknown, predicate: PathPredicate): unknown {
  return walk(toJSONValue(value, ''), [], predicate, new Set());
}

/**
 * Filter `value` and encode it as JSON.
 */
export function serializePartial(
  value: unknown,
  predicate: PathPredicate,
  space?: string | number
): string {
  return JSON.stringify(filterValue(value, predicate), null, space);
}

/**
 * Parse `selector` and filter `value` with it.
 *
 * A missing or empty selector keeps every field. A malformed selector throws
 * a `FieldsSyntaxException` unless `ignoreParseErrors` is set.
 *
 * @example
 * ```ts
 * selectFields(user, 'id,profile/name');
 * ```
 */
export function selectFields(
  value: unknown,
  selector: string | null | undefined,
  options: SelectFieldsOptions = {}
): unknown {
  const { ignoreCase = false, ignoreParseErrors = false, ...parseOptions } = options;
  const result = parseFields(selector, parseOptions);

  switch (result.status) {
    case 'present':
      return filterValue(value, createPathPredicate(result.selection, ignoreCase));
    case 'absent':
      return filterValue(value, includeAll);
    case 'error':
      if (!ignoreParseErrors) {
        throw new FieldsSyntaxException(selector ?? '', result.error);
      }
      return filterValue(value, includeAll);
  }
}

// ============================================================================
// Walker
// ============================================================================

function walk(
  value: unknown,
  path: PathSegment[],
  predicate: PathPredicate,
  ancestors: Set<object>
): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (ancestors.has(value)) {
    throw new TypeError(`Converting circular structure to JSON at ${formatPath(path) || '<root>'}`);
  }
  ancestors.add(value);

  let result: unknown;
  if (Array.isArray(value)) {
    result = walkArray(value, path, predicate, ancestors);
  } else {
    result = walkObject(value, path, predicate, ancestors);
  }

  ancestors.delete(value);
  return result;
}

function walkArray(
  items: readonly unknown[],
  path: PathSegment[],
  predicate: PathPredicate,
  ancestors: Set<object>
): unknown[] {
  return items.map((item, index) => {
    const element = toJSONValue(item, String(index));
    if (isOmitted(element)) return null;
    return walk(element, [...path, indexSegment(index)], predicate, ancestors);
  });
}

function walkObject(
  record: object,
  path: PathSegment[],
  predicate: PathPredicate,
  ancestors: Set<object>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, raw] of Object.entries(record)) {
    const property = toJSONValue(raw, key);
    if (isOmitted(property)) continue;

    const propertyPath = [...path, propertySegment(key)];
    if (!predicate(propertyPath)) continue;

    // Plain assignment would hit the `__proto__` setter for a parsed `"__proto__"` key.
    Object.defineProperty(result, key, {
      value: walk(property, propertyPath, predicate, ancestors),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return result;
}

/**
 * Apply `toJSON(key)` the way `JSON.stringify` does.
 */
function toJSONValue(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && 'toJSON' in value) {
    const { toJSON } = value;
    if (typeof toJSON === 'function') {
      return toJSON.call(value, key);
    }
  }
  return value;
}

/**
 * Values `JSON.stringify` drops from objects and turns into `null` in arrays.
 */
function isOmitted(value: unknown): boolean {
  return value === undefined || typeof value === 'function' || typeof value === 'symbol';
}
