import type { Selection } from './selection';
import type { IndexSegment, PathPredicate, PathSegment, PropertySegment } from './types';

/**
 * Decide whether the value at `path` is selected.
 *
 * Walks the path while descending into the selection. Index segments are
 * transparent: the same node is used for the following segment, so `a(b)`
 * selects `b` of every element when `a` is an array.
 *
 * A field found on the last segment is selected as a whole, even if it has a
 * sub-selection; the serializer asks again for each of its children. A field
 * missing from a node is selected only if that node carries a wildcard.
 *
 * @example
 * ```ts
 * const { selection } = parseFields('kind,items(title,id)') as FieldsPresent;
 * matchesPath(selection, toPath(['items', 0, 'title'])); // true
 * matchesPath(selection, toPath(['items', 0, 'extra'])); // false
 * ```
 */
export function matchesPath(
  selection: Selection,
  path: readonly PathSegment[],
  ignoreCase = false
): boolean {
  let node = selection;
  const last = lastPropertyIndex(path);

  if (last < 0) {
    return node.isEmpty || node.hasWildcard;
  }

  for (let i = 0; i <= last; i++) {
    if (node.isEmpty) return true;

    const segment = path[i];
    if (segment.kind === 'index') continue;

    const child = node.get(segment.name, ignoreCase);
    if (!child) return node.hasWildcard;
    if (i === last) return true;
    node = child;
  }

  return true;
}

/**
 * Whether at least one path strictly below `path` is selected.
 *
 * Kept apart from {@link matchesPath}: a serializer uses it to decide whether
 * a container is worth walking at all.
 */
export function hasSelectedDescendant(
  selection: Selection,
  path: readonly PathSegment[],
  ignoreCase = false
): boolean {
  let node = selection;

  for (const segment of path) {
    if (node.isEmpty) return true;
    if (segment.kind === 'index') continue;

    const child = node.get(segment.name, ignoreCase);
    if (!child) return node.hasWildcard;
    node = child;
  }

  return true;
}

/**
 * Bind a selection into a predicate for the object-graph walker.
 */
export function createPathPredicate(selection: Selection, ignoreCase = false): PathPredicate {
  if (selection.isEmpty) {
    return () => true;
  }
  return (path) => matchesPath(selection, path, ignoreCase);
}

function lastPropertyIndex(path: readonly PathSegment[]): number {
  for (let i = path.length - 1; i >= 0; i--) {
    if (path[i].kind === 'property') return i;
  }
  return -1;
}

// ============================================================================
// Path Helpers
// ============================================================================

export function propertySegment(name: string): PropertySegment {
  return { kind: 'property', name };
}

export function indexSegment(index: number): IndexSegment {
  return { kind: 'index', index };
}

/**
 * Build a path from names and indexes: `toPath(['items', 0, 'title'])`.
 */
export function toPath(steps: readonly (string | number)[]): PathSegment[] {
  return steps.map((step) =>
    typeof step === 'number' ? indexSegment(step) : propertySegment(step)
  );
}

/**
 * Render a path for diagnostics, e.g. `items[0].title`.
 */
export function formatPath(path: readonly PathSegment[]): string {
  let out = '';
  for (const segment of path) {
    if (segment.kind === 'index') {
      out += `[${segment.index}]`;
    } else {
      out += out === '' ? segment.name : `.${segment.name}`;
    }
  }
  return out;
}
