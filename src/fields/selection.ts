/**
 * Parsed selector tree.
 *
 * Each node maps field names (case preserved) to the sub-selection applied
 * to that field. A node without entries and without a wildcard places no
 * restriction on the value it is attached to: at the root this means "no
 * filtering", below a field it means "the whole field".
 *
 * Nodes are immutable once constructed and can be shared across requests.
 *
 * @example
 * ```ts
 * const selection = Selection.from({ kind: {}, items: { title: {}, id: {} } });
 * selection.toString(); // 'kind,items(title,id)'
 * ```
 */
export class Selection {
  /** The "no filtering" node. */
  static readonly EMPTY: Selection = new Selection(new Map(), false);

  readonly entries: ReadonlyMap<string, Selection>;
  readonly hasWildcard: boolean;
  readonly depth: number;

  private readonly folded: ReadonlyMap<string, Selection>;

  constructor(entries: ReadonlyMap<string, Selection>, hasWildcard: boolean) {
    this.entries = entries;
    this.hasWildcard = hasWildcard;

    let childDepth = 0;
    const folded = new Map<string, Selection>();
    for (const [name, child] of entries) {
      childDepth = Math.max(childDepth, child.depth);
      const key = foldCase(name);
      const existing = folded.get(key);
      folded.set(key, existing ? mergeSelections(existing, child) : child);
    }
    this.folded = folded;
    this.depth = entries.size > 0 || hasWildcard ? childDepth + 1 : 0;
  }

  /**
   * Build a selection from a nested object literal. `'*': {}` sets the
   * wildcard at that level.
   */
  static from(shape: SelectionShape): Selection {
    const entries = new Map<string, Selection>();
    let hasWildcard = false;
    for (const [name, child] of Object.entries(shape)) {
      if (name === WILDCARD) {
        hasWildcard = true;
        continue;
      }
      entries.set(name, Selection.from(child));
    }
    if (entries.size === 0 && !hasWildcard) return Selection.EMPTY;
    return new Selection(entries, hasWildcard);
  }

  /** True for a node that restricts nothing. */
  get isEmpty(): boolean {
    return this.entries.size === 0 && !this.hasWildcard;
  }

  /**
   * Look up the sub-selection of a field.
   * With `ignoreCase`, names are compared after case folding on both sides.
   */
  get(name: string, ignoreCase = false): Selection | undefined {
    if (ignoreCase) {
      return this.folded.get(foldCase(name));
    }
    return this.entries.get(name);
  }

  /**
   * Render the tree in canonical selector syntax: groups instead of slash
   * chains, wildcard last.
   */
  toString(): string {
    const parts: string[] = [];
    for (const [name, child] of this.entries) {
      parts.push(child.isEmpty ? name : `${name}(${child.toString()})`);
    }
    if (this.hasWildcard) parts.push(WILDCARD);
    return parts.join(',');
  }

  /** Nested object literal form, the inverse of {@link Selection.from}. */
  toJSON(): SelectionShape {
    const shape: SelectionShape = {};
    for (const [name, child] of this.entries) {
      Object.defineProperty(shape, name, {
        value: child.toJSON(),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    if (this.hasWildcard) shape[WILDCARD] = {};
    return shape;
  }
}

/**
 * Nested object literal describing a selection.
 */
export interface SelectionShape {
  [field: string]: SelectionShape;
}

export const WILDCARD = '*';

/**
 * Union of two selections, field by field.
 *
 * A field selected without a sub-group selects the whole field, so merging
 * it with a restricted selection of the same field keeps it unrestricted.
 * Wildcard flags are OR'd.
 */
export function mergeSelections(a: Selection, b: Selection): Selection {
  if (a.isEmpty || b.isEmpty) return Selection.EMPTY;
  if (a === b) return a;

  const entries = new Map<string, Selection>(a.entries);
  for (const [name, child] of b.entries) {
    const existing = entries.get(name);
    entries.set(name, existing ? mergeSelections(existing, child) : child);
  }
  return new Selection(entries, a.hasWildcard || b.hasWildcard);
}

function foldCase(name: string): string {
  return name.toLowerCase();
}
