import { ConfigurationException } from '../core/exceptions';
import { Selection, WILDCARD } from './selection';
import type {
  FieldsError,
  FieldsPresent,
  FieldsResult,
  FieldsSyntaxError,
  ParseFieldsOptions,
} from './types';

/** Default maximum group nesting depth. */
export const DEFAULT_MAX_DEPTH = 32;

/** Default maximum selector length in characters. */
export const DEFAULT_MAX_LENGTH = 4096;

/**
 * Parse a field selector string.
 *
 * Grammar:
 * ```
 * selection := group | ""
 * group     := item ("," item)*
 * item      := name ("(" group ")")? | name "/" item | "*"
 * ```
 *
 * `a/b/c` is shorthand for `a(b(c))`. Repeated fields at one level are merged.
 * Whitespace around names and punctuation is ignored.
 *
 * Malformed input is reported as an `error` result carrying the offset of the
 * first problem; it never throws. Only a non-string argument (other than
 * `null`/`undefined`, which yield `absent`) throws a `ConfigurationException`.
 *
 * @example
 * ```ts
 * const result = parseFields('kind,items(title,id)');
 * if (result.status === 'present') {
 *   result.selection.toString(); // 'kind,items(title,id)'
 * }
 *
 * parseFields('a,,b');
 * // { status: 'error', error: { message: 'Expected field name at position 2', position: 2 } }
 * ```
 */
export function parseFields(
  text: string | null | undefined,
  options: ParseFieldsOptions = {}
): FieldsResult {
  if (text === null || text === undefined) {
    return { status: 'absent' };
  }
  if (typeof text !== 'string') {
    throw new ConfigurationException('Fields selector must be a string', {
      received: typeof text,
    });
  }

  const { maxDepth = DEFAULT_MAX_DEPTH, maxLength = DEFAULT_MAX_LENGTH } = options;

  if (text.length > maxLength) {
    return failure({
      message: `Selector exceeds maximum length of ${maxLength} characters`,
      position: maxLength,
    });
  }

  if (text.trim() === '') {
    return present(Selection.EMPTY);
  }

  try {
    const parser = new SelectorParser(text, maxDepth);
    return present(parser.parse());
  } catch (err) {
    if (err instanceof SelectorSyntaxFailure) {
      return failure(err.error);
    }
    throw err;
  }
}

/** Type guard for a malformed selector result. */
export function isFieldsError(result: FieldsResult): result is FieldsError {
  return result.status === 'error';
}

/** Type guard for a parsed selector result. */
export function isFieldsPresent(result: FieldsResult): result is FieldsPresent {
  return result.status === 'present';
}

function present(selection: Selection): FieldsPresent {
  return { status: 'present', selection };
}

function failure(error: FieldsSyntaxError): FieldsError {
  return { status: 'error', error };
}

// ============================================================================
// Recursive Descent
// ============================================================================

/**
 * Unwinds the parser to `parseFields`. Never leaves this module.
 */
class SelectorSyntaxFailure extends Error {
  constructor(readonly error: FieldsSyntaxError) {
    super(error.message);
    this.name = 'SelectorSyntaxFailure';
  }
}

/**
 * Mutable node used while parsing. Repeated fields are merged in place, so
 * the whole parse stays linear in the input length.
 */
class SelectionDraft {
  readonly entries = new Map<string, SelectionDraft>();
  wildcard = false;
  /** Set when the field was selected at least once without a sub-group. */
  whole = false;

  add(name: string, child: SelectionDraft): void {
    const existing = this.entries.get(name);
    if (existing) {
      existing.absorb(child);
    } else {
      this.entries.set(name, child);
    }
  }

  absorb(other: SelectionDraft): void {
    this.whole = this.whole || other.whole;
    this.wildcard = this.wildcard || other.wildcard;
    for (const [name, child] of other.entries) {
      this.add(name, child);
    }
  }

  build(): Selection {
    if (this.whole || (this.entries.size === 0 && !this.wildcard)) {
      return Selection.EMPTY;
    }
    const entries = new Map<string, Selection>();
    for (const [name, child] of this.entries) {
      entries.set(name, child.build());
    }
    return new Selection(entries, this.wildcard);
  }
}

const DELIMITERS = new Set([',', '(', ')', '/']);

class SelectorParser {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly maxDepth: number
  ) {}

  parse(): Selection {
    const root = new SelectionDraft();
    this.parseGroup(root, 0);

    // parseGroup only returns early on ')', which is unbalanced at the top level
    if (this.pos < this.text.length) {
      this.unexpected();
    }
    return root.build();
  }

  /**
   * group := item ("," item)*
   * Stops in front of a ')' or at the end of the input.
   */
  private parseGroup(target: SelectionDraft, depth: number): void {
    for (;;) {
      this.parseItem(target, depth);
      this.skipWhitespace();

      const ch = this.peek();
      if (ch === ',') {
        this.pos++;
        continue;
      }
      if (ch === undefined || ch === ')') {
        return;
      }
      this.unexpected();
    }
  }

  /**
   * item := name ("(" group ")")? | name "/" item | "*"
   */
  private parseItem(target: SelectionDraft, depth: number): void {
    this.skipWhitespace();
    const start = this.pos;
    const name = this.readName();

    if (name === '') {
      this.fail(`Expected field name at position ${start}`, start);
    }

    if (name === WILDCARD) {
      const next = this.peek();
      if (next === '(' || next === '/') {
        this.unexpected();
      }
      target.wildcard = true;
      return;
    }

    const child = new SelectionDraft();
    const next = this.peek();

    if (next === '(') {
      this.enter(depth);
      this.pos++;
      this.parseGroup(child, depth + 1);
      if (this.peek() !== ')') {
        this.fail(`Missing ')' at position ${this.pos}`, this.pos);
      }
      this.pos++;
    } else if (next === '/') {
      this.enter(depth);
      this.pos++;
      this.parseItem(child, depth + 1);
    } else {
      child.whole = true;
    }

    target.add(name, child);
  }

  /**
   * Reads up to the next delimiter and trims surrounding whitespace.
   */
  private readName(): string {
    const start = this.pos;
    while (this.pos < this.text.length && !DELIMITERS.has(this.text.charAt(this.pos))) {
      this.pos++;
    }
    return this.text.slice(start, this.pos).trim();
  }

  private enter(depth: number): void {
    if (depth + 1 > this.maxDepth) {
      this.fail(
        `Maximum nesting depth of ${this.maxDepth} exceeded at position ${this.pos}`,
        this.pos
      );
    }
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  private peek(): string | undefined {
    return this.pos < this.text.length ? this.text.charAt(this.pos) : undefined;
  }

  private unexpected(): never {
    return this.fail(`Unexpected '${this.text.charAt(this.pos)}' at position ${this.pos}`, this.pos);
  }

  private fail(message: string, position: number): never {
    throw new SelectorSyntaxFailure({ message, position });
  }
}
