import type { Selection } from './selection';

// ============================================================================
// Path Types
// ============================================================================

/**
 * A named property step on the way to a value being serialized.
 */
export interface PropertySegment {
  kind: 'property';
  name: string;
}

/**
 * An array element step. Index segments never consume a selector token:
 * the matcher reuses the current selection node for the next segment.
 */
export interface IndexSegment {
  kind: 'index';
  index: number;
}

export type PathSegment = PropertySegment | IndexSegment;

/**
 * Decides whether the value found at `path` is serialized.
 */
export type PathPredicate = (path: readonly PathSegment[]) => boolean;

// ============================================================================
// Parse Result Types
// ============================================================================

/**
 * Describes the first syntax problem found in a selector string.
 */
export interface FieldsSyntaxError {
  /** Human readable description, including the position */
  message: string;
  /** Zero-based character offset of the problem */
  position: number;
}

export interface FieldsPresent {
  status: 'present';
  selection: Selection;
}

export interface FieldsAbsent {
  status: 'absent';
}

export interface FieldsError {
  status: 'error';
  error: FieldsSyntaxError;
}

/**
 * Outcome of parsing a selector string.
 *
 * `absent` means no selector was supplied at all, which lets a host skip the
 * matcher entirely. `error` is a normal outcome for malformed input.
 */
export type FieldsResult = FieldsPresent | FieldsAbsent | FieldsError;

/**
 * Options for {@link parseFields}.
 */
export interface ParseFieldsOptions {
  /** Maximum group nesting depth. @default 32 */
  maxDepth?: number;
  /** Maximum selector length in characters. @default 4096 */
  maxLength?: number;
}
