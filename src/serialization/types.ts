import type { ParseFieldsOptions } from '../fields/types';

/**
 * Options for {@link selectFields}.
 */
export interface SelectFieldsOptions extends ParseFieldsOptions {
  /** Compare field names case-insensitively. @default false */
  ignoreCase?: boolean;
  /** Serialize everything instead of throwing on a malformed selector. @default false */
  ignoreParseErrors?: boolean;
}
