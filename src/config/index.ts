/**
 * Partial response options.
 *
 * Options are validated once, when the middleware is created, so a bad
 * configuration fails at startup rather than on the first request.
 *
 * @example
 * ```ts
 * import { resolvePartialResponseOptions } from 'hono-partial-response';
 *
 * const options = resolvePartialResponseOptions({ ignoreCase: true });
 * options.queryParam; // 'fields'
 * ```
 */

import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions';
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_LENGTH } from '../fields/parser';

export const partialResponseOptionsSchema = z.object({
  /** Query parameter holding the selector */
  queryParam: z.string().min(1).default('fields'),
  /** Header consulted when the query parameter is missing */
  headerName: z.string().min(1).optional(),
  /** Compare field names case-insensitively */
  ignoreCase: z.boolean().default(false),
  /** Serialize everything when the selector is malformed, instead of answering 400 */
  ignoreParseErrors: z.boolean().default(false),
  /** Parser nesting guard */
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  /** Parser length guard */
  maxLength: z.number().int().positive().default(DEFAULT_MAX_LENGTH),
  /** Filter JSON responses produced by downstream handlers */
  filterResponses: z.boolean().default(true),
});

/** Options accepted by `partialResponse()`. */
export type PartialResponseOptions = z.input<typeof partialResponseOptionsSchema>;

/** Options with every default applied. */
export type ResolvedPartialResponseOptions = z.output<typeof partialResponseOptionsSchema>;

/**
 * Validate options and apply defaults.
 *
 * @throws ConfigurationException when an option has the wrong type or range
 */
export function resolvePartialResponseOptions(
  input: PartialResponseOptions = {}
): ResolvedPartialResponseOptions {
  const parsed = partialResponseOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    }));
    throw new ConfigurationException('Invalid partial response options', issues);
  }
  return parsed.data;
}
