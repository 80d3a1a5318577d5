import type { Context, Env } from 'hono';

/**
 * Type-safe context variable accessors.
 *
 * The partial response middleware runs inside applications whose `Env` does
 * not declare its variables, so reads and writes go through these helpers.
 */

/**
 * Safely retrieves a variable from the Hono context.
 * Returns undefined if the variable doesn't exist.
 *
 * @example
 * ```ts
 * const result = getContextVar<FieldsResult>(ctx, 'partialFields');
 * ```
 */
export function getContextVar<T>(ctx: unknown, key: string): T | undefined {
  const ctxObj = ctx as { var?: Record<string, unknown> };
  return ctxObj?.var?.[key] as T | undefined;
}

/**
 * Type-safe setter for context variables in middleware, for an `Env` that
 * may not include the key.
 */
export function setContextVar<E extends Env>(ctx: Context<E>, key: string, value: unknown): void {
  (ctx as unknown as { set: (key: string, value: unknown) => void }).set(key, value);
}
