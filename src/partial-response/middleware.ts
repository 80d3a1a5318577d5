import type { Context, MiddlewareHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from '@hono/zod-openapi';
import {
  resolvePartialResponseOptions,
  type PartialResponseOptions,
  type ResolvedPartialResponseOptions,
} from '../config/index';
import { getContextVar, setContextVar } from '../core/context-helpers';
import { FieldsSyntaxException } from '../core/exceptions';
import { getLogger } from '../core/logger';
import { createPathPredicate } from '../fields/matcher';
import { parseFields } from '../fields/parser';
import type { Selection } from '../fields/selection';
import type { FieldsResult, PathPredicate } from '../fields/types';
import { filterValue, serializePartial } from '../serialization/serialize';
import type { FieldsQuerySchemaOptions } from './types';

/**
 * Read the raw selector from the query string, falling back to the header.
 */
function extractSelector(ctx: Context, options: ResolvedPartialResponseOptions): string | undefined {
  const fromQuery = ctx.req.query(options.queryParam);
  if (fromQuery !== undefined) return fromQuery;
  if (options.headerName) {
    return ctx.req.header(options.headerName) ?? undefined;
  }
  return undefined;
}

/**
 * Parse the request's selector and apply the parse error policy.
 * Returns `absent` for an ignored error.
 */
function resolveFieldsResult(
  selector: string | undefined,
  options: ResolvedPartialResponseOptions
): FieldsResult {
  const result = parseFields(selector, {
    maxDepth: options.maxDepth,
    maxLength: options.maxLength,
  });

  if (result.status !== 'error') {
    return result;
  }

  if (!options.ignoreParseErrors) {
    throw new FieldsSyntaxException(selector ?? '', result.error);
  }

  getLogger().warn('Ignoring malformed fields selector', {
    selector,
    position: result.error.position,
    reason: result.error.message,
  });
  return { status: 'absent' };
}

/**
 * The predicate for a request, or undefined when nothing is to be filtered.
 */
function predicateFor(
  result: FieldsResult,
  options: ResolvedPartialResponseOptions
): PathPredicate | undefined {
  if (result.status !== 'present' || result.selection.isEmpty) {
    return undefined;
  }
  return createPathPredicate(result.selection, options.ignoreCase);
}

/**
 * Create partial response middleware.
 *
 * Parses the selector once per request and stores the outcome in context.
 * A malformed selector rejects the request with a 400 `INVALID_FIELDS` error
 * unless `ignoreParseErrors` is set, in which case the response is sent
 * unfiltered. With `filterResponses` on (the default), JSON responses of
 * downstream handlers are filtered on the way out: the body is decoded,
 * filtered and encoded again, and `Content-Length` and `ETag` are dropped.
 *
 * Decoding goes through `JSON.parse`, so a rewritten body carries numbers as
 * JavaScript numbers: integers beyond 2^53 lose precision and `1.0` comes out
 * as `1`. Handlers that need the exact encoding should respond with
 * {@link partialJson}, which filters the value before it is encoded.
 *
 * @example
 * ```ts
 * import { Hono } from 'hono';
 * import { partialResponse, createErrorHandler } from 'hono-partial-response';
 *
 * const app = new Hono();
 * app.onError(createErrorHandler());
 * app.use('/api/*', partialResponse({ ignoreCase: true }));
 *
 * // GET /api/feed?fields=kind,items(title,id)
 * app.get('/api/feed', (c) => c.json(feed));
 * ```
 */
export function partialResponse(options: PartialResponseOptions = {}): MiddlewareHandler {
  const resolved = resolvePartialResponseOptions(options);

  return async (ctx, next) => {
    const result = resolveFieldsResult(extractSelector(ctx, resolved), resolved);

    setContextVar(ctx, 'partialFields', result);
    setContextVar(ctx, 'partialResponseOptions', resolved);

    await next();

    if (!resolved.filterResponses || !ctx.res.ok) return;
    if (getContextVar<boolean>(ctx, 'partialResponseApplied')) return;

    const predicate = predicateFor(result, resolved);
    if (!predicate) return;

    const contentType = ctx.res.headers.get('content-type');
    if (!contentType?.includes('application/json')) return;

    let body: unknown;
    try {
      body = await ctx.res.clone().json();
    } catch (error) {
      getLogger().warn('Response declared as JSON could not be parsed, sent unfiltered', {
        path: ctx.req.path,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    // Both describe the unfiltered body.
    const headers = new Headers(ctx.res.headers);
    headers.delete('content-length');
    headers.delete('etag');
    const filtered = new Response(serializePartial(body, predicate), {
      status: ctx.res.status,
      statusText: ctx.res.statusText,
      headers,
    });

    // Assigning over an existing response makes Hono copy its headers back in.
    ctx.res = undefined;
    ctx.res = filtered;
    setContextVar(ctx, 'partialResponseApplied', true);
  };
}

/**
 * Get the parse outcome of the current request's selector.
 */
export function getFieldsResult(ctx: Context): FieldsResult | undefined {
  return getContextVar<FieldsResult>(ctx, 'partialFields');
}

/**
 * Get the current request's selection, if one was supplied and parsed.
 */
export function getPartialSelection(ctx: Context): Selection | undefined {
  const result = getFieldsResult(ctx);
  return result?.status === 'present' ? result.selection : undefined;
}

/**
 * Respond with `value` filtered by the request's selector.
 *
 * Uses the outcome stored by `partialResponse()`; without the middleware the
 * selector is read and parsed here with default options. The response is
 * marked as filtered so the middleware leaves it alone.
 *
 * @example
 * ```ts
 * app.get('/users/:id', (c) => partialJson(c, await users.get(c.req.param('id'))));
 * ```
 */
export function partialJson(ctx: Context, value: unknown, status?: ContentfulStatusCode): Response {
  let options = getContextVar<ResolvedPartialResponseOptions>(ctx, 'partialResponseOptions');
  let result = getFieldsResult(ctx);

  if (!options || !result) {
    options = resolvePartialResponseOptions();
    result = resolveFieldsResult(extractSelector(ctx, options), options);
  }

  const predicate = predicateFor(result, options) ?? (() => true);
  setContextVar(ctx, 'partialResponseApplied', true);

  ctx.header('Content-Type', 'application/json');
  return ctx.body(JSON.stringify(filterValue(value, predicate)), status);
}

/**
 * Query schema declaring the selector parameter on an OpenAPI route.
 *
 * @example
 * ```ts
 * const route = createRoute({
 *   method: 'get',
 *   path: '/feed',
 *   request: { query: fieldsQuerySchema() },
 *   responses: { 200: { description: 'Feed' } },
 * });
 * ```
 */
export function fieldsQuerySchema(options: FieldsQuerySchemaOptions = {}) {
  const {
    queryParam = 'fields',
    description = 'Comma separated fields to include, e.g. `a,b(c,d),e/f`',
    example = 'id,name',
  } = options;

  return z.object({
    [queryParam]: z
      .string()
      .optional()
      .openapi({
        param: { name: queryParam, in: 'query' },
        description,
        example,
      }),
  });
}
