import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ApiException } from './exceptions';
import { getContextVar } from './context-helpers';
import { getLogger } from './logger';

export interface ErrorHandlerConfig {
  /** Add the `requestId` context variable (set by `hono/request-id`) to error bodies. Default: true */
  includeRequestId?: boolean;
  /** Code for errors that are not HTTP exceptions. Default: 'INTERNAL_ERROR' */
  defaultErrorCode?: string;
  /** Message for errors that are not HTTP exceptions. Default: 'An internal error occurred' */
  defaultErrorMessage?: string;
  /** Log errors that are not HTTP exceptions through the library logger. Default: true */
  logUnexpectedErrors?: boolean;
}

/**
 * `app.onError` handler rendering every error as
 * `{ success: false, error: { code, message, details?, requestId? } }`.
 *
 * - `ApiException` (including `FieldsSyntaxException` and
 *   `ConfigurationException`) keeps its status, code and details.
 * - Any other `HTTPException` keeps its status, with code `HTTP_ERROR`.
 * - Everything else becomes a 500 and is logged; its message is not exposed.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.use('*', requestId());
 * app.onError(createErrorHandler());
 * app.use('*', partialResponse());
 * ```
 */
export function createErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig = {}
): ErrorHandler<E> {
  const {
    includeRequestId = true,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = 'An internal error occurred',
    logUnexpectedErrors = true,
  } = config;

  const toApiException = (err: Error): ApiException => {
    if (err instanceof ApiException) return err;
    if (err instanceof HTTPException) {
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }
    if (logUnexpectedErrors) {
      getLogger().error('Unexpected error', { error: err.message, stack: err.stack });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  };

  return (err: Error, ctx: Context<E>): Response => {
    const exception = toApiException(err);
    const body = exception.toJSON();
    const error: Record<string, unknown> = { ...body.error };

    if (includeRequestId) {
      const requestId = getContextVar<string>(ctx, 'requestId');
      if (requestId) error.requestId = requestId;
    }

    return ctx.json({ success: body.success, error }, exception.status);
  };
}
