import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { FieldsSyntaxError } from '../fields/types';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * Base API exception that extends Hono's HTTPException.
 * Provides structured error responses with code, message, and optional details.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Selector too long', 400, 'FIELDS_TOO_LONG', { limit: 4096 });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown
  ) {
    super(status, { message });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  /**
   * Converts the exception to the JSON error body.
   */
  toJSON() {
    const errorObj: { code: string; message: string; details?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.details) {
      errorObj.details = this.details;
    }
    return {
      success: false as const,
      error: errorObj,
    };
  }

  /** Alias of `status`. */
  get statusCode(): ApiStatusCode {
    return this.status;
  }
}

/**
 * Thrown when a request carries a malformed field selector and parse errors
 * are not ignored.
 *
 * @example
 * ```ts
 * throw new FieldsSyntaxException('a(b', { message: "Missing ')' at position 3", position: 3 });
 * ```
 */
export class FieldsSyntaxException extends ApiException {
  public readonly selector: string;
  public readonly position: number;

  constructor(selector: string, error: FieldsSyntaxError) {
    super(`Invalid fields selector: ${error.message}`, 400, 'INVALID_FIELDS', {
      selector,
      position: error.position,
    });
    this.name = 'FieldsSyntaxException';
    this.selector = selector;
    this.position = error.position;
  }
}

/**
 * Caller contract violation: invalid options or arguments. Raised eagerly,
 * when the offending value is first seen.
 */
export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationException';
  }
}
