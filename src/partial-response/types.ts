import type { ResolvedPartialResponseOptions } from '../config/index';
import type { FieldsResult } from '../fields/types';

/**
 * Environment type additions for the partial response middleware.
 */
export interface PartialResponseEnv {
  Variables: {
    /** Parse outcome of the request's selector */
    partialFields: FieldsResult;
    /** Options of the middleware that handled the request */
    partialResponseOptions: ResolvedPartialResponseOptions;
    /** Set once the response body has been filtered */
    partialResponseApplied: boolean;
  };
}

/**
 * Options for {@link fieldsQuerySchema}.
 */
export interface FieldsQuerySchemaOptions {
  /** Query parameter name. @default 'fields' */
  queryParam?: string;
  /** Parameter description shown in the OpenAPI document */
  description?: string;
  /** Example selector */
  example?: string;
}
