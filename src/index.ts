// Combined environment type
import type { PartialResponseEnv } from './partial-response/types';

/** Environment type with all hono-partial-response context variables */
export type HonoPartialResponseEnv = PartialResponseEnv;

// Selector parsing and matching
export {
  Selection,
  mergeSelections,
  WILDCARD,
  parseFields,
  isFieldsError,
  isFieldsPresent,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_LENGTH,
  matchesPath,
  hasSelectedDescendant,
  createPathPredicate,
  propertySegment,
  indexSegment,
  toPath,
  formatPath,
} from './fields/index';
export type {
  SelectionShape,
  PathSegment,
  PropertySegment,
  IndexSegment,
  PathPredicate,
  FieldsResult,
  FieldsPresent,
  FieldsAbsent,
  FieldsError,
  FieldsSyntaxError,
  ParseFieldsOptions,
} from './fields/index';

// Serialization
export { filterValue, serializePartial, selectFields } from './serialization/index';
export type { SelectFieldsOptions } from './serialization/index';

// Hono integration
export {
  partialResponse,
  partialJson,
  getFieldsResult,
  getPartialSelection,
  fieldsQuerySchema,
} from './partial-response/index';
export type { PartialResponseEnv, FieldsQuerySchemaOptions } from './partial-response/index';

// Configuration
export {
  partialResponseOptionsSchema,
  resolvePartialResponseOptions,
} from './config/index';
export type {
  PartialResponseOptions,
  ResolvedPartialResponseOptions,
} from './config/index';

// Errors
export {
  ApiException,
  FieldsSyntaxException,
  ConfigurationException,
} from './core/exceptions';
export type { ApiStatusCode } from './core/exceptions';
export { createErrorHandler } from './core/error-handler';
export type { ErrorHandlerConfig } from './core/error-handler';

// Logging
export { setLogger, getLogger, resetLogger } from './core/logger';
export type { Logger } from './core/logger';
