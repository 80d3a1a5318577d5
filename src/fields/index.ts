export { Selection, mergeSelections, WILDCARD } from './selection';
export type { SelectionShape } from './selection';
export {
  parseFields,
  isFieldsError,
  isFieldsPresent,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_LENGTH,
} from './parser';
export {
  matchesPath,
  hasSelectedDescendant,
  createPathPredicate,
  propertySegment,
  indexSegment,
  toPath,
  formatPath,
} from './matcher';
export type {
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
} from './types';
