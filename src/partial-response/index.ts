export {
  partialResponse,
  partialJson,
  getFieldsResult,
  getPartialSelection,
  fieldsQuerySchema,
} from './middleware';
export type { PartialResponseEnv, FieldsQuerySchemaOptions } from './types';
