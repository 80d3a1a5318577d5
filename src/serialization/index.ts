export { filterValue, serializePartial, selectFields } from './serialize';
export type { SelectFieldsOptions } from './types';
