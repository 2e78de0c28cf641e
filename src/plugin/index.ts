export { TablePlugin, buildRow, matchesQuals, validateQuals } from './plugin.js';
export type { PluginDefinition } from './plugin.js';
export { QualMap } from './quals.js';
export { ColumnTransform, fromField, fromValue, fromColumnName, getField } from './transform.js';
export type { TransformFn } from './transform.js';
export { paginate, DEFAULT_PAGE_SIZE } from './pagination.js';
export type { PageFetcher, PaginateOptions } from './pagination.js';
export { QueryError, UnsupportedQueryError, TransformError } from './errors.js';
export type {
  Column,
  ColumnType,
  GetConfig,
  Page,
  ListConfig,
  QualValue,
  QueryData,
  QueryOptions,
  Row,
  Table,
} from './types.js';
