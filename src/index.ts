export { defineEntity } from './entity/define.js';
export type {
  Entity,
  EntityConfig,
  EntityShape,
  FieldDefinition,
  FieldKind,
  FieldSpec,
  RelationSpec,
} from './entity/define.js';
export type {
  Model,
  FieldName,
  CallOptions,
  OmitOptions,
  DeleteOptions,
  Example,
  EqualityMap,
  Repository,
} from './types.js';
export type { StructuredQuery, SortDirection, OrderDirective, Range } from './query/types.js';
export { PostgresRepository } from './store/repository.js';
export type { RepositoryConfig } from './store/repository.js';
export { createPool } from './store/pool.js';
export {
  CrudError,
  NotFoundError,
  MultipleResultsError,
  ExecutionError,
  MissingPrimaryKeyError,
  EntityDefinitionError,
} from './errors.js';
