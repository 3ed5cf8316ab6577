export {
  VecModelError,
  SchemaError,
  ValidationError,
  QueryConfigError,
  CompileError,
  ConfigError,
  ConnectionNotFoundError,
  DoesNotExist,
  MultipleObjectsReturned,
  DataIntegrityError,
  UpdateFailedError,
  NotPersistedError,
  StorageError
} from './core/errors';

export {
  Field,
  IntField,
  FloatField,
  CharField,
  BooleanField,
  JsonField,
  VectorField,
  type FieldKind,
  type FieldOptions,
  type FieldDescriptor,
  type CharFieldOptions,
  type VectorFieldOptions,
  type JsonValue
} from './fields/field';

export { defineModel, type Model, type ModelDefinition } from './models/model';
export { ModelInstance } from './models/instance';
export type { ModelSchema, FieldName } from './models/schema';
export type { FieldMap, FieldType, ModelInput, ModelRecord, Row } from './models/types';
export type { UpdateFailedHook } from './models/context';

export { Q, DISTANCE_FIELD, type Predicate, type Operator } from './query/predicate';
export type { Lookups } from './query/lookups';
export { compileExpression } from './query/compiler';
export type { QueryPlan, QueryLimits } from './query/plan';
export type { QuerySpec } from './query/query-spec';
export { QuerySet, DEFAULT_TOP_K, type Criteria, type OrderKey, type SearchOptions } from './query/query-set';

export type { StorageClient, ScalarQueryRequest, VectorSearchRequest, SearchHit, InsertResult } from './storage/storage-client';
export { ConnectionRegistry, connections } from './storage/connection-registry';
export { connect, disconnect, type ConnectOptions } from './storage/connect';
export { InMemoryStorageClient, type CollectionOptions } from './storage/in-memory-storage-client';
export { MilvusStorageClient, type MilvusApi } from './storage/milvus-storage-client';

export { loadSettings, getSettings, resetSettings, type Settings } from './config/settings';
export {
  ConsoleOperationLogger,
  SilentOperationLogger,
  StructuredOperationLogger,
  createDefaultLogger,
  redactObject,
  type OperationLogger,
  type OperationLogEntry
} from './logging/operation-logger';
