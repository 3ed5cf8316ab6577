import { getSettings } from '../config/settings';
import { DataIntegrityError, DoesNotExist, MultipleObjectsReturned, ValidationError } from '../core/errors';
import { createDefaultLogger, type StructuredOperationLogger } from '../logging/operation-logger';
import type { QueryLimits } from '../query/plan';
import { isPredicate } from '../query/predicate';
import { createSpec } from '../query/query-spec';
import { QuerySet, type Criteria } from '../query/query-set';
import { connections, type ConnectionRegistry } from '../storage/connection-registry';
import type { HydrationOptions, ModelContext, Target, UpdateFailedHook } from './context';
import { ModelInstance } from './instance';
import { buildSchema, type ModelSchema } from './schema';
import type { FieldMap, ModelInput, ModelRecord, Row } from './types';

export interface ModelDefinition<S extends FieldMap> {
  name: string;
  fields: S;
  /** Defaults to the lower-cased model name. */
  collection?: string;
  /** Connection alias; defaults to `VECMODEL_DEFAULT_ALIAS`. */
  connection?: string;
  registry?: ConnectionRegistry;
  logger?: StructuredOperationLogger;
  limits?: Partial<QueryLimits>;
  /** Called when an update deleted the stored record but could not insert the new one. */
  onUpdateFailed?: UpdateFailedHook<S>;
}

export interface Model<S extends FieldMap> {
  readonly schema: ModelSchema<S>;
  objects(): QuerySet<S>;
  /** A new, unsaved instance; defaults fill omitted fields. */
  build(values?: ModelInput<S>): ModelInstance<S>;
  /** An unsaved instance from a plain record such as `UpdateFailedError.snapshot`. */
  fromRecord(record: ModelRecord): ModelInstance<S>;
  create(values: ModelInput<S>): Promise<ModelInstance<S>>;
  getOrCreate(criteria: Criteria<S>, defaults?: ModelInput<S>): Promise<{ instance: ModelInstance<S>; created: boolean }>;
  /** Validates every item, then inserts them in one request. Returns the inserted count. */
  bulkCreate(items: Array<ModelInstance<S> | ModelInput<S>>): Promise<number>;
  isDoesNotExist(error: unknown): error is DoesNotExist;
  isMultipleObjectsReturned(error: unknown): error is MultipleObjectsReturned;
}

export function defineModel<S extends FieldMap>(definition: ModelDefinition<S>): Model<S> {
  const settings = getSettings();
  const schema = buildSchema({
    name: definition.name,
    fields: definition.fields,
    collection: definition.collection,
    alias: definition.connection ?? settings.defaultAlias
  });
  const registry = definition.registry ?? connections;
  const defaultTarget: Target = { alias: schema.alias, collection: schema.collection };

  const context: ModelContext<S> = {
    schema,
    logger: definition.logger ?? createDefaultLogger(settings.log),
    limits: {
      queryLimit: definition.limits?.queryLimit ?? settings.queryLimit,
      maxScan: definition.limits?.maxScan ?? settings.maxScan
    },
    onUpdateFailed: definition.onUpdateFailed,
    client: (alias) => registry.resolve(alias),
    fromRow: (row, index, options) => fromRow(row, index, options),
    objects: () => new QuerySet(context, createSpec(schema.collection, schema.alias))
  };

  function fromRow(row: Row, index: number, options: HydrationOptions): ModelInstance<S> {
    const loaded = options.projection ?? schema.fieldNames;
    const values = new Map<string, unknown>();
    try {
      for (const name of loaded) {
        const field = schema.fields[name];
        values.set(name, field.validate(name, field.fromStorage(row[name])));
      }
    } catch (error) {
      throw new DataIntegrityError(schema.name, index, error);
    }

    return new ModelInstance(context, values, {
      target: options.target,
      persisted: true,
      projection: options.projection,
      distance: options.distance,
      annotations: options.annotations
    });
  }

  function build(values: ModelInput<S> = {}): ModelInstance<S> {
    return fromValues(values);
  }

  function fromValues(values: object): ModelInstance<S> {
    const given = new Map<string, unknown>(Object.entries(values));
    for (const name of given.keys()) {
      if (!(name in schema.fields)) {
        throw new ValidationError(name, `${schema.name} has no such field`);
      }
    }

    const validated = new Map<string, unknown>();
    for (const name of schema.fieldNames) {
      const field = schema.fields[name];
      const value = given.get(name);
      validated.set(name, field.validate(name, value === undefined ? structuredClone(field.defaultValue) : value));
    }

    return new ModelInstance(context, validated, {
      target: defaultTarget,
      persisted: false,
      projection: null,
      distance: null,
      annotations: {}
    });
  }

  return {
    schema,
    objects: context.objects,
    build,
    fromRecord: (record) => fromValues(record),
    async create(values) {
      return build(values).save();
    },
    async getOrCreate(criteria, defaults = {}) {
      try {
        return { instance: await context.objects().get(criteria), created: false };
      } catch (error) {
        if (!(error instanceof DoesNotExist)) {
          throw error;
        }
      }
      // Equality lookups seed the new instance
      const seed = isPredicate(criteria)
        ? {}
        : Object.fromEntries(Object.entries(criteria).filter(([key]) => !key.includes('__')));
      return { instance: await fromValues({ ...seed, ...defaults }).save(), created: true };
    },
    async bulkCreate(items) {
      const instances = items.map((item) => (item instanceof ModelInstance ? item : build(item)));
      return ModelInstance.insertAll(context, instances, defaultTarget);
    },
    isDoesNotExist: (error): error is DoesNotExist => error instanceof DoesNotExist && error.model === schema.name,
    isMultipleObjectsReturned: (error): error is MultipleObjectsReturned =>
      error instanceof MultipleObjectsReturned && error.model === schema.name
  };
}
