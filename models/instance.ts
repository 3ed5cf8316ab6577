import { NotPersistedError, QueryConfigError, StorageError, UpdateFailedError, ValidationError } from '../core/errors';
import type { Field } from '../fields/field';
import { Q } from '../query/predicate';
import type { ModelContext, Target } from './context';
import { deleteByPrimaryKey, insertRows, replaceRow, type PrimaryKey } from './mutations';
import type { FieldName } from './schema';
import type { FieldMap, FieldType, ModelInput, ModelRecord, Row } from './types';

export interface InstanceState {
  target: Target;
  persisted: boolean;
  /** Loaded fields when the instance came from a projected query. */
  projection: readonly string[] | null;
  distance: number | null;
  annotations: Readonly<Record<string, number>>;
}

/**
 * One record of a model. Values are validated on every assignment; `save`
 * inserts or replaces the stored record and `delete` removes it.
 */
export class ModelInstance<S extends FieldMap> {
  private readonly values = new Map<string, unknown>();
  private readonly changed = new Set<string>();
  private persistedFlag: boolean;
  // Field values as last loaded or saved
  private stored: ModelRecord | null = null;
  private readonly target: Target;
  private readonly projection: readonly string[] | null;

  readonly distance: number | null;
  readonly annotations: Readonly<Record<string, number>>;

  constructor(
    private readonly context: ModelContext<S>,
    values: ReadonlyMap<string, unknown>,
    state: InstanceState
  ) {
    for (const [name, value] of values) {
      this.values.set(name, value);
    }
    this.target = { ...state.target };
    this.persistedFlag = state.persisted;
    this.projection = state.projection;
    this.distance = state.distance;
    this.annotations = Object.freeze({ ...state.annotations });

    if (state.persisted) {
      this.stored = this.snapshot();
    } else {
      for (const name of values.keys()) {
        this.changed.add(name);
      }
    }
  }

  get model(): string {
    return this.context.schema.name;
  }

  get persisted(): boolean {
    return this.persistedFlag;
  }

  /** True when loaded through `only()`/`defer()`; such instances cannot be saved. */
  get isPartial(): boolean {
    return this.projection !== null;
  }

  get pk(): PrimaryKey | null {
    const value = this.values.get(this.context.schema.primaryKey);
    return typeof value === 'string' || typeof value === 'number' ? value : null;
  }

  get<K extends FieldName<S>>(name: K): FieldType<S[K]> | null {
    this.assertField(name);
    return (this.values.get(name) ?? null) as FieldType<S[K]> | null;
  }

  set<K extends FieldName<S>>(name: K, value: FieldType<S[K]> | null): this {
    const field = this.assertField(name);
    const validated = field.validate(name, value);
    this.values.set(name, validated);
    this.changed.add(name);
    return this;
  }

  /** Validates every value before assigning any of them. */
  assign(values: ModelInput<S>): this {
    const validated = new Map<string, unknown>();
    for (const [name, value] of Object.entries(values)) {
      if (value === undefined) {
        continue;
      }
      validated.set(name, this.assertField(name).validate(name, value));
    }
    for (const [name, value] of validated) {
      this.values.set(name, value);
      this.changed.add(name);
    }
    return this;
  }

  isDirty(): boolean {
    return this.changed.size > 0;
  }

  changedFields(): string[] {
    return [...this.changed];
  }

  toRecord(): ModelRecord {
    return this.snapshot();
  }

  /** The row sent to storage; every value is validated again. */
  toRow(): Row {
    const { schema } = this.context;
    if (this.projection) {
      throw new QueryConfigError(`Cannot save a partially loaded ${schema.name}; load it without only() or defer()`);
    }

    const row: Row = {};
    for (const name of schema.fieldNames) {
      const field = schema.fields[name];
      if (field.autoId) {
        continue;
      }
      row[name] = field.validate(name, this.values.get(name));
    }
    return row;
  }

  async save(): Promise<this> {
    const row = this.toRow();

    if (!this.persistedFlag) {
      await insertRows(this.context, this.target, [row], (result) => this.markSaved(result.primaryKeys[0]));
      return this;
    }

    const key = this.storedKey();
    const snapshot = this.stored ?? this.snapshot();
    try {
      await replaceRow(this.context, this.target, key, snapshot, row, (result) => this.markSaved(result.primaryKeys[0]));
    } catch (error) {
      if (error instanceof UpdateFailedError) {
        // The stored record is gone; the instance can only be inserted again
        this.persistedFlag = false;
        this.stored = null;
        await this.notifyUpdateFailed(error);
      }
      throw error;
    }
    return this;
  }

  /** Assigns `values` and saves. */
  async update(values: ModelInput<S>): Promise<this> {
    this.assign(values);
    return this.save();
  }

  async delete(): Promise<number> {
    if (!this.persistedFlag) {
      throw new NotPersistedError(this.model);
    }
    return deleteByPrimaryKey(this.context, this.target, this.storedKey(), () => {
      this.persistedFlag = false;
      this.stored = null;
    });
  }

  /** Reloads every field from storage, discarding unsaved changes. */
  async refresh(): Promise<this> {
    if (!this.persistedFlag) {
      throw new NotPersistedError(this.model);
    }
    const { schema } = this.context;
    const fresh = await this.context
      .objects()
      .using(this.target.alias)
      .on(this.target.collection)
      .filter(Q.where(schema.primaryKey, 'eq', this.storedKey()))
      .get();

    this.values.clear();
    for (const [name, value] of Object.entries(fresh.toRecord())) {
      this.values.set(name, value);
    }
    this.changed.clear();
    this.stored = this.snapshot();
    return this;
  }

  /** Inserts instances in one request after validating all of them. */
  static async insertAll<S extends FieldMap>(context: ModelContext<S>, instances: ModelInstance<S>[], target: Target): Promise<number> {
    const rows = instances.map((instance) => {
      if (instance.persistedFlag) {
        throw new QueryConfigError(`${instance.model} instance is already persisted; use save()`);
      }
      return instance.toRow();
    });
    if (!rows.length) {
      return 0;
    }

    const result = await insertRows(context, target, rows, (inserted) =>
      instances.forEach((instance, index) => instance.markSaved(inserted.primaryKeys[index]))
    );
    return result.insertCount;
  }

  private markSaved(assignedKey: PrimaryKey | undefined): void {
    const { schema } = this.context;
    const field = schema.fields[schema.primaryKey];
    if (field.autoId) {
      if (assignedKey === undefined) {
        throw new StorageError(`Insert into ${this.target.collection} returned no primary key`);
      }
      this.values.set(schema.primaryKey, field.validate(schema.primaryKey, field.fromStorage(assignedKey)));
    }
    this.persistedFlag = true;
    this.changed.clear();
    this.stored = this.snapshot();
  }

  private storedKey(): PrimaryKey {
    const { schema } = this.context;
    const value = this.stored ? this.stored[schema.primaryKey] : this.values.get(schema.primaryKey);
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new NotPersistedError(this.model);
    }
    return value;
  }

  private async notifyUpdateFailed(error: UpdateFailedError): Promise<void> {
    const hook = this.context.onUpdateFailed;
    if (!hook) {
      return;
    }
    try {
      await hook(error, this);
    } catch (hookError) {
      await this.context.logger.logError({ model: this.model, alias: this.target.alias, operation: 'onUpdateFailed', error: hookError });
    }
  }

  private snapshot(): ModelRecord {
    const record: Row = {};
    for (const name of this.context.schema.fieldNames) {
      if (this.values.has(name)) {
        record[name] = structuredClone(this.values.get(name));
      }
    }
    return Object.freeze(record);
  }

  private assertField(name: string): Field<unknown> {
    const field = this.context.schema.fields[name];
    if (!field) {
      throw new ValidationError(name, `${this.model} has no such field`);
    }
    if (this.projection && !this.projection.includes(name)) {
      throw new QueryConfigError(`Field '${name}' was not loaded for this ${this.model}`);
    }
    return field;
  }
}
