import { DoesNotExist, MultipleObjectsReturned, QueryConfigError, SchemaError } from '../core/errors';
import type { ModelContext } from '../models/context';
import type { ModelInstance } from '../models/instance';
import { vectorFieldOf, type FieldName } from '../models/schema';
import type { FieldMap, Row } from '../models/types';
import { splitDistanceBound } from './compiler';
import { lookupsToPredicate, type Lookups } from './lookups';
import { planQuery, type QueryPlan } from './plan';
import { checkPredicate, DISTANCE_FIELD, isPredicate, Q, type Predicate } from './predicate';
import { extendSpec, type Direction, type Ordering, type QuerySpec, type SearchDirective } from './query-spec';

export type Criteria<S extends FieldMap> = Lookups<S> | Predicate;

export type OrderKey<S extends FieldMap> =
  | FieldName<S>
  | `-${FieldName<S>}`
  | typeof DISTANCE_FIELD
  | `-${typeof DISTANCE_FIELD}`;

export interface SearchOptions<S extends FieldMap> {
  /** Defaults to the model's only vector field. */
  field?: FieldName<S>;
  /** Defaults to the field's metric. */
  metric?: string;
  topK?: number;
  /** Index search parameters, passed through untouched. */
  params?: Record<string, string | number>;
}

export const DEFAULT_TOP_K = 10;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Lazy, immutable query over one model. Chain methods return new querysets;
 * nothing reaches storage until a terminal method (`fetch`, `count`, `get`,
 * iteration and so on) runs. Results are cached per queryset.
 */
export class QuerySet<S extends FieldMap> implements AsyncIterable<ModelInstance<S>> {
  private results?: Promise<ModelInstance<S>[]>;
  private total?: Promise<number>;

  constructor(
    private readonly model: ModelContext<S>,
    readonly spec: QuerySpec
  ) {}

  filter(criteria: Criteria<S>): QuerySet<S> {
    return this.narrow(criteria, false);
  }

  exclude(criteria: Criteria<S>): QuerySet<S> {
    return this.narrow(criteria, true);
  }

  orderBy(key: OrderKey<S>): QuerySet<S> {
    const descending = key.startsWith('-');
    const field: string = descending ? key.slice(1) : key;
    const direction: Direction = descending ? 'desc' : 'asc';

    if (field !== DISTANCE_FIELD) {
      const declared = this.model.schema.fields[field];
      if (!declared) {
        throw new QueryConfigError(`Cannot order ${this.model.schema.name} by unknown field '${field}'`);
      }
      if (declared.kind === 'vector' || declared.kind === 'json') {
        throw new QueryConfigError(`Cannot order by ${declared.kind} field '${field}'`);
      }
      if (this.spec.search) {
        throw new QueryConfigError(`Search results are ranked by ${DISTANCE_FIELD}; they cannot also be ordered by '${field}'`);
      }
    }

    const ordering: Ordering = Object.freeze({ field, direction });
    return this.derive({ ordering });
  }

  limit(count: number): QuerySet<S> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new QueryConfigError(`limit must be a positive integer, got ${count}`);
    }
    return this.derive({ limit: count });
  }

  offset(count: number): QuerySet<S> {
    if (!Number.isInteger(count) || count < 0) {
      throw new QueryConfigError(`offset must be a non-negative integer, got ${count}`);
    }
    return this.derive({ offset: count });
  }

  search(vector: readonly number[], options: SearchOptions<S> = {}): QuerySet<S> {
    const { schema } = this.model;
    const fieldName = options.field ?? this.defaultVectorField();
    const field = vectorFieldOf(schema, fieldName);
    if (!field) {
      throw new SchemaError(`'${fieldName}' is not a vector field of ${schema.name}`);
    }
    if (vector.length !== field.dim) {
      throw new SchemaError(`Query vector for '${fieldName}' has ${vector.length} dimensions, expected ${field.dim}`);
    }
    if (vector.some((component) => !Number.isFinite(component))) {
      throw new SchemaError('Query vector components must be finite numbers');
    }

    const topK = options.topK ?? DEFAULT_TOP_K;
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new SchemaError(`topK must be a positive integer, got ${topK}`);
    }

    const ordering = this.spec.ordering;
    if (ordering && ordering.field !== DISTANCE_FIELD) {
      throw new QueryConfigError(`Search results are ranked by ${DISTANCE_FIELD}; remove orderBy('${ordering.field}') first`);
    }

    const search: SearchDirective = Object.freeze({
      field: fieldName,
      vector: Object.freeze([...vector]),
      metric: options.metric ?? field.metric,
      topK,
      params: options.params ? Object.freeze({ ...options.params }) : undefined
    });
    return this.derive({ search });
  }

  /** Exposes each hit's distance under `alias` in `instance.annotations`. */
  annotateDistance(alias: string = DISTANCE_FIELD): QuerySet<S> {
    if (!this.spec.search) {
      throw new QueryConfigError('annotateDistance() needs a vector search; call search() first');
    }
    if (!IDENTIFIER.test(alias) || alias in this.model.schema.fields) {
      throw new QueryConfigError(`Invalid distance annotation name '${alias}'`);
    }
    return this.derive({ distanceAlias: alias });
  }

  /** Loads only the named fields (plus the primary key). */
  only(...fields: FieldName<S>[]): QuerySet<S> {
    if (!fields.length) {
      throw new QueryConfigError('only() needs at least one field');
    }
    this.assertKnownFields(fields);
    return this.derive({ projection: Object.freeze([...new Set(fields)]) });
  }

  /** Loads every field except the named ones. */
  defer(...fields: FieldName<S>[]): QuerySet<S> {
    const { schema } = this.model;
    this.assertKnownFields(fields);
    if (fields.includes(schema.primaryKey)) {
      throw new QueryConfigError(`The primary key '${schema.primaryKey}' cannot be deferred`);
    }
    const projection = schema.fieldNames.filter((name) => !fields.includes(name));
    return this.derive({ projection: Object.freeze(projection) });
  }

  /** A fresh, unevaluated copy. */
  all(): QuerySet<S> {
    return this.derive({});
  }

  /** Runs against another registered connection. */
  using(alias: string): QuerySet<S> {
    if (!alias.trim()) {
      throw new QueryConfigError('Connection alias must be a non-empty string');
    }
    return this.derive({ alias });
  }

  /** Runs against another collection with the same schema. */
  on(collection: string): QuerySet<S> {
    if (!IDENTIFIER.test(collection)) {
      throw new QueryConfigError(`Invalid collection name '${collection}'`);
    }
    return this.derive({ collection });
  }

  /** The request this queryset would send, without sending it. */
  explain(): QueryPlan {
    return this.plan();
  }

  fetch(): Promise<ModelInstance<S>[]> {
    if (!this.results) {
      this.results = this.evaluate().catch((error: unknown) => {
        this.results = undefined;
        throw error;
      });
    }
    return this.results;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ModelInstance<S>> {
    yield* await this.fetch();
  }

  count(): Promise<number> {
    if (this.results) {
      return this.results.then((instances) => instances.length);
    }
    if (!this.total) {
      this.total = this.evaluateCount().catch((error: unknown) => {
        this.total = undefined;
        throw error;
      });
    }
    return this.total;
  }

  async get(criteria?: Criteria<S>): Promise<ModelInstance<S>> {
    const target = criteria ? this.filter(criteria) : this;
    const instances = await target.limit(2).fetch();
    const [instance] = instances;
    if (!instance) {
      throw new DoesNotExist(this.model.schema.name);
    }
    if (instances.length > 1) {
      throw new MultipleObjectsReturned(this.model.schema.name, instances.length);
    }
    return instance;
  }

  async first(): Promise<ModelInstance<S> | null> {
    // A -distance search would reverse only the single nearest hit
    const reversed = this.spec.search !== null && this.spec.ordering?.direction === 'desc';
    const instances = this.results || reversed ? await this.fetch() : await this.limit(1).fetch();
    return instances[0] ?? null;
  }

  async last(): Promise<ModelInstance<S> | null> {
    const instances = await this.fetch();
    return instances[instances.length - 1] ?? null;
  }

  async exists(): Promise<boolean> {
    return (await this.first()) !== null;
  }

  /** Deletes every record matching the filter and returns how many went. */
  async delete(): Promise<number> {
    if (this.spec.search) {
      throw new QueryConfigError('Cannot delete the results of a vector search');
    }
    if (this.spec.limit !== null || this.spec.offset !== null) {
      throw new QueryConfigError('Cannot delete a sliced queryset');
    }

    const plan = this.plan();
    const filter = plan.request.filter;
    if (!filter) {
      throw new QueryConfigError('Refusing to delete every record; filter the queryset first');
    }

    const { schema, logger } = this.model;
    const { alias } = this.spec;
    const client = this.model.client(alias);
    try {
      const deleted = await client.delete(plan.request.collection, filter);
      this.results = undefined;
      this.total = undefined;
      await logger.logMutation({ model: schema.name, alias, kind: 'delete', collection: plan.request.collection, affected: deleted });
      return deleted;
    } catch (error) {
      await logger.logError({ model: schema.name, alias, operation: 'delete', error, context: { filter } });
      throw error;
    }
  }

  private narrow(criteria: Criteria<S>, negate: boolean): QuerySet<S> {
    const predicate = isPredicate(criteria) ? criteria : lookupsToPredicate(criteria);
    if (!predicate) {
      return this.derive({});
    }
    checkPredicate(this.model.schema.fields, predicate);

    const next = negate ? Q.not(predicate) : predicate;
    const where = this.spec.where ? Q.and(this.spec.where, next) : next;
    // Distance bounds under or/not are rejected here rather than at evaluation
    splitDistanceBound(where);
    return this.derive({ where });
  }

  private derive(patch: Partial<QuerySpec>): QuerySet<S> {
    return new QuerySet(this.model, extendSpec(this.spec, patch));
  }

  private plan(): QueryPlan {
    return planQuery(this.model.schema, this.spec, this.model.limits);
  }

  private defaultVectorField(): FieldName<S> {
    const { schema } = this.model;
    const [only, ...others] = schema.vectorFields;
    if (!only || others.length) {
      throw new SchemaError(`${schema.name} has several vector fields; pass search(vector, { field })`);
    }
    return only;
  }

  private assertKnownFields(fields: readonly string[]): void {
    for (const field of fields) {
      if (!(field in this.model.schema.fields)) {
        throw new QueryConfigError(`Unknown field '${field}' on ${this.model.schema.name}`);
      }
    }
  }

  private async evaluate(): Promise<ModelInstance<S>[]> {
    const plan = this.plan();
    const { schema, logger } = this.model;
    const { alias } = this.spec;
    const client = this.model.client(alias);
    const started = Date.now();

    try {
      let instances: ModelInstance<S>[];
      if (plan.kind === 'search') {
        const hits = await client.search(plan.request);
        const bound = plan.distanceBound;
        const kept = bound === null ? hits : hits.filter((hit) => hit.distance < bound);
        instances = (plan.descending ? [...kept].reverse() : kept).map((hit, index) => this.hydrate(hit, index, plan.request.outputFields));
      } else {
        const rows = await client.query(plan.request);
        const ordered = plan.ordering && plan.window ? this.sortAndWindow(rows, plan.ordering, plan.window) : rows;
        instances = ordered.map((row, index) => this.hydrate({ row, distance: null }, index, plan.request.outputFields));
      }

      await logger.logQuery({
        model: schema.name,
        alias,
        kind: plan.kind,
        request: { ...plan.request },
        rows: instances.length,
        durationMs: Date.now() - started
      });
      return instances;
    } catch (error) {
      await logger.logError({ model: schema.name, alias, operation: plan.kind, error, context: { collection: plan.request.collection } });
      throw error;
    }
  }

  private async evaluateCount(): Promise<number> {
    const plan = this.plan();
    const client = this.model.client(this.spec.alias);
    if (plan.kind === 'search' || !client.count) {
      return (await this.fetch()).length;
    }

    const { schema, logger } = this.model;
    const { alias } = this.spec;
    const started = Date.now();
    const total = await client.count(plan.request.collection, plan.request.filter);
    await logger.logQuery({
      model: schema.name,
      alias,
      kind: 'count',
      request: { collection: plan.request.collection, filter: plan.request.filter },
      rows: total,
      durationMs: Date.now() - started
    });

    // Agree with the length fetch() would return
    if (plan.window) {
      const scanned = Math.min(total, plan.request.limit);
      return Math.max(0, Math.min(plan.window.limit, scanned - plan.window.offset));
    }
    return Math.max(0, Math.min(plan.request.limit, total - plan.request.offset));
  }

  private hydrate(hit: { row: Row; distance: number | null }, index: number, outputFields: readonly string[]): ModelInstance<S> {
    const { distanceAlias } = this.spec;
    return this.model.fromRow(hit.row, index, {
      target: { alias: this.spec.alias, collection: this.spec.collection },
      projection: this.spec.projection ? outputFields : null,
      distance: hit.distance,
      annotations: distanceAlias && hit.distance !== null ? { [distanceAlias]: hit.distance } : {}
    });
  }

  private sortAndWindow(rows: Row[], ordering: Ordering, window: { offset: number; limit: number }): Row[] {
    const field = this.model.schema.fields[ordering.field];
    const sign = ordering.direction === 'desc' ? -1 : 1;
    const keyed = rows.map((row) => ({ row, key: field ? field.fromStorage(row[ordering.field]) : row[ordering.field] }));

    keyed.sort((a, b) => {
      const aMissing = a.key === null || a.key === undefined;
      const bMissing = b.key === null || b.key === undefined;
      if (aMissing || bMissing) {
        // Nulls last in both directions
        return Number(aMissing) - Number(bMissing);
      }
      return sign * compareValues(a.key, b.key);
    });

    return keyed.slice(window.offset, window.offset + window.limit).map((entry) => entry.row);
  }
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

