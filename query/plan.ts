import { CompileError, QueryConfigError } from '../core/errors';
import type { ModelSchema } from '../models/schema';
import type { FieldMap } from '../models/types';
import type { ScalarQueryRequest, VectorSearchRequest } from '../storage/storage-client';
import { compileExpression, splitDistanceBound } from './compiler';
import { DISTANCE_FIELD } from './predicate';
import type { Ordering, QuerySpec } from './query-spec';

export interface QueryLimits {
  /** Server-side limit for scalar queries that set none. */
  queryLimit: number;
  /** Rows fetched when a scalar query has to be ordered in process. */
  maxScan: number;
}

export type QueryPlan =
  | {
      kind: 'query';
      request: ScalarQueryRequest;
      /** Set when rows are sorted in process before the window is applied. */
      ordering: Ordering | null;
      window: { offset: number; limit: number } | null;
    }
  | {
      kind: 'search';
      request: VectorSearchRequest;
      distanceBound: number | null;
      descending: boolean;
    };

/**
 * Turns a spec into the request to send. Pure: everything that can be
 * rejected without a round trip is rejected here.
 */
export function planQuery<S extends FieldMap>(schema: ModelSchema<S>, spec: QuerySpec, limits: QueryLimits): QueryPlan {
  const { scalar, distanceBound } = splitDistanceBound(spec.where);
  const filter = compileExpression(scalar, schema.fields);
  const outputFields = outputFieldsFor(schema, spec);

  if (spec.search) {
    const search = spec.search;
    const topK = spec.limit === null ? search.topK : Math.min(search.topK, spec.limit);
    const request: VectorSearchRequest = {
      collection: spec.collection,
      primaryKey: schema.primaryKey,
      field: search.field,
      vector: [...search.vector],
      topK,
      offset: spec.offset ?? 0,
      filter,
      outputFields
    };
    if (search.metric !== undefined) {
      request.metric = search.metric;
    }
    if (search.params) {
      request.params = { ...search.params };
    }

    return {
      kind: 'search',
      request,
      distanceBound,
      descending: spec.ordering?.direction === 'desc'
    };
  }

  if (distanceBound !== null) {
    throw new CompileError('A distance bound needs a vector search; call search() first');
  }

  if (spec.ordering?.field === DISTANCE_FIELD) {
    throw new QueryConfigError(`Ordering by ${DISTANCE_FIELD} needs a vector search`);
  }

  const limit = spec.limit ?? limits.queryLimit;
  const offset = spec.offset ?? 0;

  if (spec.ordering) {
    return {
      kind: 'query',
      request: { collection: spec.collection, filter, outputFields, limit: limits.maxScan, offset: 0 },
      ordering: spec.ordering,
      window: { offset, limit }
    };
  }

  return {
    kind: 'query',
    request: { collection: spec.collection, filter, outputFields, limit, offset },
    ordering: null,
    window: null
  };
}

function outputFieldsFor<S extends FieldMap>(schema: ModelSchema<S>, spec: QuerySpec): string[] {
  if (!spec.projection) {
    return [...schema.fieldNames];
  }
  const fields = new Set<string>([schema.primaryKey, ...spec.projection]);
  if (spec.ordering && spec.ordering.field in schema.fields) {
    fields.add(spec.ordering.field);
  }
  return schema.fieldNames.filter((name) => fields.has(name));
}
