import { CompileError } from '../core/errors';
import type { FieldMap, FieldType } from '../models/types';
import { DISTANCE_FIELD, Q, type ComparisonOperator, type Operator, type Predicate, type TextOperator } from './predicate';

type Names<S extends FieldMap> = keyof S & string;

/**
 * Keyword filters: `title` means equality, `title__contains`,
 * `views__gte`, `tags__in` and so on apply the named operator, and
 * `distance__lt` bounds the neighbour distance of a search.
 */
export type Lookups<S extends FieldMap> = {
  [K in Names<S>]?: FieldType<S[K]>;
} & {
  [K in Names<S> as `${K}__${ComparisonOperator}`]?: FieldType<S[K]>;
} & {
  [K in Names<S> as `${K}__${TextOperator}`]?: string;
} & {
  [K in Names<S> as `${K}__in`]?: ReadonlyArray<FieldType<S[K]>>;
} & {
  distance__lt?: number;
};

const LOOKUP_OPERATORS: Readonly<Record<string, Operator>> = {
  eq: 'eq',
  ne: 'ne',
  gt: 'gt',
  gte: 'gte',
  lt: 'lt',
  lte: 'lte',
  contains: 'contains',
  startswith: 'startswith',
  endswith: 'endswith',
  in: 'in'
};

/** AND-combines the lookups in key order; returns null when there are none. */
export function lookupsToPredicate(lookups: object): Predicate | null {
  const predicates: Predicate[] = [];

  for (const [key, value] of Object.entries(lookups)) {
    if (value === undefined) {
      continue;
    }
    predicates.push(lookupToPredicate(key, value));
  }

  return predicates.length ? Q.and(...predicates) : null;
}

function lookupToPredicate(key: string, value: unknown): Predicate {
  const separator = key.lastIndexOf('__');
  if (separator <= 0) {
    return Q.where(key, 'eq', value);
  }

  const field = key.slice(0, separator);
  const suffix = key.slice(separator + 2);

  if (field === DISTANCE_FIELD) {
    if (suffix !== 'lt') {
      throw new CompileError(`Unsupported lookup '${key}': the ${DISTANCE_FIELD} pseudo-field only supports __lt`);
    }
    return Q.where(DISTANCE_FIELD, 'distance_lt', value);
  }

  const op = LOOKUP_OPERATORS[suffix];
  if (!op) {
    throw new CompileError(`Unsupported lookup '${key}'`);
  }
  return Q.where(field, op, value);
}
