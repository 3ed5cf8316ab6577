import { CompileError } from '../core/errors';
import type { FieldKind } from '../fields/field';
import type { FieldMap } from '../models/types';

/** Pseudo-field holding the neighbour distance of a vector search hit. */
export const DISTANCE_FIELD = 'distance';

export type ComparisonOperator = 'eq' | 'ne' | 'gt' | 'lt' | 'gte' | 'lte';
export type TextOperator = 'contains' | 'startswith' | 'endswith';
export type ScalarOperator = ComparisonOperator | TextOperator | 'in';
export type Operator = ScalarOperator | 'distance_lt';

export const PREDICATE: unique symbol = Symbol('vecmodel.predicate');

export interface LeafPredicate {
  readonly [PREDICATE]: true;
  readonly kind: 'leaf';
  readonly field: string;
  readonly op: Operator;
  readonly value: unknown;
}

export interface BinaryPredicate {
  readonly [PREDICATE]: true;
  readonly kind: 'and' | 'or';
  readonly left: Predicate;
  readonly right: Predicate;
}

export interface NotPredicate {
  readonly [PREDICATE]: true;
  readonly kind: 'not';
  readonly operand: Predicate;
}

export type Predicate = LeafPredicate | BinaryPredicate | NotPredicate;

export function isPredicate(value: unknown): value is Predicate {
  return typeof value === 'object' && value !== null && PREDICATE in value;
}

function leaf(field: string, op: Operator, value: unknown): LeafPredicate {
  const frozenValue = Array.isArray(value) ? Object.freeze([...value]) : value;
  return Object.freeze({ [PREDICATE]: true as const, kind: 'leaf' as const, field, op, value: frozenValue });
}

function combine(kind: 'and' | 'or', predicates: Predicate[]): Predicate {
  const [first, ...rest] = predicates;
  if (!first) {
    throw new CompileError(`${kind}() needs at least one predicate`);
  }
  return rest.reduce<Predicate>(
    (left, right) => Object.freeze({ [PREDICATE]: true as const, kind, left, right }),
    first
  );
}

/** Builders for predicate trees. */
export const Q = {
  where(field: string, op: Operator, value: unknown): Predicate {
    return leaf(field, op, value);
  },
  and(...predicates: Predicate[]): Predicate {
    return combine('and', predicates);
  },
  or(...predicates: Predicate[]): Predicate {
    return combine('or', predicates);
  },
  not(operand: Predicate): Predicate {
    return Object.freeze({ [PREDICATE]: true as const, kind: 'not' as const, operand });
  },
  /** Keeps hits whose raw score is below `bound`; under IP and COSINE the score is a similarity. */
  distanceLessThan(bound: number): Predicate {
    return leaf(DISTANCE_FIELD, 'distance_lt', bound);
  }
};

const OPERATORS_BY_KIND: Record<FieldKind, readonly ScalarOperator[]> = {
  integer: ['eq', 'ne', 'gt', 'lt', 'gte', 'lte', 'in'],
  float: ['eq', 'ne', 'gt', 'lt', 'gte', 'lte', 'in'],
  string: ['eq', 'ne', 'gt', 'lt', 'gte', 'lte', 'in', 'contains', 'startswith', 'endswith'],
  boolean: ['eq', 'ne', 'in'],
  json: ['eq', 'ne', 'in'],
  vector: []
};

/**
 * Rejects unknown fields, operators the field's kind does not support and
 * operands of the wrong type. Runs when a predicate is attached to a
 * queryset and again at compile time.
 */
export function checkPredicate(fields: FieldMap, predicate: Predicate): void {
  switch (predicate.kind) {
    case 'and':
    case 'or':
      checkPredicate(fields, predicate.left);
      checkPredicate(fields, predicate.right);
      return;
    case 'not':
      checkPredicate(fields, predicate.operand);
      return;
    case 'leaf':
      checkLeaf(fields, predicate);
  }
}

function checkLeaf(fields: FieldMap, predicate: LeafPredicate): void {
  const { field: name, op, value } = predicate;

  if (op === 'distance_lt' || name === DISTANCE_FIELD) {
    if (op !== 'distance_lt' || name !== DISTANCE_FIELD) {
      throw new CompileError(`The ${DISTANCE_FIELD} pseudo-field only supports distance_lt`);
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new CompileError('distance_lt needs a finite number');
    }
    return;
  }

  const field = fields[name];
  if (!field) {
    throw new CompileError(`Unknown field '${name}'`);
  }
  if (!OPERATORS_BY_KIND[field.kind].includes(op)) {
    throw new CompileError(`Operator '${op}' is not supported on ${field.kind} field '${name}'`);
  }

  if (op === 'in') {
    if (!Array.isArray(value)) {
      throw new CompileError(`Operator 'in' on '${name}' needs a list`);
    }
    for (const item of value) {
      checkOperand(name, field.kind, item);
    }
    return;
  }

  if (op === 'contains' || op === 'startswith' || op === 'endswith') {
    if (typeof value !== 'string') {
      throw new CompileError(`Operator '${op}' on '${name}' needs a string`);
    }
    return;
  }

  checkOperand(name, field.kind, value);
}

function checkOperand(name: string, kind: FieldKind, value: unknown): void {
  switch (kind) {
    case 'integer':
    case 'float':
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new CompileError(`Field '${name}' compares against finite numbers, got ${describe(value)}`);
      }
      return;
    case 'string':
      if (typeof value !== 'string') {
        throw new CompileError(`Field '${name}' compares against strings, got ${describe(value)}`);
      }
      return;
    case 'boolean':
      if (typeof value !== 'boolean') {
        throw new CompileError(`Field '${name}' compares against booleans, got ${describe(value)}`);
      }
      return;
    case 'json':
      if (!(typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value)))) {
        throw new CompileError(`Field '${name}' compares against scalar JSON values, got ${describe(value)}`);
      }
      return;
    case 'vector':
      throw new CompileError(`Vector field '${name}' cannot be filtered; use search()`);
  }
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'a list' : typeof value;
}
