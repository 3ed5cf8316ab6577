import { CompileError } from '../core/errors';
import type { FieldMap } from '../models/types';
import { checkPredicate, DISTANCE_FIELD, Q, type LeafPredicate, type Predicate } from './predicate';

const COMPARISON_SYMBOLS = {
  eq: '==',
  ne: '!=',
  gt: '>',
  lt: '<',
  gte: '>=',
  lte: '<='
} as const;

/**
 * Renders a predicate tree as a boolean expression in the storage layer's
 * filter grammar. An empty tree renders as the empty string, which the
 * storage layer reads as "no filter".
 */
export function compileExpression(tree: Predicate | null, fields: FieldMap): string {
  if (!tree) {
    return '';
  }
  checkPredicate(fields, tree);
  return render(tree);
}

export interface SplitFilter {
  scalar: Predicate | null;
  /** Upper bound on the neighbour distance, or null when none was requested. */
  distanceBound: number | null;
}

/**
 * Separates distance bounds from the scalar part of a tree. Bounds are only
 * meaningful as top-level conjuncts: a bound under `or` or `not` cannot be
 * applied after the search, so it is rejected.
 */
export function splitDistanceBound(tree: Predicate | null): SplitFilter {
  if (!tree) {
    return { scalar: null, distanceBound: null };
  }

  const conjuncts = flattenAnd(tree);
  const bounds = conjuncts.filter(isDistanceLeaf);
  if (!bounds.length) {
    assertNoNestedBound(tree);
    return { scalar: tree, distanceBound: null };
  }

  const rest = conjuncts.filter((node) => !isDistanceLeaf(node));
  rest.forEach(assertNoNestedBound);

  const values = bounds.map((bound) => {
    if (typeof bound.value !== 'number' || !Number.isFinite(bound.value)) {
      throw new CompileError('distance_lt needs a finite number');
    }
    return bound.value;
  });

  return {
    scalar: rest.length ? Q.and(...rest) : null,
    distanceBound: Math.min(...values)
  };
}

export function renderLiteral(value: unknown): string {
  if (typeof value === 'string') {
    return `"${escapeString(value)}"`;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new CompileError(`Cannot render non-finite number ${value}`);
    }
    return String(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map(renderLiteral).join(', ')}]`;
  }
  throw new CompileError(`Cannot render literal of type ${value === null ? 'null' : typeof value}`);
}

function render(node: Predicate): string {
  switch (node.kind) {
    case 'leaf':
      return renderLeaf(node);
    case 'not':
      return `not (${render(node.operand)})`;
    case 'and':
    case 'or':
      return `${renderChild(node.left, node.kind)} ${node.kind} ${renderChild(node.right, node.kind)}`;
  }
}

function renderChild(child: Predicate, parent: 'and' | 'or'): string {
  const text = render(child);
  const isOtherPolarity = (child.kind === 'and' || child.kind === 'or') && child.kind !== parent;
  return isOtherPolarity ? `(${text})` : text;
}

function renderLeaf(node: LeafPredicate): string {
  const { field, op, value } = node;
  switch (op) {
    case 'contains':
      return `${field} like ${renderLikePattern('%', value, '%')}`;
    case 'startswith':
      return `${field} like ${renderLikePattern('', value, '%')}`;
    case 'endswith':
      return `${field} like ${renderLikePattern('%', value, '')}`;
    case 'in':
      if (!Array.isArray(value)) {
        throw new CompileError(`Operator 'in' on '${field}' needs a list`);
      }
      return `${field} in ${renderLiteral(value)}`;
    case 'distance_lt':
      throw new CompileError(`The ${DISTANCE_FIELD} bound is applied to search hits and has no filter expression`);
    default:
      return `${field} ${COMPARISON_SYMBOLS[op]} ${renderLiteral(value)}`;
  }
}

function renderLikePattern(prefix: string, value: unknown, suffix: string): string {
  if (typeof value !== 'string') {
    throw new CompileError('Pattern operators need a string');
  }
  return `"${prefix}${escapeString(value)}${suffix}"`;
}

function escapeString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function flattenAnd(node: Predicate): Predicate[] {
  return node.kind === 'and' ? [...flattenAnd(node.left), ...flattenAnd(node.right)] : [node];
}

function isDistanceLeaf(node: Predicate): node is LeafPredicate {
  return node.kind === 'leaf' && node.op === 'distance_lt';
}

function assertNoNestedBound(node: Predicate): void {
  switch (node.kind) {
    case 'leaf':
      if (node.op === 'distance_lt') {
        throw new CompileError(`A ${DISTANCE_FIELD} bound cannot appear under 'or' or 'not'`);
      }
      return;
    case 'not':
      assertNoNestedBound(node.operand);
      return;
    case 'and':
    case 'or':
      assertNoNestedBound(node.left);
      assertNoNestedBound(node.right);
  }
}
