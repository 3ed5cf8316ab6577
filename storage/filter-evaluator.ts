import { StorageError } from '../core/errors';
import type { Row } from '../models/types';

type Literal = string | number | boolean | Literal[];
type ComparisonSymbol = '==' | '!=' | '>' | '<' | '>=' | '<=';

type FilterNode =
  | { type: 'and' | 'or'; left: FilterNode; right: FilterNode }
  | { type: 'not'; operand: FilterNode }
  | { type: 'compare'; field: string; op: ComparisonSymbol; value: Literal }
  | { type: 'like'; field: string; pattern: RegExp }
  | { type: 'in'; field: string; values: Literal[] };

type Token =
  | { type: 'punct'; value: '(' | ')' | '[' | ']' | ',' }
  | { type: 'op'; value: ComparisonSymbol }
  | { type: 'word'; value: string }
  | { type: 'number'; value: number }
  | { type: 'string'; value: string };

export type RowPredicate = (row: Row) => boolean;

/**
 * Parses the filter grammar produced by the expression compiler (boolean
 * `and`/`or`/`not`, comparisons, `like` and `in`) into a row predicate.
 * The empty expression matches every row.
 */
export function parseFilter(expression: string): RowPredicate {
  if (!expression.trim()) {
    return () => true;
  }

  const parser = new FilterParser(tokenize(expression));
  const node = parser.parseExpression();
  parser.expectEnd();
  return (row) => evaluate(node, row);
}

const OPERATOR_PATTERN = /^(==|!=|>=|<=|>|<)/;
const NUMBER_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/;
const WORD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*/;

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let rest = input;

  while (rest.length) {
    const whitespace = /^\s+/.exec(rest);
    if (whitespace) {
      rest = rest.slice(whitespace[0].length);
      continue;
    }

    const head = rest[0];
    if (head === '(' || head === ')' || head === '[' || head === ']' || head === ',') {
      tokens.push({ type: 'punct', value: head });
      rest = rest.slice(1);
      continue;
    }

    if (head === '"') {
      const { value, length } = readString(rest);
      tokens.push({ type: 'string', value });
      rest = rest.slice(length);
      continue;
    }

    const operator = OPERATOR_PATTERN.exec(rest);
    if (operator) {
      tokens.push({ type: 'op', value: toComparison(operator[0]) });
      rest = rest.slice(operator[0].length);
      continue;
    }

    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]) });
      rest = rest.slice(number[0].length);
      continue;
    }

    const word = WORD_PATTERN.exec(rest);
    if (word) {
      tokens.push({ type: 'word', value: word[0] });
      rest = rest.slice(word[0].length);
      continue;
    }

    throw new StorageError(`Invalid filter expression near '${rest.slice(0, 20)}'`);
  }

  return tokens;
}

function readString(input: string): { value: string; length: number } {
  let value = '';
  for (let i = 1; i < input.length; i += 1) {
    const char = input[i];
    if (char === '\\') {
      const next = input[i + 1];
      if (next === undefined) {
        break;
      }
      value += next;
      i += 1;
      continue;
    }
    if (char === '"') {
      return { value, length: i + 1 };
    }
    value += char;
  }
  throw new StorageError('Unterminated string literal in filter expression');
}

function toComparison(symbol: string): ComparisonSymbol {
  switch (symbol) {
    case '==':
    case '!=':
    case '>':
    case '<':
    case '>=':
    case '<=':
      return symbol;
    default:
      throw new StorageError(`Unknown operator '${symbol}'`);
  }
}

class FilterParser {
  private position = 0;

  constructor(private readonly tokens: Token[]) {}

  parseExpression(): FilterNode {
    let node = this.parseAnd();
    while (this.acceptWord('or')) {
      node = { type: 'or', left: node, right: this.parseAnd() };
    }
    return node;
  }

  expectEnd(): void {
    const token = this.tokens[this.position];
    if (token) {
      throw new StorageError(`Unexpected token '${String(token.value)}' in filter expression`);
    }
  }

  private parseAnd(): FilterNode {
    let node = this.parseUnary();
    while (this.acceptWord('and')) {
      node = { type: 'and', left: node, right: this.parseUnary() };
    }
    return node;
  }

  private parseUnary(): FilterNode {
    if (this.acceptWord('not')) {
      return { type: 'not', operand: this.parseUnary() };
    }
    if (this.acceptPunct('(')) {
      const node = this.parseExpression();
      this.expectPunct(')');
      return node;
    }
    return this.parseCondition();
  }

  private parseCondition(): FilterNode {
    const field = this.next();
    if (field?.type !== 'word') {
      throw new StorageError('Expected a field name in filter expression');
    }

    if (this.acceptWord('like')) {
      const pattern = this.next();
      if (pattern?.type !== 'string') {
        throw new StorageError('like needs a string pattern');
      }
      return { type: 'like', field: field.value, pattern: likeToRegExp(pattern.value) };
    }

    if (this.acceptWord('in')) {
      const values = this.parseLiteral();
      if (!Array.isArray(values)) {
        throw new StorageError('in needs a list');
      }
      return { type: 'in', field: field.value, values };
    }

    const operator = this.next();
    if (operator?.type !== 'op') {
      throw new StorageError(`Expected an operator after '${field.value}'`);
    }
    return { type: 'compare', field: field.value, op: operator.value, value: this.parseLiteral() };
  }

  private parseLiteral(): Literal {
    const token = this.next();
    if (!token) {
      throw new StorageError('Expected a literal in filter expression');
    }
    if (token.type === 'number' || token.type === 'string') {
      return token.value;
    }
    if (token.type === 'word' && (token.value === 'true' || token.value === 'false')) {
      return token.value === 'true';
    }
    if (token.type === 'punct' && token.value === '[') {
      const items: Literal[] = [];
      if (this.acceptPunct(']')) {
        return items;
      }
      do {
        items.push(this.parseLiteral());
      } while (this.acceptPunct(','));
      this.expectPunct(']');
      return items;
    }
    throw new StorageError(`Unexpected token '${String(token.value)}' where a literal was expected`);
  }

  private next(): Token | undefined {
    const token = this.tokens[this.position];
    this.position += 1;
    return token;
  }

  private acceptWord(word: string): boolean {
    const token = this.tokens[this.position];
    if (token?.type === 'word' && token.value === word) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private acceptPunct(value: string): boolean {
    const token = this.tokens[this.position];
    if (token?.type === 'punct' && token.value === value) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private expectPunct(value: string): void {
    if (!this.acceptPunct(value)) {
      throw new StorageError(`Expected '${value}' in filter expression`);
    }
  }
}

function likeToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('')
    .map((char) => {
      if (char === '%') {
        return '.*';
      }
      if (char === '_') {
        return '.';
      }
      return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${body}$`, 's');
}

function evaluate(node: FilterNode, row: Row): boolean {
  switch (node.type) {
    case 'and':
      return evaluate(node.left, row) && evaluate(node.right, row);
    case 'or':
      return evaluate(node.left, row) || evaluate(node.right, row);
    case 'not':
      return !evaluate(node.operand, row);
    case 'like': {
      const value = row[node.field];
      return typeof value === 'string' && node.pattern.test(value);
    }
    case 'in': {
      const value = row[node.field];
      return node.values.some((candidate) => candidate === value);
    }
    case 'compare':
      return compare(row[node.field], node.op, node.value);
  }
}

function compare(value: unknown, op: ComparisonSymbol, literal: Literal): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  switch (op) {
    case '==':
      return value === literal;
    case '!=':
      return value !== literal;
  }

  let order: number;
  if (typeof value === 'number' && typeof literal === 'number') {
    order = value - literal;
  } else if (typeof value === 'string' && typeof literal === 'string') {
    order = value < literal ? -1 : value > literal ? 1 : 0;
  } else {
    return false;
  }

  switch (op) {
    case '>':
      return order > 0;
    case '<':
      return order < 0;
    case '>=':
      return order >= 0;
    case '<=':
      return order <= 0;
  }
}
