import { StorageError } from '../core/errors';
import type { Row } from '../models/types';
import { parseFilter } from './filter-evaluator';
import { resolveMetric } from './metrics';
import type { InsertResult, ScalarQueryRequest, SearchHit, StorageClient, VectorSearchRequest } from './storage-client';

export interface CollectionOptions {
  primaryKey: string;
  /** Assign incrementing integer keys on insert. */
  autoId?: boolean;
}

interface Collection {
  primaryKey: string;
  autoId: boolean;
  nextId: number;
  rows: Row[];
}

/**
 * In-process stand-in for a vector database. Evaluates the same filter
 * grammar the compiler emits and ranks search hits by the requested metric.
 */
export class InMemoryStorageClient implements StorageClient {
  private readonly collections = new Map<string, Collection>();
  private closed = false;

  createCollection(name: string, options: CollectionOptions): void {
    if (this.collections.has(name)) {
      throw new StorageError(`Collection '${name}' already exists`);
    }
    this.collections.set(name, {
      primaryKey: options.primaryKey,
      autoId: options.autoId ?? false,
      nextId: 1,
      rows: []
    });
  }

  /** Copies of every stored row, in insertion order. */
  dump(collection: string): Row[] {
    return this.collection(collection).rows.map((row) => structuredClone(row));
  }

  async query(request: ScalarQueryRequest): Promise<Row[]> {
    const { rows } = this.collection(request.collection);
    const matches = parseFilter(request.filter);

    return rows
      .filter(matches)
      .slice(request.offset, request.offset + request.limit)
      .map((row) => project(row, request.outputFields));
  }

  async search(request: VectorSearchRequest): Promise<SearchHit[]> {
    const { rows } = this.collection(request.collection);
    const matches = parseFilter(request.filter);
    const metric = resolveMetric(request.metric);

    const scored: SearchHit[] = [];
    for (const row of rows) {
      const candidate = row[request.field];
      if (!isVector(candidate) || !matches(row)) {
        continue;
      }
      scored.push({ row, distance: metric.score(request.vector, candidate) });
    }

    return scored
      .sort((a, b) => (metric.higherIsCloser ? b.distance - a.distance : a.distance - b.distance))
      .slice(request.offset, request.offset + request.topK)
      .map((hit) => ({ row: project(hit.row, request.outputFields), distance: hit.distance }));
  }

  async insert(collection: string, rows: Row[]): Promise<InsertResult> {
    const target = this.collection(collection);
    const prepared = rows.map((row) => structuredClone(row));
    const seen = new Set(target.rows.map((row) => row[target.primaryKey]));
    const primaryKeys: Array<string | number> = [];

    // Check the whole batch before storing any of it
    for (const row of prepared) {
      if (target.autoId) {
        if (row[target.primaryKey] !== undefined && row[target.primaryKey] !== null) {
          throw new StorageError(`Primary key '${target.primaryKey}' is assigned automatically`, 'IllegalArgument');
        }
        continue;
      }

      const key = row[target.primaryKey];
      if (typeof key !== 'string' && typeof key !== 'number') {
        throw new StorageError(`Missing primary key '${target.primaryKey}'`, 'IllegalArgument');
      }
      if (seen.has(key)) {
        throw new StorageError(`Duplicate primary key ${String(key)}`, 'IllegalArgument');
      }
      seen.add(key);
    }

    for (const row of prepared) {
      if (target.autoId) {
        row[target.primaryKey] = target.nextId;
        target.nextId += 1;
      }
      const key = row[target.primaryKey];
      if (typeof key === 'string' || typeof key === 'number') {
        primaryKeys.push(key);
      }
      target.rows.push(row);
    }

    return { insertCount: prepared.length, primaryKeys };
  }

  async delete(collection: string, filter: string): Promise<number> {
    const target = this.collection(collection);
    if (!filter.trim()) {
      throw new StorageError('Delete needs a filter expression', 'IllegalArgument');
    }

    const matches = parseFilter(filter);
    const before = target.rows.length;
    target.rows = target.rows.filter((row) => !matches(row));
    return before - target.rows.length;
  }

  async count(collection: string, filter: string): Promise<number> {
    const matches = parseFilter(filter);
    return this.collection(collection).rows.filter(matches).length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private collection(name: string): Collection {
    if (this.closed) {
      throw new StorageError('Client is closed');
    }
    const collection = this.collections.get(name);
    if (!collection) {
      throw new StorageError(`Collection '${name}' does not exist`, 'CollectionNotExists');
    }
    return collection;
  }
}

function project(row: Row, outputFields: string[]): Row {
  const result: Row = {};
  for (const field of outputFields) {
    if (field in row) {
      result[field] = structuredClone(row[field]);
    }
  }
  return result;
}

function isVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}
