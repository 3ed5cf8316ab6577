import type { Row } from '../models/types';

export interface ScalarQueryRequest {
  collection: string;
  /** Compiled filter expression; empty means every record. */
  filter: string;
  outputFields: string[];
  limit: number;
  offset: number;
}

export interface VectorSearchRequest {
  collection: string;
  /** Name of the primary-key field, for clients that report keys under a fixed name. */
  primaryKey: string;
  field: string;
  vector: number[];
  metric?: string;
  topK: number;
  offset: number;
  /** Scalar pre-filter applied before ranking. */
  filter: string;
  outputFields: string[];
  params?: Record<string, string | number>;
}

export interface SearchHit {
  row: Row;
  distance: number;
}

export interface InsertResult {
  insertCount: number;
  /** Keys in insertion order, including those the storage layer assigned. */
  primaryKeys: Array<string | number>;
}

/**
 * The narrow surface the engine needs from a vector database client.
 * Hits from `search` arrive ranked by distance.
 */
export interface StorageClient {
  query(request: ScalarQueryRequest): Promise<Row[]>;
  search(request: VectorSearchRequest): Promise<SearchHit[]>;
  insert(collection: string, rows: Row[]): Promise<InsertResult>;
  /** Returns the number of deleted records. */
  delete(collection: string, filter: string): Promise<number>;
  count?(collection: string, filter: string): Promise<number>;
  close?(): Promise<void>;
}
