import { z } from 'zod';
import { StorageError } from '../core/errors';
import type { Row } from '../models/types';
import type { InsertResult, ScalarQueryRequest, SearchHit, StorageClient, VectorSearchRequest } from './storage-client';

/**
 * The slice of `MilvusClient` this adapter calls. Responses are parsed
 * rather than trusted, so they are typed loosely here.
 */
export interface MilvusApi {
  query(request: {
    collection_name: string;
    filter: string;
    output_fields: string[];
    limit: number;
    offset: number;
  }): Promise<unknown>;
  search(request: {
    collection_name: string;
    anns_field: string;
    data: number[];
    limit: number;
    offset: number;
    filter: string;
    output_fields: string[];
    metric_type?: string;
    params?: Record<string, string | number>;
  }): Promise<unknown>;
  insert(request: { collection_name: string; data?: Row[] }): Promise<unknown>;
  delete(request: { collection_name: string; filter: string }): Promise<unknown>;
  count(request: { collection_name: string; expr: string }): Promise<unknown>;
  closeConnection(): Promise<unknown>;
}

const statusSchema = z.object({
  error_code: z.union([z.string(), z.number()]).optional(),
  code: z.number().optional(),
  reason: z.string().optional()
});

const baseResponseSchema = z.object({ status: statusSchema.optional() }).passthrough();

const queryResponseSchema = baseResponseSchema.extend({
  data: z.array(z.record(z.unknown())).default([])
});

const hitSchema = z.record(z.unknown());

const searchResponseSchema = baseResponseSchema.extend({
  // One list per query vector, or a flat list when a single vector was sent
  results: z.union([z.array(z.array(hitSchema)), z.array(hitSchema)]).default([])
});

const idListSchema = z.object({ data: z.array(z.union([z.string(), z.number()])) });

const insertResponseSchema = baseResponseSchema.extend({
  insert_cnt: z.coerce.number().default(0),
  IDs: z
    .object({
      int_id: idListSchema.optional(),
      str_id: idListSchema.optional()
    })
    .optional()
});

const deleteResponseSchema = baseResponseSchema.extend({
  delete_cnt: z.coerce.number().default(0)
});

const countResponseSchema = baseResponseSchema.extend({
  data: z.coerce.number()
});

export class MilvusStorageClient implements StorageClient {
  constructor(private readonly client: MilvusApi) {}

  async query(request: ScalarQueryRequest): Promise<Row[]> {
    const response = parseResponse(
      queryResponseSchema,
      await this.client.query({
        collection_name: request.collection,
        filter: request.filter,
        output_fields: request.outputFields,
        limit: request.limit,
        offset: request.offset
      }),
      'query'
    );
    return response.data.map((row) => pick(row, request.outputFields));
  }

  async search(request: VectorSearchRequest): Promise<SearchHit[]> {
    const payload: Parameters<MilvusApi['search']>[0] = {
      collection_name: request.collection,
      anns_field: request.field,
      data: request.vector,
      limit: request.topK,
      offset: request.offset,
      filter: request.filter,
      output_fields: request.outputFields
    };
    if (request.metric !== undefined) {
      payload.metric_type = request.metric;
    }
    if (request.params) {
      payload.params = request.params;
    }

    const response = parseResponse(searchResponseSchema, await this.client.search(payload), 'search');
    const hits = flattenHits(response.results);

    return hits.map((hit, index) => {
      const distance = hit.score ?? hit.distance;
      if (typeof distance !== 'number') {
        throw new StorageError(`Search hit ${index} has no score`);
      }
      const row = pick(hit, request.outputFields);
      if (row[request.primaryKey] === undefined && hit.id !== undefined) {
        row[request.primaryKey] = hit.id;
      }
      return { row, distance };
    });
  }

  async insert(collection: string, rows: Row[]): Promise<InsertResult> {
    const response = parseResponse(
      insertResponseSchema,
      await this.client.insert({ collection_name: collection, data: rows }),
      'insert'
    );
    const primaryKeys = response.IDs?.int_id?.data ?? response.IDs?.str_id?.data ?? [];
    return { insertCount: response.insert_cnt, primaryKeys };
  }

  async delete(collection: string, filter: string): Promise<number> {
    const response = parseResponse(
      deleteResponseSchema,
      await this.client.delete({ collection_name: collection, filter }),
      'delete'
    );
    return response.delete_cnt;
  }

  async count(collection: string, filter: string): Promise<number> {
    const response = parseResponse(
      countResponseSchema,
      await this.client.count({ collection_name: collection, expr: filter }),
      'count'
    );
    return response.data;
  }

  async close(): Promise<void> {
    await this.client.closeConnection();
  }
}

function parseResponse<T extends z.ZodTypeAny>(schema: T, response: unknown, operation: string): z.infer<T> {
  const status = statusSchema.safeParse(
    typeof response === 'object' && response !== null && 'status' in response ? response.status : undefined
  );
  if (status.success) {
    assertSuccess(status.data, operation);
  }

  const parsed = schema.safeParse(response);
  if (!parsed.success) {
    throw new StorageError(`Unexpected ${operation} response: ${parsed.error.issues[0]?.message ?? 'unreadable'}`);
  }
  return parsed.data;
}

function assertSuccess(status: z.infer<typeof statusSchema>, operation: string): void {
  const errorCode = status.error_code;
  const failedCode =
    errorCode !== undefined && errorCode !== 'Success' && errorCode !== 0
      ? String(errorCode)
      : status.code !== undefined && status.code !== 0
        ? String(status.code)
        : null;
  if (failedCode !== null) {
    throw new StorageError(`Milvus ${operation} failed: ${status.reason || failedCode}`, failedCode);
  }
}

function flattenHits(results: Array<Record<string, unknown>> | Array<Array<Record<string, unknown>>>): Array<Record<string, unknown>> {
  const hits: Array<Record<string, unknown>> = [];
  for (const entry of results) {
    if (Array.isArray(entry)) {
      // Only one query vector is ever sent
      return entry;
    }
    hits.push(entry);
  }
  return hits;
}

function pick(source: Record<string, unknown>, fields: string[]): Row {
  const row: Row = {};
  for (const field of fields) {
    if (field in source) {
      row[field] = source[field];
    }
  }
  return row;
}
