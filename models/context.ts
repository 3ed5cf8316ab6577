import type { UpdateFailedError } from '../core/errors';
import type { StructuredOperationLogger } from '../logging/operation-logger';
import type { QueryLimits } from '../query/plan';
import type { QuerySet } from '../query/query-set';
import type { StorageClient } from '../storage/storage-client';
import type { ModelInstance } from './instance';
import type { ModelSchema } from './schema';
import type { FieldMap, Row } from './types';

/** Connection alias and collection a request goes to. */
export interface Target {
  alias: string;
  collection: string;
}

export interface HydrationOptions {
  target: Target;
  /** Fields present in the row; `null` means every declared field. */
  projection: readonly string[] | null;
  distance: number | null;
  annotations: Readonly<Record<string, number>>;
}

export type UpdateFailedHook<S extends FieldMap> = (error: UpdateFailedError, instance: ModelInstance<S>) => void | Promise<void>;

/** What querysets, instances and mutations share about one model. */
export interface ModelContext<S extends FieldMap> {
  readonly schema: ModelSchema<S>;
  readonly logger: StructuredOperationLogger;
  readonly limits: QueryLimits;
  readonly onUpdateFailed?: UpdateFailedHook<S>;
  client(alias: string): StorageClient;
  /** Maps a stored row to an instance; `DataIntegrityError` when a value fails its field. */
  fromRow(row: Row, index: number, options: HydrationOptions): ModelInstance<S>;
  objects(): QuerySet<S>;
}
