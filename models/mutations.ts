import { UpdateFailedError } from '../core/errors';
import { compileExpression } from '../query/compiler';
import { Q } from '../query/predicate';
import type { InsertResult } from '../storage/storage-client';
import type { ModelContext, Target } from './context';
import type { FieldMap, ModelRecord, Row } from './types';

export type PrimaryKey = string | number;

export function primaryKeyFilter<S extends FieldMap>(context: ModelContext<S>, key: PrimaryKey): string {
  const { schema } = context;
  return compileExpression(Q.where(schema.primaryKey, 'eq', key), schema.fields);
}

/** Runs once storage has applied a mutation, before it is logged. */
export type AppliedCallback<T> = (result: T) => void;

export async function insertRows<S extends FieldMap>(
  context: ModelContext<S>,
  target: Target,
  rows: Row[],
  onApplied?: AppliedCallback<InsertResult>
): Promise<InsertResult> {
  const { schema, logger } = context;
  let result: InsertResult;
  try {
    result = await context.client(target.alias).insert(target.collection, rows);
  } catch (error) {
    await logger.logError({ model: schema.name, alias: target.alias, operation: 'insert', error, context: { rows: rows.length } });
    throw error;
  }

  onApplied?.(result);
  await logger.logMutation({
    model: schema.name,
    alias: target.alias,
    kind: 'insert',
    collection: target.collection,
    affected: result.insertCount,
    primaryKeys: result.primaryKeys
  });
  return result;
}

export async function deleteByPrimaryKey<S extends FieldMap>(
  context: ModelContext<S>,
  target: Target,
  key: PrimaryKey,
  onApplied?: AppliedCallback<number>
): Promise<number> {
  const deleted = await deleteStored(context, target, key);
  onApplied?.(deleted);
  await logDeleted(context, target, key, deleted);
  return deleted;
}

/**
 * Replaces a stored record: delete by key, then insert the new row. The two
 * steps are not atomic. A failed delete propagates as is. Once the delete has
 * gone through, any failure before the insert is stored becomes
 * `UpdateFailedError` carrying `snapshot`, the record as it was stored
 * before the delete.
 */
export async function replaceRow<S extends FieldMap>(
  context: ModelContext<S>,
  target: Target,
  key: PrimaryKey,
  snapshot: ModelRecord,
  row: Row,
  onApplied?: AppliedCallback<InsertResult>
): Promise<InsertResult> {
  const { schema, logger } = context;
  const deleted = await deleteStored(context, target, key);

  let result: InsertResult;
  try {
    await logDeleted(context, target, key, deleted);
    result = await context.client(target.alias).insert(target.collection, [row]);
  } catch (error) {
    const failure = new UpdateFailedError(schema.name, snapshot, error);
    await logger.logError({ model: schema.name, alias: target.alias, operation: 'update', error: failure, context: { primaryKey: key } });
    throw failure;
  }

  onApplied?.(result);
  await logger.logMutation({
    model: schema.name,
    alias: target.alias,
    kind: 'update',
    collection: target.collection,
    affected: result.insertCount,
    primaryKeys: result.primaryKeys.length ? result.primaryKeys : [key]
  });
  return result;
}

async function deleteStored<S extends FieldMap>(context: ModelContext<S>, target: Target, key: PrimaryKey): Promise<number> {
  const filter = primaryKeyFilter(context, key);
  try {
    return await context.client(target.alias).delete(target.collection, filter);
  } catch (error) {
    await context.logger.logError({ model: context.schema.name, alias: target.alias, operation: 'delete', error, context: { filter } });
    throw error;
  }
}

async function logDeleted<S extends FieldMap>(context: ModelContext<S>, target: Target, key: PrimaryKey, deleted: number): Promise<void> {
  await context.logger.logMutation({
    model: context.schema.name,
    alias: target.alias,
    kind: 'delete',
    collection: target.collection,
    affected: deleted,
    primaryKeys: [key]
  });
}
