import type { ModelRecord } from '../models/types';

export class VecModelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid field or model declaration, or a malformed search directive. */
export class SchemaError extends VecModelError {}

export class ValidationError extends VecModelError {
  constructor(readonly field: string, message: string, options?: { cause?: unknown }) {
    super(`Invalid value for field '${field}': ${message}`, options);
  }
}

/** Illegal combination of chain calls. */
export class QueryConfigError extends VecModelError {}

export class CompileError extends VecModelError {}

export class ConfigError extends VecModelError {}

export class ConnectionNotFoundError extends VecModelError {
  constructor(readonly alias: string) {
    super(`Connection alias '${alias}' is not registered`);
  }
}

export class DoesNotExist extends VecModelError {
  constructor(readonly model: string) {
    super(`${model} matching query does not exist`);
  }
}

export class MultipleObjectsReturned extends VecModelError {
  constructor(readonly model: string, readonly returned: number) {
    super(`get() returned more than one ${model} (returned ${returned})`);
  }
}

export class DataIntegrityError extends VecModelError {
  constructor(readonly model: string, readonly rowIndex: number, cause: unknown) {
    super(`Row ${rowIndex} returned for ${model} failed validation: ${describeCause(cause)}`, { cause });
  }
}

/**
 * The delete half of an update succeeded and the insert half did not, so the
 * record no longer exists in storage. `snapshot` holds the field values as
 * they were before the delete.
 */
export class UpdateFailedError extends VecModelError {
  constructor(readonly model: string, readonly snapshot: ModelRecord, cause: unknown) {
    super(`Update of ${model} lost the stored record: insert after delete failed (${describeCause(cause)})`, { cause });
  }
}

export class NotPersistedError extends VecModelError {
  constructor(readonly model: string) {
    super(`${model} instance is not persisted`);
  }
}

export class StorageError extends VecModelError {
  constructor(message: string, readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
