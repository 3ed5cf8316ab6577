import { SchemaError } from '../core/errors';
import { Field, VectorField } from '../fields/field';
import { DISTANCE_FIELD } from '../query/predicate';
import type { FieldMap } from './types';

export type FieldName<S extends FieldMap> = keyof S & string;

export interface ModelSchema<S extends FieldMap> {
  readonly name: string;
  readonly collection: string;
  readonly alias: string;
  readonly fields: Readonly<S>;
  /** Declaration order. */
  readonly fieldNames: readonly FieldName<S>[];
  readonly primaryKey: FieldName<S>;
  readonly vectorFields: readonly FieldName<S>[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function buildSchema<S extends FieldMap>(options: {
  name: string;
  fields: S;
  collection?: string;
  alias: string;
}): ModelSchema<S> {
  const { name, fields, alias } = options;
  if (!name.trim()) {
    throw new SchemaError('Model name is required');
  }

  const collection = options.collection ?? name.toLowerCase();
  if (!IDENTIFIER.test(collection)) {
    throw new SchemaError(`Invalid collection name '${collection}'`);
  }

  const fieldNames = ownKeys(fields);
  if (!fieldNames.length) {
    throw new SchemaError(`${name} declares no fields`);
  }

  const primaryKeys: FieldName<S>[] = [];
  const vectorFields: FieldName<S>[] = [];

  for (const fieldName of fieldNames) {
    const field: unknown = fields[fieldName];
    if (!(field instanceof Field)) {
      throw new SchemaError(`${name}.${fieldName} is not a field`);
    }
    if (!IDENTIFIER.test(fieldName) || fieldName.includes('__')) {
      throw new SchemaError(`Invalid field name '${fieldName}' on ${name}`);
    }
    if (fieldName === DISTANCE_FIELD) {
      throw new SchemaError(`'${DISTANCE_FIELD}' is reserved for search distances`);
    }
    if (field.primaryKey) {
      primaryKeys.push(fieldName);
    }
    if (field instanceof VectorField) {
      vectorFields.push(fieldName);
    }
  }

  const [primaryKey, ...extraKeys] = primaryKeys;
  if (!primaryKey) {
    throw new SchemaError(`${name} must declare a primary key field`);
  }
  if (extraKeys.length) {
    throw new SchemaError(`${name} declares more than one primary key: ${primaryKeys.join(', ')}`);
  }
  if (!vectorFields.length) {
    throw new SchemaError(`${name} must declare at least one vector field`);
  }

  return Object.freeze({
    name,
    collection,
    alias,
    fields: Object.freeze({ ...fields }),
    fieldNames: Object.freeze(fieldNames),
    primaryKey,
    vectorFields: Object.freeze(vectorFields)
  });
}

export function vectorFieldOf<S extends FieldMap>(schema: ModelSchema<S>, name: string): VectorField | undefined {
  const field = schema.fields[name];
  return field instanceof VectorField ? field : undefined;
}

function ownKeys<S extends FieldMap>(fields: S): FieldName<S>[] {
  return Object.keys(fields).filter((key): key is FieldName<S> => Object.prototype.hasOwnProperty.call(fields, key));
}
