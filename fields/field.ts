import { z } from 'zod';
import { SchemaError, ValidationError } from '../core/errors';

export type FieldKind = 'integer' | 'float' | 'string' | 'vector' | 'json' | 'boolean';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface FieldOptions<T> {
  primaryKey?: boolean;
  /** Storage assigns the key on insert. Only valid on an integer primary key. */
  autoId?: boolean;
  nullable?: boolean;
  default?: T;
  description?: string;
}

export interface FieldDescriptor {
  kind: FieldKind;
  primaryKey: boolean;
  autoId: boolean;
  nullable: boolean;
  description: string;
  maxLength?: number;
  dim?: number;
  metric?: string;
}

export abstract class Field<T> {
  abstract readonly kind: FieldKind;
  readonly primaryKey: boolean;
  readonly autoId: boolean;
  readonly nullable: boolean;
  readonly defaultValue: T | undefined;
  readonly description: string;
  private schema?: z.ZodType<T>;

  protected constructor(options: FieldOptions<T>) {
    this.primaryKey = options.primaryKey ?? false;
    this.autoId = options.autoId ?? false;
    this.nullable = options.nullable ?? false;
    this.defaultValue = options.default;
    this.description = options.description ?? '';

    if (this.autoId && !this.primaryKey) {
      throw new SchemaError('autoId is only valid on a primary key field');
    }
    if (this.primaryKey && this.nullable) {
      throw new SchemaError('A primary key field cannot be nullable');
    }
  }

  protected abstract buildSchema(): z.ZodType<T>;

  /**
   * Checks a value against the field's type and constraints and returns the
   * value to store. `name` is only used to label the error.
   */
  validate(name: string, value: unknown): T | null {
    if (value === null || value === undefined) {
      if (this.nullable || this.autoId) {
        return null;
      }
      throw new ValidationError(name, 'value is required');
    }

    const result = this.valueSchema().safeParse(value);
    if (!result.success) {
      throw new ValidationError(name, result.error.issues.map((issue) => issue.message).join('; '));
    }
    return result.data;
  }

  /** Normalises a raw value returned by the storage layer before validation. */
  fromStorage(value: unknown): unknown {
    return value;
  }

  describe(): FieldDescriptor {
    return {
      kind: this.kind,
      primaryKey: this.primaryKey,
      autoId: this.autoId,
      nullable: this.nullable,
      description: this.description
    };
  }

  // Subclasses call this once their own constraints are set.
  protected assertDefault(): void {
    if (this.defaultValue === undefined) {
      return;
    }
    try {
      this.validate('default', this.defaultValue);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SchemaError(`Default value does not satisfy the field: ${reason}`, { cause: error });
    }
  }

  private valueSchema(): z.ZodType<T> {
    if (!this.schema) {
      this.schema = this.buildSchema();
    }
    return this.schema;
  }
}

export class IntField extends Field<number> {
  readonly kind = 'integer';

  constructor(options: FieldOptions<number> = {}) {
    super(options);
    this.assertDefault();
  }

  protected buildSchema(): z.ZodType<number> {
    return z
      .number({ invalid_type_error: 'expected an integer' })
      .int('expected an integer')
      .refine((value) => Number.isSafeInteger(value), 'integer is outside the safe range');
  }

  fromStorage(value: unknown): unknown {
    // 64-bit integers come back as decimal strings
    if (typeof value === 'string' && /^-?\d+$/.test(value)) {
      return Number(value);
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    return value;
  }
}

export class FloatField extends Field<number> {
  readonly kind = 'float';

  constructor(options: FieldOptions<number> = {}) {
    super(options);
    if (this.primaryKey) {
      throw new SchemaError('A float field cannot be a primary key');
    }
    this.assertDefault();
  }

  protected buildSchema(): z.ZodType<number> {
    return z.number({ invalid_type_error: 'expected a number' }).finite('expected a finite number');
  }
}

export interface CharFieldOptions extends FieldOptions<string> {
  maxLength?: number;
}

export class CharField extends Field<string> {
  readonly kind = 'string';
  readonly maxLength: number;

  constructor(options: CharFieldOptions = {}) {
    super(options);
    this.maxLength = options.maxLength ?? 65535;
    if (!Number.isInteger(this.maxLength) || this.maxLength <= 0) {
      throw new SchemaError(`maxLength must be a positive integer, got ${options.maxLength}`);
    }
    if (this.autoId) {
      throw new SchemaError('autoId requires an integer primary key');
    }
    this.assertDefault();
  }

  protected buildSchema(): z.ZodType<string> {
    return z
      .string({ invalid_type_error: 'expected a string' })
      .max(this.maxLength, `string exceeds maxLength of ${this.maxLength}`);
  }

  describe(): FieldDescriptor {
    return { ...super.describe(), maxLength: this.maxLength };
  }
}

export class BooleanField extends Field<boolean> {
  readonly kind = 'boolean';

  constructor(options: FieldOptions<boolean> = {}) {
    super(options);
    if (this.primaryKey) {
      throw new SchemaError('A boolean field cannot be a primary key');
    }
    this.assertDefault();
  }

  protected buildSchema(): z.ZodType<boolean> {
    return z.boolean({ invalid_type_error: 'expected a boolean' });
  }
}

const jsonSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number().finite(), z.boolean(), z.null(), z.array(jsonSchema), z.record(jsonSchema)])
);

export class JsonField extends Field<JsonValue> {
  readonly kind = 'json';

  constructor(options: FieldOptions<JsonValue> = {}) {
    super(options);
    if (this.primaryKey) {
      throw new SchemaError('A JSON field cannot be a primary key');
    }
    this.assertDefault();
  }

  protected buildSchema(): z.ZodType<JsonValue> {
    return jsonSchema;
  }
}

export interface VectorFieldOptions extends FieldOptions<number[]> {
  dim: number;
  /** Metric handed to the storage layer when a search names none. */
  metric?: string;
}

export class VectorField extends Field<number[]> {
  readonly kind = 'vector';
  readonly dim: number;
  readonly metric?: string;

  constructor(options: VectorFieldOptions) {
    super(options);
    if (!Number.isInteger(options.dim) || options.dim <= 0) {
      throw new SchemaError(`Vector dimensionality must be a positive integer, got ${options.dim}`);
    }
    if (this.primaryKey) {
      throw new SchemaError('A vector field cannot be a primary key');
    }
    this.dim = options.dim;
    this.metric = options.metric;
    this.assertDefault();
  }

  protected buildSchema(): z.ZodType<number[]> {
    return z
      .array(z.number({ invalid_type_error: 'vector components must be numbers' }).finite('vector components must be finite'), {
        invalid_type_error: 'expected an array of numbers'
      })
      .length(this.dim, `expected ${this.dim} dimensions`);
  }

  describe(): FieldDescriptor {
    return { ...super.describe(), dim: this.dim, metric: this.metric };
  }
}
