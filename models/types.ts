import type { Field } from '../fields/field';

export type FieldMap = Record<string, Field<unknown>>;

export type FieldType<F> = F extends Field<infer T> ? T : never;

/** Input accepted when building an instance; omitted fields fall back to defaults. */
export type ModelInput<S extends FieldMap> = { [K in keyof S]?: FieldType<S[K]> | null };

/** Plain row as exchanged with the storage layer. */
export type ModelRecord = Readonly<Record<string, unknown>>;

export type Row = Record<string, unknown>;
