import type { Predicate } from './predicate';

export type Direction = 'asc' | 'desc';

export interface Ordering {
  readonly field: string;
  readonly direction: Direction;
}

export interface SearchDirective {
  readonly field: string;
  readonly vector: readonly number[];
  /** Opaque to the engine; passed to the storage layer as-is. */
  readonly metric?: string;
  readonly topK: number;
  readonly params?: Readonly<Record<string, string | number>>;
}

/**
 * Everything a queryset records before evaluation. Specs are frozen; chain
 * calls derive new ones with `extendSpec`.
 */
export interface QuerySpec {
  readonly collection: string;
  readonly alias: string;
  readonly where: Predicate | null;
  readonly ordering: Ordering | null;
  readonly limit: number | null;
  readonly offset: number | null;
  readonly search: SearchDirective | null;
  readonly projection: readonly string[] | null;
  readonly distanceAlias: string | null;
}

export function createSpec(collection: string, alias: string): QuerySpec {
  return Object.freeze({
    collection,
    alias,
    where: null,
    ordering: null,
    limit: null,
    offset: null,
    search: null,
    projection: null,
    distanceAlias: null
  });
}

export function extendSpec(spec: QuerySpec, patch: Partial<QuerySpec>): QuerySpec {
  return Object.freeze({ ...spec, ...patch });
}
