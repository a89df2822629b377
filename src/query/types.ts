import type { FieldName } from '../types.js';

export type SortDirection = 'asc' | 'desc';

export interface Range<V> {
  from: V;
  to: V;
}

export interface OrderDirective<T> {
  field: FieldName<T>;
  direction: SortDirection;
}

/**
 * Explicit filter descriptor. All clauses are ANDed; there is no OR.
 * Ordering is a list so that multi-column sorts are deterministic.
 */
export interface StructuredQuery<T> {
  readonly equal?: { readonly [K in FieldName<T>]?: T[K] };
  /** Value must appear as a contiguous substring. */
  readonly like?: { readonly [K in FieldName<T>]?: string };
  /** Inclusive on both bounds. */
  readonly between?: { readonly [K in FieldName<T>]?: Range<NonNullable<T[K]>> };
  readonly isNull?: readonly FieldName<T>[];
  readonly orderBy?: readonly OrderDirective<T>[];
  readonly preload?: readonly FieldName<T>[];
  readonly omit?: readonly FieldName<T>[];
}

export type Predicate =
  | { kind: 'eq'; column: string; value: unknown }
  | { kind: 'like'; column: string; pattern: string }
  | { kind: 'between'; column: string; lower: unknown; upper: unknown }
  | { kind: 'null'; column: string };

export interface Ordering {
  column: string;
  direction: SortDirection;
}

/**
 * Output of the translator: everything the compiler needs to render a statement.
 * `preload` holds relation names and `omit` holds field names; both are resolved
 * against the entity later.
 */
export interface PredicateSet {
  readonly predicates: readonly Predicate[];
  readonly order: readonly Ordering[];
  readonly preload: readonly string[];
  readonly omit: readonly string[];
}
