import type { StructuredQuery } from './query/types.js';

/**
 * Base shape of every persisted record. Entity types extend it:
 *
 * ```typescript
 * interface User extends Model {
 *   name: string;
 *   age: number | null;
 * }
 * ```
 */
export interface Model {
  id: number;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

/** Property names of a record type, used wherever a column is addressed by name. */
export type FieldName<T> = Extract<keyof T, string>;

/** Fields the database manages; never written from caller-supplied values. */
export const MANAGED_FIELDS = ['createdAt', 'updatedAt', 'deletedAt'] as const;

export type ManagedField = (typeof MANAGED_FIELDS)[number];

export interface CallOptions {
  /** Checked before every round trip; an aborted signal rejects with its reason. */
  signal?: AbortSignal;
}

export interface OmitOptions<T> extends CallOptions {
  /** Added to the repository's default omit set, never substituted for it. */
  omit?: readonly FieldName<T>[];
}

export interface DeleteOptions extends CallOptions {
  /** Remove the row even when the entity uses soft deletion. */
  hard?: boolean;
}

/**
 * Partially populated record used as a filter. Zero-valued fields are ignored,
 * so there is no way to ask for "field equals zero" through an example; use an
 * equality map or a StructuredQuery for that.
 */
export type Example<T> = Partial<T>;

/** Every present key becomes an equality constraint, zero values included. */
export type EqualityMap<T> = Partial<T>;

export interface Repository<T extends Model> {
  create(record: Partial<T>, options?: OmitOptions<T>): Promise<T>;
  getOrCreate(record: Partial<T>, options?: OmitOptions<T>): Promise<T>;
  getById(record: Partial<T>, options?: CallOptions): Promise<T>;
  query(example: Example<T>, options?: OmitOptions<T>): Promise<T[]>;
  queryOne(example: Example<T>, options?: OmitOptions<T>): Promise<T>;
  queryMap(map: EqualityMap<T>, options?: OmitOptions<T>): Promise<T[]>;
  queryMapOne(map: EqualityMap<T>, options?: OmitOptions<T>): Promise<T>;
  smartQuery(query: StructuredQuery<T>, options?: CallOptions): Promise<T[]>;
  smartQueryOne(query: StructuredQuery<T>, options?: CallOptions): Promise<T>;
  updateField<K extends FieldName<T>>(record: Partial<T>, field: K, value: T[K], options?: CallOptions): Promise<number>;
  update(record: Partial<T>, options?: OmitOptions<T>): Promise<number>;
  updateMap(record: Partial<T>, map: EqualityMap<T>, options?: CallOptions): Promise<number>;
  delete(record: Partial<T>, options?: DeleteOptions): Promise<number>;
}
