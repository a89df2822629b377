import type { Entity } from '../entity/define.js';
import type { Model } from '../types.js';
import type { Predicate, PredicateSet, Range, StructuredQuery } from './types.js';

const EMPTY: PredicateSet = { predicates: [], order: [], preload: [], omit: [] };

/** Entries of a partial record or clause map, skipping keys explicitly set to undefined. */
function definedEntries(source: object): Array<[string, unknown]> {
  return Object.entries(source).filter(([, value]) => value !== undefined);
}

/**
 * Escapes LIKE metacharacters so the value matches literally.
 * Backslash is PostgreSQL's default LIKE escape character.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function isRange(value: unknown): value is Range<unknown> {
  return typeof value === 'object' && value !== null && 'from' in value && 'to' in value;
}

function equality(column: string, value: unknown): Predicate {
  return value === null ? { kind: 'null', column } : { kind: 'eq', column, value };
}

/**
 * One equality predicate per declared field whose value is not the zero value
 * of its kind, in field declaration order, then one per undeclared non-zero
 * key as a snake_case column. Zero-valued fields are skipped, so an all-zero
 * example yields no predicates and matches every record.
 */
export function translateByExample<T extends Model>(entity: Entity<T>, example: Partial<T>): PredicateSet {
  const values = new Map(definedEntries(example));
  const predicates: Predicate[] = [];
  for (const field of entity.fields) {
    const value = values.get(field.name);
    if (!entity.isZero(field.name, value)) {
      predicates.push({ kind: 'eq', column: field.column, value });
    }
  }
  for (const [name, value] of entity.undeclaredEntries(example)) {
    if (!entity.isZero(name, value)) {
      predicates.push({ kind: 'eq', column: entity.columnOf(name), value });
    }
  }
  return { ...EMPTY, predicates };
}

/**
 * One predicate per present key, zero values included. `null` becomes IS NULL.
 * Keys naming a relation are skipped; undeclared keys pass through as
 * snake_case columns.
 */
export function translateEquality<T extends Model>(entity: Entity<T>, map: Partial<T>): PredicateSet {
  const predicates = definedEntries(map)
    .filter(([name]) => !entity.relations.has(name))
    .map(([name, value]) => equality(entity.columnOf(name), value));
  return { ...EMPTY, predicates };
}

/**
 * Translates every clause of a StructuredQuery. Predicates are emitted in
 * clause order equal, like, between, isNull; since they are ANDed the order
 * only affects the shape of the generated SQL.
 */
export function translateStructured<T extends Model>(entity: Entity<T>, query: StructuredQuery<T>): PredicateSet {
  const predicates: Predicate[] = [];

  for (const [name, value] of definedEntries(query.equal ?? {})) {
    predicates.push(equality(entity.columnOf(name), value));
  }

  for (const [name, value] of definedEntries(query.like ?? {})) {
    predicates.push({ kind: 'like', column: entity.columnOf(name), pattern: `%${escapeLike(String(value))}%` });
  }

  for (const [name, range] of definedEntries(query.between ?? {})) {
    if (!isRange(range)) continue;
    predicates.push({ kind: 'between', column: entity.columnOf(name), lower: range.from, upper: range.to });
  }

  for (const name of query.isNull ?? []) {
    predicates.push({ kind: 'null', column: entity.columnOf(name) });
  }

  return {
    predicates,
    order: (query.orderBy ?? []).map(({ field, direction }) => ({ column: entity.columnOf(field), direction })),
    preload: [...(query.preload ?? [])],
    omit: [...(query.omit ?? [])],
  };
}

/** Default omit set first, then per-call additions not already in it. */
export function mergeOmit(defaults: readonly string[], extra: readonly string[] = []): string[] {
  return [...new Set([...defaults, ...extra])];
}
