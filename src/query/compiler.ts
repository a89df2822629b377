import type { EntityShape, FieldDefinition } from '../entity/define.js';
import type { Ordering, Predicate, PredicateSet, SortDirection } from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/** A column to write and the value to write into it. */
export interface Assignment {
  column: string;
  value: unknown;
  kind?: FieldDefinition['kind'];
}

const DIRECTIONS: Record<SortDirection, 'ASC' | 'DESC'> = {
  asc: 'ASC',
  desc: 'DESC',
};

export function renderDirection(direction: SortDirection): 'ASC' | 'DESC' {
  return DIRECTIONS[direction];
}

/** Double-quotes an identifier; a schema-qualified table name is quoted per part. */
export function quoteIdent(name: string): string {
  return name
    .split('.')
    .map((part) => `"${part.replace(/"/g, '""')}"`)
    .join('.');
}

/**
 * Shared parameter list with a running placeholder counter, so that every
 * fragment of one statement numbers its placeholders without gaps.
 */
class Params {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

function toParam(assignment: Assignment): unknown {
  // Objects and arrays would otherwise be sent as PostgreSQL arrays
  if (assignment.kind === 'json' && assignment.value !== null) {
    return JSON.stringify(assignment.value);
  }
  return assignment.value;
}

function compilePredicate(predicate: Predicate, params: Params): string {
  const column = quoteIdent(predicate.column);
  switch (predicate.kind) {
    case 'eq':
      return `${column} = ${params.add(predicate.value)}`;
    case 'like':
      return `${column} LIKE ${params.add(predicate.pattern)}`;
    case 'between':
      return `${column} BETWEEN ${params.add(predicate.lower)} AND ${params.add(predicate.upper)}`;
    case 'null':
      return `${column} IS NULL`;
  }
}

function softDeleteGuard(entity: EntityShape): string | null {
  return entity.softDelete ? `${quoteIdent(entity.columnOf('deletedAt'))} IS NULL` : null;
}

function compileWhere(entity: EntityShape, predicates: readonly Predicate[], params: Params): string {
  const parts = predicates.map((p) => compilePredicate(p, params));
  const guard = softDeleteGuard(entity);
  if (guard !== null) parts.push(guard);
  return parts.length === 0 ? '' : `WHERE ${parts.join(' AND ')}`;
}

/**
 * Appends the primary key as a final ascending tie-breaker when an explicit
 * ordering does not already include it, so equal sort keys come back in a
 * stable order.
 */
function compileOrder(entity: EntityShape, order: readonly Ordering[]): string {
  if (order.length === 0) return '';
  const pk = entity.primaryKey.column;
  const full = order.some((o) => o.column === pk) ? order : [...order, { column: pk, direction: 'asc' as const }];
  return `ORDER BY ${full.map((o) => `${quoteIdent(o.column)} ${renderDirection(o.direction)}`).join(', ')}`;
}

function selectList(entity: EntityShape, omit: readonly string[]): string {
  const omitted = new Set(omit);
  const columns = entity.fields.filter((f) => !omitted.has(f.name)).map((f) => quoteIdent(f.column));
  return columns.length > 0 ? columns.join(', ') : quoteIdent(entity.primaryKey.column);
}

export interface SelectOptions {
  limit?: number;
  /** Default order when the predicate set carries none. */
  defaultOrder?: readonly Ordering[];
}

/**
 * Compiles a predicate set into a SELECT. Omitted fields are left out of the
 * column list; soft-deleted rows are excluded when the entity uses soft delete.
 */
export function compileSelect(entity: EntityShape, set: PredicateSet, options: SelectOptions = {}): CompiledQuery {
  const params = new Params();
  const where = compileWhere(entity, set.predicates, params);
  const order = compileOrder(entity, set.order.length > 0 ? set.order : (options.defaultOrder ?? []));
  const limit = options.limit !== undefined ? `LIMIT ${params.add(options.limit)}` : '';

  const sql = [`SELECT ${selectList(entity, set.omit)}`, `FROM ${quoteIdent(entity.table)}`, where, order, limit]
    .filter((line) => line !== '')
    .join('\n');

  return { sql, params: params.values };
}

export function compileInsert(entity: EntityShape, assignments: readonly Assignment[]): CompiledQuery {
  const params = new Params();
  const table = quoteIdent(entity.table);

  if (assignments.length === 0) {
    return { sql: `INSERT INTO ${table} DEFAULT VALUES\nRETURNING *`, params: [] };
  }

  const columns = assignments.map((a) => quoteIdent(a.column)).join(', ');
  const values = assignments.map((a) => params.add(toParam(a))).join(', ');
  return {
    sql: [`INSERT INTO ${table} (${columns})`, `VALUES (${values})`, 'RETURNING *'].join('\n'),
    params: params.values,
  };
}

/**
 * UPDATE of one row by primary key. `updated_at` is set to NOW() unless an
 * assignment already writes it; soft-deleted rows are not touched.
 */
export function compileUpdate(entity: EntityShape, id: unknown, assignments: readonly Assignment[]): CompiledQuery {
  const params = new Params();
  const sets = assignments.map((a) => `${quoteIdent(a.column)} = ${params.add(toParam(a))}`);
  const updatedAt = entity.columnOf('updatedAt');
  if (!assignments.some((a) => a.column === updatedAt)) {
    sets.push(`${quoteIdent(updatedAt)} = NOW()`);
  }
  const where = compileWhere(entity, [{ kind: 'eq', column: entity.primaryKey.column, value: id }], params);

  return {
    sql: [`UPDATE ${quoteIdent(entity.table)}`, `SET ${sets.join(', ')}`, where].join('\n'),
    params: params.values,
  };
}

/** Soft delete marks deleted_at once; hard delete removes the row. */
export function compileDelete(entity: EntityShape, id: unknown, hard: boolean): CompiledQuery {
  const params = new Params();
  const table = quoteIdent(entity.table);
  const byId: Predicate = { kind: 'eq', column: entity.primaryKey.column, value: id };

  if (hard || !entity.softDelete) {
    return { sql: `DELETE FROM ${table}\nWHERE ${compilePredicate(byId, params)}`, params: params.values };
  }

  const where = compileWhere(entity, [byId], params);
  return {
    sql: [`UPDATE ${table}`, `SET ${quoteIdent(entity.columnOf('deletedAt'))} = NOW()`, where].join('\n'),
    params: params.values,
  };
}

/** Related rows whose `column` holds any of `keys`, for eager loading. */
export function compileRelatedSelect(entity: EntityShape, column: string, keys: readonly unknown[]): CompiledQuery {
  const params = new Params();
  const parts = [`${quoteIdent(column)} = ANY(${params.add([...keys])})`];
  const guard = softDeleteGuard(entity);
  if (guard !== null) parts.push(guard);

  const sql = [
    `SELECT ${selectList(entity, [])}`,
    `FROM ${quoteIdent(entity.table)}`,
    `WHERE ${parts.join(' AND ')}`,
    compileOrder(entity, [{ column: entity.primaryKey.column, direction: 'asc' }]),
  ].join('\n');

  return { sql, params: params.values };
}
