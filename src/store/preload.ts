import type pg from 'pg';
import type { EntityShape, RelationDefinition } from '../entity/define.js';
import { ExecutionError } from '../errors.js';
import { compileRelatedSelect, type CompiledQuery } from '../query/compiler.js';
import type { MappedRow } from './row-mapper.js';

export type Execute = (operation: string, compiled: CompiledQuery) => Promise<pg.QueryResult>;

function uniqueKeys(rows: readonly MappedRow[], field: string): unknown[] {
  const seen = new Map<string, unknown>();
  for (const row of rows) {
    const value = row[field];
    if (value !== undefined && value !== null) seen.set(String(value), value);
  }
  return [...seen.values()];
}

/** Groups related rows by the raw value of `column`, mapping each to its fields. */
function groupBy(target: EntityShape, rows: readonly Record<string, unknown>[], column: string): Map<string, MappedRow[]> {
  const groups = new Map<string, MappedRow[]>();
  for (const row of rows) {
    const key = String(row[column]);
    const group = groups.get(key) ?? [];
    group.push(target.mapRow(row));
    groups.set(key, group);
  }
  return groups;
}

async function loadRelation(
  owner: EntityShape,
  relation: RelationDefinition,
  rows: MappedRow[],
  execute: Execute,
): Promise<void> {
  const target = relation.entity();
  const ownsKey = relation.kind === 'belongsTo';

  // belongsTo: our foreign key points at their primary key; otherwise theirs points at ours
  const keys = uniqueKeys(rows, ownsKey ? relation.foreignKey : owner.primaryKey.name);
  const targetColumn = ownsKey ? target.primaryKey.column : target.columnOf(relation.foreignKey);

  let groups = new Map<string, MappedRow[]>();
  if (keys.length > 0) {
    const result = await execute('preload', compileRelatedSelect(target, targetColumn, keys));
    groups = groupBy(target, result.rows, targetColumn);
  }

  for (const row of rows) {
    const key = String(row[ownsKey ? relation.foreignKey : owner.primaryKey.name]);
    const related = groups.get(key) ?? [];
    row[relation.name] = relation.kind === 'hasMany' ? related : (related[0] ?? null);
  }
}

/**
 * Fields of the owner rows that the named relations join on. Unknown names
 * are left to preloadRelations to reject.
 */
export function preloadKeyFields(
  owner: EntityShape,
  relations: ReadonlyMap<string, RelationDefinition>,
  names: readonly string[],
): string[] {
  const keys = new Set<string>();
  for (const name of names) {
    const relation = relations.get(name);
    if (relation !== undefined) {
      keys.add(relation.kind === 'belongsTo' ? relation.foreignKey : owner.primaryKey.name);
    }
  }
  return [...keys];
}

/**
 * Attaches each named relation to every row: hasMany as an array, hasOne and
 * belongsTo as a record or null. Issues one query per relation. All names are
 * checked before the first query.
 */
export async function preloadRelations(
  owner: EntityShape,
  relations: ReadonlyMap<string, RelationDefinition>,
  rows: MappedRow[],
  names: readonly string[],
  execute: Execute,
): Promise<void> {
  const resolved = [...new Set(names)].map((name) => {
    const relation = relations.get(name);
    if (relation === undefined) {
      throw new ExecutionError('preload', `Unsupported relation "${name}" on "${owner.table}"`);
    }
    return relation;
  });

  for (const relation of resolved) {
    await loadRelation(owner, relation, rows, execute);
  }
}
