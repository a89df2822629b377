import type { FieldName, Model } from '../types.js';
import { EntityDefinitionError } from '../errors.js';
import { mapRow, type MappedRow } from '../store/row-mapper.js';
import { isZeroValue } from './zero.js';

export type FieldKind = 'integer' | 'bigint' | 'numeric' | 'text' | 'boolean' | 'timestamp' | 'json';

export type FieldSpec = FieldKind | { kind: FieldKind; column?: string };

export interface FieldDefinition {
  readonly name: string;
  readonly column: string;
  readonly kind: FieldKind;
}

/**
 * hasMany / hasOne: `foreignKey` is a field of the related entity holding this
 * entity's primary key. belongsTo: `foreignKey` is a field of this entity
 * holding the related entity's primary key.
 */
export interface RelationSpec {
  kind: 'hasMany' | 'hasOne' | 'belongsTo';
  entity: () => EntityShape;
  foreignKey: string;
}

export interface RelationDefinition extends RelationSpec {
  readonly name: string;
}

/** Non-generic view of an entity, enough to read related rows. */
export interface EntityShape {
  readonly table: string;
  readonly primaryKey: FieldDefinition;
  readonly fields: readonly FieldDefinition[];
  readonly softDelete: boolean;
  field(name: string): FieldDefinition | undefined;
  /** Declared column, or the snake_case form of an undeclared name. */
  columnOf(name: string): string;
  mapRow(row: Record<string, unknown>): MappedRow;
}

export interface Entity<T extends Model> extends EntityShape {
  readonly relations: ReadonlyMap<string, RelationDefinition>;
  /** Returns undefined when the record's primary key is at its zero value. */
  primaryKeyOf(record: Partial<T>): T['id'] | undefined;
  isZero(field: string, value: unknown): boolean;
  /** Entries of `record` naming neither a declared field nor a relation; undefined values are skipped. */
  undeclaredEntries(record: Partial<T>): Array<[string, unknown]>;
  /** Types a mapped row (relations attached or not) as a record. */
  hydrate(mapped: MappedRow): T;
  fromRow(row: Record<string, unknown>): T;
}

export interface EntityConfig<T extends Model> {
  table: string;
  fields: { [K in Exclude<FieldName<T>, keyof Model>]?: FieldSpec };
  relations?: { [K in Exclude<FieldName<T>, keyof Model>]?: RelationSpec };
  /** Defaults to true: deletes set deleted_at and reads skip deleted rows. */
  softDelete?: boolean;
}

const TABLE_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_][a-zA-Z0-9_]*)?$/;

const MODEL_FIELDS: Record<keyof Model, FieldKind> = {
  id: 'integer',
  createdAt: 'timestamp',
  updatedAt: 'timestamp',
  deletedAt: 'timestamp',
};

export function snakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

function resolveField(name: string, spec: FieldSpec): FieldDefinition {
  if (typeof spec === 'string') {
    return { name, column: snakeCase(name), kind: spec };
  }
  return { name, column: spec.column ?? snakeCase(name), kind: spec.kind };
}

/**
 * Builds the runtime description of a record type. The base Model fields are
 * always present; `fields` declares the rest.
 *
 * Throws EntityDefinitionError when the table name is not a (schema-qualified)
 * identifier, when two fields map to the same column, or when a relation shares
 * its name with a field.
 */
export function defineEntity<T extends Model>(config: EntityConfig<T>): Entity<T> {
  if (!TABLE_NAME_PATTERN.test(config.table)) {
    throw new EntityDefinitionError(`defineEntity: table name "${config.table}" is not a valid identifier`);
  }

  const primaryKey = resolveField('id', MODEL_FIELDS.id);
  const fields: FieldDefinition[] = [
    primaryKey,
    resolveField('createdAt', MODEL_FIELDS.createdAt),
    resolveField('updatedAt', MODEL_FIELDS.updatedAt),
    resolveField('deletedAt', MODEL_FIELDS.deletedAt),
  ];
  for (const [name, spec] of Object.entries<FieldSpec | undefined>(config.fields)) {
    if (spec === undefined) continue;
    if (name in MODEL_FIELDS) {
      throw new EntityDefinitionError(`defineEntity: "${name}" is a base field and cannot be redeclared`);
    }
    fields.push(resolveField(name, spec));
  }

  const byName = new Map<string, FieldDefinition>();
  const columns = new Set<string>();
  for (const field of fields) {
    if (columns.has(field.column)) {
      throw new EntityDefinitionError(
        `defineEntity: column "${field.column}" of "${config.table}" is declared twice`,
      );
    }
    columns.add(field.column);
    byName.set(field.name, field);
  }

  const relations = new Map<string, RelationDefinition>();
  for (const [name, spec] of Object.entries<RelationSpec | undefined>(config.relations ?? {})) {
    if (spec === undefined) continue;
    if (byName.has(name)) {
      throw new EntityDefinitionError(`defineEntity: relation "${name}" clashes with a field of the same name`);
    }
    relations.set(name, { name, ...spec });
  }

  const entity: Entity<T> = {
    table: config.table,
    primaryKey,
    fields,
    relations,
    softDelete: config.softDelete ?? true,

    field(name) {
      return byName.get(name);
    },

    columnOf(name) {
      return byName.get(name)?.column ?? snakeCase(name);
    },

    isZero(name, value) {
      return isZeroValue(byName.get(name)?.kind, value);
    },

    undeclaredEntries(record) {
      return Object.entries(record).filter(
        ([name, value]) => value !== undefined && !byName.has(name) && !relations.has(name),
      );
    },

    primaryKeyOf(record) {
      const id = record.id;
      return id === undefined || isZeroValue(primaryKey.kind, id) ? undefined : id;
    },

    mapRow(row) {
      return mapRow(fields, row);
    },

    hydrate(mapped) {
      return mapped as unknown as T;
    },

    fromRow(row) {
      return entity.hydrate(mapRow(fields, row));
    },
  };
  return entity;
}
