import type pg from 'pg';
import type { Entity } from '../entity/define.js';
import { ExecutionError, MissingPrimaryKeyError, MultipleResultsError, NotFoundError } from '../errors.js';
import {
  compileDelete,
  compileInsert,
  compileSelect,
  compileUpdate,
  type Assignment,
  type CompiledQuery,
  type SelectOptions,
} from '../query/compiler.js';
import { mergeOmit, translateByExample, translateEquality, translateStructured } from '../query/translator.js';
import type { PredicateSet, StructuredQuery } from '../query/types.js';
import {
  MANAGED_FIELDS,
  type CallOptions,
  type DeleteOptions,
  type EqualityMap,
  type Example,
  type FieldName,
  type Model,
  type OmitOptions,
  type Repository,
} from '../types.js';
import { preloadKeyFields, preloadRelations } from './preload.js';
import type { MappedRow } from './row-mapper.js';

export interface RepositoryConfig<T extends Model> {
  pool: pg.Pool;
  entity: Entity<T>;
  /** Fields left out of every read and write, on top of the managed timestamps for writes. */
  omit?: readonly FieldName<T>[];
  /** Print every statement with console.debug when no onQuery hook is given. */
  debug?: boolean;
  onQuery?: (sql: string, params: readonly unknown[]) => void;
  onError?: (operation: string, error: ExecutionError) => void;
}

/** Internal: resolved config with defaults applied */
interface ResolvedConfig {
  omit: readonly string[];
  onQuery?: (sql: string, params: readonly unknown[]) => void;
  onError: (operation: string, error: ExecutionError) => void;
}

export class PostgresRepository<T extends Model> implements Repository<T> {
  private readonly pool: pg.Pool;
  private readonly entity: Entity<T>;
  private readonly resolved: ResolvedConfig;

  constructor(config: RepositoryConfig<T>) {
    this.pool = config.pool;
    this.entity = config.entity;

    const onQuery =
      config.onQuery ??
      (config.debug === true
        ? (sql: string, params: readonly unknown[]) => console.debug(`[crud] ${sql}`, params)
        : undefined);

    this.resolved = {
      omit: [...(config.omit ?? [])],
      onError: config.onError ?? ((operation, err) => {
        console.error(`[crud] "${operation}" on "${config.entity.table}" failed:`, err);
      }),
      ...(onQuery !== undefined ? { onQuery } : {}),
    };
  }

  async create(record: Partial<T>, options: OmitOptions<T> = {}): Promise<T> {
    const omit = mergeOmit([...MANAGED_FIELDS, ...this.resolved.omit], options.omit);
    const result = await this.execute('create', compileInsert(this.entity, this.insertable(record, omit)), options);
    const row = result.rows[0];
    if (row === undefined) {
      throw new ExecutionError('create', `INSERT into "${this.entity.table}" returned no row`);
    }
    return this.entity.fromRow(row);
  }

  /** First live record matching the example by primary key order, else inserts it. */
  async getOrCreate(record: Partial<T>, options: OmitOptions<T> = {}): Promise<T> {
    const set = this.withOmit(translateByExample(this.entity, record), options.omit);
    const found = await this.select('getOrCreate', set, options, {
      limit: 1,
      defaultOrder: [{ column: this.entity.primaryKey.column, direction: 'asc' }],
    });
    const first = found[0];
    if (first !== undefined) return this.entity.hydrate(first);
    return this.create(record, options);
  }

  async getById(record: Partial<T>, options: CallOptions = {}): Promise<T> {
    const id = this.requireId('getById', record);
    const set = this.withOmit(
      { predicates: [{ kind: 'eq', column: this.entity.primaryKey.column, value: id }], order: [], preload: [], omit: [] },
    );
    const rows = await this.select('getById', set, options, { limit: 1 });
    const first = rows[0];
    if (first === undefined) {
      throw new NotFoundError(this.entity.table, `No record with ${this.entity.primaryKey.column} = ${String(id)} in "${this.entity.table}"`);
    }
    return this.entity.hydrate(first);
  }

  async query(example: Example<T>, options: OmitOptions<T> = {}): Promise<T[]> {
    const set = this.withOmit(translateByExample(this.entity, example), options.omit);
    const rows = await this.select('query', set, options);
    return rows.map((row) => this.entity.hydrate(row));
  }

  async queryOne(example: Example<T>, options: OmitOptions<T> = {}): Promise<T> {
    const set = this.withOmit(translateByExample(this.entity, example), options.omit);
    return this.resolveSingleton('queryOne', set, options);
  }

  async queryMap(map: EqualityMap<T>, options: OmitOptions<T> = {}): Promise<T[]> {
    const set = this.withOmit(translateEquality(this.entity, map), options.omit);
    const rows = await this.select('queryMap', set, options);
    return rows.map((row) => this.entity.hydrate(row));
  }

  async queryMapOne(map: EqualityMap<T>, options: OmitOptions<T> = {}): Promise<T> {
    const set = this.withOmit(translateEquality(this.entity, map), options.omit);
    return this.resolveSingleton('queryMapOne', set, options);
  }

  async smartQuery(query: StructuredQuery<T>, options: CallOptions = {}): Promise<T[]> {
    const set = this.withOmit(translateStructured(this.entity, query));
    const rows = await this.select('smartQuery', set, options);
    await this.preload(rows, set, options);
    return rows.map((row) => this.entity.hydrate(row));
  }

  async smartQueryOne(query: StructuredQuery<T>, options: CallOptions = {}): Promise<T> {
    const set = this.withOmit(translateStructured(this.entity, query));
    return this.resolveSingleton('smartQueryOne', set, options);
  }

  /** Sets one field by primary key; zero values are written as given. */
  async updateField<K extends FieldName<T>>(
    record: Partial<T>,
    field: K,
    value: T[K],
    options: CallOptions = {},
  ): Promise<number> {
    const id = this.requireId('updateField', record);
    const assignment: Assignment = { column: this.entity.columnOf(field), value, kind: this.entity.field(field)?.kind };
    return this.write('updateField', compileUpdate(this.entity, id, [assignment]), options);
  }

  /**
   * Writes the record's non-zero fields by primary key. Managed timestamps and
   * the repository's default omit set are always excluded; `options.omit`
   * excludes more.
   */
  async update(record: Partial<T>, options: OmitOptions<T> = {}): Promise<number> {
    const id = this.requireId('update', record);
    const omitted = new Set(mergeOmit([...MANAGED_FIELDS, ...this.resolved.omit], options.omit));
    const values = new Map(Object.entries(record));

    const assignments: Assignment[] = [];
    for (const field of this.entity.fields) {
      if (field === this.entity.primaryKey || omitted.has(field.name)) continue;
      const value = values.get(field.name);
      if (!this.entity.isZero(field.name, value)) {
        assignments.push({ column: field.column, value, kind: field.kind });
      }
    }
    for (const [name, value] of this.entity.undeclaredEntries(record)) {
      if (!omitted.has(name) && !this.entity.isZero(name, value)) {
        assignments.push({ column: this.entity.columnOf(name), value });
      }
    }
    return this.write('update', compileUpdate(this.entity, id, assignments), options);
  }

  /** Writes every key present in the map by primary key, zero values included. */
  async updateMap(record: Partial<T>, map: EqualityMap<T>, options: CallOptions = {}): Promise<number> {
    const id = this.requireId('updateMap', record);
    const assignments: Assignment[] = [];
    for (const [name, value] of Object.entries(map)) {
      if (value === undefined || name === this.entity.primaryKey.name || this.entity.relations.has(name)) continue;
      assignments.push({ column: this.entity.columnOf(name), value, kind: this.entity.field(name)?.kind });
    }
    return this.write('updateMap', compileUpdate(this.entity, id, assignments), options);
  }

  /** Soft delete when the entity uses it, unless `hard` is set. */
  async delete(record: Partial<T>, options: DeleteOptions = {}): Promise<number> {
    const id = this.requireId('delete', record);
    return this.write('delete', compileDelete(this.entity, id, options.hard ?? false), options);
  }

  /**
   * Reads at most two rows: none is NotFound, two is MultipleResults. An
   * ambiguous filter is reported to the caller, never narrowed to the first match.
   */
  private async resolveSingleton(operation: string, set: PredicateSet, options: CallOptions): Promise<T> {
    const rows = await this.select(operation, set, options, { limit: 2 });
    const [first, second] = rows;
    if (first === undefined) {
      throw new NotFoundError(this.entity.table);
    }
    if (second !== undefined) {
      throw new MultipleResultsError(this.entity.table);
    }
    await this.preload(rows, set, options);
    return this.entity.hydrate(first);
  }

  /** Merges the default omit set; key fields a requested preload joins on are always selected. */
  private withOmit(set: PredicateSet, extra: readonly string[] = []): PredicateSet {
    const keys = new Set(preloadKeyFields(this.entity, this.entity.relations, set.preload));
    const omit = mergeOmit(this.resolved.omit, [...set.omit, ...extra]).filter((name) => !keys.has(name));
    return { ...set, omit };
  }

  private requireId(operation: string, record: Partial<T>): T['id'] {
    const id = this.entity.primaryKeyOf(record);
    if (id === undefined) {
      throw new MissingPrimaryKeyError(operation, this.entity.table);
    }
    return id;
  }

  /** Fields with a value, minus omitted ones and a zero primary key; undeclared keys come last. */
  private insertable(record: Partial<T>, omit: readonly string[]): Assignment[] {
    const omitted = new Set(omit);
    const values = new Map(Object.entries(record));
    const assignments: Assignment[] = [];
    for (const field of this.entity.fields) {
      const value = values.get(field.name);
      if (value === undefined || omitted.has(field.name)) continue;
      if (field === this.entity.primaryKey && this.entity.isZero(field.name, value)) continue;
      assignments.push({ column: field.column, value, kind: field.kind });
    }
    for (const [name, value] of this.entity.undeclaredEntries(record)) {
      if (!omitted.has(name)) assignments.push({ column: this.entity.columnOf(name), value });
    }
    return assignments;
  }

  private async select(
    operation: string,
    set: PredicateSet,
    options: CallOptions,
    selectOptions: SelectOptions = {},
  ): Promise<MappedRow[]> {
    const result = await this.execute(operation, compileSelect(this.entity, set, selectOptions), options);
    return result.rows.map((row) => this.entity.mapRow(row));
  }

  private async preload(rows: MappedRow[], set: PredicateSet, options: CallOptions): Promise<void> {
    if (set.preload.length === 0) return;
    await preloadRelations(this.entity, this.entity.relations, rows, set.preload, (operation, compiled) =>
      this.execute(operation, compiled, options),
    );
  }

  private async write(operation: string, compiled: CompiledQuery, options: CallOptions): Promise<number> {
    const result = await this.execute(operation, compiled, options);
    return result.rowCount ?? 0;
  }

  private async execute(operation: string, compiled: CompiledQuery, options: CallOptions): Promise<pg.QueryResult> {
    options.signal?.throwIfAborted();
    this.resolved.onQuery?.(compiled.sql, compiled.params);
    try {
      return await this.pool.query(compiled.sql, compiled.params);
    } catch (err) {
      const wrapped = new ExecutionError(
        operation,
        `Failed to ${operation} on "${this.entity.table}": ${String(err)}`,
        err,
      );
      this.resolved.onError(operation, wrapped);
      throw wrapped;
    }
  }
}
