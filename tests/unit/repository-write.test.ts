import { describe, it, expect, vi } from 'vitest';
import { PostgresRepository } from '../../src/store/repository.js';
import { ExecutionError, MissingPrimaryKeyError } from '../../src/errors.js';
import {
  CREATED,
  asPool,
  makeMockPool,
  makeUserRow,
  sparseUsers,
  tags,
  users,
  type Tag,
  type User,
} from './fixtures.js';

function makeRepo(pool: { query: unknown }, omit: readonly (keyof User & string)[] = []) {
  return new PostgresRepository<User>({ pool: asPool(pool), entity: users, omit, onError: vi.fn() });
}

describe('PostgresRepository.create()', () => {
  it('inserts the given fields and returns the stored record', async () => {
    const pool = makeMockPool([makeUserRow({ id: 1, name: 'test', age: 11 })]);
    const user = await makeRepo(pool).create({ name: 'test', age: 11 });
    expect(user.id).toBe(1);
    expect(user.createdAt).toEqual(CREATED);
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toBe('INSERT INTO "users" ("name", "age")\nVALUES ($1, $2)\nRETURNING *');
    expect(params).toEqual(['test', 11]);
  });

  it('writes zero values and nulls that are explicitly present', async () => {
    const pool = makeMockPool([makeUserRow()]);
    await makeRepo(pool).create({ name: '', age: null, active: false });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('("name", "age", "active")');
    expect(params).toEqual(['', null, false]);
  });

  it('never writes the managed timestamps', async () => {
    const pool = makeMockPool([makeUserRow()]);
    await makeRepo(pool).create({ name: 'a', createdAt: CREATED, updatedAt: CREATED, deletedAt: CREATED });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('INSERT INTO "users" ("name")');
    expect(params).toEqual(['a']);
  });

  it('writes a non-zero primary key and skips a zero one', async () => {
    const pool = makeMockPool([makeUserRow()]);
    const repo = makeRepo(pool);
    await repo.create({ id: 42, name: 'a' });
    await repo.create({ id: 0, name: 'b' });
    expect(pool.query.mock.calls[0]![1]).toEqual([42, 'a']);
    expect(pool.query.mock.calls[1]![1]).toEqual(['b']);
  });

  it('skips default and per-call omitted fields', async () => {
    const pool = makeMockPool([makeUserRow()]);
    await makeRepo(pool, ['settings']).create({ name: 'a', age: 3, settings: { x: 1 } }, { omit: ['age'] });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('("name")');
    expect(params).toEqual(['a']);
  });

  it('writes undeclared keys as snake_case columns', async () => {
    const pool = makeMockPool([makeUserRow()]);
    const repo = new PostgresRepository<User>({ pool: asPool(pool), entity: sparseUsers });
    await repo.create({ age: 0, name: 'a', posts: [] });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toBe('INSERT INTO "users" ("name", "age")\nVALUES ($1, $2)\nRETURNING *');
    expect(params).toEqual(['a', 0]);
  });

  it('serializes json fields', async () => {
    const pool = makeMockPool([makeUserRow()]);
    await makeRepo(pool).create({ settings: { theme: 'dark' } });
    expect(pool.query.mock.calls[0]![1]).toEqual(['{"theme":"dark"}']);
  });

  it('throws ExecutionError when the INSERT returns no row', async () => {
    const pool = makeMockPool([]);
    await expect(makeRepo(pool).create({ name: 'a' })).rejects.toThrow('INSERT into "users" returned no row');
  });
});

describe('PostgresRepository.update()', () => {
  it('writes non-zero fields by primary key', async () => {
    const pool = makeMockPool([], 1);
    const count = await makeRepo(pool).update({ id: 7, name: 'test!!', age: 1111, active: false });
    expect(count).toBe(1);
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toBe(
      [
        'UPDATE "users"',
        'SET "name" = $1, "age" = $2, "updated_at" = NOW()',
        'WHERE "id" = $3 AND "deleted_at" IS NULL',
      ].join('\n'),
    );
    expect(params).toEqual(['test!!', 1111, 7]);
  });

  it('an explicit omit adds to the timestamp defaults instead of replacing them', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).update({ id: 7, name: 'x', age: 12, createdAt: CREATED, updatedAt: CREATED }, { omit: ['name'] });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('SET "age" = $1, "updated_at" = NOW()\n');
    expect(sql).not.toContain('"created_at"');
    expect(params).toEqual([12, 7]);
  });

  it('respects the repository default omit set', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool, ['age']).update({ id: 7, name: 'x', age: 12 });
    expect(pool.query.mock.calls[0]![1]).toEqual(['x', 7]);
  });

  it('writes undeclared non-zero keys too', async () => {
    const pool = makeMockPool([], 1);
    const repo = new PostgresRepository<User>({ pool: asPool(pool), entity: sparseUsers });
    await repo.update({ id: 7, name: 'x', age: 12, active: false, createdAt: CREATED });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('SET "name" = $1, "age" = $2, "updated_at" = NOW()\n');
    expect(params).toEqual(['x', 12, 7]);
  });

  it('returns 0 when no live row has the key', async () => {
    const pool = makeMockPool([], 0);
    await expect(makeRepo(pool).update({ id: 7, name: 'x' })).resolves.toBe(0);
  });

  it('throws MissingPrimaryKeyError without a primary key', async () => {
    const pool = makeMockPool([]);
    await expect(makeRepo(pool).update({ name: 'x' })).rejects.toBeInstanceOf(MissingPrimaryKeyError);
    expect(pool.query).not.toHaveBeenCalled();
  });
});

describe('PostgresRepository.updateField()', () => {
  it('writes one field, zero values included', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).updateField({ id: 7 }, 'age', 0);
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toBe(
      ['UPDATE "users"', 'SET "age" = $1, "updated_at" = NOW()', 'WHERE "id" = $2 AND "deleted_at" IS NULL'].join('\n'),
    );
    expect(params).toEqual([0, 7]);
  });

  it('an explicit updatedAt is written once, without NOW()', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).updateField({ id: 7 }, 'updatedAt', CREATED);
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toBe(['UPDATE "users"', 'SET "updated_at" = $1', 'WHERE "id" = $2 AND "deleted_at" IS NULL'].join('\n'));
    expect(params).toEqual([CREATED, 7]);
  });

  it('serializes a json field', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).updateField({ id: 7 }, 'settings', { a: [1, 2] });
    expect(pool.query.mock.calls[0]![1]).toEqual(['{"a":[1,2]}', 7]);
  });
});

describe('PostgresRepository.updateMap()', () => {
  it('writes every present key, zero values and nulls included', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).updateMap({ id: 7 }, { name: '', age: null });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('SET "name" = $1, "age" = $2, "updated_at" = NOW()\nWHERE "id" = $3');
    expect(params).toEqual(['', null, 7]);
  });

  it('does not add NOW() when the map sets updatedAt', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).updateMap({ id: 7 }, { name: 'x', updatedAt: CREATED });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('SET "name" = $1, "updated_at" = $2\nWHERE "id" = $3');
    expect(params).toEqual(['x', CREATED, 7]);
  });

  it('ignores the primary key, relations and undefined values in the map', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).updateMap({ id: 7 }, { id: 99, posts: [], name: undefined, active: true });
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toContain('SET "active" = $1, "updated_at" = NOW()');
    expect(params).toEqual([true, 7]);
  });
});

describe('PostgresRepository.delete()', () => {
  it('soft deletes by default', async () => {
    const pool = makeMockPool([], 1);
    const count = await makeRepo(pool).delete({ id: 7 });
    expect(count).toBe(1);
    const [sql, params] = pool.query.mock.calls[0]!;
    expect(sql).toBe(['UPDATE "users"', 'SET "deleted_at" = NOW()', 'WHERE "id" = $1 AND "deleted_at" IS NULL'].join('\n'));
    expect(params).toEqual([7]);
  });

  it('hard deletes on request', async () => {
    const pool = makeMockPool([], 1);
    await makeRepo(pool).delete({ id: 7 }, { hard: true });
    expect(pool.query.mock.calls[0]![0]).toBe('DELETE FROM "users"\nWHERE "id" = $1');
  });

  it('hard deletes entities without soft delete', async () => {
    const pool = makeMockPool([], 1);
    const repo = new PostgresRepository<Tag>({ pool: asPool(pool), entity: tags });
    await repo.delete({ id: 3 });
    expect(pool.query.mock.calls[0]![0]).toBe('DELETE FROM "tags"\nWHERE "id" = $1');
  });

  it('throws MissingPrimaryKeyError for a zero id', async () => {
    const pool = makeMockPool([]);
    await expect(makeRepo(pool).delete({ id: 0 })).rejects.toBeInstanceOf(MissingPrimaryKeyError);
  });

  it('wraps a failing statement in ExecutionError', async () => {
    const pool = { query: vi.fn().mockRejectedValue(new Error('permission denied')) };
    await expect(makeRepo(pool).delete({ id: 7 })).rejects.toThrow(ExecutionError);
  });

  it('returns 0 when rowCount is null', async () => {
    const pool = { query: vi.fn().mockResolvedValue({ rows: [], rowCount: null }) };
    await expect(makeRepo(pool).delete({ id: 7 })).resolves.toBe(0);
  });
});
