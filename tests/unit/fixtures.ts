import { vi } from 'vitest';
import type pg from 'pg';
import { defineEntity, type Entity } from '../../src/entity/define.js';
import type { Model } from '../../src/types.js';

export interface User extends Model {
  name: string;
  age: number | null;
  active: boolean;
  balance: bigint;
  settings: Record<string, unknown> | null;
  posts?: Post[];
}

export interface Post extends Model {
  userId: number;
  title: string;
  author?: User | null;
}

export interface Tag extends Model {
  label: string;
}

export const users: Entity<User> = defineEntity<User>({
  table: 'users',
  fields: {
    name: 'text',
    age: 'integer',
    active: 'boolean',
    balance: 'bigint',
    settings: 'json',
  },
  relations: {
    posts: { kind: 'hasMany', entity: () => posts, foreignKey: 'userId' },
  },
});

export const posts: Entity<Post> = defineEntity<Post>({
  table: 'posts',
  fields: {
    userId: 'integer',
    title: 'text',
  },
  relations: {
    author: { kind: 'belongsTo', entity: () => users, foreignKey: 'userId' },
  },
});

/** Same table as `users`, declaring only `name`. */
export const sparseUsers: Entity<User> = defineEntity<User>({
  table: 'users',
  fields: { name: 'text' },
  relations: {
    posts: { kind: 'hasMany', entity: () => posts, foreignKey: 'userId' },
  },
});

/** Hard-delete entity: no deleted_at guard. */
export const tags = defineEntity<Tag>({
  table: 'tags',
  fields: { label: 'text' },
  softDelete: false,
});

export const USER_COLUMNS =
  '"id", "created_at", "updated_at", "deleted_at", "name", "age", "active", "balance", "settings"';

export const POST_COLUMNS = '"id", "created_at", "updated_at", "deleted_at", "user_id", "title"';

export const CREATED = new Date('2024-01-01T00:00:00.000Z');

// A users row as pg would return it
export function makeUserRow(overrides: Partial<Record<string, unknown>> = {}): Record<string, unknown> {
  return {
    id: 1,
    created_at: CREATED,
    updated_at: CREATED,
    deleted_at: null,
    name: 'a',
    age: 11,
    active: true,
    balance: '0',
    settings: null,
    ...overrides,
  };
}

export function makePostRow(overrides: Partial<Record<string, unknown>> = {}): Record<string, unknown> {
  return {
    id: 10,
    created_at: CREATED,
    updated_at: CREATED,
    deleted_at: null,
    user_id: 1,
    title: 'hello',
    ...overrides,
  };
}

// Helper to create a mock pool answering every query with the same rows
export function makeMockPool(rows: object[] = [], rowCount: number = rows.length) {
  return {
    query: vi.fn().mockResolvedValue({ rows, rowCount }),
    connect: vi.fn(),
    end: vi.fn(),
  };
}

export function asPool(mock: { query: unknown }): pg.Pool {
  return mock as unknown as pg.Pool;
}
