import type { FieldKind } from './define.js';

/**
 * Zero value test used by filter-by-example. `undefined` and `null` are zero
 * for every kind; an undeclared field (kind undefined) also treats 0, 0n, ''
 * and false as zero.
 */
export function isZeroValue(kind: FieldKind | undefined, value: unknown): boolean {
  if (value === undefined || value === null) return true;

  switch (kind) {
    case 'integer':
    case 'numeric':
      return value === 0;
    case 'bigint':
      return value === 0n || value === 0;
    case 'text':
      return value === '';
    case 'boolean':
      return value === false;
    case 'timestamp':
      return value instanceof Date && Number.isNaN(value.getTime());
    case 'json':
      return false;
    case undefined:
      return value === 0 || value === 0n || value === '' || value === false;
  }
}
