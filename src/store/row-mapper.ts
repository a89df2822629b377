import type { FieldDefinition } from '../entity/define.js';

/** A row with columns renamed to field names; relations are attached to it by preload. */
export type MappedRow = Record<string, unknown>;

function convert(field: FieldDefinition, value: unknown): unknown {
  // pg returns BIGINT as string by default
  if (field.kind === 'bigint' && (typeof value === 'string' || typeof value === 'number')) {
    return BigInt(value);
  }
  return value;
}

/**
 * Renames declared columns to their field names. Columns the entity does not
 * declare are dropped; declared columns absent from the row (omitted from the
 * SELECT) stay absent.
 */
export function mapRow(fields: readonly FieldDefinition[], row: Record<string, unknown>): MappedRow {
  const mapped: MappedRow = {};
  for (const field of fields) {
    if (Object.hasOwn(row, field.column)) {
      mapped[field.name] = convert(field, row[field.column]);
    }
  }
  return mapped;
}
