// packages/core/src/rows.ts
import { LookupError } from './errors';
import type { LookupRow, Relation, RelationField } from './types';

export function declaredField(relation: Relation, field: string): RelationField {
  const f = relation.fields.find((rf) => rf.id === field);
  if (!f) {
    throw new LookupError(`field \`${field}\` is not declared by relation \`${relation.name}\``);
  }
  return f;
}

/**
 * Render a driver value as a field value. null/undefined mean "no value";
 * anything that has no canonical string form is an extraction failure.
 */
export function extractValue(relation: Relation, field: string, raw: unknown): string | undefined {
  if (raw === null || raw === undefined) return undefined;
  switch (typeof raw) {
    case 'string': return raw;
    case 'number':
    case 'bigint':
    case 'boolean': return String(raw);
  }
  if (raw instanceof Date) return raw.toISOString();
  throw new LookupError(
    `failed to get field \`${field}\` when querying relation ${relation.name}: unsupported value of type ${describe(raw)}`
  );
}

function describe(raw: unknown): string {
  if (Buffer.isBuffer(raw)) return 'binary';
  if (Array.isArray(raw)) return 'array';
  return typeof raw;
}

/** Project one driver row onto the relation's declared fields. */
export function toLookupRow(relation: Relation, get: (field: RelationField) => unknown): LookupRow {
  const row: LookupRow = {};
  for (const f of relation.fields) {
    const v = extractValue(relation, f.id, get(f));
    if (v !== undefined) row[f.id] = v;
  }
  return row;
}
