// packages/resolver/src/field-index.ts
import { ConfigError, type Field, type Relation, type RelationAdapter } from '@fieldlink/core';

/** Every relation field must name a declared field. */
export function assertDeclared(fields: readonly Field[], relations: readonly Relation[]): void {
  const declared = new Set(fields.map((f) => f.id));
  for (const r of relations) {
    for (const f of r.fields) {
      if (!declared.has(f.id)) {
        throw new ConfigError(
          `undeclared field \`${f.id}\` used in relation \`${r.name}\`, you have to declare it in \`fields\``
        );
      }
    }
  }
}

/**
 * field id -> relations exposing it, in relation declaration order.
 * Built once and never mutated, so concurrent requests read it without locking.
 */
export class FieldIndex {
  private readonly byField: ReadonlyMap<string, readonly RelationAdapter[]>;
  private readonly fields: ReadonlyMap<string, Field>;

  constructor(fields: readonly Field[], relations: readonly RelationAdapter[]) {
    assertDeclared(fields, relations.map((r) => r.relation));
    this.fields = new Map(fields.map((f) => [f.id, f]));

    const byField = new Map<string, RelationAdapter[]>();
    for (const r of relations) {
      for (const f of r.relation.fields) {
        const list = byField.get(f.id) ?? [];
        if (!list.includes(r)) list.push(r);
        byField.set(f.id, list);
      }
    }
    this.byField = new Map([...byField].map(([k, v]) => [k, Object.freeze(v)]));
  }

  /** undefined means no relation exposes the field */
  relationsFor(field: string): readonly RelationAdapter[] | undefined {
    return this.byField.get(field);
  }

  field(id: string): Field | undefined {
    return this.fields.get(id);
  }
}
