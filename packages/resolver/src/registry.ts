// packages/resolver/src/registry.ts
import {
  ConfigError,
  silentLogger,
  type Field,
  type Logger,
  type Relation,
  type RelationAdapter,
} from '@fieldlink/core';
import { FieldIndex, assertDeclared } from './field-index';

/** Opens the adapter for one relation; must fail fast on connectivity problems. */
export type RelationConnector = (relation: Relation, logger: Logger) => Promise<RelationAdapter>;

export interface RegistryInput {
  fields: readonly Field[];
  relations: readonly Relation[];
}

/**
 * Process-wide, immutable bundle of declared fields, one adapter per relation,
 * and the field index. Every request references the same instance.
 */
export class Registry {
  readonly index: FieldIndex;
  readonly adapters: readonly RelationAdapter[];

  constructor(fields: readonly Field[], adapters: readonly RelationAdapter[]) {
    const names = new Set<string>();
    for (const a of adapters) {
      if (names.has(a.relation.name)) throw new ConfigError(`duplicate relation name \`${a.relation.name}\``);
      names.add(a.relation.name);
    }
    this.adapters = Object.freeze([...adapters]);
    this.index = new FieldIndex(fields, this.adapters);
    Object.freeze(this);
  }

  /**
   * Connect every relation in declaration order. The first failure closes the
   * adapters already opened and rethrows; nothing is served from a partial registry.
   */
  static async build(input: RegistryInput, connect: RelationConnector, logger: Logger = silentLogger): Promise<Registry> {
    // reject undeclared fields before touching any data source
    assertDeclared(input.fields, input.relations);

    const opened: RelationAdapter[] = [];
    try {
      for (const r of input.relations) {
        const adapter = await connect(r, logger);
        opened.push(adapter);
        logger.info({ relation: r.name, kind: adapter.kind, fields: r.fields.map((f) => f.id) }, 'relation-ready');
      }
      return new Registry(input.fields, opened);
    } catch (e) {
      await Promise.allSettled(opened.map((a) => a.close()));
      throw e;
    }
  }

  async close(logger: Logger = silentLogger): Promise<void> {
    const results = await Promise.allSettled(this.adapters.map((a) => a.close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        logger.warn({ relation: this.adapters[i].relation.name, err: r.reason }, 'relation-close-failed');
      }
    });
  }
}
