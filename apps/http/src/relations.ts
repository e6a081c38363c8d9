// apps/http/src/relations.ts
import { ConnectionError } from '@fieldlink/core';
import { isMongoDescriptor, openMongoRelation } from '@fieldlink/relation-mongo';
import { isSqlDescriptor, openSqlRelation } from '@fieldlink/relation-sql';
import type { RelationConnector } from '@fieldlink/resolver';

/**
 * Pick the adapter from the connection descriptor's scheme.
 * Relative sqlite paths resolve against `baseDir` (the config file's directory).
 */
export function createConnector(opts: { baseDir?: string } = {}): RelationConnector {
  return async (relation, logger) => {
    if (isSqlDescriptor(relation.connect)) return openSqlRelation(relation, { logger, cwd: opts.baseDir });
    if (isMongoDescriptor(relation.connect)) return openMongoRelation(relation, { logger });
    throw new ConnectionError(
      relation.name,
      `unsupported connection descriptor \`${relation.connect}\` for relation ${relation.name}`
    );
  };
}
