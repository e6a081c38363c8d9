// packages/relation-mongo/src/index.ts
import { Decimal128, Long, MongoClient, ObjectId, type Document, type Filter, type FindOptions } from 'mongodb';
import type { HealthStatus, Logger, LookupOptions, LookupRow, Relation, RelationAdapter } from '@fieldlink/core';
import {
  ConfigError,
  ConnectionError,
  LookupError,
  RequestAbortedError,
  declaredField,
  errorMessage,
  raceAbort,
  silentLogger,
  throwIfAborted,
  toLookupRow,
} from '@fieldlink/core';

/** The part of a mongodb Collection the adapter reads through. */
export interface DocumentFinder {
  find(filter: Filter<Document>, options?: FindOptions): { toArray(): Promise<Document[]> };
}

export interface MongoRelationOptions {
  logger?: Logger;
  /** ping used by health(); defaults to a no-op for injected finders */
  ping?: () => Promise<unknown>;
  close?: () => Promise<void>;
}

export function isMongoDescriptor(connect: string): boolean {
  return /^mongodb(\+srv)?:\/\//i.test(connect);
}

function isDocument(v: unknown): v is Document {
  return v !== null && typeof v === 'object';
}

// Walk a dotted path ("profile.email") through nested documents.
export function readPath(doc: Document, dotted: string): unknown {
  let cur: unknown = doc;
  for (const key of dotted.split('.')) {
    if (!isDocument(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

/** BSON scalars without a JS primitive counterpart, rendered the way they print. */
export function fromBson(raw: unknown): unknown {
  if (raw instanceof ObjectId) return raw.toHexString();
  if (raw instanceof Long || raw instanceof Decimal128) return raw.toString();
  return raw;
}

const OBJECT_ID_HEX = /^[0-9a-f]{24}$/i;
const INTEGER = /^-?\d+$/;
const DECIMAL = /^-?\d+\.\d+$/;

type Candidate = string | number | Long | Decimal128 | ObjectId;

/**
 * Every stored form a field value may have been read from: the string itself,
 * a number (or Long / Decimal128 past double precision) for numeric literals,
 * an ObjectId for 24 hex digits.
 */
export function valueCandidates(value: string): Candidate[] {
  const out: Candidate[] = [value];
  const n = Number(value);
  if (value.trim() !== '' && Number.isFinite(n) && String(n) === value) {
    out.push(n);
  } else if (INTEGER.test(value)) {
    const long = Long.fromString(value);
    if (long.toString() === value) out.push(long);
  } else if (DECIMAL.test(value)) {
    out.push(Decimal128.fromString(value));
  }
  if (OBJECT_ID_HEX.test(value)) out.push(new ObjectId(value));
  return out;
}

export class MongoRelation implements RelationAdapter {
  readonly kind = 'mongodb' as const;
  private readonly logger: Logger;

  constructor(
    readonly relation: Relation,
    private readonly coll: DocumentFinder,
    private readonly opts: MongoRelationOptions = {},
  ) {
    if (relation.fields.length === 0) {
      throw new ConfigError(`relation \`${relation.name}\` does not have any field`);
    }
    this.logger = opts.logger ?? silentLogger;
  }

  /** Connects, pings and binds the collection named by the relation's table name. */
  static async open(relation: Relation, opts: { logger?: Logger } = {}): Promise<MongoRelation> {
    if (relation.fields.length === 0) {
      throw new ConfigError(`relation \`${relation.name}\` does not have any field`);
    }
    const fail = (e: unknown) => new ConnectionError(
      relation.name,
      `failed to connect to mongodb \`${relation.connect}\` for relation ${relation.name}: ${errorMessage(e)}`,
      { cause: e },
    );

    const cli = await MongoClient.connect(relation.connect).catch((e: unknown) => { throw fail(e); });
    const db = cli.db(); // database from the URI path
    try {
      await db.command({ ping: 1 });
    } catch (e) {
      await cli.close();
      throw fail(e);
    }
    return new MongoRelation(relation, db.collection(relation.tableName), {
      logger: opts.logger,
      ping: () => db.command({ ping: 1 }),
      close: () => cli.close(),
    });
  }

  buildLookup(field: string, value: string): { filter: Filter<Document>; options: FindOptions } {
    const by = declaredField(this.relation, field);
    const projection: Document = { _id: 0 };
    for (const f of this.relation.fields) projection[f.query] = 1;
    return { filter: { [by.query]: { $in: valueCandidates(value) } }, options: { projection } };
  }

  async lookup(field: string, value: string, opts: LookupOptions = {}): Promise<LookupRow[]> {
    throwIfAborted(opts.signal);
    const { filter, options } = this.buildLookup(field, value);
    this.logger.debug({ relation: this.relation.name, collection: this.relation.tableName, filter }, 'mongo-lookup');

    let docs: Document[];
    try {
      docs = await raceAbort(this.coll.find(filter, options).toArray(), opts.signal);
    } catch (e) {
      if (e instanceof RequestAbortedError) throw e;
      throw new LookupError(errorMessage(e), { cause: e });
    }
    return docs.map((doc) => toLookupRow(this.relation, (f) => fromBson(readPath(doc, f.query))));
  }

  async health(): Promise<HealthStatus> {
    if (!this.opts.ping) return { ok: true };
    try {
      await this.opts.ping();
      return { ok: true };
    } catch (e) {
      return { ok: false, details: errorMessage(e) };
    }
  }

  async close(): Promise<void> {
    await this.opts.close?.();
  }
}

export function openMongoRelation(relation: Relation, opts?: { logger?: Logger }): Promise<MongoRelation> {
  return MongoRelation.open(relation, opts);
}

export default MongoRelation;
