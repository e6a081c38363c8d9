/* tests/helpers.ts */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { LookupOptions, LookupRow, Relation, RelationAdapter } from '@fieldlink/core';
import { LookupError, declaredField, raceAbort, throwIfAborted } from '@fieldlink/core';

export function makeTempDir(prefix = 'fieldlink-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Create a sqlite file from DDL + rows; returns its path. */
export function makeSqliteDb(
  dir: string,
  name: string,
  ddl: string,
  table: string,
  rows: Record<string, string | number | bigint | null>[]
): string {
  const file = path.join(dir, name);
  const db = new Database(file);
  try {
    db.exec(ddl);
    for (const row of rows) {
      const cols = Object.keys(row);
      db.prepare(`INSERT INTO ${table} (${cols.join(', ')}) VALUES (${cols.map(() => '?').join(', ')})`)
        .run(...cols.map((c) => row[c]));
    }
  } finally {
    db.close();
  }
  return file;
}

/** users(uid -> mail) and accounts(email -> country) for the linkage scenario */
export function makeLinkageFixture(dir: string) {
  const users = makeSqliteDb(dir, 'users.db',
    'CREATE TABLE users (uid TEXT NOT NULL, mail TEXT)', 'users', [
      { uid: '42', mail: 'a@x.com' },
      { uid: '43', mail: 'b@x.com' },
    ]);
  const accounts = makeSqliteDb(dir, 'accounts.db',
    'CREATE TABLE accounts (email TEXT NOT NULL, country TEXT)', 'accounts', [
      { email: 'a@x.com', country: 'US' },
      { email: 'b@x.com', country: 'DE' },
    ]);
  return {
    users,
    accounts,
    config: {
      listen: '127.0.0.1:0',
      fields: [
        { id: 'user_id', distinct: true },
        { id: 'email', distinct: true },
        { id: 'country' },
      ],
      relations: [
        {
          name: 'r1',
          connect: `sqlite://${users}`,
          table_name: 'users',
          fields: [{ id: 'user_id', query: 'uid' }, { id: 'email', query: 'mail' }],
        },
        {
          name: 'r2',
          connect: `sqlite://${accounts}`,
          table_name: 'accounts',
          fields: [{ id: 'email', query: 'email' }, { id: 'country', query: 'country' }],
        },
      ],
    },
  };
}

export type Responder = (field: string, value: string) => LookupRow[] | Promise<LookupRow[]>;

/**
 * In-process RelationAdapter. Either serves `rows` (matching on the looked-up
 * field) or delegates to a responder; records every call.
 */
export class FakeRelation implements RelationAdapter {
  readonly kind = 'sql' as const;
  readonly relation: Relation;
  readonly calls: Array<{ field: string; value: string }> = [];
  closed = false;

  constructor(
    name: string,
    fields: string[],
    private readonly source: LookupRow[] | Responder,
  ) {
    this.relation = {
      name,
      connect: `fake://${name}`,
      tableName: name,
      fields: fields.map((id) => ({ id, query: id })),
    };
  }

  async lookup(field: string, value: string, opts: LookupOptions = {}): Promise<LookupRow[]> {
    throwIfAborted(opts.signal);
    declaredField(this.relation, field);
    this.calls.push({ field, value });
    const { source } = this;
    if (typeof source === 'function') return raceAbort(Promise.resolve(source(field, value)), opts.signal);
    return source.filter((row) => row[field] === value);
  }

  async health() {
    return { ok: !this.closed };
  }

  async close() {
    this.closed = true;
  }
}

export function failingRelation(name: string, fields: string[], message: string): FakeRelation {
  return new FakeRelation(name, fields, () => {
    throw new LookupError(message);
  });
}
