/* packages/core/test/core.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  ConfigSchema,
  ConnectionError,
  DEFAULT_MAX_DEPTH,
  EnvSchema,
  LookupError,
  RequestAbortedError,
  UnknownFieldError,
  declaredField,
  extractValue,
  isRequestError,
  raceAbort,
  toLookupRow,
  type Relation,
} from '../src';

const rel: Relation = {
  name: 'users',
  connect: 'sqlite::memory:',
  tableName: 'users',
  fields: [
    { id: 'user_id', query: 'uid' },
    { id: 'email', query: 'mail' },
  ],
};

describe('error taxonomy', () => {
  it('formats the unknown-field message', () => {
    const e = new UnknownFieldError('bogus_field');
    expect(e.message).toBe('no relation has field `bogus_field`');
    expect(e.code).toBe('UNKNOWN_FIELD');
    expect(e.name).toBe('UnknownFieldError');
  });

  it('separates request-scoped errors from startup errors', () => {
    expect(isRequestError(new UnknownFieldError('x'))).toBe(true);
    expect(isRequestError(new LookupError('boom'))).toBe(true);
    expect(isRequestError(new RequestAbortedError('timed out'))).toBe(true);
    expect(isRequestError(new ConnectionError('r1', 'down'))).toBe(false);
    expect(isRequestError(new Error('plain'))).toBe(false);
  });
});

describe('row extraction', () => {
  it('stringifies scalars and drops nulls', () => {
    expect(extractValue(rel, 'user_id', 'abc')).toBe('abc');
    expect(extractValue(rel, 'user_id', 42)).toBe('42');
    expect(extractValue(rel, 'user_id', 9007199254740993n)).toBe('9007199254740993');
    expect(extractValue(rel, 'user_id', true)).toBe('true');
    expect(extractValue(rel, 'user_id', new Date('2025-01-02T03:04:05.000Z'))).toBe('2025-01-02T03:04:05.000Z');
    expect(extractValue(rel, 'user_id', null)).toBeUndefined();
    expect(extractValue(rel, 'user_id', undefined)).toBeUndefined();
  });

  it('fails on values without a string form', () => {
    expect(() => extractValue(rel, 'email', Buffer.from('x'))).toThrow(
      'failed to get field `email` when querying relation users: unsupported value of type binary'
    );
    expect(() => extractValue(rel, 'email', { a: 1 })).toThrow(LookupError);
  });

  it('projects rows onto declared fields in declaration order', () => {
    const raw: Record<string, unknown> = { uid: 7, mail: null };
    const row = toLookupRow(rel, (f) => raw[f.query]);
    expect(row).toEqual({ user_id: '7' });
  });

  it('rejects lookups on undeclared fields', () => {
    expect(declaredField(rel, 'email').query).toBe('mail');
    expect(() => declaredField(rel, 'phone')).toThrow('field `phone` is not declared by relation `users`');
  });
});

describe('raceAbort', () => {
  it('passes results through without a signal', async () => {
    await expect(raceAbort(Promise.resolve(3))).resolves.toBe(3);
  });

  it('rejects immediately for an already aborted signal', async () => {
    const ctl = new AbortController();
    ctl.abort(new Error('client disconnected'));
    await expect(raceAbort(new Promise(() => undefined), ctl.signal)).rejects.toThrow(
      'request aborted: client disconnected'
    );
  });

  it('rejects when the signal aborts mid-flight', async () => {
    const ctl = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), ctl.signal);
    ctl.abort();
    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
  });
});

describe('schemas', () => {
  it('applies defaults', () => {
    const cfg = ConfigSchema.parse({
      listen: '127.0.0.1:3000',
      fields: [{ id: 'user_id' }],
      relations: [],
    });
    expect(cfg.max_depth).toBe(DEFAULT_MAX_DEPTH);
    expect(cfg.request_timeout_ms).toBe(30000);
    expect(cfg.fields[0].distinct).toBe(false);
  });

  it('requires at least one relation field', () => {
    const r = ConfigSchema.safeParse({
      listen: ':3000',
      fields: [],
      relations: [{ name: 'r', connect: 'sqlite::memory:', table_name: 't', fields: [] }],
    });
    expect(r.success).toBe(false);
  });

  it('coerces numeric env knobs', () => {
    const env = EnvSchema.parse({ MAX_DEPTH: '4', REQUEST_TIMEOUT_MS: '1500' });
    expect(env.MAX_DEPTH).toBe(4);
    expect(env.REQUEST_TIMEOUT_MS).toBe(1500);
    expect(env.LOG_LEVEL).toBe('info');
  });
});
