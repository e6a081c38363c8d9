/* apps/http/test/health-checks.spec.ts */
import { describe, it, expect } from 'vitest';
import { createLogger, type Field, type HealthStatus } from '@fieldlink/core';
import { Registry } from '@fieldlink/resolver';
import { buildServer } from '../src/server';
import { FakeRelation } from '../../../tests/helpers';

class UnreachableRelation extends FakeRelation {
  async health(): Promise<HealthStatus> {
    throw new Error('connection refused');
  }
}

const fields: Field[] = [{ id: 'email', distinct: true }, { id: 'country', distinct: false }];

async function serve(...relations: FakeRelation[]) {
  const registry = new Registry(fields, relations);
  return buildServer({ registry, logger: createLogger({ level: 'silent' }), maxDepth: 10, requestTimeoutMs: 1000 });
}

describe('Health endpoints', () => {
  it('/healthz answers without touching relations', async () => {
    const app = await serve(new UnreachableRelation('crm', ['email'], []));
    try {
      const res = await app.inject({ method: 'GET', url: '/healthz' });
      expect(res.json()).toEqual({ ok: true });
    } finally {
      await app.close();
    }
  });

  it('/readyz reports every relation', async () => {
    const app = await serve(new FakeRelation('r1', ['email'], []), new FakeRelation('r2', ['email', 'country'], []));
    try {
      const res = await app.inject({ method: 'GET', url: '/readyz' });
      expect(res.json()).toEqual({ ok: true, relations: { r1: { ok: true }, r2: { ok: true } } });
    } finally {
      await app.close();
    }
  });

  it('/readyz is not ok when any relation is down', async () => {
    const closed = new FakeRelation('r2', ['email', 'country'], []);
    await closed.close();
    const app = await serve(new FakeRelation('r1', ['email'], []), closed, new UnreachableRelation('crm', ['email'], []));
    try {
      const res = await app.inject({ method: 'GET', url: '/readyz' });
      expect(res.json()).toEqual({
        ok: false,
        relations: {
          r1: { ok: true },
          r2: { ok: false },
          crm: { ok: false, details: 'connection refused' },
        },
      });
    } finally {
      await app.close();
    }
  });
});
