// apps/http/src/server.ts
import Fastify, { type FastifyBaseLogger, type FastifyReply, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { SeedQuerySchema, errorMessage, type HealthStatus } from '@fieldlink/core';
import { resolveLinks, seedsFromQuery, type Registry } from '@fieldlink/resolver';

export interface ServerOptions {
  registry: Registry;
  logger: FastifyBaseLogger;
  maxDepth: number;
  requestTimeoutMs: number;
  corsOrigin?: string; // comma-separated allow-list; empty allows all
}

export interface QueryResponse {
  success: boolean;
  message: string;
  data: Record<string, string[]>;
  trace?: { rounds: number; lookups: number; elapsedMs: number };
}

function shouldDebug(req: FastifyRequest) {
  return String(req.headers['x-debug'] ?? '') === '1' || process.env.DEBUG_ERRORS === '1';
}

function failure(message: string): QueryResponse {
  return { success: false, message, data: {} };
}

// aborts on client disconnect or after timeoutMs, whichever comes first
function requestSignal(reply: FastifyReply, timeoutMs: number): AbortSignal {
  const client = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) client.abort(new Error('client disconnected'));
  });
  return AbortSignal.any([client.signal, AbortSignal.timeout(timeoutMs)]);
}

export async function buildServer(opts: ServerOptions) {
  const { registry, maxDepth, requestTimeoutMs } = opts;

  const app = Fastify({ loggerInstance: opts.logger });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = (opts.corsOrigin ?? '').split(',').map((s) => s.trim()).filter(Boolean);
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  // failures share the success status; only `success` tells them apart
  app.setErrorHandler((err, req, reply) => {
    req.log.error({ err, requestId: req.id }, 'request-error');
    return reply.status(200).send(failure(errorMessage(err)));
  });

  // ------------------------------------
  // GET /query?<field>=<value>&...
  // ------------------------------------
  app.get('/query', async (req, reply) => {
    const parsed = SeedQuerySchema.safeParse(req.query ?? {});
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      return reply.send(failure(`invalid query parameters: ${details}`));
    }

    const t0 = Date.now();
    const res = await resolveLinks(registry, seedsFromQuery(parsed.data), {
      maxDepth,
      signal: requestSignal(reply, requestTimeoutMs),
      logger: req.log,
    });

    const body: QueryResponse = { success: res.success, message: res.message, data: res.data };
    if (shouldDebug(req)) body.trace = { ...res.stats, elapsedMs: Date.now() - t0 };
    return reply.send(body);
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    const settled = await Promise.allSettled(registry.adapters.map((a) => a.health()));
    const relations: Record<string, HealthStatus> = {};
    settled.forEach((s, i) => {
      relations[registry.adapters[i].relation.name] =
        s.status === 'fulfilled' ? s.value : { ok: false, details: errorMessage(s.reason) };
    });
    return { ok: Object.values(relations).every((h) => h.ok), relations };
  });

  return app;
}
