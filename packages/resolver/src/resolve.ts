// packages/resolver/src/resolve.ts
// Bounded breadth-first traversal over (relation, field, value) lookup units.
//
//   seed:   every seed (field, value) -> one unit per relation exposing field
//   round:  freeze pending into a worklist, look every unvisited unit up
//           concurrently, then merge all rows in worklist order:
//             - each (field2, value2) joins the result
//             - distinct field2 enqueues (r2, field2, value2) for every r2 exposing it
//   stop:   pending empty (fixpoint), or maxDepth rounds done (warning, partial data)
import {
  DEFAULT_MAX_DEPTH,
  DEPTH_LIMIT_WARNING,
  LookupError,
  RequestAbortedError,
  UnknownFieldError,
  errorMessage,
  isRequestError,
  silentLogger,
  throwIfAborted,
  type Logger,
  type LookupRow,
  type LookupUnit,
  type RelationAdapter,
  type ResolveResponse,
  type ResolveStats,
  type Seed,
} from '@fieldlink/core';
import type { Registry } from './registry';
import { ResultAccumulator } from './result';

export interface ResolveOptions {
  maxDepth?: number;
  /** aborts in-flight lookups: client disconnect, per-request timeout */
  signal?: AbortSignal;
  logger?: Logger;
}

export interface Traversal {
  result: ResultAccumulator;
  truncated: boolean;
}

interface PlannedLookup {
  unit: LookupUnit;
  adapter: RelationAdapter;
}

export function unitKey(u: LookupUnit): string {
  return JSON.stringify([u.relation, u.field, u.value]);
}

async function runLookup(p: PlannedLookup, signal: AbortSignal, log: Logger): Promise<LookupRow[]> {
  const { unit, adapter } = p;
  log.debug({ relation: unit.relation, field: unit.field, value: unit.value }, 'visit');
  try {
    return await adapter.lookup(unit.field, unit.value, { signal });
  } catch (e) {
    if (e instanceof RequestAbortedError) throw e;
    throw new LookupError(
      `failed to query relation \`${unit.relation}\` with field \`${unit.field}\`, value \`${unit.value}\`: ${errorMessage(e)}`,
      { cause: e }
    );
  }
}

/**
 * Issue one round's lookups concurrently. Workers only return rows; the caller
 * merges them. The first failure aborts the round's remaining lookups.
 */
async function lookupRound(worklist: readonly PlannedLookup[], log: Logger, signal?: AbortSignal): Promise<LookupRow[][]> {
  const round = new AbortController();
  const linked = signal ? AbortSignal.any([signal, round.signal]) : round.signal;
  return Promise.all(
    worklist.map((p) =>
      runLookup(p, linked, log).catch((e: unknown) => {
        round.abort(e);
        throw e;
      })
    )
  );
}

/** Throws request-class errors; see resolveLinks for the response boundary. */
export async function traverse(
  registry: Registry,
  seeds: readonly Seed[],
  opts: ResolveOptions = {},
  stats: ResolveStats = { rounds: 0, lookups: 0 },
): Promise<Traversal> {
  const { index } = registry;
  const maxDepth = opts.maxDepth ?? DEFAULT_MAX_DEPTH;
  const log = opts.logger ?? silentLogger;

  const visited = new Set<string>();
  const result = new ResultAccumulator();
  let pending = new Map<string, PlannedLookup>();

  const enqueue = (into: Map<string, PlannedLookup>, adapter: RelationAdapter, field: string, value: string) => {
    const unit: LookupUnit = { relation: adapter.relation.name, field, value };
    const key = unitKey(unit);
    if (!visited.has(key) && !into.has(key)) into.set(key, { unit, adapter });
  };

  // non-distinct seed fields are still queried once
  for (const s of seeds) {
    const relations = index.relationsFor(s.field);
    if (!relations) throw new UnknownFieldError(s.field);
    for (const r of relations) enqueue(pending, r, s.field, s.value);
  }

  let truncated = false;
  while (pending.size > 0) {
    if (stats.rounds >= maxDepth) {
      truncated = true;
      break;
    }
    throwIfAborted(opts.signal);

    const worklist = [...pending.values()].filter((p) => !visited.has(unitKey(p.unit)));
    pending = new Map();
    for (const p of worklist) visited.add(unitKey(p.unit));
    stats.rounds++;
    stats.lookups += worklist.length;

    const rowsByUnit = await lookupRound(worklist, log, opts.signal);

    worklist.forEach((_, i) => {
      for (const row of rowsByUnit[i]) {
        for (const [field, value] of Object.entries(row)) {
          result.add(field, value);
          const def = index.field(field);
          if (!def) throw new UnknownFieldError(field);
          if (!def.distinct) continue; // reported, never expanded
          for (const r of index.relationsFor(field) ?? []) enqueue(pending, r, field, value);
        }
      }
    });
  }

  return { result, truncated };
}

/**
 * Resolve every field value reachable from the seeds. Request-class failures
 * (unknown field, failed lookup, abort) become `success: false` with empty
 * data; anything else propagates.
 */
export async function resolveLinks(
  registry: Registry,
  seeds: readonly Seed[],
  opts: ResolveOptions = {},
): Promise<ResolveResponse> {
  const log = opts.logger ?? silentLogger;
  const stats: ResolveStats = { rounds: 0, lookups: 0 };
  const t0 = Date.now();

  try {
    const { result, truncated } = await traverse(registry, seeds, opts, stats);
    const data = result.finalize(seeds);
    log.info({ seeds: seeds.length, ...stats, truncated, ms: Date.now() - t0 }, 'resolved');
    return {
      success: true,
      message: truncated ? DEPTH_LIMIT_WARNING : '',
      data,
      stats,
    };
  } catch (e) {
    if (!isRequestError(e)) throw e;
    log.warn({ code: e.code, error: e.message, ...stats }, 'resolve-failed');
    return { success: false, message: e.message, data: {}, stats };
  }
}
