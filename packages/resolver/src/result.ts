// packages/resolver/src/result.ts
import type { Seed } from '@fieldlink/core';

/** field id -> distinct values discovered during one resolution */
export class ResultAccumulator {
  private readonly values = new Map<string, Set<string>>();

  add(field: string, value: string): void {
    const set = this.values.get(field);
    if (set) set.add(value);
    else this.values.set(field, new Set([value]));
  }

  /**
   * Sorted field ids, each with its sorted, deduplicated values. The caller's
   * own seed pairs are not echoed back; fields left empty are dropped.
   */
  finalize(seeds: readonly Seed[] = []): Record<string, string[]> {
    const known = new Map<string, Set<string>>();
    for (const s of seeds) {
      const set = known.get(s.field) ?? new Set<string>();
      set.add(s.value);
      known.set(s.field, set);
    }

    const out: Record<string, string[]> = {};
    for (const field of [...this.values.keys()].sort()) {
      const skip = known.get(field);
      const vals = [...(this.values.get(field) ?? [])].filter((v) => !skip?.has(v)).sort();
      if (vals.length) out[field] = vals;
    }
    return out;
  }
}
