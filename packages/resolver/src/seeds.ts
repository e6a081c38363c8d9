// packages/resolver/src/seeds.ts
import type { Seed, SeedQuery } from '@fieldlink/core';

/** Query parameters -> seeds, in parameter order; a repeated parameter yields one seed per value. */
export function seedsFromQuery(query: SeedQuery): Seed[] {
  const seeds: Seed[] = [];
  for (const [field, raw] of Object.entries(query)) {
    const values = Array.isArray(raw) ? raw : [raw];
    for (const value of values) {
      if (!seeds.some((s) => s.field === field && s.value === value)) seeds.push({ field, value });
    }
  }
  return seeds;
}
