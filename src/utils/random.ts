/**
 * Seeded randomness
 *
 * Every random draw in the simulation goes through an `Rng` so a run is
 * reproducible from its seed.
 */

export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let s = seed;
  return function () {
    s |= 0;
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * 32-bit FNV-1a over the joined parts. Used to derive independent sub-seeds,
 * e.g. one stream per (slot, actor) so results do not depend on execution order.
 */
export function deriveSeed(seed: number, ...parts: Array<string | number>): number {
  let h = 0x811c9dc5 ^ (seed >>> 0);
  const text = parts.join(':');
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function bernoulli(rng: Rng, p: number): boolean {
  if (p <= 0) return false;
  if (p >= 1) return true;
  return rng() < p;
}

export function clamp01(x: number): number {
  return Math.min(1, Math.max(0, x));
}

export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function pick<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.floor(rng() * items.length)];
}

/**
 * Weighted choice. Entries with weight ≤ 0 are never chosen; returns undefined
 * when nothing has positive weight.
 */
export function weightedChoice<T>(rng: Rng, entries: ReadonlyArray<readonly [T, number]>): T | undefined {
  const positive = entries.filter(([, w]) => w > 0);
  const total = positive.reduce((sum, [, w]) => sum + w, 0);
  if (total <= 0) return undefined;

  let r = rng() * total;
  for (const [value, weight] of positive) {
    r -= weight;
    if (r < 0) return value;
  }
  return positive[positive.length - 1][0];
}

/** Fisher-Yates on a copy. */
export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function sampleWithoutReplacement<T>(rng: Rng, items: readonly T[], n: number): T[] {
  return shuffle(rng, items).slice(0, Math.max(0, Math.min(n, items.length)));
}
