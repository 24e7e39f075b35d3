/** Source of uniform integers; the opponent draws its moves and promotions from one. */
export interface RandomSource {
  int(min: number, maxExclusive: number): number;
  pick<T>(arr: readonly T[]): T;
}

export function pickWith<T>(source: Pick<RandomSource, "int">, arr: readonly T[]): T {
  if (arr.length === 0) throw new Error("pick() from empty array");
  return arr[source.int(0, arr.length)];
}

// FNV-1a, so string seeds such as "test-seed" map to a 32-bit state.
function hashSeed(seed: number | string): number {
  if (typeof seed === "number") return seed >>> 0;
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(h ^ seed.charCodeAt(i), 0x01000193);
  }
  return h >>> 0;
}

/**
 * Seeded Mulberry32 stream. Replays the same opponent game for the same seed,
 * which is what tests and `CHESS_SEED` rely on.
 */
export function createPrng(seed: number | string): RandomSource {
  let state = hashSeed(seed);

  function nextUint32(): number {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  const source: RandomSource = {
    int(min, maxExclusive) {
      const lo = Math.floor(min);
      const span = Math.floor(maxExclusive) - lo;
      if (!Number.isFinite(span) || span <= 0) return lo;
      return lo + (nextUint32() % span);
    },
    pick: (arr) => pickWith(source, arr),
  };
  return source;
}
