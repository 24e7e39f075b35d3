import { randomInt } from "node:crypto";
import { pickWith, type RandomSource } from "./prng.ts";

// Unbiased integer in [min, maxExclusive)
export function secureRandomInt(min: number, maxExclusive: number): number {
  const lo = Math.floor(min);
  const hi = Math.floor(maxExclusive);
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || hi <= lo) {
    throw new Error(`Invalid secureRandomInt range: [${min}, ${maxExclusive})`);
  }
  return randomInt(lo, hi);
}

export function createSecureRandom(): RandomSource {
  const api: RandomSource = {
    int: secureRandomInt,
    pick: <T,>(arr: readonly T[]) => pickWith(api, arr),
  };
  return api;
}
