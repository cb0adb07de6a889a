// src/util/rng.ts
import seedrandom from "seedrandom";
import type { RNG } from "../types/rng.js";

/**
 * Create a seeded random number generator.
 */
export function createRng(seed: number | string): RNG {
  return seedrandom(String(seed));
}

/**
 * Pick a random integer in [min, max] inclusive.
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * Pick a random element from an array.
 */
export function randomPick<T>(rng: RNG, arr: readonly T[]): T {
  const picked = arr[Math.floor(rng() * arr.length)];
  if (picked === undefined) {
    throw new Error("Cannot pick from empty array");
  }
  return picked;
}
