// src/types/rng.ts

/** A source of uniform floats in [0, 1), e.g. a seedrandom PRNG. */
export type RNG = () => number;
