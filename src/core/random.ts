/**
 * Seeded random sources for fixture generation.
 *
 * The generator is an explicit object: whoever holds it owns the draw
 * order, so the same seed and the same sequence of calls always give the
 * same numbers.
 *
 * @module
 */

export const DEFAULT_SEED = 1234;

export interface SeededRng {
  readonly seed: number;
  /** Uniform integer in [0, 2³²). */
  nextUint32(): number;
  /** Uniform float in [0, 1) with 53 random bits. */
  nextDouble(): number;
}

/** mulberry32 over a 32-bit state. */
export const createRng = (seed: number): SeededRng => {
  let state = seed >>> 0;

  const nextUint32 = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return (t ^ (t >>> 14)) >>> 0;
  };

  const nextDouble = (): number => {
    const hi = nextUint32() >>> 5;
    const lo = nextUint32() >>> 6;
    return (hi * 67108864 + lo) / 9007199254740992;
  };

  return { seed: seed >>> 0, nextUint32, nextDouble };
};

export interface NormalSource {
  /** Standard normal draw. */
  next(): number;
}

/**
 * Marsaglia polar method. Each accepted point gives two normals; the
 * second is returned by the following call.
 */
export const createNormalSource = (rng: SeededRng): NormalSource => {
  let spare: number | null = null;

  const next = (): number => {
    if (spare !== null) {
      const value = spare;
      spare = null;
      return value;
    }
    let x1 = 0;
    let x2 = 0;
    let r2 = 0;
    do {
      x1 = 2 * rng.nextDouble() - 1;
      x2 = 2 * rng.nextDouble() - 1;
      r2 = x1 * x1 + x2 * x2;
    } while (r2 >= 1 || r2 === 0);
    const f = Math.sqrt((-2 * Math.log(r2)) / r2);
    spare = f * x1;
    return f * x2;
  };

  return { next };
};
