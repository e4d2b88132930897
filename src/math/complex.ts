/**
 * Complex-vector helpers on the split-array representation.
 *
 * All functions operate on `ComplexArray` (`{ real, imag }` with Float64Array).
 * Arithmetic has two forms:
 *   - allocating:  `conj(a)` → new ComplexArray
 *   - in-place:    `conjInto(a, out)` → writes into `out`, returns `out`
 *
 * The pair helpers convert to and from the `[re, im]` form fixtures use.
 *
 * @module
 */

import type { ComplexArray } from "../core/dft.js";

export type ComplexPair = readonly [number, number];

// ── helpers ──────────────────────────────────────────────────────────

const len = (a: ComplexArray): number => a.real.length;

const alloc = (n: number): ComplexArray => ({
  real: new Float64Array(n),
  imag: new Float64Array(n),
});

// ── scale (scalar multiply) ──────────────────────────────────────────

/** Multiply every element by a real scalar, writing into `out`. */
export const scaleInto = (
  a: ComplexArray,
  s: number,
  out: ComplexArray,
): ComplexArray => {
  const n = len(a);
  for (let i = 0; i < n; i += 1) {
    out.real[i] = (a.real[i] ?? 0) * s;
    out.imag[i] = (a.imag[i] ?? 0) * s;
  }
  return out;
};

// ── conj (complex conjugate) ─────────────────────────────────────────

/** Element-wise complex conjugate: negate imaginary parts. */
export const conj = (a: ComplexArray): ComplexArray =>
  conjInto(a, alloc(len(a)));

export const conjInto = (a: ComplexArray, out: ComplexArray): ComplexArray => {
  const n = len(a);
  for (let i = 0; i < n; i += 1) {
    out.real[i] = a.real[i] ?? 0;
    out.imag[i] = -(a.imag[i] ?? 0);
  }
  return out;
};

// ── norms ────────────────────────────────────────────────────────────

/** Largest element magnitude, 0 for an empty array. */
export const maxMagnitude = (a: ComplexArray): number => {
  let max = 0;
  for (let i = 0; i < len(a); i += 1) {
    max = Math.max(max, Math.hypot(a.real[i] ?? 0, a.imag[i] ?? 0));
  }
  return max;
};

// ── pairs ────────────────────────────────────────────────────────────

export const toPairs = (a: ComplexArray): ComplexPair[] => {
  const pairs: ComplexPair[] = [];
  for (let i = 0; i < len(a); i += 1) {
    pairs.push([a.real[i] ?? 0, a.imag[i] ?? 0]);
  }
  return pairs;
};

export const fromPairs = (pairs: readonly ComplexPair[]): ComplexArray => {
  const out = alloc(pairs.length);
  pairs.forEach(([re, im], i) => {
    out.real[i] = re;
    out.imag[i] = im;
  });
  return out;
};
