// Fixture files: one `<length>.json` per test vector.

import { type ComplexPair, toPairs } from "../math/complex.js";
import type { TestVector } from "../xform/vectors.js";

export type FixtureDocument = {
  x: ComplexPair[];
  y: ComplexPair[];
};

export const fixtureFileName = (length: number): string => `${length}.json`;

export const toFixtureDocument = (vector: TestVector): FixtureDocument => ({
  x: toPairs(vector.input),
  y: toPairs(vector.output)
});

const encodeNumber = (value: number): string => {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Fixture values must be finite, got ${value}`);
  }
  return String(value);
};

const encodePairs = (pairs: readonly ComplexPair[]): string =>
  `[${pairs
    .map(([re, im]) => `[${encodeNumber(re)}, ${encodeNumber(im)}]`)
    .join(", ")}]`;

/**
 * `{"x": [[re, im], ...], "y": [[re, im], ...]}` with every number in its
 * shortest round-trip form, so equal vectors always give equal bytes.
 */
export const encodeFixture = (vector: TestVector): string => {
  const { x, y } = toFixtureDocument(vector);
  return `{"x": ${encodePairs(x)}, "y": ${encodePairs(y)}}`;
};
