import { type ComplexArray, createComplexArray, dft } from "../core/dft.js";
import type { NormalSource } from "../core/random.js";

export type TestVector = {
  length: number;
  input: ComplexArray;
  output: ComplexArray;
};

/**
 * Draws `length` complex samples: for each index in increasing order, the
 * real part first, then the imaginary part.
 */
export const generateSequence = (
  length: number,
  normal: NormalSource
): ComplexArray => {
  if (!Number.isInteger(length) || length < 1) {
    throw new Error(`Sequence length must be a positive integer, got ${length}`);
  }
  const out = createComplexArray(length);
  for (let i = 0; i < length; i += 1) {
    out.real[i] = normal.next();
    out.imag[i] = normal.next();
  }
  return out;
};

export const buildTestVector = (
  length: number,
  normal: NormalSource
): TestVector => {
  const input = generateSequence(length, normal);
  return { length, input, output: dft(input) };
};
