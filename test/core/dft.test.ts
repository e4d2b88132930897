import { describe, expect, it } from "vitest";
import {
  type ComplexArray,
  buildTwiddles,
  createComplexArray,
  dft,
  idft
} from "../../src/core/dft.js";
import { createNormalSource, createRng } from "../../src/core/random.js";
import { maxMagnitude } from "../../src/math/complex.js";
import { generateSequence } from "../../src/xform/vectors.js";
import { cx, expectCloseArray } from "../helpers.js";

const energy = (a: ComplexArray): number =>
  a.real.reduce((sum, re, i) => sum + re * re + (a.imag[i] ?? 0) ** 2, 0);

const randomInput = (n: number, seed = 99) =>
  generateSequence(n, createNormalSource(createRng(seed)));

describe("buildTwiddles", () => {
  it("stores quarter turns exactly", () => {
    const { cos, sin } = buildTwiddles(4);
    expect(Array.from(cos)).toEqual([1, 0, -1, 0]);
    expect(Array.from(sin)).toEqual([0, -1, 0, 1]);
  });

  it("uses exp(-2πi·r/n) off the quarter turns", () => {
    const { cos, sin } = buildTwiddles(8);
    expect(cos[1]).toBeCloseTo(Math.SQRT1_2, 15);
    expect(sin[1]).toBeCloseTo(-Math.SQRT1_2, 15);
    expect(cos[6]).toBe(0);
    expect(sin[6]).toBe(1);
  });
});

describe("dft", () => {
  it("is the identity for a single point", () => {
    const x = cx([0.3125], [-1.75]);
    const y = dft(x);
    expect(y.real[0]).toBe(0.3125);
    expect(y.imag[0]).toBe(-1.75);
  });

  it("is exactly sum and difference for two points", () => {
    const y = dft(cx([1.5, -0.75], [0.25, 2]));
    expect(Array.from(y.real)).toEqual([0.75, 2.25]);
    expect(Array.from(y.imag)).toEqual([2.25, -1.75]);
  });

  it("maps a delayed impulse to a unit phasor", () => {
    const y = dft(cx([0, 1, 0, 0], [0, 0, 0, 0]));
    expectCloseArray(y.real, [1, 0, -1, 0]);
    expectCloseArray(y.imag, [0, -1, 0, 1]);
  });

  it("puts a constant signal in the DC bin", () => {
    const y = dft(cx([2, 2, 2, 2, 2], [0, 0, 0, 0, 0]));
    expectCloseArray(y.real, [10, 0, 0, 0, 0], 1e-12);
    expectCloseArray(y.imag, [0, 0, 0, 0, 0], 1e-12);
  });

  for (const n of [3, 7, 12, 30]) {
    it(`matches the summation formula for n=${n}`, () => {
      const x = randomInput(n);
      const y = dft(x);
      const scale = maxMagnitude(x);
      for (let k = 0; k < n; k += 1) {
        let re = 0;
        let im = 0;
        for (let j = 0; j < n; j += 1) {
          const angle = (-2 * Math.PI * j * k) / n;
          const xr = x.real[j] ?? 0;
          const xi = x.imag[j] ?? 0;
          re += xr * Math.cos(angle) - xi * Math.sin(angle);
          im += xr * Math.sin(angle) + xi * Math.cos(angle);
        }
        expect(Math.abs((y.real[k] ?? 0) - re)).toBeLessThan(1e-9 * scale);
        expect(Math.abs((y.imag[k] ?? 0) - im)).toBeLessThan(1e-9 * scale);
      }
    });
  }

  it("preserves energy up to a factor of n", () => {
    const x = randomInput(64);
    const y = dft(x);
    expect(energy(y) / (64 * energy(x))).toBeCloseTo(1, 12);
  });

  it("writes into a provided output", () => {
    const x = cx([1, 2], [0, 0]);
    const out = createComplexArray(2);
    expect(dft(x, out)).toBe(out);
    expect(Array.from(out.real)).toEqual([3, -1]);
  });

  it("rejects empty, ragged and aliased input", () => {
    expect(() => dft(cx([], []))).toThrow("DFT size must be positive, got 0");
    expect(() => dft(cx([1, 2], [0]))).toThrow(
      "DFT input imag length 1 != real length 2"
    );
    const x = cx([1, 2], [0, 0]);
    expect(() => dft(x, x)).toThrow("DFT output must not alias its input.");
  });
});

describe("idft", () => {
  it("recovers the input of dft", () => {
    const x = randomInput(27, 5);
    const roundTrip = idft(dft(x));
    expectCloseArray(roundTrip.real, x.real, 1e-12);
    expectCloseArray(roundTrip.imag, x.imag, 1e-12);
  });

  it("scales by 1/n", () => {
    const x = idft(cx([4, 0, 0, 0], [0, 0, 0, 0]));
    expectCloseArray(x.real, [1, 1, 1, 1]);
    expectCloseArray(x.imag, [0, 0, 0, 0]);
  });
});
