import { conj, scaleInto } from "../math/complex.js";

export type ComplexArray = {
  real: Float64Array;
  imag: Float64Array;
};

export const createComplexArray = (size: number, fill = 0): ComplexArray => {
  const real = new Float64Array(size);
  const imag = new Float64Array(size);
  if (fill !== 0) {
    real.fill(fill);
    imag.fill(fill);
  }
  return { real, imag };
};

export type TwiddleTable = {
  cos: Float64Array;
  sin: Float64Array;
};

/**
 * `exp(-2πi·r/size)` for every `r` in `0..size-1`.
 *
 * Quarter turns are stored exactly, so `1`, `-i`, `-1` and `i` carry no
 * rounding from `Math.cos` / `Math.sin`.
 */
export const buildTwiddles = (size: number): TwiddleTable => {
  const cos = new Float64Array(size);
  const sin = new Float64Array(size);
  for (let r = 0; r < size; r += 1) {
    if ((4 * r) % size === 0) {
      switch ((4 * r) / size) {
        case 0:
          cos[r] = 1;
          sin[r] = 0;
          break;
        case 1:
          cos[r] = 0;
          sin[r] = -1;
          break;
        case 2:
          cos[r] = -1;
          sin[r] = 0;
          break;
        default:
          cos[r] = 0;
          sin[r] = 1;
      }
      continue;
    }
    const angle = (-2 * Math.PI * r) / size;
    cos[r] = Math.cos(angle);
    sin[r] = Math.sin(angle);
  }
  return { cos, sin };
};

const checkInput = (input: ComplexArray, out: ComplexArray | undefined) => {
  const n = input.real.length;
  if (n === 0) {
    throw new Error("DFT size must be positive, got 0");
  }
  if (input.imag.length !== n) {
    throw new Error(
      `DFT input imag length ${input.imag.length} != real length ${n}`
    );
  }
  if (out && (out.real === input.real || out.imag === input.imag)) {
    throw new Error("DFT output must not alias its input.");
  }
  if (out && (out.real.length !== n || out.imag.length !== n)) {
    throw new Error(`DFT output length ${out.real.length} != size ${n}`);
  }
};

/**
 * Forward DFT by direct summation,
 * `y[k] = Σ_j x[j]·exp(-2πi·j·k/n)`.
 * O(n²); shares no code with a fast transform.
 */
export const dft = (input: ComplexArray, out?: ComplexArray): ComplexArray => {
  checkInput(input, out);
  const n = input.real.length;
  const result = out ?? createComplexArray(n);
  const { cos, sin } = buildTwiddles(n);

  for (let k = 0; k < n; k += 1) {
    let re = 0;
    let im = 0;
    for (let j = 0; j < n; j += 1) {
      const t = (j * k) % n;
      const wr = cos[t] ?? 0;
      const wi = sin[t] ?? 0;
      const xr = input.real[j] ?? 0;
      const xi = input.imag[j] ?? 0;
      re += xr * wr - xi * wi;
      im += xr * wi + xi * wr;
    }
    result.real[k] = re;
    result.imag[k] = im;
  }

  return result;
};

/** Inverse DFT, scaled by `1/n`, so `idft(dft(x)) ≈ x`. */
export const idft = (
  input: ComplexArray,
  out?: ComplexArray
): ComplexArray => {
  checkInput(input, out);
  const n = input.real.length;
  const spectrum = dft(conj(input));
  const result = out ?? createComplexArray(n);
  for (let i = 0; i < n; i += 1) {
    spectrum.imag[i] = -(spectrum.imag[i] ?? 0);
  }
  return scaleInto(spectrum, 1 / n, result);
};
