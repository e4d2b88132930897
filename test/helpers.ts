import { Effect, Layer, LogLevel, Logger } from "effect";
import { expect } from "vitest";
import type { ComplexArray } from "../src/core/dft.js";
import { SinkError } from "../src/effect/errors.js";
import { FixtureSink } from "../src/effect/index.js";
import type { FixtureDocument } from "../src/public/fixture.js";

export const cx = (re: number[], im: number[]): ComplexArray => ({
  real: Float64Array.from(re),
  imag: Float64Array.from(im)
});

export const expectCloseArray = (
  actual: ArrayLike<number>,
  expected: ArrayLike<number>,
  tol = 1e-12
) => {
  expect(actual.length).toBe(expected.length);
  for (let i = 0; i < actual.length; i += 1) {
    const a = actual[i] ?? 0;
    const e = expected[i] ?? 0;
    expect(Math.abs(a - e)).toBeLessThanOrEqual(tol);
  }
};

/**
 * In-memory stand-in for the file sink. `failOn` makes matching writes
 * fail the way a full disk would.
 */
export const memorySink = (failOn: (path: string) => boolean = () => false) => {
  const files = new Map<string, string>();
  const layer = Layer.succeed(FixtureSink, {
    write: (path, contents) =>
      failOn(path)
        ? Effect.fail(SinkError.of(path, new Error("disk full")))
        : Effect.sync(() => {
            files.set(path, contents);
          })
  });
  return { files, layer };
};

export const quiet = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Logger.withMinimumLogLevel(LogLevel.None));

export const readFixture = (
  files: ReadonlyMap<string, string>,
  path: string
): FixtureDocument => {
  const text = files.get(path);
  if (text === undefined) {
    throw new Error(`Missing fixture file: ${path}`);
  }
  return JSON.parse(text) as FixtureDocument;
};
