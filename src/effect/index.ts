// Effect wiring: the file sink service and the generation program.

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Context, Effect, Layer } from "effect";
import { createNormalSource, createRng } from "../core/random.js";
import { encodeFixture, fixtureFileName } from "../public/fixture.js";
import { VARIANT_TAGS, renderRegistration } from "../public/registration.js";
import { buildTestVector } from "../xform/vectors.js";
import { type GeneratorConfig, validateLengths } from "./config.js";
import {
  FixtureWriteError,
  type InvalidLengthList,
  RegistrationWriteError,
  SinkError
} from "./errors.js";

export interface FixtureSinkService {
  write: (path: string, contents: string) => Effect.Effect<void, SinkError>;
}

export class FixtureSink extends Context.Tag("dft-vectors/FixtureSink")<
  FixtureSink,
  FixtureSinkService
>() {}

/** Writes each file whole; the target directory must already exist. */
export const FixtureSinkLive = Layer.succeed(FixtureSink, {
  write: (path, contents) =>
    Effect.tryPromise({
      try: () => writeFile(path, contents, "utf8"),
      catch: (cause) => SinkError.of(path, cause)
    })
} satisfies FixtureSinkService);

export type GenerationReport = {
  fixtures: { length: number; path: string }[];
  registrationPath: string;
  declarations: number;
};

export const generateVectors = (
  config: GeneratorConfig
): Effect.Effect<
  GenerationReport,
  InvalidLengthList | FixtureWriteError | RegistrationWriteError,
  FixtureSink
> =>
  Effect.gen(function* () {
    const lengths = yield* validateLengths(config.lengths);
    const sink = yield* FixtureSink;
    const normal = createNormalSource(createRng(config.seed));
    const fixtures: GenerationReport["fixtures"] = [];

    for (const length of lengths) {
      const vector = buildTestVector(length, normal);
      const path = join(config.outputDirectory, fixtureFileName(length));
      yield* sink
        .write(path, encodeFixture(vector))
        .pipe(
          Effect.mapError((error) =>
            FixtureWriteError.of(length, path, error.cause)
          )
        );
      yield* Effect.logDebug(`wrote ${path}`).pipe(
        Effect.annotateLogs("length", length)
      );
      fixtures.push({ length, path });
    }

    const registrationPath = join(
      config.outputDirectory,
      config.registrationFile
    );
    yield* sink
      .write(
        registrationPath,
        renderRegistration(lengths, {
          template: config.template,
          testName: config.testName
        })
      )
      .pipe(
        Effect.mapError((error) =>
          RegistrationWriteError.of(registrationPath, error.cause)
        )
      );

    const declarations = lengths.length * VARIANT_TAGS.length;
    yield* Effect.logInfo(
      `wrote ${fixtures.length} fixtures and ${declarations} declarations to ${config.outputDirectory}`
    ).pipe(Effect.annotateLogs("seed", config.seed));

    return { fixtures, registrationPath, declarations };
  });
