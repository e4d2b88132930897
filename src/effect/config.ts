import { Config, Effect, Schema } from "effect";
import { DEFAULT_SEED } from "../core/random.js";
import {
  DEFAULT_DECLARATION_TEMPLATE,
  DEFAULT_TEST_NAME
} from "../public/registration.js";
import { InvalidConfig, InvalidLengthList } from "./errors.js";

export type LengthPreset = "dense" | "factorizations";

export const LENGTH_PRESETS: Record<LengthPreset, readonly number[]> = {
  dense: Array.from({ length: 256 }, (_, i) => i + 1),
  factorizations: [
    // powers of 2
    2, 4, 8, 16, 32, 64, 128, 256,
    // powers of 3
    3, 9, 27, 81, 243,
    // mixed powers of 2 and 3
    6, 12, 18, 36, 54, 72, 108, 216
  ]
};

const isPreset = (text: string): text is LengthPreset =>
  Object.hasOwn(LENGTH_PRESETS, text);

export const DEFAULT_LENGTHS = "1..256";
export const DEFAULT_OUTPUT_DIRECTORY = "vectors";
export const DEFAULT_REGISTRATION_FILE = "generate_tests.rs";

export const GeneratorConfigSchema = Schema.Struct({
  seed: Schema.Int.pipe(Schema.between(0, 0xffffffff)),
  lengths: Schema.Array(Schema.Int),
  outputDirectory: Schema.NonEmptyString,
  registrationFile: Schema.NonEmptyString,
  template: Schema.String.pipe(
    Schema.filter((s) => s.includes("{name}") && s.includes("{file}"), {
      message: () => "template must contain {name} and {file}"
    })
  ),
  testName: Schema.String.pipe(
    Schema.filter((s) => s.includes("{tag}") && s.includes("{length}"), {
      message: () => "test name must contain {tag} and {length}"
    })
  )
});

export type GeneratorConfig = typeof GeneratorConfigSchema.Type;

/** Settings read from `DFT_VECTORS_*` environment variables. */
export const EnvConfig = Config.all({
  seed: Config.integer("DFT_VECTORS_SEED").pipe(
    Config.withDefault(DEFAULT_SEED)
  ),
  lengths: Config.string("DFT_VECTORS_LENGTHS").pipe(
    Config.withDefault(DEFAULT_LENGTHS)
  ),
  outputDirectory: Config.string("DFT_VECTORS_OUT").pipe(
    Config.withDefault(DEFAULT_OUTPUT_DIRECTORY)
  ),
  registrationFile: Config.string("DFT_VECTORS_REGISTRATION").pipe(
    Config.withDefault(DEFAULT_REGISTRATION_FILE)
  ),
  template: Config.string("DFT_VECTORS_TEMPLATE").pipe(
    Config.withDefault(DEFAULT_DECLARATION_TEMPLATE)
  ),
  testName: Config.string("DFT_VECTORS_TEST_NAME").pipe(
    Config.withDefault(DEFAULT_TEST_NAME)
  )
});

/**
 * Rejects empty lists, non-integers, lengths below 1 and duplicates,
 * naming the first offending value.
 */
export const validateLengths = (
  lengths: readonly number[]
): Effect.Effect<readonly number[], InvalidLengthList> =>
  Effect.suspend(() => {
    if (lengths.length === 0) {
      return Effect.fail(InvalidLengthList.of("", "no lengths given"));
    }
    const seen = new Set<number>();
    for (const length of lengths) {
      if (!Number.isInteger(length)) {
        return Effect.fail(
          InvalidLengthList.of(length, `${length} is not an integer`)
        );
      }
      if (length < 1) {
        return Effect.fail(
          InvalidLengthList.of(length, `length must be positive, got ${length}`)
        );
      }
      if (seen.has(length)) {
        return Effect.fail(
          InvalidLengthList.of(length, `duplicate length ${length}`)
        );
      }
      seen.add(length);
    }
    return Effect.succeed(lengths);
  });

const parseInteger = (token: string): Effect.Effect<number, InvalidLengthList> => {
  const trimmed = token.trim();
  return /^-?\d+$/.test(trimmed)
    ? Effect.succeed(Number(trimmed))
    : Effect.fail(
        InvalidLengthList.of(trimmed, `'${trimmed}' is not an integer`)
      );
};

/**
 * Parses `a..b` (inclusive range), `a,b,c`, a single integer, or a preset
 * name, then validates the result.
 */
export const parseLengthList = (
  text: string
): Effect.Effect<readonly number[], InvalidLengthList> =>
  Effect.gen(function* () {
    const trimmed = text.trim();
    if (isPreset(trimmed)) {
      return yield* validateLengths(LENGTH_PRESETS[trimmed]);
    }

    const range = /^([^.]*)\.\.([^.]*)$/.exec(trimmed);
    if (range) {
      const start = yield* parseInteger(range[1] ?? "");
      const end = yield* parseInteger(range[2] ?? "");
      if (end < start) {
        return yield* Effect.fail(
          InvalidLengthList.of(trimmed, `range ${start}..${end} is empty`)
        );
      }
      const lengths: number[] = [];
      for (let n = start; n <= end; n += 1) {
        lengths.push(n);
      }
      return yield* validateLengths(lengths);
    }

    const lengths: number[] = [];
    for (const token of trimmed === "" ? [] : trimmed.split(",")) {
      lengths.push(yield* parseInteger(token));
    }
    return yield* validateLengths(lengths);
  });

export const decodeConfig = (
  input: unknown
): Effect.Effect<GeneratorConfig, InvalidConfig> =>
  Schema.decodeUnknown(GeneratorConfigSchema)(input).pipe(
    Effect.mapError(
      (error) =>
        new InvalidConfig({ message: `invalid configuration: ${error.message}` })
    )
  );

export type ConfigOverrides = {
  seed?: number | undefined;
  lengths?: string | undefined;
  out?: string | undefined;
  registration?: string | undefined;
  template?: string | undefined;
  testName?: string | undefined;
};

/** Environment settings with `overrides` (command-line flags) on top. */
export const resolveConfig = (
  overrides: ConfigOverrides = {}
): Effect.Effect<GeneratorConfig, InvalidConfig | InvalidLengthList> =>
  Effect.gen(function* () {
    const env = yield* EnvConfig.pipe(
      Effect.mapError(
        (error) =>
          new InvalidConfig({
            message: `invalid environment configuration: ${String(error)}`
          })
      )
    );
    const lengths = yield* parseLengthList(overrides.lengths ?? env.lengths);
    return yield* decodeConfig({
      seed: overrides.seed ?? env.seed,
      lengths,
      outputDirectory: overrides.out ?? env.outputDirectory,
      registrationFile: overrides.registration ?? env.registrationFile,
      template: overrides.template ?? env.template,
      testName: overrides.testName ?? env.testName
    });
  });
