import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { Cause, Effect, Exit, LogLevel, Logger, Option } from "effect";
import { resolveConfig } from "./effect/config.js";
import type { GenerateError } from "./effect/errors.js";
import { FixtureSinkLive, generateVectors } from "./effect/index.js";

export type CliOptions = {
  seed?: number;
  lengths?: string;
  out?: string;
  registration?: string;
  template?: string;
  testName?: string;
  logLevel?: LogLevel.LogLevel;
};

const parseSeed = (value: string): number => {
  const seed = Number(value);
  if (value.trim() === "" || !Number.isInteger(seed)) {
    throw new InvalidArgumentError(`expected an integer, got '${value}'`);
  }
  return seed;
};

const parseLogLevel = (value: string): LogLevel.LogLevel => {
  const level = LogLevel.allLevels.find(
    (l) => l.label.toLowerCase() === value.toLowerCase()
  );
  if (!level) {
    const labels = LogLevel.allLevels.map((l) => l.label.toLowerCase());
    throw new InvalidArgumentError(`expected one of ${labels.join(", ")}`);
  }
  return level;
};

export const runGenerate = (options: CliOptions) =>
  resolveConfig(options).pipe(
    Effect.flatMap(generateVectors),
    Effect.provide(FixtureSinkLive),
    Effect.provide(Logger.pretty),
    Logger.withMinimumLogLevel(options.logLevel ?? LogLevel.Info)
  );

export const describeFailure = (cause: Cause.Cause<GenerateError>): string =>
  Option.match(Cause.failureOption(cause), {
    onNone: () => Cause.pretty(cause),
    onSome: (error) => error.message
  });

export const createCli = (): Command =>
  new Command()
    .name("dft-vectors")
    .description(
      "Write seeded DFT reference vectors and the test declarations that load them."
    )
    .option("-s, --seed <seed>", "seed for the normal sample source", parseSeed)
    .option(
      "-l, --lengths <list>",
      "a range (1..256), a list (2,4,8) or a preset (dense, factorizations)"
    )
    .option("-o, --out <dir>", "existing directory to write into")
    .option("-r, --registration <file>", "registration file name")
    .option(
      "-t, --template <template>",
      "declaration line with {tag}, {name}, {file} and {length} placeholders"
    )
    .option("-n, --test-name <template>", "test name with {tag} and {length}")
    .option("--log-level <level>", "minimum log level", parseLogLevel)
    .action(async (options: CliOptions) => {
      const exit = await Effect.runPromiseExit(runGenerate(options));
      if (Exit.isFailure(exit)) {
        console.error(chalk.red(describeFailure(exit.cause)));
        process.exitCode = 1;
      }
    });
