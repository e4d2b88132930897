import { Data } from "effect";

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

export class InvalidConfig extends Data.TaggedError("InvalidConfig")<{
  readonly message: string;
}> {}

export class InvalidLengthList extends Data.TaggedError("InvalidLengthList")<{
  readonly value: string;
  readonly message: string;
}> {
  static of(value: string | number, reason: string): InvalidLengthList {
    return new InvalidLengthList({
      value: String(value),
      message: `invalid length list: ${reason}`
    });
  }
}

export class SinkError extends Data.TaggedError("SinkError")<{
  readonly path: string;
  readonly cause: unknown;
  readonly message: string;
}> {
  static of(path: string, cause: unknown): SinkError {
    return new SinkError({
      path,
      cause,
      message: `cannot write ${path}: ${describeCause(cause)}`
    });
  }
}

export class FixtureWriteError extends Data.TaggedError("FixtureWriteError")<{
  readonly length: number;
  readonly path: string;
  readonly cause: unknown;
  readonly message: string;
}> {
  static of(length: number, path: string, cause: unknown): FixtureWriteError {
    return new FixtureWriteError({
      length,
      path,
      cause,
      message: `cannot write fixture for length ${length} to ${path}: ${describeCause(cause)}`
    });
  }
}

export class RegistrationWriteError extends Data.TaggedError(
  "RegistrationWriteError"
)<{
  readonly path: string;
  readonly cause: unknown;
  readonly message: string;
}> {
  static of(path: string, cause: unknown): RegistrationWriteError {
    return new RegistrationWriteError({
      path,
      cause,
      message: `cannot write registration file ${path}: ${describeCause(cause)}`
    });
  }
}

export type GenerateError =
  | InvalidConfig
  | InvalidLengthList
  | FixtureWriteError
  | RegistrationWriteError;
