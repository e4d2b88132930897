export {
  type ComplexArray,
  type TwiddleTable,
  buildTwiddles,
  createComplexArray,
  dft,
  idft
} from "./core/dft.js";
export {
  DEFAULT_SEED,
  type NormalSource,
  type SeededRng,
  createNormalSource,
  createRng
} from "./core/random.js";
export { type TestVector, buildTestVector, generateSequence } from "./xform/vectors.js";
export {
  type FixtureDocument,
  encodeFixture,
  fixtureFileName,
  toFixtureDocument
} from "./public/fixture.js";
export {
  DEFAULT_DECLARATION_TEMPLATE,
  DEFAULT_TEST_NAME,
  type Direction,
  type Precision,
  type RegistrationOptions,
  type VariantTag,
  VARIANT_TAGS,
  registrationLines,
  renderRegistration
} from "./public/registration.js";
export {
  type GeneratorConfig,
  type LengthPreset,
  LENGTH_PRESETS,
  decodeConfig,
  parseLengthList,
  resolveConfig,
  validateLengths
} from "./effect/config.js";
export * from "./effect/errors.js";
export {
  FixtureSink,
  FixtureSinkLive,
  type FixtureSinkService,
  type GenerationReport,
  generateVectors
} from "./effect/index.js";
