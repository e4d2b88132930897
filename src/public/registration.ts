// Registration file: one declaration per length × direction × precision,
// in a fixed order so regenerated files diff cleanly.

import { fixtureFileName } from "./fixture.js";

export type Direction = "forward" | "inverse";
export type Precision = "f32" | "f64";
export type VariantTag = `${Direction}_${Precision}`;

export const VARIANT_TAGS: readonly VariantTag[] = [
  "forward_f32",
  "inverse_f32",
  "forward_f64",
  "inverse_f64"
];

export const DEFAULT_DECLARATION_TEMPLATE =
  'generate_vector_test!{@{tag} {name}, "{file}"}';
export const DEFAULT_TEST_NAME = "{tag}_{length}";

export type RegistrationOptions = {
  /** Declaration line; `{tag}`, `{name}`, `{file}` and `{length}` are substituted. */
  template?: string;
  /** Test name; same placeholders as `template` except `{name}`. */
  testName?: string;
};

type Placeholders = {
  tag: VariantTag;
  length: string;
  file: string;
  name: string;
};

const fill = (template: string, values: Placeholders): string =>
  template.replace(
    /\{(tag|length|file|name)\}/g,
    (_, key: keyof Placeholders) => values[key]
  );

export const registrationLines = (
  lengths: readonly number[],
  options: RegistrationOptions = {}
): string[] => {
  const template = options.template ?? DEFAULT_DECLARATION_TEMPLATE;
  const testName = options.testName ?? DEFAULT_TEST_NAME;
  const lines: string[] = [];
  for (const length of lengths) {
    const base = {
      length: String(length),
      file: fixtureFileName(length),
      name: ""
    };
    for (const tag of VARIANT_TAGS) {
      const name = fill(testName, { ...base, tag });
      lines.push(fill(template, { ...base, tag, name }));
    }
  }
  return lines;
};

export const renderRegistration = (
  lengths: readonly number[],
  options: RegistrationOptions = {}
): string =>
  registrationLines(lengths, options)
    .map((line) => `${line}\n`)
    .join("");
