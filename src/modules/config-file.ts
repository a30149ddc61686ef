/**
 * Configuration file loader
 * Reads `<programName>_config.ini` and validates it against the
 * configuration-file declarations
 */

import { readFile } from "fs/promises";
import { join } from "node:path";
import { parse } from "ini";
import { z } from "zod";
import { ConfigFileError, describeError } from "../utils/errors";
import type { OptionDeclaration, OptionValue } from "../types";

const TRUE_WORDS = ["true", "1", "yes", "on"];
const FALSE_WORDS = ["false", "0", "no", "off"];

const FlagSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .refine((s) => TRUE_WORDS.includes(s) || FALSE_WORDS.includes(s), {
      message: "Expected a boolean",
    })
    .transform((s) => TRUE_WORDS.includes(s)),
]);

const IntegerSchema = z.union([z.number(), z.string().trim()]).pipe(
  z.coerce.number().int(),
);

const StringSchema = z.union([
  z.string(),
  z.number().transform(String),
  z.boolean().transform(String),
]);

const StringsSchema = z.union([
  StringSchema.transform((s) => [s]),
  z.array(StringSchema),
]);

function schemaFor(
  declaration: OptionDeclaration,
): z.ZodType<OptionValue, z.ZodTypeDef, unknown> {
  switch (declaration.type) {
    case "flag":
      return FlagSchema;
    case "integer":
      return IntegerSchema;
    case "string":
      return StringSchema;
    case "strings":
      return StringsSchema;
  }
}

export interface ConfigFileResult {
  values: Map<string, OptionValue>;
  // Keys present in the file that no declaration matched
  ignored: string[];
}

export function configFilePath(programName: string, cwd: string): string {
  return join(cwd, `${programName}_config.ini`);
}

/**
 * Flatten INI sections into dotted keys, e.g. `[bus] rate=1` -> `bus.rate`
 */
function flatten(
  record: Record<string, unknown>,
  prefix = "",
): Map<string, unknown> {
  const flat = new Map<string, unknown>();

  for (const [key, value] of Object.entries(record)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (value !== null && typeof value === "object" && !Array.isArray(value)) {
      const nested = Object.fromEntries(Object.entries(value));
      for (const [nestedName, nestedValue] of flatten(nested, name)) {
        flat.set(nestedName, nestedValue);
      }
    } else {
      flat.set(name, value);
    }
  }

  return flat;
}

/**
 * Parse INI text. Throws ConfigFileError when a declared key holds a value
 * of the wrong type.
 */
export function parseConfigText(
  text: string,
  declarations: readonly OptionDeclaration[],
  path: string,
): ConfigFileResult {
  const parsed: Record<string, unknown> = parse(text);
  const entries = flatten(parsed);
  const values = new Map<string, OptionValue>();
  const problems: string[] = [];

  for (const declaration of declarations) {
    if (!entries.has(declaration.name)) continue;

    const result = schemaFor(declaration).safeParse(
      entries.get(declaration.name),
    );
    if (result.success) {
      values.set(declaration.name, result.data);
    } else {
      problems.push(`${declaration.name}: ${describeError(result.error)}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigFileError(path, problems.join("; "));
  }

  const declared = new Set(declarations.map((d) => d.name));
  const ignored = [...entries.keys()].filter((key) => !declared.has(key));

  return { values, ignored };
}

export async function loadConfigFile(
  path: string,
  declarations: readonly OptionDeclaration[],
): Promise<ConfigFileResult> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigFileError(path, describeError(error), { cause: error });
  }
  return parseConfigText(text, declarations, path);
}
