// packages/variant-runtime/descriptor.ts
// Variant sets declared in JSON.
//
// {
//   "name": "Ticket",
//   "variants": {
//     "Economy": { "departure": "string", "price": "number" },
//     "Student": { "courses": "string[]", "grade": { "optional": "string" } }
//   }
// }

import { readFile } from "node:fs/promises";
import { match as patternMatch, P } from "ts-pattern";
import type { Literal } from "../variant-spec/src/mod.ts";
import { t } from "./builders.ts";
import { DEFAULT_OPTIONS, type VariantSetOptions } from "./config.ts";
import { InvalidDefinitionError } from "./errors.ts";
import { type Field, isElementField } from "./field.ts";
import { isPlainObject, type ValidationError } from "./validate.ts";
import { define, type VariantSchemas, type VariantSet } from "./variant-set.ts";

export type PrimitiveDescriptor = "string" | "number" | "boolean" | "date";

export type FieldDescriptor =
  | PrimitiveDescriptor
  | `${PrimitiveDescriptor}[]`
  | { readonly array: FieldDescriptor }
  | { readonly record: { readonly [name: string]: FieldDescriptor } }
  | { readonly optional: FieldDescriptor }
  | { readonly literal: Literal };

export type VariantSetDescriptor = {
  readonly name?: string;
  readonly variants: {
    readonly [tag: string]: { readonly [field: string]: FieldDescriptor };
  };
};

const PRIMITIVES = new Map<string, () => Field>([
  ["string", () => t.string()],
  ["number", () => t.number()],
  ["boolean", () => t.boolean()],
  ["date", () => t.date()],
]);

const WRAPPERS = ["array", "record", "optional", "literal"];

const join = (path: string, key: string): string => (path ? `${path}.${key}` : key);

function isLiteral(value: unknown): value is Literal {
  return typeof value === "string" || typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value));
}

function recordFrom(
  desc: unknown,
  path: string,
  issues: ValidationError[],
): { [name: string]: Field } | undefined {
  if (!isPlainObject(desc)) {
    issues.push({ path, message: "expected object of field descriptors" });
    return undefined;
  }
  const fields: { [name: string]: Field } = {};
  for (const [name, item] of Object.entries(desc)) {
    const field = fieldFrom(item, join(path, name), issues);
    if (field) fields[name] = field;
  }
  return fields;
}

function arrayFrom(
  element: Field | undefined,
  path: string,
  issues: ValidationError[],
): Field | undefined {
  if (!element) return undefined;
  if (isElementField(element)) return t.array(element);
  issues.push({ path, message: "array elements cannot be optional" });
  return undefined;
}

function fieldFrom(
  desc: unknown,
  path: string,
  issues: ValidationError[],
): Field | undefined {
  const unsupported = (): undefined => {
    issues.push({
      path,
      message: `unsupported field descriptor ${JSON.stringify(desc)}`,
    });
    return undefined;
  };

  if (isPlainObject(desc) && Object.keys(desc).length !== 1) {
    issues.push({
      path,
      message: `expected exactly one of: ${WRAPPERS.join(", ")}`,
    });
    return undefined;
  }

  return patternMatch<unknown, Field | undefined>(desc)
    .with(P.string.endsWith("[]"), (s) => {
      return arrayFrom(fieldFrom(s.slice(0, -2), path, issues), path, issues);
    })
    .with(P.string, (s) => {
      const build = PRIMITIVES.get(s);
      return build ? build() : unsupported();
    })
    .with({ array: P._ }, ({ array }) => {
      const at = join(path, "array");
      return arrayFrom(fieldFrom(array, at, issues), at, issues);
    })
    .with({ optional: P._ }, ({ optional }) => {
      const inner = fieldFrom(optional, join(path, "optional"), issues);
      return inner ? t.optional(inner) : undefined;
    })
    .with({ record: P._ }, ({ record }) => {
      const fields = recordFrom(record, join(path, "record"), issues);
      return fields ? t.record(fields) : undefined;
    })
    .with({ literal: P._ }, ({ literal }) => {
      if (isLiteral(literal)) return t.literal(literal);
      issues.push({
        path: join(path, "literal"),
        message: "expected string, finite number or boolean",
      });
      return undefined;
    })
    .otherwise(unsupported);
}

/**
 * Build a variant set from a parsed descriptor. `options.name` wins over the
 * descriptor's own name.
 *
 * @throws InvalidDefinitionError listing every malformed entry
 */
export function fromDescriptor(
  json: unknown,
  options: VariantSetOptions = {},
): VariantSet<VariantSchemas> {
  const issues: ValidationError[] = [];
  const described = isPlainObject(json) ? json.name : undefined;
  if (described !== undefined && typeof described !== "string") {
    issues.push({ path: "name", message: "expected string" });
  }
  const name = options.name ??
    (typeof described === "string" ? described : DEFAULT_OPTIONS.name);

  if (!isPlainObject(json)) {
    throw new InvalidDefinitionError(name, [
      { path: "", message: "expected object" },
    ]);
  }

  const variants: { [tag: string]: { [name: string]: Field } } = {};
  const declared = json.variants;
  if (!isPlainObject(declared)) {
    issues.push({ path: "variants", message: "expected object of variants" });
  } else {
    for (const [tag, desc] of Object.entries(declared)) {
      const fields = recordFrom(desc, join("variants", tag), issues);
      if (fields) variants[tag] = fields;
    }
  }

  if (issues.length > 0) {
    throw new InvalidDefinitionError(name, issues);
  }
  return define<VariantSchemas>(variants, { ...options, name });
}

/**
 * Read a descriptor file and build its variant set.
 *
 * @example
 * ```ts
 * const Ticket = await loadVariantSet("./tickets.json");
 * ```
 */
export async function loadVariantSet(
  path: string,
  options: VariantSetOptions = {},
): Promise<VariantSet<VariantSchemas>> {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidDefinitionError(
      options.name ?? DEFAULT_OPTIONS.name,
      [{ path, message: `invalid JSON (${reason})` }],
      { cause: err },
    );
  }
  return fromDescriptor(json, options);
}
