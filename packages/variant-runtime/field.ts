// packages/variant-runtime/field.ts
// Field objects: the semantic type of one payload field, backed by a schema node.

import {
  enc,
  type Literal,
  type RecordNode,
  type SchemaNode,
} from "../variant-spec/src/mod.ts";
import { DEFAULT_OPTIONS } from "./config.ts";
import { FieldValidationError } from "./errors.ts";
import { formatNode } from "./introspection.ts";
import { Result } from "./result.ts";
import { type ValidationError, validateAll } from "./validate.ts";

export type FieldKind =
  | "string"
  | "number"
  | "boolean"
  | "date"
  | "literal"
  | "array"
  | "record"
  | "optional";

/**
 * Abstract base class for all fields.
 *
 * `accepts` is the single entry point into the validation interpreter; the
 * other checks are built on it.
 */
export abstract class Field<T = unknown> {
  /** Field kind discriminator */
  abstract readonly kind: FieldKind;

  /** Node the validation interpreter walks */
  abstract readonly node: SchemaNode;

  /**
   * Type guard that also reports why a value was rejected.
   * Issues are appended to `errors`, at most `maxErrors` of them.
   */
  accepts(
    value: unknown,
    errors: ValidationError[] = [],
    maxErrors: number = DEFAULT_OPTIONS.maxErrors,
  ): value is T {
    const found = validateAll(this.node, value, maxErrors);
    errors.push(...found);
    return found.length === 0;
  }

  is(value: unknown): value is T {
    return this.accepts(value);
  }

  /**
   * @throws FieldValidationError listing every issue
   */
  validate(value: unknown): T {
    const errors: ValidationError[] = [];
    if (this.accepts(value, errors)) return value;
    throw new FieldValidationError(errors);
  }

  validateSafe(value: unknown): Result<T, readonly ValidationError[]> {
    const errors: ValidationError[] = [];
    return this.accepts(value, errors) ? Result.ok(value) : Result.err(errors);
  }

  /** Type text, e.g. `string[]` */
  describe(): string {
    return formatNode(this.node);
  }

  toString(): string {
    return `Field<${this.describe()}>`;
  }
}

// ============================================================================
// Primitive fields
// ============================================================================

export class StringField extends Field<string> {
  readonly kind = "string" as const;
  readonly node = enc.str();
}

export class NumberField extends Field<number> {
  readonly kind = "number" as const;
  readonly node = enc.num();
}

export class BooleanField extends Field<boolean> {
  readonly kind = "boolean" as const;
  readonly node = enc.bool();
}

export class DateField extends Field<Date> {
  readonly kind = "date" as const;
  readonly node = enc.date();
}

export class LiteralField<T extends Literal = Literal> extends Field<T> {
  readonly kind = "literal" as const;
  readonly node: SchemaNode;
  readonly value: T;

  constructor(value: T) {
    super();
    this.value = value;
    this.node = enc.lit(value);
  }
}

// ============================================================================
// Composite fields
// ============================================================================

/** Any field but `OptionalField`: only record members may be absent. */
export type ElementField<T = unknown> = Field<T> & {
  readonly kind: Exclude<FieldKind, "optional">;
};

export function isElementField<T>(field: Field<T>): field is ElementField<T> {
  return field.kind !== "optional";
}

export class ArrayField<T = unknown> extends Field<readonly T[]> {
  readonly kind = "array" as const;
  readonly node: SchemaNode;
  readonly element: ElementField<T>;

  constructor(element: ElementField<T>) {
    super();
    this.element = element;
    this.node = enc.arr(element.node);
  }
}

/**
 * Marks a record field that may be absent. A present `undefined` counts as
 * absent.
 */
export class OptionalField<T = unknown> extends Field<T | undefined> {
  readonly kind = "optional" as const;
  readonly node: SchemaNode;
  readonly inner: Field<T>;

  constructor(inner: Field<T>) {
    super();
    this.inner = inner;
    this.node = inner.node;
  }

  override accepts(
    value: unknown,
    errors: ValidationError[] = [],
    maxErrors: number = DEFAULT_OPTIONS.maxErrors,
  ): value is T | undefined {
    return value === undefined || this.inner.accepts(value, errors, maxErrors);
  }

  override describe(): string {
    return `${this.inner.describe()} | undefined`;
  }
}

// ============================================================================
// Records
// ============================================================================

/** Named fields of one record, e.g. a variant's payload. */
export type FieldSchema = { readonly [name: string]: Field };

/** Value type of a field. */
export type Infer<F> = F extends Field<infer T> ? T : never;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type OptionalKeys<F extends FieldSchema> = {
  [K in keyof F]: F[K] extends OptionalField ? K : never;
}[keyof F];

type RequiredKeys<F extends FieldSchema> = Exclude<keyof F, OptionalKeys<F>>;

/**
 * Value type of a record of fields. Optional fields become optional keys.
 *
 * @example
 * Payload<{ name: StringField; grade: OptionalField<string> }>
 * // { readonly name: string; readonly grade?: string | undefined }
 */
export type Payload<F extends FieldSchema> = Simplify<
  & { readonly [K in RequiredKeys<F>]: Infer<F[K]> }
  & { readonly [K in OptionalKeys<F>]?: Infer<F[K]> }
>;

// one node per field schema object
const recordNodes = new WeakMap<FieldSchema, RecordNode>();

function recordNodeOf(fields: FieldSchema): RecordNode {
  let node = recordNodes.get(fields);
  if (!node) {
    node = enc.rec(
      Object.entries(fields).map(([name, field]) => ({
        name,
        type: field.node,
        optional: field.kind === "optional",
      })),
    );
    recordNodes.set(fields, node);
  }
  return node;
}

export class RecordField<F extends FieldSchema = FieldSchema> extends Field<Payload<F>> {
  readonly kind = "record" as const;
  readonly node: RecordNode;
  readonly fields: F;

  constructor(fields: F) {
    super();
    this.fields = fields;
    this.node = recordNodeOf(fields);
  }

  get names(): readonly string[] {
    return Object.keys(this.fields);
  }
}
