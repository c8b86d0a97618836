// packages/variant-runtime/builders.ts
// Programmatic field builders for variant payload schemas

import type { Literal } from "../variant-spec/src/mod.ts";
import {
  ArrayField,
  BooleanField,
  DateField,
  type ElementField,
  type Field,
  type FieldSchema,
  LiteralField,
  NumberField,
  OptionalField,
  RecordField,
  StringField,
} from "./field.ts";

/**
 * Fluent API for declaring variant payloads.
 *
 * @example
 * ```ts
 * import { define, t } from "variant-runtime";
 *
 * const Session = define({
 *   KeyNote: { title: t.string(), speaker: t.string() },
 *   Workshop: { title: t.string(), seats: t.number(), notes: t.optional(t.string()) },
 * }, { name: "Session" });
 * ```
 */
export const t = {
  string(): StringField {
    return new StringField();
  },

  number(): NumberField {
    return new NumberField();
  },

  boolean(): BooleanField {
    return new BooleanField();
  },

  date(): DateField {
    return new DateField();
  },

  /**
   * Exact value, e.g. `t.literal("window")`.
   */
  literal<T extends Literal>(value: T): LiteralField<T> {
    return new LiteralField(value);
  },

  array<T>(element: ElementField<T>): ArrayField<T> {
    return new ArrayField(element);
  },

  /** Shorthand for `t.array(t.string())`. */
  strings(): ArrayField<string> {
    return new ArrayField(new StringField());
  },

  /**
   * Nested record. Closed like a payload: extra keys are rejected.
   */
  record<F extends FieldSchema>(fields: F): RecordField<F> {
    return new RecordField(fields);
  },

  /** Record member that may be left out. Not accepted by `t.array`. */
  optional<T>(inner: Field<T>): OptionalField<T> {
    return new OptionalField(inner);
  },
};
