// packages/variant-runtime/field.test.ts

import { expect, test } from "vitest";
import { t } from "./builders.ts";
import { FieldValidationError } from "./errors.ts";
import { isElementField, RecordField } from "./field.ts";
import type { ValidationError } from "./validate.ts";

test("t.string: validate returns the value or throws FieldValidationError", () => {
  expect(t.string().validate("Ada")).toBe("Ada");
  expect(() => t.number().validate("Ada")).toThrow(FieldValidationError);
  expect(() => t.number().validate("Ada")).toThrow(
    "Validation failed: expected finite number",
  );
});

test("t.strings: validateSafe reports element paths", () => {
  expect(t.strings().validateSafe(["a", "b"])).toEqual({
    ok: true,
    value: ["a", "b"],
  });
  expect(t.strings().validateSafe(["a", 1])).toEqual({
    ok: false,
    error: [{ path: "[1]", message: "expected string, got number" }],
  });
});

test("accepts: appends issues to the caller's list", () => {
  const errors: ValidationError[] = [];
  const field = t.record({ row: t.number(), letter: t.literal("A") });

  expect(field.accepts({ row: "1", letter: "B" }, errors)).toBe(false);
  expect(errors).toEqual([
    { path: "row", message: "expected finite number" },
    { path: "letter", message: 'expected literal "A"' },
  ]);
});

test("t.optional: undefined passes, other values go to the inner field", () => {
  const grade = t.optional(t.number());
  expect(grade.is(undefined)).toBe(true);
  expect(grade.is(4)).toBe(true);
  expect(grade.is("4")).toBe(false);
});

test("t.record: optional members may be left out", () => {
  const member = t.record({ name: t.string(), grade: t.optional(t.number()) });
  expect(member.is({ name: "Ann" })).toBe(true);
  expect(member.is({ name: "Ann", grade: 5 })).toBe(true);
  expect(member.is({ name: "Ann", grade: 5, house: "Red" })).toBe(false);
});

test("isElementField: only record members may be optional", () => {
  expect(isElementField(t.string())).toBe(true);
  expect(isElementField(t.optional(t.string()))).toBe(false);
  expect(t.array(t.record({ note: t.optional(t.string()) })).is([{}])).toBe(true);
});

test("describe: renders type text", () => {
  expect(t.strings().describe()).toBe("string[]");
  expect(t.optional(t.string()).describe()).toBe("string | undefined");
  expect(t.literal("window").describe()).toBe('"window"');
  expect(t.array(t.record({ x: t.number() })).describe()).toBe("{ x: number }[]");
  expect(
    t.record({ name: t.string(), grade: t.optional(t.number()) }).describe(),
  ).toBe("{ name: string; grade?: number }");
});

test("RecordField: shares one node per field schema object", () => {
  const fields = { title: t.string() };
  const first = new RecordField(fields);
  const second = new RecordField(fields);
  expect(first.node).toBe(second.node);
  expect(first.names).toEqual(["title"]);
  expect(first.kind).toBe("record");
});

test("toString: shows the described type", () => {
  expect(t.date().toString()).toBe("Field<Date>");
});
