// packages/variant-runtime/descriptor.test.ts

import { fileURLToPath } from "node:url";
import { expect, test } from "vitest";
import { fromDescriptor, loadVariantSet } from "./descriptor.ts";
import { InvalidDefinitionError, NonExhaustiveMatchError } from "./errors.ts";

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./testing/fixtures/${name}`, import.meta.url));

test("loadVariantSet: builds the set described in the file", async () => {
  const Ticket = await loadVariantSet(fixture("tickets.json"));

  expect(Ticket.name).toBe("Ticket");
  expect(Ticket.tags).toEqual(["Economy", "Business", "Student"]);
  expect(Ticket.describe()[2]).toEqual({
    tag: "Student",
    fields: [
      { name: "departure", type: "string", optional: false },
      { name: "arrival", type: "string", optional: false },
      { name: "price", type: "number", optional: false },
      { name: "school", type: "string", optional: true },
      { name: "seat", type: "{ row: number; letter: string }", optional: false },
    ],
  });
});

test("loadVariantSet: descriptor sets are checked at run time", async () => {
  const Ticket = await loadVariantSet(fixture("tickets.json"), { name: "Fare" });
  const business = Ticket.construct("Business", {
    departure: "OSL",
    arrival: "BCN",
    price: 900,
    lounge: true,
    meals: ["lunch"],
  });

  expect(Ticket.name).toBe("Fare");
  expect(
    Ticket.match(business, {
      Economy: () => 0,
      Business: () => 1,
      Student: () => 2,
    }),
  ).toBe(1);
  expect(() => Ticket.match(business, { Economy: () => 0, Business: () => 1 }))
    .toThrow(NonExhaustiveMatchError);
});

test("loadVariantSet: invalid JSON keeps the parser error as cause", async () => {
  const path = fixture("broken.json");
  const err = await loadVariantSet(path).then(
    () => undefined,
    (reason: unknown) => reason,
  );

  expect(err).toBeInstanceOf(InvalidDefinitionError);
  if (err instanceof InvalidDefinitionError) {
    expect(err.cause).toBeInstanceOf(SyntaxError);
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]?.path).toBe(path);
  }
});

test("fromDescriptor: array, optional and literal descriptors", () => {
  const Seat = fromDescriptor({
    name: "Seat",
    variants: {
      Window: { row: "number", side: { literal: "left" } },
      Aisle: { row: "number", tags: { array: "string" }, note: { optional: "string" } },
      Booked: { at: "date[]" },
    },
  });

  expect(Seat.describe().map((v) => v.fields.map((f) => f.type))).toEqual([
    ["number", '"left"'],
    ["number", "string[]", "string"],
    ["Date[]"],
  ]);
  expect(Seat.construct("Aisle", { row: 3, tags: [] }).payload).toEqual({
    row: 3,
    tags: [],
  });
});

test("fromDescriptor: lists every malformed entry", () => {
  let err: unknown;
  try {
    fromDescriptor({
      name: 7,
      variants: {
        A: {
          x: "strng",
          y: { array: "number", extra: 1 },
          z: { literal: null },
        },
        B: "string",
      },
    });
  } catch (e) {
    err = e;
  }

  expect(err).toBeInstanceOf(InvalidDefinitionError);
  if (err instanceof InvalidDefinitionError) {
    expect(err.variantSet).toBe("VariantSet");
    expect(err.issues).toEqual([
      { path: "name", message: "expected string" },
      { path: "variants.A.x", message: 'unsupported field descriptor "strng"' },
      {
        path: "variants.A.y",
        message: "expected exactly one of: array, record, optional, literal",
      },
      { path: "variants.A.z.literal", message: "expected string, finite number or boolean" },
      { path: "variants.B", message: "expected object of field descriptors" },
    ]);
  }
});

test("fromDescriptor: array elements cannot be optional", () => {
  let err: unknown;
  try {
    fromDescriptor({
      variants: { Seat: { tags: { array: { optional: "string" } } } },
    });
  } catch (e) {
    err = e;
  }

  expect(err).toBeInstanceOf(InvalidDefinitionError);
  if (err instanceof InvalidDefinitionError) {
    expect(err.issues).toEqual([
      { path: "variants.Seat.tags.array", message: "array elements cannot be optional" },
    ]);
  }
});

test("fromDescriptor: non-object input", () => {
  expect(() => fromDescriptor([], { name: "Empty" })).toThrow(
    "Empty: invalid definition (expected object)",
  );
  expect(() => fromDescriptor({ variants: {} })).toThrow(
    "VariantSet: invalid definition (a variant set needs at least one variant)",
  );
});
