// packages/variant-runtime/observe.test.ts

import { afterEach, expect, test, vi } from "vitest";
import { observe } from "./observe.ts";
import { ticketSchemas } from "./testing/variants.ts";
import { define, type VariantSchemas } from "./variant-set.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

const Ticket = define<VariantSchemas>(ticketSchemas, {
  name: "Ticket",
  hooks: observe("checkout"),
});

test("observe: logs successful constructions", () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});

  Ticket.construct("Economy", { departure: "OSL", arrival: "BCN", price: 120 });

  expect(log.mock.calls).toEqual([["✓ checkout: constructed Economy"]]);
});

test("observe: logs failures with the error message", () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});

  const result = Ticket.constructSafe("Charter", {});

  expect(result.ok).toBe(false);
  expect(error.mock.calls).toEqual([[
    '✗ checkout: Ticket: unknown variant "Charter"; ' +
    'expected one of: "Economy", "BusinessEconomy", "Business"',
  ]]);
});

test("observe: schema mismatches include each path", () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});

  Ticket.constructSafe("Economy", { departure: "OSL", price: "cheap" });

  expect(error.mock.calls).toEqual([[
    '✗ checkout: Ticket: payload for "Economy" does not match its schema ' +
    "(arrival: required property missing; price: expected finite number)",
  ]]);
});
