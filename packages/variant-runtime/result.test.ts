// packages/variant-runtime/result.test.ts

import { expect, test } from "vitest";
import { Result } from "./result.ts";
import { Ticket } from "./testing/variants.ts";

test("Result.map: transforms only successes", () => {
  expect(Result.map(Result.ok(2), (n: number) => n * 10)).toEqual({ ok: true, value: 20 });
  expect(Result.map(Result.err<number, string>("nope"), (n) => n * 10)).toEqual({
    ok: false,
    error: "nope",
  });
});

test("Result.andThen: short-circuits on the first error", () => {
  const half = (n: number): Result<number, string> =>
    n % 2 === 0 ? Result.ok(n / 2) : Result.err(`${n} is odd`);

  expect(Result.andThen(Result.andThen(Result.ok(8), half), half)).toEqual({
    ok: true,
    value: 2,
  });
  expect(Result.andThen(Result.andThen(Result.ok(6), half), half)).toEqual({
    ok: false,
    error: "3 is odd",
  });
});

test("Result.mapErr and unwrapOr", () => {
  const failed = Result.err<number, string>("boom");
  expect(Result.mapErr(failed, (e) => e.length)).toEqual({ ok: false, error: 4 });
  expect(Result.unwrapOr(failed, 0)).toBe(0);
  expect(Result.unwrapOr(Result.ok(5), 0)).toBe(5);
});

test("Result: composes with constructSafe", () => {
  const price = Result.map(
    Ticket.constructSafe("Economy", { departure: "OSL", arrival: "BCN", price: 120 }),
    (ticket) => ticket.payload.price,
  );
  expect(Result.unwrapOr(price, -1)).toBe(120);
});
