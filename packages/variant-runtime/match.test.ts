// packages/variant-runtime/match.test.ts

import { expect, test } from "vitest";
import { NonExhaustiveMatchError } from "./errors.ts";
import { assertNever, construct, match, matchPartial } from "./match.ts";
import { caught, keynoteDate, LooseSession, Ticket } from "./testing/variants.ts";

const route = { departure: "OSL", arrival: "BCN", price: 120 };

test("construct: delegates to the set", () => {
  const economy = construct(Ticket, "Economy", route);
  expect(Ticket.is(economy)).toBe(true);
  expect(economy.payload).toEqual(route);
});

test("match: resolves the owning set from the instance", () => {
  const upgrade = construct(Ticket, "BusinessEconomy", { ...route, extraLegroom: true });

  const seat = match(upgrade, {
    Economy: () => "standard",
    BusinessEconomy: ({ extraLegroom }) => (extraLegroom ? "exit row" : "standard"),
    Business: () => "lie-flat",
  });

  expect(seat).toBe("exit row");
});

test("match: coverage is checked against the owning set", () => {
  const talk = construct(LooseSession, "KeyNote", {
    title: "WWDC",
    speaker: "Tim",
    date: keynoteDate,
    recorded: false,
  });

  expect(() => match(talk, { KeyNote: () => "keynote" })).toThrow(
    NonExhaustiveMatchError,
  );
});

test("matchPartial: otherwise receives the whole instance", () => {
  const business = construct(Ticket, "Business", {
    ...route,
    lounge: false,
    meals: [],
  });

  const label = matchPartial(
    business,
    { Economy: ({ price }) => `economy at ${price}` },
    (other) => `${other.type} from ${other.payload.departure}`,
  );

  expect(label).toBe("Business from OSL");
});

// ============================================================================
// assertNever
// ============================================================================

type Light = { type: "red" } | { type: "green" };

const isLight = (value: unknown): value is Light =>
  typeof value === "object" && value !== null && "type" in value;

function action(light: Light): string {
  switch (light.type) {
    case "red":
      return "stop";
    case "green":
      return "go";
    default:
      return assertNever(light, "Light");
  }
}

test("assertNever: unreachable for the declared variants", () => {
  expect(action({ type: "red" })).toBe("stop");
  expect(action({ type: "green" })).toBe("go");
});

test("assertNever: reports a variant the switch does not handle", () => {
  const amber: unknown = { type: "amber" };
  expect(isLight(amber)).toBe(true);
  if (!isLight(amber)) return;

  const err = caught(() => action(amber));

  expect(err).toBeInstanceOf(NonExhaustiveMatchError);
  if (err instanceof NonExhaustiveMatchError) {
    expect(err.missing).toEqual(["amber"]);
    expect(err.message).toBe('Light: non-exhaustive match; no handler for "amber"');
  }
});
