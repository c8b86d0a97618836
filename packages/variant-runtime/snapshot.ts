// packages/variant-runtime/snapshot.ts
// Schema-directed copy used to seal payloads: arrays and records come back
// frozen, dates are copied with their setters disabled. Keys the schema does not know are carried over
// unchanged so that validating the copy still reports them.

import { match as patternMatch } from "ts-pattern";
import { Op, type SchemaNode } from "../variant-spec/src/mod.ts";
import { getVariantMap, isPlainObject } from "./validate.ts";

const DATE_SETTERS: readonly string[] = Object.getOwnPropertyNames(Date.prototype)
  .filter((name) => name.startsWith("set"));

function readOnly(): never {
  throw new TypeError("Cannot modify a date held by a variant instance");
}

/** Copy of `date` whose `set*` methods throw. */
function frozenDate(date: Date): Date {
  const copy = new Date(date.getTime());
  for (const name of DATE_SETTERS) {
    Object.defineProperty(copy, name, { value: readOnly });
  }
  return Object.freeze(copy);
}

function copyEntries(
  value: Readonly<Record<string, unknown>>,
  typeOf: (key: string) => SchemaNode | undefined,
): Readonly<Record<string, unknown>> {
  return Object.freeze(
    Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, unknown] => {
        const type = typeOf(key);
        return [key, type ? snapshot(type, item) : item];
      }),
    ),
  );
}

export function snapshot(node: SchemaNode, value: unknown): unknown {
  return patternMatch<SchemaNode, unknown>(node)
    .with(
      { op: Op.STRING },
      { op: Op.NUMBER },
      { op: Op.BOOLEAN },
      { op: Op.LITERAL },
      () => value,
    )
    .with(
      { op: Op.DATE },
      () => (value instanceof Date ? frozenDate(value) : value),
    )
    .with({ op: Op.ARRAY }, ({ element }) => {
      if (!Array.isArray(value)) return value;
      const items: readonly unknown[] = value;
      return Object.freeze(items.map((item) => snapshot(element, item)));
    })
    .with({ op: Op.RECORD }, ({ properties }) => {
      if (!isPlainObject(value)) return value;
      const types = new Map(
        properties.map((p): [string, SchemaNode] => [p.name, p.type]),
      );
      return copyEntries(value, (key) => types.get(key));
    })
    .with({ op: Op.DUNION }, (du) => {
      if (!isPlainObject(value)) return value;
      const tag = value[du.tagKey];
      const payload = typeof tag === "string"
        ? getVariantMap(du).get(tag)
        : undefined;
      return copyEntries(
        value,
        (key) => (key === du.payloadKey ? payload : undefined),
      );
    })
    .exhaustive();
}
