// packages/variant-runtime/validate.ts
// Interpreter that walks a schema node tree and collects every mismatch.

import { match as patternMatch } from "ts-pattern";
import {
  type ArrayNode,
  type DUnionNode,
  Op,
  type RecordNode,
  type SchemaNode,
} from "../variant-spec/src/mod.ts";
import { DEFAULT_OPTIONS } from "./config.ts";

// Validation error with path context
export type ValidationError = {
  readonly path: string;
  readonly message: string;
};

// Path segment type for lazy path construction
type PathSegment = string | number;

type Sink = {
  readonly errors: ValidationError[];
  readonly maxErrors: number;
};

// Build path string from segments (only called on error)
function buildPath(segments: readonly PathSegment[]): string {
  let path = "";
  for (let i = 0; i < segments.length; i++) {
    const seg = segments[i];
    if (typeof seg === "number") {
      path += `[${seg}]`;
    } else {
      path += i === 0 ? seg : `.${seg}`;
    }
  }
  return path;
}

function report(sink: Sink, segments: readonly PathSegment[], message: string): void {
  if (sink.errors.length < sink.maxErrors) {
    sink.errors.push({ path: buildPath(segments), message });
  }
}

export function isPlainObject(
  value: unknown,
): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  return typeof value;
}

const quoteAll = (tags: readonly string[]): string =>
  tags.map((tag) => JSON.stringify(tag)).join(", ");

// DUNION tag map cache: tag → payload record, built on first use
const dunionCache = new WeakMap<DUnionNode, ReadonlyMap<string, RecordNode>>();

export function getVariantMap(node: DUnionNode): ReadonlyMap<string, RecordNode> {
  let map = dunionCache.get(node);
  if (!map) {
    map = new Map(
      node.variants.map((v): [string, RecordNode] => [v.tag, v.payload]),
    );
    dunionCache.set(node, map);
  }
  return map;
}

function collectArray(
  node: ArrayNode,
  value: unknown,
  segments: PathSegment[],
  sink: Sink,
): void {
  if (!Array.isArray(value)) {
    report(sink, segments, "expected array");
    return;
  }
  const items: readonly unknown[] = value;
  for (let i = 0; i < items.length; i++) {
    segments.push(i);
    collect(node.element, items[i], segments, sink);
    segments.pop();
  }
}

function collectRecord(
  node: RecordNode,
  value: unknown,
  segments: PathSegment[],
  sink: Sink,
): void {
  if (!isPlainObject(value)) {
    report(sink, segments, "expected object");
    return;
  }

  for (const prop of node.properties) {
    segments.push(prop.name);
    const present = Object.hasOwn(value, prop.name);
    const item = value[prop.name];
    if (!present) {
      if (!prop.optional) report(sink, segments, "required property missing");
    } else if (!(prop.optional && item === undefined)) {
      collect(prop.type, item, segments, sink);
    }
    segments.pop();
  }

  if (node.strict) {
    const known = new Set(node.properties.map((p) => p.name));
    for (const key of Object.keys(value)) {
      if (!known.has(key)) {
        segments.push(key);
        report(sink, segments, "excess property (not in schema)");
        segments.pop();
      }
    }
  }
}

function collectDUnion(
  node: DUnionNode,
  value: unknown,
  segments: PathSegment[],
  sink: Sink,
): void {
  if (!isPlainObject(value)) {
    report(sink, segments, "expected object for discriminated union");
    return;
  }

  const variants = getVariantMap(node);
  const tag = value[node.tagKey];
  segments.push(node.tagKey);
  if (typeof tag !== "string") {
    report(
      sink,
      segments,
      `expected string discriminant; expected one of: ${quoteAll([...variants.keys()])}`,
    );
    segments.pop();
    return;
  }
  const payload = variants.get(tag);
  if (!payload) {
    report(
      sink,
      segments,
      `unexpected tag ${JSON.stringify(tag)}; expected one of: ${quoteAll([...variants.keys()])}`,
    );
    segments.pop();
    return;
  }
  segments.pop();

  segments.push(node.payloadKey);
  if (Object.hasOwn(value, node.payloadKey)) {
    collect(payload, value[node.payloadKey], segments, sink);
  } else {
    report(sink, segments, "required property missing");
  }
  segments.pop();

  for (const key of Object.keys(value)) {
    if (key !== node.tagKey && key !== node.payloadKey) {
      segments.push(key);
      report(sink, segments, "excess property (not in schema)");
      segments.pop();
    }
  }
}

function collect(
  node: SchemaNode,
  value: unknown,
  segments: PathSegment[],
  sink: Sink,
): void {
  if (sink.errors.length >= sink.maxErrors) return;

  patternMatch(node)
    .with({ op: Op.STRING }, () => {
      if (typeof value !== "string") {
        report(sink, segments, `expected string, got ${kindOf(value)}`);
      }
    })
    .with({ op: Op.NUMBER }, () => {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        report(sink, segments, "expected finite number");
      }
    })
    .with({ op: Op.BOOLEAN }, () => {
      if (typeof value !== "boolean") report(sink, segments, "expected boolean");
    })
    .with({ op: Op.DATE }, () => {
      if (!(value instanceof Date)) {
        report(sink, segments, "expected Date");
      } else if (Number.isNaN(value.getTime())) {
        report(sink, segments, "invalid Date");
      }
    })
    .with({ op: Op.LITERAL }, (lit) => {
      if (value !== lit.value) {
        report(sink, segments, `expected literal ${JSON.stringify(lit.value)}`);
      }
    })
    .with({ op: Op.ARRAY }, (arr) => collectArray(arr, value, segments, sink))
    .with({ op: Op.RECORD }, (rec) => collectRecord(rec, value, segments, sink))
    .with({ op: Op.DUNION }, (du) => collectDUnion(du, value, segments, sink))
    .exhaustive();
}

/**
 * Validate a value against a schema node and collect ALL errors.
 * Stops collecting once `maxErrors` have been found.
 *
 * @example
 * const errors = validateAll(enc.rec([{ name: "title", type: enc.str() }]), {});
 * // [{ path: "title", message: "required property missing" }]
 */
export function validateAll(
  node: SchemaNode,
  value: unknown,
  maxErrors: number = DEFAULT_OPTIONS.maxErrors,
): ValidationError[] {
  const sink: Sink = { errors: [], maxErrors };
  collect(node, value, [], sink);
  return sink.errors;
}
