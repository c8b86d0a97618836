// packages/variant-runtime/introspection.ts

import { match as patternMatch } from "ts-pattern";
import {
  type DUnionNode,
  Op,
  type RecordNode,
  type SchemaNode,
} from "../variant-spec/src/mod.ts";

export type FieldInfo = {
  readonly name: string;
  readonly type: string;
  readonly optional: boolean;
};

export type VariantInfo = {
  readonly tag: string;
  readonly fields: readonly FieldInfo[];
};

function formatRecord(node: RecordNode): string {
  if (node.properties.length === 0) return "{}";
  const props = node.properties.map((p) =>
    `${p.name}${p.optional ? "?" : ""}: ${formatNode(p.type)}`
  );
  return `{ ${props.join("; ")} }`;
}

/**
 * Render a node as TypeScript-like type text, e.g. `{ title: string; tags: string[] }`.
 */
export function formatNode(node: SchemaNode): string {
  return patternMatch<SchemaNode, string>(node)
    .with({ op: Op.STRING }, () => "string")
    .with({ op: Op.NUMBER }, () => "number")
    .with({ op: Op.BOOLEAN }, () => "boolean")
    .with({ op: Op.DATE }, () => "Date")
    .with({ op: Op.LITERAL }, (lit) => JSON.stringify(lit.value))
    .with({ op: Op.ARRAY }, ({ element }) => `${formatNode(element)}[]`)
    .with({ op: Op.RECORD }, (rec) => formatRecord(rec))
    .with({ op: Op.DUNION }, (du) =>
      du.variants
        .map((v) =>
          `{ ${du.tagKey}: ${JSON.stringify(v.tag)}; ${du.payloadKey}: ${formatRecord(v.payload)} }`
        )
        .join(" | "))
    .exhaustive();
}

export function getVariants(node: DUnionNode): VariantInfo[] {
  return node.variants.map((v) => ({
    tag: v.tag,
    fields: v.payload.properties.map((p) => ({
      name: p.name,
      type: formatNode(p.type),
      optional: p.optional,
    })),
  }));
}
