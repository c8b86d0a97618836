// packages/variant-spec/src/mod.ts
// Schema node spec for variant payloads. Nodes nest; every node carries its opcode.
export enum Op {
  // primitives & literals
  STRING,
  NUMBER,
  BOOLEAN,
  DATE,
  LITERAL,
  // composites
  ARRAY,
  RECORD,
  PROPERTY,
  // closed set of tagged records
  DUNION,
}

export type Literal = string | number | boolean;

export type StringNode = { readonly op: Op.STRING };
export type NumberNode = { readonly op: Op.NUMBER };
export type BooleanNode = { readonly op: Op.BOOLEAN };
export type DateNode = { readonly op: Op.DATE };
export type LiteralNode = { readonly op: Op.LITERAL; readonly value: Literal };

export type ArrayNode = { readonly op: Op.ARRAY; readonly element: SchemaNode };

export type PropertyNode = {
  readonly op: Op.PROPERTY;
  readonly name: string;
  readonly optional: boolean;
  readonly type: SchemaNode;
};

export type RecordNode = {
  readonly op: Op.RECORD;
  readonly strict: boolean;
  readonly properties: readonly PropertyNode[];
};

export type VariantNode = { readonly tag: string; readonly payload: RecordNode };

/**
 * Wire shape of a whole variant set: `{ [tagKey]: tag, [payloadKey]: {...} }`.
 */
export type DUnionNode = {
  readonly op: Op.DUNION;
  readonly tagKey: string;
  readonly payloadKey: string;
  readonly variants: readonly VariantNode[];
};

export type SchemaNode =
  | StringNode
  | NumberNode
  | BooleanNode
  | DateNode
  | LiteralNode
  | ArrayNode
  | RecordNode
  | DUnionNode;

export const enc = {
  str: (): StringNode => ({ op: Op.STRING }),
  num: (): NumberNode => ({ op: Op.NUMBER }),
  bool: (): BooleanNode => ({ op: Op.BOOLEAN }),
  date: (): DateNode => ({ op: Op.DATE }),
  lit: (value: Literal): LiteralNode => ({ op: Op.LITERAL, value }),

  arr: (element: SchemaNode): ArrayNode => ({ op: Op.ARRAY, element }),
  rec: (
    props: readonly { name: string; type: SchemaNode; optional?: boolean }[],
    strict = true,
  ): RecordNode => ({
    op: Op.RECORD,
    strict,
    properties: props.map((p) => ({
      op: Op.PROPERTY,
      name: p.name,
      optional: p.optional ?? false,
      type: p.type,
    })),
  }),
  dunion: (
    tagKey: string,
    payloadKey: string,
    variants: readonly VariantNode[],
  ): DUnionNode => ({ op: Op.DUNION, tagKey, payloadKey, variants }),
};
