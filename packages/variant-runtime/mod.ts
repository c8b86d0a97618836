// packages/variant-runtime/mod.ts
export { Op } from "../variant-spec/src/mod.ts";
export type { DUnionNode, RecordNode, SchemaNode } from "../variant-spec/src/mod.ts";

// ============================================================================
// Fields
// ============================================================================

export { t } from "./builders.ts";
export {
  ArrayField,
  BooleanField,
  DateField,
  Field,
  isElementField,
  LiteralField,
  NumberField,
  OptionalField,
  RecordField,
  StringField,
} from "./field.ts";
export type { ElementField, FieldKind, FieldSchema, Infer, Payload } from "./field.ts";

// ============================================================================
// Variant sets
// ============================================================================

export { define, VARIANT_SET } from "./variant-set.ts";
export type {
  Handlers,
  Instance,
  Matcher,
  MatchMode,
  Owned,
  PartialHandlers,
  PayloadOf,
  Tag,
  Variant,
  VariantSchemas,
  VariantSet,
} from "./variant-set.ts";
export { assertNever, construct, match, matchPartial } from "./match.ts";
export type { HandlerResult } from "./match.ts";
export { fromDescriptor, loadVariantSet } from "./descriptor.ts";
export type {
  FieldDescriptor,
  PrimitiveDescriptor,
  VariantSetDescriptor,
} from "./descriptor.ts";

// ============================================================================
// Errors, results, configuration
// ============================================================================

export {
  FieldValidationError,
  ForeignInstanceError,
  formatErrors,
  InvalidDefinitionError,
  NonExhaustiveMatchError,
  SchemaMismatchError,
  toVariantError,
  UnknownVariantError,
  VariantError,
} from "./errors.ts";
export type { ConstructionFailure, VariantErrorCode } from "./errors.ts";
export { Result } from "./result.ts";
export { DEFAULT_OPTIONS } from "./config.ts";
export type {
  ConstructEvent,
  ResolvedOptions,
  VariantHooks,
  VariantSetOptions,
} from "./config.ts";
export { observe } from "./observe.ts";

// ============================================================================
// Validation and introspection
// ============================================================================

export { validateAll } from "./validate.ts";
export type { ValidationError } from "./validate.ts";
export { formatNode, getVariants } from "./introspection.ts";
export type { FieldInfo, VariantInfo } from "./introspection.ts";
