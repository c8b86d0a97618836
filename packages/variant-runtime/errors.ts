// packages/variant-runtime/errors.ts
// Contract violations raised by the registry and dispatcher. None are retried.

import { match as patternMatch } from "ts-pattern";
import type { ValidationError } from "./validate.ts";

export type VariantErrorCode =
  | "SchemaMismatch"
  | "UnknownVariant"
  | "NonExhaustiveMatch"
  | "InvalidDefinition"
  | "ForeignInstance";

const quoteAll = (tags: readonly string[]): string =>
  tags.map((tag) => JSON.stringify(tag)).join(", ");

export function formatErrors(errors: readonly ValidationError[]): string {
  return errors
    .map((e) => (e.path ? `${e.path}: ${e.message}` : e.message))
    .join("; ");
}

const describeSubject = (tag: string | undefined): string =>
  tag === undefined ? "value" : `payload for ${JSON.stringify(tag)}`;

export abstract class VariantError extends Error {
  abstract readonly code: VariantErrorCode;
  /** Name of the variant set the violation was detected in. */
  readonly variantSet: string;

  constructor(variantSet: string, message: string, options?: ErrorOptions) {
    super(`${variantSet}: ${message}`, options);
    this.variantSet = variantSet;
  }
}

export class SchemaMismatchError extends VariantError {
  readonly code = "SchemaMismatch" as const;
  /** Undefined when the value carried no usable tag. */
  readonly tag: string | undefined;
  readonly errors: readonly ValidationError[];

  constructor(
    variantSet: string,
    tag: string | undefined,
    errors: readonly ValidationError[],
  ) {
    super(
      variantSet,
      `${describeSubject(tag)} does not match its schema (${formatErrors(errors)})`,
    );
    this.name = "SchemaMismatchError";
    this.tag = tag;
    this.errors = errors;
  }
}

export class UnknownVariantError extends VariantError {
  readonly code = "UnknownVariant" as const;
  /** Offending tags, in the order they were found. */
  readonly tags: readonly string[];
  readonly expected: readonly string[];

  constructor(variantSet: string, tags: readonly string[], expected: readonly string[]) {
    super(
      variantSet,
      `unknown variant ${quoteAll(tags)}; expected one of: ${quoteAll(expected)}`,
    );
    this.name = "UnknownVariantError";
    this.tags = tags;
    this.expected = expected;
  }
}

export class NonExhaustiveMatchError extends VariantError {
  readonly code = "NonExhaustiveMatch" as const;
  readonly missing: readonly string[];

  constructor(variantSet: string, missing: readonly string[]) {
    super(variantSet, `non-exhaustive match; no handler for ${quoteAll(missing)}`);
    this.name = "NonExhaustiveMatchError";
    this.missing = missing;
  }
}

export class InvalidDefinitionError extends VariantError {
  readonly code = "InvalidDefinition" as const;
  readonly issues: readonly ValidationError[];

  constructor(variantSet: string, issues: readonly ValidationError[], options?: ErrorOptions) {
    super(variantSet, `invalid definition (${formatErrors(issues)})`, options);
    this.name = "InvalidDefinitionError";
    this.issues = issues;
  }
}

export class ForeignInstanceError extends VariantError {
  readonly code = "ForeignInstance" as const;

  constructor(variantSet: string) {
    super(variantSet, "value was not constructed by this variant set");
    this.name = "ForeignInstanceError";
  }
}

/**
 * Thrown by `Field.validate`. A bare field belongs to no variant set.
 */
export class FieldValidationError extends Error {
  readonly errors: readonly ValidationError[];

  constructor(errors: readonly ValidationError[]) {
    super(`Validation failed: ${formatErrors(errors)}`);
    this.name = "FieldValidationError";
    this.errors = errors;
  }
}

// ============================================================================
// Construction failures (Result form)
// ============================================================================

export type ConstructionFailure =
  | {
    readonly type: "schema_mismatch";
    readonly variantSet: string;
    readonly tag: string | undefined;
    readonly errors: readonly ValidationError[];
  }
  | {
    readonly type: "unknown_variant";
    readonly variantSet: string;
    readonly tag: string;
    readonly expected: readonly string[];
  };

export function toVariantError(failure: ConstructionFailure): VariantError {
  return patternMatch<ConstructionFailure, VariantError>(failure)
    .with(
      { type: "schema_mismatch" },
      (f) => new SchemaMismatchError(f.variantSet, f.tag, f.errors),
    )
    .with(
      { type: "unknown_variant" },
      (f) => new UnknownVariantError(f.variantSet, [f.tag], f.expected),
    )
    .exhaustive();
}
