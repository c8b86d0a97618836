// packages/variant-runtime/config.ts

import type { ConstructionFailure } from "./errors.ts";

export type ConstructEvent = {
  readonly variantSet: string;
  readonly tag: string;
};

/**
 * Observation hooks run after every construction attempt.
 * A hook that throws is reported on stderr and never changes the outcome.
 */
export type VariantHooks = {
  readonly onConstruct?: (event: ConstructEvent) => void;
  readonly onFailure?: (failure: ConstructionFailure) => void;
};

export type VariantSetOptions = {
  /** Used in error messages and hook events. */
  readonly name?: string;
  /** Cap on validation errors collected for one payload. */
  readonly maxErrors?: number;
  readonly hooks?: VariantHooks;
};

export type ResolvedOptions = {
  readonly name: string;
  readonly maxErrors: number;
  readonly hooks: VariantHooks;
};

export const DEFAULT_OPTIONS = {
  name: "VariantSet",
  maxErrors: 100,
} as const;

export function resolveOptions(options: VariantSetOptions = {}): ResolvedOptions {
  return {
    name: options.name ?? DEFAULT_OPTIONS.name,
    maxErrors: options.maxErrors ?? DEFAULT_OPTIONS.maxErrors,
    hooks: options.hooks ?? {},
  };
}
