// packages/variant-runtime/match.ts
// Free-standing forms of the registry operations. Each resolves the owning
// set and delegates to it.

import { DEFAULT_OPTIONS } from "./config.ts";
import { ForeignInstanceError, NonExhaustiveMatchError } from "./errors.ts";
import type { Payload } from "./field.ts";
import { isPlainObject } from "./validate.ts";
import {
  type Handlers,
  type Instance,
  type Owned,
  type PartialHandlers,
  type Tag,
  type Variant,
  VARIANT_SET,
  type VariantSchemas,
  type VariantSet,
} from "./variant-set.ts";

/** Union of the handlers' return types. */
export type HandlerResult<H> = {
  [K in keyof H]: H[K] extends (...args: never[]) => infer R ? R : never;
}[keyof H];

function ownerOf<S extends VariantSchemas>(instance: Owned<S>): VariantSet<S> {
  const owner: VariantSet<S> | undefined = isPlainObject(instance)
    ? instance[VARIANT_SET]
    : undefined;
  if (!owner) throw new ForeignInstanceError(DEFAULT_OPTIONS.name);
  return owner;
}

export function construct<S extends VariantSchemas, K extends Tag<S>>(
  set: VariantSet<S>,
  tag: K,
  payload: Payload<S[K]>,
): Variant<S, K> {
  return set.construct(tag, payload);
}

/**
 * Exhaustive dispatch on an instance's variant.
 *
 * @example
 * ```ts
 * const label = match(session, {
 *   KeyNote: ({ title, speaker }) => `${title} by ${speaker}`,
 *   JointSession: ({ title, coSpeakers }) => `${title} with ${coSpeakers.join(", ")}`,
 * });
 * ```
 */
export function match<S extends VariantSchemas, H extends Handlers<S, unknown>>(
  instance: Owned<S>,
  handlers: H,
): HandlerResult<H>;
export function match<S extends VariantSchemas>(
  instance: Owned<S>,
  handlers: Handlers<S, unknown>,
): unknown {
  return ownerOf(instance).match(instance, handlers);
}

export function matchPartial<S extends VariantSchemas, R>(
  instance: Owned<S>,
  handlers: PartialHandlers<S, R>,
  otherwise: (instance: Instance<S>) => R,
): R {
  return ownerOf(instance).matchPartial(instance, handlers, otherwise);
}

/**
 * Closes a hand-written `switch` over `instance.type`. Reaching it at run
 * time means a variant was not handled.
 */
export function assertNever(value: never, variantSet: string = DEFAULT_OPTIONS.name): never {
  const seen: unknown = value;
  const tag = isPlainObject(seen) && typeof seen.type === "string"
    ? seen.type
    : String(seen);
  throw new NonExhaustiveMatchError(variantSet, [tag]);
}
