// packages/variant-runtime/variant-set.ts
// Variant registry and dispatcher: closed sets of tagged records.

import { type DUnionNode, enc } from "../variant-spec/src/mod.ts";
import {
  type ConstructEvent,
  type ResolvedOptions,
  resolveOptions,
  type VariantHooks,
  type VariantSetOptions,
} from "./config.ts";
import {
  type ConstructionFailure,
  ForeignInstanceError,
  InvalidDefinitionError,
  NonExhaustiveMatchError,
  toVariantError,
  UnknownVariantError,
} from "./errors.ts";
import { Field, type FieldSchema, type Payload, RecordField } from "./field.ts";
import { getVariants, type VariantInfo } from "./introspection.ts";
import { Result } from "./result.ts";
import { snapshot } from "./snapshot.ts";
import { isPlainObject, type ValidationError, validateAll } from "./validate.ts";

// ============================================================================
// Types
// ============================================================================

/** Back-reference from an instance to the set that built it (non-enumerable). */
export const VARIANT_SET: unique symbol = Symbol("variantSet");

/** Variant name → payload fields. */
export type VariantSchemas = { readonly [tag: string]: FieldSchema };

export type Tag<S extends VariantSchemas> = keyof S & string;

export type PayloadOf<S extends VariantSchemas, K extends Tag<S>> = Payload<S[K]>;

export type Owned<S extends VariantSchemas> = {
  readonly [VARIANT_SET]: VariantSet<S>;
};

/** Instance of one particular variant. */
export type Variant<S extends VariantSchemas, K extends Tag<S>> = Owned<S> & {
  readonly type: K;
  readonly payload: Payload<S[K]>;
};

/**
 * Any instance of the set, discriminated on `type`:
 *
 * ```ts
 * switch (ticket.type) {
 *   case "Economy": return ticket.payload.price;
 *   ...
 *   default: return assertNever(ticket);
 * }
 * ```
 */
export type Instance<S extends VariantSchemas> = {
  [K in Tag<S>]: Variant<S, K>;
}[Tag<S>];

/** Exactly one handler per variant. */
export type Handlers<S extends VariantSchemas, R> = {
  readonly [K in Tag<S>]: (payload: Payload<S[K]>) => R;
};

export type PartialHandlers<S extends VariantSchemas, R> = {
  readonly [K in Tag<S>]?: (payload: Payload<S[K]>) => R;
};

export type MatchMode = "exhaustive" | "partial";

/**
 * Handler mapping that already passed its coverage check.
 */
export type Matcher<S extends VariantSchemas, R> = {
  readonly variantSet: VariantSet<S>;
  readonly mode: MatchMode;
  apply(instance: Owned<S>): R;
};

export interface VariantSet<S extends VariantSchemas> {
  readonly name: string;
  /** Declared variant names, in declaration order */
  readonly tags: readonly Tag<S>[];
  readonly schemas: S;
  /** Wire shape `{ type, payload }` of the whole set */
  readonly node: DUnionNode;

  has(tag: string): tag is Tag<S>;
  schemaOf<K extends Tag<S>>(tag: K): RecordField<S[K]>;

  /**
   * @throws UnknownVariantError when `tag` is not declared
   * @throws SchemaMismatchError when `payload` has missing, extra or mistyped fields
   */
  construct<K extends Tag<S>>(tag: K, payload: Payload<S[K]>): Variant<S, K>;
  constructSafe<K extends Tag<S>>(
    tag: K,
    payload: Payload<S[K]>,
  ): Result<Variant<S, K>, ConstructionFailure>;

  /** Build an instance from untrusted `{ type, payload }` data. */
  parse(value: unknown): Instance<S>;
  parseSafe(value: unknown): Result<Instance<S>, ConstructionFailure>;

  /** True only for instances built by this set. */
  is(value: unknown): value is Instance<S>;

  /**
   * Run the handler for the instance's variant.
   *
   * @throws UnknownVariantError when a handler key names an undeclared variant
   * @throws NonExhaustiveMatchError when a variant has no handler
   * @throws ForeignInstanceError when this set did not build `instance`
   */
  match<R>(instance: Owned<S>, handlers: Handlers<S, R>): R;

  /** Missing handlers fall through to `otherwise`. */
  matchPartial<R>(
    instance: Owned<S>,
    handlers: PartialHandlers<S, R>,
    otherwise: (instance: Instance<S>) => R,
  ): R;

  matcher<R>(handlers: Handlers<S, R>): Matcher<S, R>;
  partialMatcher<R>(
    handlers: PartialHandlers<S, R>,
    otherwise: (instance: Instance<S>) => R,
  ): Matcher<S, R>;

  /**
   * New, independent set with the extra variants. Instances of this set are
   * not members of the result.
   */
  extend<E extends VariantSchemas>(
    variants: E,
    options?: VariantSetOptions,
  ): VariantSet<S & E>;

  describe(): VariantInfo[];
}

// ============================================================================
// Implementation
// ============================================================================

// Per-instance dispatch, closed over the instance's own tag and payload.
type Dispatch<S extends VariantSchemas> = {
  readonly all: <R>(handlers: Handlers<S, R>) => R;
  readonly some: <R>(handlers: PartialHandlers<S, R>, fallback: () => R) => R;
};

function checkOptions(options: ResolvedOptions): ValidationError[] {
  const { maxErrors } = options;
  return Number.isSafeInteger(maxErrors) && maxErrors > 0
    ? []
    : [{ path: "maxErrors", message: `expected positive integer, got ${maxErrors}` }];
}

function checkDefinition(variants: unknown): ValidationError[] {
  if (!isPlainObject(variants)) {
    return [{ path: "", message: "expected object of variants" }];
  }
  const issues: ValidationError[] = [];
  const tags = Object.keys(variants);
  if (tags.length === 0) {
    issues.push({ path: "", message: "a variant set needs at least one variant" });
  }
  for (const tag of tags) {
    if (tag === "") {
      issues.push({ path: "", message: "variant name must not be empty" });
    }
    const fields = variants[tag];
    if (!isPlainObject(fields)) {
      issues.push({ path: tag, message: "expected object of fields" });
      continue;
    }
    for (const [name, field] of Object.entries(fields)) {
      if (!(field instanceof Field)) {
        issues.push({ path: `${tag}.${name}`, message: "expected a Field" });
      }
    }
  }
  return issues;
}

class VariantSetImpl<S extends VariantSchemas> implements VariantSet<S> {
  readonly name: string;
  readonly tags: readonly Tag<S>[];
  readonly schemas: S;
  readonly node: DUnionNode;

  private readonly options: ResolvedOptions;
  private readonly members = new WeakMap<object, Dispatch<S>>();

  constructor(variants: S, options: ResolvedOptions) {
    this.options = options;
    this.name = options.name;
    const schemas = { ...variants };
    Object.freeze(schemas);
    this.schemas = schemas;
    this.tags = Object.freeze(
      Object.keys(this.schemas).filter((tag): tag is Tag<S> => this.has(tag)),
    );
    this.node = enc.dunion(
      "type",
      "payload",
      this.tags.map((tag) => ({ tag, payload: this.schemaOf(tag).node })),
    );
    Object.freeze(this);
  }

  has(tag: string): tag is Tag<S> {
    return Object.hasOwn(this.schemas, tag);
  }

  schemaOf<K extends Tag<S>>(tag: K): RecordField<S[K]> {
    return new RecordField(this.schemas[tag]);
  }

  construct<K extends Tag<S>>(tag: K, payload: Payload<S[K]>): Variant<S, K> {
    const result = this.attempt(tag, payload);
    if (result.ok) return result.value;
    throw toVariantError(result.error);
  }

  constructSafe<K extends Tag<S>>(
    tag: K,
    payload: Payload<S[K]>,
  ): Result<Variant<S, K>, ConstructionFailure> {
    return this.attempt(tag, payload);
  }

  parse(value: unknown): Instance<S> {
    const result = this.parseSafe(value);
    if (result.ok) return result.value;
    throw toVariantError(result.error);
  }

  parseSafe(value: unknown): Result<Instance<S>, ConstructionFailure> {
    const tag = isPlainObject(value) ? value[this.node.tagKey] : undefined;
    if (typeof tag === "string" && !this.has(tag)) {
      return this.fail({
        type: "unknown_variant",
        variantSet: this.name,
        tag,
        expected: this.tags,
      });
    }
    const errors = validateAll(this.node, value, this.options.maxErrors);
    if (
      errors.length > 0 || !isPlainObject(value) ||
      typeof tag !== "string" || !this.has(tag)
    ) {
      return this.fail({
        type: "schema_mismatch",
        variantSet: this.name,
        tag: typeof tag === "string" ? tag : undefined,
        errors,
      });
    }
    return this.attempt(tag, value[this.node.payloadKey]);
  }

  is(value: unknown): value is Instance<S> {
    return typeof value === "object" && value !== null && this.members.has(value);
  }

  match<R>(instance: Owned<S>, handlers: Handlers<S, R>): R {
    this.checkHandlers(handlers, "exhaustive");
    return this.member(instance).all(handlers);
  }

  matchPartial<R>(
    instance: Owned<S>,
    handlers: PartialHandlers<S, R>,
    otherwise: (instance: Instance<S>) => R,
  ): R {
    this.checkHandlers(handlers, "partial");
    return this.dispatchPartial(instance, handlers, otherwise);
  }

  matcher<R>(handlers: Handlers<S, R>): Matcher<S, R> {
    this.checkHandlers(handlers, "exhaustive");
    const matcher: Matcher<S, R> = {
      variantSet: this,
      mode: "exhaustive",
      apply: (instance) => this.member(instance).all(handlers),
    };
    return Object.freeze(matcher);
  }

  partialMatcher<R>(
    handlers: PartialHandlers<S, R>,
    otherwise: (instance: Instance<S>) => R,
  ): Matcher<S, R> {
    this.checkHandlers(handlers, "partial");
    const matcher: Matcher<S, R> = {
      variantSet: this,
      mode: "partial",
      apply: (instance) => this.dispatchPartial(instance, handlers, otherwise),
    };
    return Object.freeze(matcher);
  }

  extend<E extends VariantSchemas>(
    variants: E,
    options: VariantSetOptions = {},
  ): VariantSet<S & E> {
    const clashes = Object.keys(variants).filter((tag) => this.has(tag));
    if (clashes.length > 0) {
      throw new InvalidDefinitionError(
        options.name ?? this.name,
        clashes.map((tag) => ({ path: tag, message: "variant already declared" })),
      );
    }
    return define({ ...this.schemas, ...variants }, {
      name: this.name,
      maxErrors: this.options.maxErrors,
      hooks: this.options.hooks,
      ...options,
    });
  }

  describe(): VariantInfo[] {
    return getVariants(this.node);
  }

  toString(): string {
    return `VariantSet<${this.name}: ${this.tags.join(" | ")}>`;
  }

  // --------------------------------------------------------------------------

  private attempt<K extends Tag<S>>(
    tag: K,
    payload: unknown,
  ): Result<Variant<S, K>, ConstructionFailure> {
    if (!this.has(tag)) {
      return this.fail({
        type: "unknown_variant",
        variantSet: this.name,
        tag,
        expected: this.tags,
      });
    }
    const schema = this.schemaOf(tag);
    const copy = snapshot(schema.node, payload);
    const errors: ValidationError[] = [];
    if (!schema.accepts(copy, errors, this.options.maxErrors)) {
      return this.fail({
        type: "schema_mismatch",
        variantSet: this.name,
        tag,
        errors,
      });
    }
    const instance = this.seal(tag, copy);
    const event: ConstructEvent = { variantSet: this.name, tag };
    this.notify("onConstruct", (hooks) => hooks.onConstruct?.(event));
    return Result.ok(instance);
  }

  private seal<K extends Tag<S>>(tag: K, payload: Payload<S[K]>): Variant<S, K> {
    const owner: VariantSet<S> = this;
    const instance = { type: tag, payload, [VARIANT_SET]: owner };
    Object.defineProperty(instance, VARIANT_SET, { enumerable: false });
    this.members.set(instance, {
      all: <R>(handlers: Handlers<S, R>): R => handlers[tag](payload),
      some: <R>(handlers: PartialHandlers<S, R>, fallback: () => R): R => {
        const handler: ((payload: Payload<S[K]>) => R) | undefined =
          Object.hasOwn(handlers, tag) ? handlers[tag] : undefined;
        return typeof handler === "function" ? handler(payload) : fallback();
      },
    });
    return Object.freeze(instance);
  }

  private member(value: unknown): Dispatch<S> {
    const dispatch = typeof value === "object" && value !== null
      ? this.members.get(value)
      : undefined;
    if (!dispatch) throw new ForeignInstanceError(this.name);
    return dispatch;
  }

  private dispatchPartial<R>(
    instance: Owned<S>,
    handlers: PartialHandlers<S, R>,
    otherwise: (instance: Instance<S>) => R,
  ): R {
    if (!this.is(instance)) throw new ForeignInstanceError(this.name);
    const member: Instance<S> = instance;
    return this.member(member).some(handlers, () => otherwise(member));
  }

  // Coverage is settled before any handler runs.
  private checkHandlers(
    handlers: Readonly<Record<string, unknown>>,
    mode: MatchMode,
  ): void {
    const unknown = Object.keys(handlers).filter((key) => !this.has(key));
    if (unknown.length > 0) {
      throw new UnknownVariantError(this.name, unknown, this.tags);
    }
    if (mode === "partial") return;
    // own keys only: a variant named "toString" is not handled by Object.prototype
    const missing = this.tags.filter(
      (tag) => !Object.hasOwn(handlers, tag) || typeof handlers[tag] !== "function",
    );
    if (missing.length > 0) {
      throw new NonExhaustiveMatchError(this.name, missing);
    }
  }

  private fail<T>(failure: ConstructionFailure): Result<T, ConstructionFailure> {
    this.notify("onFailure", (hooks) => hooks.onFailure?.(failure));
    return Result.err(failure);
  }

  private notify(
    hook: keyof VariantHooks,
    run: (hooks: VariantHooks) => void,
  ): void {
    try {
      run(this.options.hooks);
    } catch (err) {
      // a failing hook never changes the outcome
      console.error(`Variant hook error (${hook}):`, err);
    }
  }
}

/**
 * Declare a closed set of variants. The set is frozen; nothing can be
 * registered later (see `extend` for a new, larger set).
 *
 * @throws InvalidDefinitionError for an empty set, a variant whose schema is
 * not an object of fields, a field that is not a `Field`, or a `maxErrors`
 * that is not a positive integer
 *
 * @example
 * ```ts
 * const Ticket = define({
 *   Economy: { departure: t.string(), arrival: t.string(), price: t.string() },
 *   Business: { departure: t.string(), arrival: t.string(), price: t.string(), lounge: t.boolean() },
 * }, { name: "Ticket" });
 *
 * const ticket = Ticket.construct("Economy", { departure: "OSL", arrival: "BCN", price: "120" });
 * ```
 */
export function define<S extends VariantSchemas>(
  variants: S,
  options?: VariantSetOptions,
): VariantSet<S> {
  const resolved = resolveOptions(options);
  const issues = [...checkOptions(resolved), ...checkDefinition(variants)];
  if (issues.length > 0) {
    throw new InvalidDefinitionError(resolved.name, issues);
  }
  return new VariantSetImpl(variants, resolved);
}
