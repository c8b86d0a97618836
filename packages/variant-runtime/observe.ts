// packages/variant-runtime/observe.ts

import type { VariantHooks } from "./config.ts";
import { toVariantError } from "./errors.ts";

/**
 * Hooks that log every construction attempt under `label`.
 *
 * @example
 * ```ts
 * const Ticket = define({ ... }, { name: "Ticket", hooks: observe("checkout") });
 * // ✓ checkout: constructed Economy
 * // ✗ checkout: Ticket: unknown variant "Charter"; expected one of: "Economy", ...
 * ```
 */
export function observe(label: string): VariantHooks {
  return {
    onConstruct: (event) => {
      console.log(`✓ ${label}: constructed ${event.tag}`);
    },
    onFailure: (failure) => {
      console.error(`✗ ${label}: ${toVariantError(failure).message}`);
    },
  };
}
