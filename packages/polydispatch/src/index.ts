/**
 * polydispatch - Runtime multiple dispatch for JavaScript and TypeScript
 *
 * Register several implementations of one function and let each call pick
 * the first whose parameters accept its arguments, by count, by name and
 * by runtime type.
 *
 * ## Quick Start
 *
 * ```ts
 * import { overload, kw } from "polydispatch";
 *
 * const area = overload(function area(side) {
 *   return side * side;
 * }).add(function area(w, h) {
 *   return w * h;
 * });
 *
 * area(3);              // 9
 * area(3, 4);           // 12
 * area(kw({ w: 2, h: 5 })); // 10
 * ```
 *
 * Parameters are read from the function source; a trailing object pattern
 * (`{ unit, ...options }`) declares keyword-only parameters. Functions
 * whose source cannot be read take a hand-written signature through
 * `declareSignature` or the `signature` option.
 *
 * @module
 */

import {
  chainIntrospectors,
  createOverloadRegistry,
  explicitIntrospector,
  type AnyFunction,
  type FinalizeOptions,
  type Introspector,
  type OverloadedFunction,
  type OverloadRegistry,
  type OverloadRegistryOptions,
  type OverloadTarget,
  type RegisterOptions,
} from "@polydispatch/core";
import { createSourceIntrospector } from "@polydispatch/introspect";

// ============================================================================
// Core types and utilities
// ============================================================================

export * from "@polydispatch/core";
export * from "@polydispatch/introspect";

// ============================================================================
// Registries
// ============================================================================

export interface CreateRegistryOptions extends OverloadRegistryOptions {
  /** Treat a trailing object pattern as the keyword section (default: true) */
  keywordPattern?: boolean;
}

/**
 * The introspector used by default: hand-declared signatures first, then
 * the function source.
 */
export function createDefaultIntrospector(
  options: Pick<CreateRegistryOptions, "config" | "writer" | "keywordPattern"> = {},
): Introspector {
  return chainIntrospectors(explicitIntrospector, createSourceIntrospector(options));
}

/**
 * Create a registry that reads signatures from declarations and source.
 *
 * @example
 * ```ts
 * const registry = createRegistry({ keyOf: keyByName });
 * registry.register(function size(a) { ... });
 * registry.register(function size(a, b) { ... }); // same group
 * ```
 */
export function createRegistry(options: CreateRegistryOptions = {}): OverloadRegistry {
  const { keywordPattern, ...registryOptions } = options;
  return createOverloadRegistry({
    ...registryOptions,
    introspector:
      options.introspector ??
      createDefaultIntrospector({ config: options.config, writer: options.writer, keywordPattern }),
  });
}

/** The registry behind {@link overload} and {@link finalize}. */
export const defaultRegistry: OverloadRegistry = createRegistry();

// ============================================================================
// Entry points
// ============================================================================

/**
 * Start a new overloaded function from `target`. Add more overloads with
 * `.add()` on the returned handle.
 */
export function overload(target: OverloadTarget, options?: RegisterOptions): OverloadedFunction {
  return defaultRegistry.register(target, options);
}

/**
 * Re-expose an overloaded function under the name and doc of `wrapper`.
 * Pass the group's `key`, since the default registry does not group by
 * name.
 */
export function finalize(wrapper: AnyFunction, options: FinalizeOptions): OverloadedFunction {
  return defaultRegistry.finalize(wrapper, options);
}
