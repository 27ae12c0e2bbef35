import type { AnyFunction, ClassTarget, SignatureDescriptor } from "./types.js";

/** Something that can be introspected: a plain function or a class. */
export type Definition = AnyFunction | ClassTarget;

/**
 * Supplies the raw parameter metadata of a definition.
 *
 * For a class, the descriptor is that of its constructor; `undefined` means
 * the shape is unknown (or the class declares no constructor).
 */
export interface Introspector {
  describe(definition: Definition): SignatureDescriptor | undefined;
}

const declaredSignatures = new WeakMap<Definition, SignatureDescriptor>();

/**
 * Attach a descriptor to a function or class by hand.
 *
 * @example
 * ```typescript
 * const area = declareSignature((w: number, h: number) => w * h, {
 *   params: ["w", "h"],
 *   types: { w: Number, h: Number },
 * });
 * ```
 */
export function declareSignature<T extends Definition>(
  definition: T,
  descriptor: SignatureDescriptor,
): T {
  declaredSignatures.set(definition, descriptor);
  return definition;
}

/** Look up a descriptor attached with {@link declareSignature}. */
export function getDeclaredSignature(definition: Definition): SignatureDescriptor | undefined {
  return declaredSignatures.get(definition);
}

/** Introspector that only knows hand-declared descriptors. */
export const explicitIntrospector: Introspector = {
  describe: getDeclaredSignature,
};

/** First introspector that describes the definition wins. */
export function chainIntrospectors(...introspectors: readonly Introspector[]): Introspector {
  return {
    describe(definition) {
      for (const introspector of introspectors) {
        const descriptor = introspector.describe(definition);
        if (descriptor) return descriptor;
      }
      return undefined;
    },
  };
}
