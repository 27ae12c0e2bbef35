/**
 * Core types for the polydispatch overload system
 */

// ============================================================================
// Callables
// ============================================================================

/**
 * Any plain function. Parameters are `never` so that every function type is
 * assignable; calls go through `Reflect.apply`.
 */
export type AnyFunction = (...args: never[]) => unknown;

/** A class that can be registered as an overload and invoked with `new`. */
export type ClassTarget = new (...args: never[]) => unknown;

/** A class usable as a type constraint (abstract classes included). */
export type TypeConstructor = abstract new (...args: never[]) => unknown;

/** Identity of a dispatch group. */
export type OverloadKey = string | symbol;

// ============================================================================
// Type Constraints
// ============================================================================

/**
 * A concrete runtime type: a name for messages plus a membership test.
 *
 * @example
 * ```typescript
 * const Positive = defineType("positive", (v) => typeof v === "number" && v > 0);
 * ```
 */
export interface RuntimeType {
  readonly name: string;
  is(value: unknown): boolean;
}

/**
 * A declared type: a class, a {@link RuntimeType}, or a string forward
 * reference resolved through a `TypeNamespace` (`"number"`, `"Point"`,
 * `"string | null"`).
 */
export type TypeRef = TypeConstructor | RuntimeType | string;

/** A declared annotation; an array is an ordered set of alternatives. */
export type TypeAnnotation = TypeRef | readonly TypeRef[];

/** A resolved constraint attached to a parameter. */
export type TypeConstraint =
  | { readonly kind: "single"; readonly type: RuntimeType }
  | { readonly kind: "union"; readonly types: readonly RuntimeType[] };

// ============================================================================
// Parameters
// ============================================================================

export type ParamKind =
  | "positional"
  | "positional-only"
  | "keyword-only"
  | "collect-positional"
  | "collect-keyword";

/** One declared parameter of a signature. */
export interface ParameterSpec {
  readonly name: string;
  readonly kind: ParamKind;
  readonly constraint?: TypeConstraint;
  readonly hasDefault: boolean;
  readonly defaultValue?: unknown;
}

/**
 * Raw parameter metadata for a callable, as supplied by an introspector or
 * written by hand.
 *
 * `defaults` align to the *end* of `params`: with `params: ["a", "b", "c"]`
 * and `defaults: [2, 3]`, `b` defaults to 2 and `c` to 3.
 */
export interface SignatureDescriptor {
  readonly name?: string;
  readonly doc?: string;
  readonly params: readonly string[];
  /** Number of leading `params` that may never be bound by keyword. */
  readonly positionalOnly?: number;
  readonly defaults?: readonly unknown[];
  /** Name of the parameter collecting extra positional arguments. */
  readonly rest?: string;
  readonly keywordOnly?: readonly string[];
  readonly keywordDefaults?: Readonly<Record<string, unknown>>;
  /** Name of the parameter collecting extra keyword arguments. */
  readonly restKeywords?: string;
  readonly types?: Readonly<Record<string, TypeAnnotation>>;
}

// ============================================================================
// Calls
// ============================================================================

/** A call split into positional and keyword arguments. */
export interface CallArguments {
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;
}

/**
 * The values an implementation is invoked with once a signature matched.
 *
 * `keywords` is present only when the signature declares keyword-only or
 * collect-keyword parameters.
 */
export interface BoundCall {
  readonly positional: readonly unknown[];
  readonly keywords?: Readonly<Record<string, unknown>>;
}

/** Result of trying one candidate during dispatch. */
export type CandidateOutcome =
  | { readonly kind: "matched"; readonly value: unknown }
  | { readonly kind: "rejected" }
  | { readonly kind: "failed"; readonly error: unknown };
