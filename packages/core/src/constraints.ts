/**
 * Runtime type constraints
 *
 * Declared annotations (classes, runtime types and string forward
 * references) are resolved once, when a signature is built, into
 * {@link TypeConstraint}s that dispatch tests values against.
 */

import { UnresolvedTypeError } from "./errors.js";
import type {
  RuntimeType,
  TypeAnnotation,
  TypeConstraint,
  TypeConstructor,
  TypeRef,
} from "./types.js";

/** Define a runtime type from a membership test. */
export function defineType(name: string, is: (value: unknown) => boolean): RuntimeType {
  return { name, is };
}

/** Integral numbers. */
export const Int: RuntimeType = defineType(
  "int",
  (value) => typeof value === "number" && Number.isInteger(value),
);

const isNullish = (value: unknown): boolean => value === null || value === undefined;

/**
 * Runtime type for a class. The primitive wrapper classes match their
 * primitives, `Array` uses `Array.isArray`, and `Object` matches every
 * non-nullish value.
 */
export function typeOfConstructor(ctor: TypeConstructor): RuntimeType {
  switch (ctor) {
    case Number:
      return defineType("number", (v) => typeof v === "number" || v instanceof Number);
    case String:
      return defineType("string", (v) => typeof v === "string" || v instanceof String);
    case Boolean:
      return defineType("boolean", (v) => typeof v === "boolean" || v instanceof Boolean);
    case Function:
      return defineType("function", (v) => typeof v === "function");
    case Array:
      return defineType("Array", (v) => Array.isArray(v));
    case Object:
      return defineType("Object", (v) => !isNullish(v));
    default:
      return defineType(ctor.name || "<anonymous class>", (v) => v instanceof ctor);
  }
}

/** Names that resolve to "no constraint". */
const UNCONSTRAINED_NAMES = new Set(["any", "unknown"]);

const BUILTIN_TYPES: ReadonlyArray<readonly [string, RuntimeType]> = [
  ["number", typeOfConstructor(Number)],
  ["string", typeOfConstructor(String)],
  ["boolean", typeOfConstructor(Boolean)],
  ["bigint", defineType("bigint", (v) => typeof v === "bigint")],
  ["symbol", defineType("symbol", (v) => typeof v === "symbol")],
  ["function", typeOfConstructor(Function)],
  ["object", defineType("object", (v) => typeof v === "object" && v !== null)],
  ["undefined", defineType("undefined", (v) => v === undefined)],
  ["null", defineType("null", (v) => v === null)],
  ["int", Int],
  ["integer", Int],
  ["Array", typeOfConstructor(Array)],
  ["Object", typeOfConstructor(Object)],
  ["Date", typeOfConstructor(Date)],
  ["RegExp", typeOfConstructor(RegExp)],
  ["Map", typeOfConstructor(Map)],
  ["Set", typeOfConstructor(Set)],
  ["Promise", typeOfConstructor(Promise)],
  ["Error", typeOfConstructor(Error)],
];

/**
 * Names that string type references resolve against.
 *
 * Starts with the built-in primitive and global types; applications add
 * their own classes with {@link TypeNamespace.define}.
 */
export class TypeNamespace {
  private readonly types = new Map<string, RuntimeType>(BUILTIN_TYPES);

  /** Bind a name to a class or runtime type. */
  define(name: string, type: TypeConstructor | RuntimeType): this {
    this.types.set(name, typeof type === "function" ? typeOfConstructor(type) : type);
    return this;
  }

  lookup(name: string): RuntimeType | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }
}

/** Create a namespace with the built-ins plus `entries`. */
export function createTypeNamespace(
  entries: Readonly<Record<string, TypeConstructor | RuntimeType>> = {},
): TypeNamespace {
  const namespace = new TypeNamespace();
  for (const [name, type] of Object.entries(entries)) {
    namespace.define(name, type);
  }
  return namespace;
}

/**
 * Resolve one reference. Returns `null` for an explicit "any".
 * A string may name several alternatives separated by `|`.
 */
function resolveRef(ref: TypeRef, namespace: TypeNamespace): RuntimeType[] | null {
  if (typeof ref === "function") return [typeOfConstructor(ref)];
  if (typeof ref !== "string") return [ref];

  const resolved: RuntimeType[] = [];
  for (const part of ref.split("|")) {
    const name = part.trim();
    if (UNCONSTRAINED_NAMES.has(name)) return null;
    const type = namespace.lookup(name);
    if (!type) throw new UnresolvedTypeError(name);
    resolved.push(type);
  }
  return resolved;
}

/**
 * Resolve a declared annotation into a constraint.
 *
 * Returns `undefined` (unconstrained) for a missing annotation or one that
 * includes "any". An empty array resolves to an empty union, which no value
 * satisfies; signature construction rejects it before getting here.
 */
export function resolveAnnotation(
  annotation: TypeAnnotation | undefined,
  namespace: TypeNamespace,
): TypeConstraint | undefined {
  if (annotation === undefined) return undefined;

  const refs: readonly TypeRef[] = isRefList(annotation) ? annotation : [annotation];
  const types: RuntimeType[] = [];
  for (const ref of refs) {
    const resolved = resolveRef(ref, namespace);
    if (resolved === null) return undefined;
    types.push(...resolved);
  }

  return types.length === 1 ? { kind: "single", type: types[0] } : { kind: "union", types };
}

function isRefList(annotation: TypeAnnotation): annotation is readonly TypeRef[] {
  return Array.isArray(annotation);
}

/** Whether `value` satisfies `constraint`; a missing constraint accepts everything. */
export function satisfies(constraint: TypeConstraint | undefined, value: unknown): boolean {
  if (!constraint) return true;
  return constraint.kind === "single"
    ? constraint.type.is(value)
    : constraint.types.some((type) => type.is(value));
}

/** Render a constraint the way it would be written, e.g. `number | string`. */
export function formatConstraint(constraint: TypeConstraint): string {
  return constraint.kind === "single"
    ? constraint.type.name
    : constraint.types.map((type) => type.name).join(" | ");
}
