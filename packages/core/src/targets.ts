/**
 * Overload targets
 *
 * Anything registered as an overload is reduced to the definition whose
 * shape is introspected, the implementation that is actually invoked, and
 * whether the first declared parameter is supplied by the runtime rather
 * than by the caller.
 */

import { MalformedOverloadTargetError } from "./errors.js";
import type { Definition } from "./introspector.js";
import type { AnyFunction, ClassTarget } from "./types.js";

/** Invokes an implementation with the call's receiver and argument list. */
export type Implementation = (receiver: unknown, argv: readonly unknown[]) => unknown;

/** A function whose first parameter receives the method's receiver. */
export interface ClassMethodTarget {
  readonly kind: "class-method";
  readonly fn: AnyFunction;
}

/** A function invoked without a receiver. */
export interface StaticMethodTarget {
  readonly kind: "static-method";
  readonly fn: AnyFunction;
}

export type MethodTarget = ClassMethodTarget | StaticMethodTarget;

export type OverloadTarget = AnyFunction | ClassTarget | MethodTarget;

export interface UnwrappedTarget {
  readonly definition: Definition;
  readonly implementation: Implementation;
  readonly skipFirstParameter: boolean;
  readonly name: string;
  readonly isClass: boolean;
}

/**
 * Mark `fn` as a class method: installed on a class, it receives the class
 * (the call's receiver) as its first argument, which overload matching
 * skips.
 *
 * @example
 * ```typescript
 * class Shape {
 *   static create = overload(classMethod(function create(cls: typeof Shape) { ... }));
 * }
 * ```
 */
export function classMethod(fn: AnyFunction): ClassMethodTarget {
  return { kind: "class-method", fn };
}

/** Mark `fn` as a static method: it is called without a receiver. */
export function staticMethod(fn: AnyFunction): StaticMethodTarget {
  return { kind: "static-method", fn };
}

/** Whether `value` is a class (as opposed to a plain or arrow function). */
export function isClass(value: unknown): value is ClassTarget {
  return (
    typeof value === "function" &&
    /^class[\s{]/.test(Function.prototype.toString.call(value))
  );
}

/** Display name of a target. */
export function targetName(target: OverloadTarget): string {
  const fn = typeof target === "function" ? target : target.fn;
  return fn.name || "<anonymous>";
}

/**
 * Reduce a target to what registration needs.
 *
 * @throws MalformedOverloadTargetError when the target is not callable
 */
export function unwrapTarget(target: OverloadTarget): UnwrappedTarget {
  if (typeof target === "function") {
    const name = targetName(target);
    if (isClass(target)) {
      return {
        definition: target,
        implementation: (_receiver, argv) => Reflect.construct(target, argv),
        skipFirstParameter: false,
        name,
        isClass: true,
      };
    }
    return {
      definition: target,
      implementation: (receiver, argv) => Reflect.apply(target, receiver, argv),
      skipFirstParameter: false,
      name,
      isClass: false,
    };
  }

  if (isMethodTarget(target)) {
    const { fn } = target;
    const name = targetName(target);
    return target.kind === "class-method"
      ? {
          definition: fn,
          implementation: (receiver, argv) => Reflect.apply(fn, receiver, [receiver, ...argv]),
          skipFirstParameter: true,
          name,
          isClass: false,
        }
      : {
          definition: fn,
          implementation: (_receiver, argv) => Reflect.apply(fn, undefined, argv),
          skipFirstParameter: false,
          name,
          isClass: false,
        };
  }

  throw new MalformedOverloadTargetError(
    String(target),
    "not-callable",
    `Cannot overload ${typeof target} value: expected a function, a class, or a method target`,
  );
}

function isMethodTarget(value: unknown): value is MethodTarget {
  if (typeof value !== "object" || value === null || !("kind" in value) || !("fn" in value)) {
    return false;
  }
  return (
    (value.kind === "class-method" || value.kind === "static-method") &&
    typeof value.fn === "function"
  );
}
