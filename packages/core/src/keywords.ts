import type { BoundCall, CallArguments } from "./types.js";

/**
 * Keyword arguments for a call to an overloaded function.
 *
 * Passed as the last argument, it is split off from the positional
 * arguments before matching:
 *
 * ```typescript
 * area(3, kw({ height: 4 }));
 * ```
 */
export class Keywords {
  readonly values: Readonly<Record<string, unknown>>;

  constructor(values: Readonly<Record<string, unknown>>) {
    this.values = Object.freeze(Object.fromEntries(Object.entries(values)));
  }
}

/** Wrap `values` as keyword arguments. */
export function kw(values: Readonly<Record<string, unknown>>): Keywords {
  return new Keywords(values);
}

const NO_KEYWORDS: Readonly<Record<string, unknown>> = Object.freeze({});

/** Split a raw argument list into positional and keyword arguments. */
export function splitArguments(argv: readonly unknown[]): CallArguments {
  const last = argv[argv.length - 1];
  if (last instanceof Keywords) {
    return { args: argv.slice(0, -1), kwargs: last.values };
  }
  return { args: argv, kwargs: NO_KEYWORDS };
}

/**
 * Flatten a bound call into the argument list an implementation receives:
 * the positional values, then the keywords object when there is one.
 */
export function toArgumentList(bound: BoundCall): unknown[] {
  return bound.keywords ? [...bound.positional, bound.keywords] : [...bound.positional];
}
