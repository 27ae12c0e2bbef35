/**
 * @polydispatch/introspect — Parameter metadata from function source.
 *
 * Parses `Function.prototype.toString()` output with the TypeScript parser
 * so that plain JavaScript functions and classes can be overloaded without
 * hand-written signatures.
 *
 * @packageDocumentation
 */

export { createSourceIntrospector } from "./introspector.js";
export type { SourceIntrospectorOptions } from "./introspector.js";

export { describeSource, describeParsed, extractDoc } from "./describe.js";
export type { DescribeOptions } from "./describe.js";

export { parseCallable, isNativeSource } from "./parse.js";
export type { ParsedCallable } from "./parse.js";

export { evaluateLiteral } from "./literals.js";
export type { KnownValue } from "./literals.js";
