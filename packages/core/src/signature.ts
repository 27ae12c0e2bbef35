/**
 * Signature Model
 *
 * A {@link Signature} is the immutable call contract of one overload: its
 * positional parameters (with a positional-only prefix), keyword-only
 * parameters, and optional collectors for extra positional and keyword
 * arguments. Dispatch asks each signature whether a concrete call fits it.
 */

import {
  createTypeNamespace,
  formatConstraint,
  resolveAnnotation,
  satisfies,
  type TypeNamespace,
} from "./constraints.js";
import { InvalidSignatureError } from "./errors.js";
import type {
  BoundCall,
  ParameterSpec,
  ParamKind,
  SignatureDescriptor,
  TypeAnnotation,
} from "./types.js";

export interface SignatureOptions {
  /**
   * Drop the first declared positional parameter from matching; the
   * runtime supplies it (the receiver of a class method).
   */
  skipFirstParameter?: boolean;
  /** Namespace for string type references (default: built-ins only) */
  types?: TypeNamespace;
  /** Name used in error messages (default: `descriptor.name`) */
  name?: string;
}

const EMPTY: Readonly<Record<string, unknown>> = Object.freeze({});

export class Signature {
  private constructor(
    readonly name: string,
    readonly positional: readonly ParameterSpec[],
    readonly keywordOnly: readonly ParameterSpec[],
    readonly collectPositional: ParameterSpec | undefined,
    readonly collectKeyword: ParameterSpec | undefined,
    readonly positionalOnlyCount: number,
    readonly skipFirstParameter: boolean,
  ) {
    Object.freeze(this);
  }

  /**
   * Build a signature from raw parameter metadata.
   *
   * @throws InvalidSignatureError when the descriptor breaks an invariant
   * @throws UnresolvedTypeError when a string type reference cannot be resolved
   */
  static fromDescriptor(
    descriptor: SignatureDescriptor,
    options: SignatureOptions = {},
  ): Signature {
    const name = options.name ?? descriptor.name ?? "<anonymous>";
    const skipFirst = options.skipFirstParameter ?? false;
    const namespace = options.types ?? createTypeNamespace();

    checkDescriptor(name, descriptor, skipFirst);

    const annotations = descriptor.types ?? EMPTY_TYPES;
    const spec = (
      paramName: string,
      kind: ParamKind,
      defaulted?: { value: unknown },
    ): ParameterSpec => {
      const annotation = annotations[paramName];
      if (Array.isArray(annotation) && annotation.length === 0) {
        throw new InvalidSignatureError(
          name,
          paramName,
          "empty_union",
          `Parameter '${paramName}' of '${name}' has an empty type union`,
        );
      }
      const constraint = resolveAnnotation(annotation, namespace);
      return Object.freeze({
        name: paramName,
        kind,
        ...(constraint ? { constraint } : {}),
        hasDefault: defaulted !== undefined,
        ...(defaulted ? { defaultValue: defaulted.value } : {}),
      });
    };

    // Defaults align to the end of the full parameter list, receiver included
    const defaults = descriptor.defaults ?? [];
    const firstDefault = descriptor.params.length - defaults.length;
    const positionalOnly = descriptor.positionalOnly ?? 0;

    const positional: ParameterSpec[] = [];
    descriptor.params.forEach((paramName, index) => {
      if (index === 0 && skipFirst) return;
      const defaultIndex = index - firstDefault;
      positional.push(
        spec(
          paramName,
          index < positionalOnly ? "positional-only" : "positional",
          defaultIndex >= 0 ? { value: defaults[defaultIndex] } : undefined,
        ),
      );
    });

    const keywordDefaults = descriptor.keywordDefaults ?? EMPTY;
    const keywordOnly = (descriptor.keywordOnly ?? []).map((paramName) =>
      spec(
        paramName,
        "keyword-only",
        Object.prototype.hasOwnProperty.call(keywordDefaults, paramName)
          ? { value: keywordDefaults[paramName] }
          : undefined,
      ),
    );

    return new Signature(
      name,
      Object.freeze(positional),
      Object.freeze(keywordOnly),
      descriptor.rest !== undefined ? spec(descriptor.rest, "collect-positional") : undefined,
      descriptor.restKeywords !== undefined
        ? spec(descriptor.restKeywords, "collect-keyword")
        : undefined,
      skipFirst && positionalOnly > 0 ? positionalOnly - 1 : positionalOnly,
      skipFirst,
    );
  }

  /** Whether the implementation receives a trailing keywords object. */
  get hasKeywordSection(): boolean {
    return this.keywordOnly.length > 0 || this.collectKeyword !== undefined;
  }

  /** Whether the call `(args, kwargs)` fits this signature. */
  validate(args: readonly unknown[], kwargs: Readonly<Record<string, unknown>> = EMPTY): boolean {
    return this.match(args, kwargs) !== undefined;
  }

  /**
   * Match a call against this signature, producing the values to invoke the
   * implementation with, or `undefined` when the call does not fit.
   *
   * Neither `args` nor `kwargs` is modified. Default values are used as
   * declared and never type-checked.
   */
  match(
    args: readonly unknown[],
    kwargs: Readonly<Record<string, unknown>> = EMPTY,
  ): BoundCall | undefined {
    const named = new Map(Object.entries(kwargs));
    const values: unknown[] = [];
    let cursor = 0;

    for (const [index, param] of this.positional.entries()) {
      let value: unknown;
      if (cursor < args.length) {
        // Supplied both ways: ambiguous
        if (named.has(param.name)) return undefined;
        value = args[cursor++];
      } else if (named.has(param.name)) {
        if (index < this.positionalOnlyCount) return undefined;
        value = named.get(param.name);
        named.delete(param.name);
      } else if (param.hasDefault) {
        values.push(param.defaultValue);
        continue;
      } else {
        return undefined;
      }

      if (!satisfies(param.constraint, value)) return undefined;
      values.push(value);
    }

    const keywords: Array<[string, unknown]> = [];
    for (const param of this.keywordOnly) {
      if (named.has(param.name)) {
        const value = named.get(param.name);
        named.delete(param.name);
        if (!satisfies(param.constraint, value)) return undefined;
        keywords.push([param.name, value]);
      } else if (param.hasDefault) {
        keywords.push([param.name, param.defaultValue]);
      } else {
        return undefined;
      }
    }

    const extras = args.slice(cursor);
    if (extras.length > 0) {
      if (!this.collectPositional) return undefined;
      const { constraint } = this.collectPositional;
      if (!extras.every((value) => satisfies(constraint, value))) return undefined;
    }

    if (named.size > 0) {
      if (!this.collectKeyword) return undefined;
      const { constraint } = this.collectKeyword;
      for (const [key, value] of named) {
        if (!satisfies(constraint, value)) return undefined;
        keywords.push([key, value]);
      }
    }

    return this.hasKeywordSection
      ? { positional: [...values, ...extras], keywords: Object.fromEntries(keywords) }
      : { positional: [...values, ...extras] };
  }

  /**
   * Render the signature in JavaScript parameter syntax, with the keyword
   * section as a trailing destructuring pattern:
   * `area(w: number, h = 1, ...rest, { unit, ...options })`.
   */
  toString(): string {
    const parts = this.positional.map(formatParam);
    if (this.positionalOnlyCount > 0) parts.splice(this.positionalOnlyCount, 0, "/");
    if (this.collectPositional) parts.push(`...${formatParam(this.collectPositional)}`);
    if (this.hasKeywordSection) {
      const keywordParts = this.keywordOnly.map(formatParam);
      if (this.collectKeyword) keywordParts.push(`...${formatParam(this.collectKeyword)}`);
      parts.push(`{ ${keywordParts.join(", ")} }`);
    }
    return `${this.name}(${parts.join(", ")})`;
  }
}

const EMPTY_TYPES: Readonly<Record<string, TypeAnnotation>> = Object.freeze({});

function formatParam(param: ParameterSpec): string {
  let text = param.name;
  if (param.constraint) text += `: ${formatConstraint(param.constraint)}`;
  if (param.hasDefault) text += ` = ${formatDefault(param.defaultValue)}`;
  return text;
}

function formatDefault(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value === null || typeof value !== "object") return String(value);
  return Array.isArray(value) ? "[...]" : "{...}";
}

function checkDescriptor(name: string, descriptor: SignatureDescriptor, skipFirst: boolean): void {
  const seen = new Set<string>();
  const names = [
    ...descriptor.params,
    ...(descriptor.keywordOnly ?? []),
    ...(descriptor.rest !== undefined ? [descriptor.rest] : []),
    ...(descriptor.restKeywords !== undefined ? [descriptor.restKeywords] : []),
  ];
  for (const paramName of names) {
    if (seen.has(paramName)) {
      throw new InvalidSignatureError(
        name,
        paramName,
        "duplicate_param",
        `Duplicate parameter '${paramName}' in signature of '${name}'`,
      );
    }
    seen.add(paramName);
  }

  if (skipFirst && descriptor.params.length === 0) {
    throw new InvalidSignatureError(
      name,
      undefined,
      "missing_receiver",
      `'${name}' must declare a leading parameter to receive the bound receiver`,
    );
  }

  const positionalOnly = descriptor.positionalOnly ?? 0;
  if (
    !Number.isInteger(positionalOnly) ||
    positionalOnly < 0 ||
    positionalOnly > descriptor.params.length
  ) {
    throw new InvalidSignatureError(
      name,
      undefined,
      "positional_only_out_of_range",
      `positionalOnly of '${name}' must be between 0 and ${descriptor.params.length}, got ${positionalOnly}`,
    );
  }

  const defaultCount = descriptor.defaults?.length ?? 0;
  if (defaultCount > descriptor.params.length) {
    throw new InvalidSignatureError(
      name,
      undefined,
      "too_many_defaults",
      `'${name}' declares ${defaultCount} defaults for ${descriptor.params.length} parameter(s)`,
    );
  }

  for (const paramName of Object.keys(descriptor.types ?? {})) {
    if (!seen.has(paramName)) {
      throw new InvalidSignatureError(
        name,
        paramName,
        "unknown_annotation",
        `Type annotation for unknown parameter '${paramName}' of '${name}'`,
      );
    }
  }

  const keywordOnly = new Set(descriptor.keywordOnly ?? []);
  for (const paramName of Object.keys(descriptor.keywordDefaults ?? {})) {
    if (!keywordOnly.has(paramName)) {
      throw new InvalidSignatureError(
        name,
        paramName,
        "unknown_keyword_default",
        `Keyword default for '${paramName}', which is not a keyword-only parameter of '${name}'`,
      );
    }
  }
}
