/**
 * Descriptor extraction
 *
 * Turns a parsed parameter list into a {@link SignatureDescriptor}:
 *
 * - identifiers become positional parameters
 * - a rest parameter (`...args`) collects extra positional arguments
 * - a trailing object pattern (`{ unit, ...options }`) is the keyword
 *   section: its elements are keyword-only and its rest element collects
 *   extra keyword arguments; with an initializer (`{ unit } = {}`) every
 *   element is optional
 * - a leading run of destructured parameters is positional-only, since
 *   they have no name to pass by keyword
 *
 * Only the trailing run of defaulted positional parameters counts as
 * defaulted. A default that is not a plain literal is recorded as
 * `undefined`, which makes JavaScript apply the declared default when the
 * implementation runs.
 */

import ts from "typescript";
import type { SignatureDescriptor } from "@polydispatch/core";
import { evaluateLiteral } from "./literals.js";
import { parseCallable, type ParsedCallable } from "./parse.js";

export interface DescribeOptions {
  /** Treat a trailing object pattern as the keyword section (default: true) */
  keywordPattern?: boolean;
}

function defaultOf(initializer: ts.Expression): unknown {
  return evaluateLiteral(initializer)?.value;
}

function keywordName(element: ts.BindingElement): string | undefined {
  const key = element.propertyName ?? element.name;
  if (ts.isIdentifier(key) || ts.isStringLiteral(key) || ts.isNumericLiteral(key)) {
    return key.text;
  }
  return undefined;
}

interface KeywordSection {
  keywordOnly: string[];
  keywordDefaults: Record<string, unknown>;
  restKeywords?: string;
}

function describeKeywordSection(
  pattern: ts.ObjectBindingPattern,
  optional: boolean,
): KeywordSection | undefined {
  const section: KeywordSection = { keywordOnly: [], keywordDefaults: {} };

  for (const element of pattern.elements) {
    if (element.dotDotDotToken) {
      if (!ts.isIdentifier(element.name)) return undefined;
      section.restKeywords = element.name.text;
      continue;
    }
    const name = keywordName(element);
    if (name === undefined) return undefined;
    section.keywordOnly.push(name);
    if (element.initializer) {
      section.keywordDefaults[name] = defaultOf(element.initializer);
    } else if (optional) {
      // `{ b } = {}` leaves b undefined when the whole section is omitted
      section.keywordDefaults[name] = undefined;
    }
  }

  return section;
}

/**
 * The doc comment of a callable: the first block comment right inside its
 * body (or class body), with comment markers and leading `*` removed.
 */
export function extractDoc(parsed: ParsedCallable): string | undefined {
  if (parsed.bodyStart === undefined) return undefined;

  const text = parsed.sourceFile.text;
  const ranges = [
    ...(ts.getTrailingCommentRanges(text, parsed.bodyStart) ?? []),
    ...(ts.getLeadingCommentRanges(text, parsed.bodyStart) ?? []),
  ];
  const block = ranges.find((range) => range.kind === ts.SyntaxKind.MultiLineCommentTrivia);
  if (!block) return undefined;

  const doc = text
    .slice(block.pos, block.end)
    .replace(/^\/\*\*?/, "")
    .replace(/\*\/$/, "")
    .split("\n")
    .map((line) => line.replace(/^\s*\*?\s?/, "").trimEnd())
    .join("\n")
    .trim();
  return doc || undefined;
}

/** Build a descriptor from a parsed callable. */
export function describeParsed(
  parsed: ParsedCallable,
  options: DescribeOptions = {},
): SignatureDescriptor | undefined {
  const parameters = [...parsed.parameters];
  let rest: string | undefined;
  let keywords: KeywordSection | undefined;

  const last = parameters[parameters.length - 1];
  if (last?.dotDotDotToken) {
    parameters.pop();
    rest = ts.isIdentifier(last.name) ? last.name.text : `$${parameters.length}`;
  } else if (
    last &&
    (options.keywordPattern ?? true) &&
    ts.isObjectBindingPattern(last.name)
  ) {
    keywords = describeKeywordSection(last.name, last.initializer !== undefined);
    if (!keywords) return undefined;
    parameters.pop();
  }

  const params = parameters.map((param, index) =>
    ts.isIdentifier(param.name) ? param.name.text : `$${index}`,
  );

  let positionalOnly = 0;
  while (positionalOnly < parameters.length && !ts.isIdentifier(parameters[positionalOnly].name)) {
    positionalOnly++;
  }

  let firstDefault = parameters.length;
  while (firstDefault > 0 && parameters[firstDefault - 1].initializer !== undefined) {
    firstDefault--;
  }
  const defaults = parameters
    .slice(firstDefault)
    .map((param) => (param.initializer ? defaultOf(param.initializer) : undefined));

  const doc = extractDoc(parsed);
  return {
    ...(parsed.name !== undefined ? { name: parsed.name } : {}),
    ...(doc !== undefined ? { doc } : {}),
    params,
    ...(positionalOnly > 0 ? { positionalOnly } : {}),
    ...(defaults.length > 0 ? { defaults } : {}),
    ...(rest !== undefined ? { rest } : {}),
    ...(keywords
      ? {
          keywordOnly: keywords.keywordOnly,
          keywordDefaults: keywords.keywordDefaults,
          ...(keywords.restKeywords !== undefined ? { restKeywords: keywords.restKeywords } : {}),
        }
      : {}),
  };
}

/**
 * Describe a callable from its source text.
 *
 * @example
 * ```typescript
 * describeSource("function area(w, h = 1) { return w * h; }");
 * // { name: "area", params: ["w", "h"], defaults: [1] }
 * ```
 */
export function describeSource(
  text: string,
  options: DescribeOptions = {},
): SignatureDescriptor | undefined {
  const parsed = parseCallable(text);
  return parsed && describeParsed(parsed, options);
}
