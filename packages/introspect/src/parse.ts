/**
 * Parsing of function source text
 *
 * `Function.prototype.toString()` returns the source of a function
 * expression, an arrow function, a class, or a method written in shorthand
 * (`area(w, h) { ... }`). Each is parsed as plain JavaScript with the
 * TypeScript parser.
 */

import ts from "typescript";

/** The parameter list of a parsed callable, with where its doc comment would be. */
export interface ParsedCallable {
  readonly kind: "function" | "class";
  readonly name: string | undefined;
  readonly parameters: readonly ts.ParameterDeclaration[];
  readonly sourceFile: ts.SourceFile;
  /** Position right after the opening brace of the body, if there is one */
  readonly bodyStart: number | undefined;
}

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

/** Whether `text` is the source of a built-in or bound function. */
export function isNativeSource(text: string): boolean {
  return NATIVE_CODE.test(text);
}

function parseExpression(code: string): ts.Expression | undefined {
  const sourceFile = ts.createSourceFile(
    "__callable__.js",
    code,
    ts.ScriptTarget.Latest,
    true,
    ts.ScriptKind.JS,
  );
  if (sourceFile.statements.length !== 1) return undefined;

  const statement = sourceFile.statements[0];
  if (!ts.isExpressionStatement(statement)) return undefined;

  let expression = statement.expression;
  while (ts.isParenthesizedExpression(expression)) {
    expression = expression.expression;
  }
  return expression;
}

function nameOf(name: ts.PropertyName | ts.BindingName | undefined): string | undefined {
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text;
  }
  return undefined;
}

function fromFunction(node: ts.FunctionLikeDeclaration): ParsedCallable {
  return {
    kind: "function",
    name: nameOf(node.name),
    parameters: node.parameters,
    sourceFile: node.getSourceFile(),
    bodyStart: node.body && ts.isBlock(node.body) ? node.body.statements.pos : undefined,
  };
}

function fromClass(node: ts.ClassExpression): ParsedCallable | undefined {
  const ctor = node.members.find(
    (member): member is ts.ConstructorDeclaration =>
      ts.isConstructorDeclaration(member) && member.body !== undefined,
  );
  if (!ctor) return undefined;

  return {
    kind: "class",
    name: nameOf(node.name),
    parameters: ctor.parameters,
    sourceFile: node.getSourceFile(),
    bodyStart: node.members.pos,
  };
}

/**
 * Parse the source text of a callable.
 *
 * Returns `undefined` for native code, for text that is not a single
 * callable, and for a class without an explicit constructor.
 */
export function parseCallable(text: string): ParsedCallable | undefined {
  if (isNativeSource(text)) return undefined;

  const expression = parseExpression(`(${text}\n)`);
  if (expression) {
    if (ts.isFunctionExpression(expression) || ts.isArrowFunction(expression)) {
      return fromFunction(expression);
    }
    if (ts.isClassExpression(expression)) {
      return fromClass(expression);
    }
  }

  // Method shorthand only parses inside an object literal
  const literal = parseExpression(`({${text}\n})`);
  if (literal && ts.isObjectLiteralExpression(literal) && literal.properties.length === 1) {
    const [member] = literal.properties;
    if (ts.isMethodDeclaration(member) || ts.isAccessor(member)) {
      return fromFunction(member);
    }
  }

  return undefined;
}
