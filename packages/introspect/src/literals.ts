import ts from "typescript";

/** A statically known value; `undefined` from {@link evaluateLiteral} means "not known". */
export interface KnownValue {
  readonly value: unknown;
}

/**
 * Evaluate a default-value expression when it is a plain literal:
 * numbers (optionally negated), strings, template strings without
 * substitutions, booleans, `null`, `undefined` and bigints.
 */
export function evaluateLiteral(expr: ts.Expression): KnownValue | undefined {
  if (ts.isParenthesizedExpression(expr)) {
    return evaluateLiteral(expr.expression);
  }
  if (ts.isNumericLiteral(expr)) {
    return { value: Number(expr.text) };
  }
  if (ts.isBigIntLiteral(expr)) {
    // Text keeps the trailing "n"
    return { value: BigInt(expr.text.slice(0, -1)) };
  }
  if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
    return { value: expr.text };
  }
  if (ts.isIdentifier(expr)) {
    return expr.text === "undefined" ? { value: undefined } : undefined;
  }
  if (ts.isPrefixUnaryExpression(expr)) {
    const operand = evaluateLiteral(expr.operand);
    if (!operand || (typeof operand.value !== "number" && typeof operand.value !== "bigint")) {
      return undefined;
    }
    switch (expr.operator) {
      case ts.SyntaxKind.MinusToken:
        return { value: -operand.value };
      case ts.SyntaxKind.PlusToken:
        return typeof operand.value === "number" ? operand : undefined;
      default:
        return undefined;
    }
  }

  switch (expr.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return { value: true };
    case ts.SyntaxKind.FalseKeyword:
      return { value: false };
    case ts.SyntaxKind.NullKeyword:
      return { value: null };
    default:
      return undefined;
  }
}
