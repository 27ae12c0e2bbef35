/**
 * polydispatch Showcase
 *
 * Self-documenting examples of the umbrella package: overloading by arity,
 * by runtime type, with keyword arguments, on methods and on classes.
 *
 * Run:   npx tsx packages/polydispatch/examples/showcase.ts
 */

import assert from "node:assert/strict";

import {
  classMethod,
  createRegistry,
  createTypeNamespace,
  declareSignature,
  finalize,
  keyByName,
  kw,
  NoMatchingOverloadError,
  overload,
  type OverloadedFunction,
} from "../src/index.js";

// ============================================================================
// 1. ARITY - the first overload that accepts the call wins
// ============================================================================

const areaOf = overload(function area(side: number) {
  return side * side;
}).add(function area(w: number, h: number) {
  return w * h;
});

assert.equal(areaOf(3), 9);
assert.equal(areaOf(3, 4), 12);
assert.throws(() => areaOf(), NoMatchingOverloadError);

// ============================================================================
// 2. TYPES - constraints by class, runtime type, or name
// ============================================================================

class Circle {
  constructor(readonly r: number) {}
}
class Square {
  constructor(readonly side: number) {}
}
const shapes = createTypeNamespace({ Circle, Square });
const registry = createRegistry({ types: shapes, keyOf: keyByName });

registry.register(function perimeter(shape: Circle) {
  return 2 * Math.PI * shape.r;
}, { types: { shape: "Circle" } });
registry.register(function perimeter(shape: Square) {
  return 4 * shape.side;
}, { types: { shape: Square } });

const perimeterOf = registry.finalize(function perimeter() {
  return undefined;
}, { doc: "Perimeter of a circle or a square." });

assert.equal(perimeterOf(new Square(2)), 8);
assert.equal(perimeterOf.doc, "Perimeter of a circle or a square.");

// ============================================================================
// 3. KEYWORDS - a trailing object pattern declares keyword-only parameters
// ============================================================================

const formatValue = overload(function format(value: number, { digits = 2, unit = "" }: { digits?: number; unit?: string } = {}) {
  return `${value.toFixed(digits)}${unit}`;
});

assert.equal(formatValue(1.5), "1.50");
assert.equal(formatValue(1.5, kw({ unit: "m" })), "1.50m");
assert.equal(formatValue(kw({ value: 2, digits: 0 })), "2");

// ============================================================================
// 4. METHODS AND CLASSES
// ============================================================================

class Vec {
  static of = overload(
    classMethod(function of(cls: typeof Vec, n: number) {
      return new cls(n, n);
    }),
  ).add(
    classMethod(function of(cls: typeof Vec, x: number, y: number) {
      return new cls(x, y);
    }),
  );

  constructor(
    readonly x: number,
    readonly y: number,
  ) {}
}

assert.deepEqual(Vec.of(1), new Vec(1, 1));
assert.deepEqual(Vec.of(1, 2), new Vec(1, 2));

// Hand-declared signatures cover functions whose source cannot be read
const max = overload(
  declareSignature(Math.max.bind(Math), { params: ["a", "b"], types: { a: Number, b: Number } }),
);
assert.equal(max(1, 2), 2);

// A declaration-only wrapper re-exposes an existing group
const lengthOf: OverloadedFunction = finalize(function len() {
  return undefined;
}, { key: overload(function length(s: string) { return s.length; }).key });
assert.equal(lengthOf("abc"), 3);

console.log("showcase: all examples passed");
