import { describe, it, expect } from "vitest";
import {
  createTypeNamespace,
  defineType,
  formatConstraint,
  Int,
  resolveAnnotation,
  satisfies,
  typeOfConstructor,
  TypeNamespace,
  UnresolvedTypeError,
} from "../index.js";

describe("typeOfConstructor", () => {
  it("matches primitives through their wrapper classes", () => {
    expect(typeOfConstructor(Number).is(1)).toBe(true);
    expect(typeOfConstructor(Number).is("1")).toBe(false);
    expect(typeOfConstructor(String).is("s")).toBe(true);
    expect(typeOfConstructor(Boolean).is(false)).toBe(true);
    expect(typeOfConstructor(Function).is(() => 0)).toBe(true);
  });

  it("uses Array.isArray for Array", () => {
    expect(typeOfConstructor(Array).is([])).toBe(true);
    expect(typeOfConstructor(Array).is({ length: 0 })).toBe(false);
  });

  it("treats Object as any non-nullish value", () => {
    const object = typeOfConstructor(Object);
    expect(object.is(0)).toBe(true);
    expect(object.is(null)).toBe(false);
    expect(object.is(undefined)).toBe(false);
  });

  it("uses instanceof for other classes", () => {
    class Animal {}
    class Dog extends Animal {}
    const animal = typeOfConstructor(Animal);

    expect(animal.name).toBe("Animal");
    expect(animal.is(new Dog())).toBe(true);
    expect(animal.is({})).toBe(false);
  });
});

describe("Int", () => {
  it("accepts integral numbers only", () => {
    expect(Int.is(3)).toBe(true);
    expect(Int.is(1.5)).toBe(false);
    expect(Int.is("3")).toBe(false);
  });
});

describe("TypeNamespace", () => {
  it("starts with the built-ins", () => {
    const ns = new TypeNamespace();
    expect(ns.has("number")).toBe(true);
    expect(ns.lookup("int")).toBe(Int);
    expect(ns.lookup("Point")).toBeUndefined();
  });

  it("defines classes and runtime types", () => {
    class Point {}
    const Even = defineType("even", (v) => typeof v === "number" && v % 2 === 0);
    const ns = createTypeNamespace({ Point }).define("Even", Even);

    expect(ns.lookup("Point")?.is(new Point())).toBe(true);
    expect(ns.lookup("Even")).toBe(Even);
  });

  it("keeps namespaces independent", () => {
    class Point {}
    createTypeNamespace({ Point });
    expect(createTypeNamespace().has("Point")).toBe(false);
  });
});

describe("resolveAnnotation", () => {
  const ns = createTypeNamespace();

  it("returns undefined without an annotation", () => {
    expect(resolveAnnotation(undefined, ns)).toBeUndefined();
  });

  it("resolves a single reference", () => {
    const constraint = resolveAnnotation("string", ns);
    expect(constraint?.kind).toBe("single");
    expect(satisfies(constraint, "x")).toBe(true);
    expect(satisfies(constraint, 1)).toBe(false);
  });

  it("flattens string unions and arrays into one union", () => {
    const constraint = resolveAnnotation([Number, "string | null"], ns);
    expect(constraint && formatConstraint(constraint)).toBe("number | string | null");
  });

  it("throws for unknown names", () => {
    expect(() => resolveAnnotation("Nope", ns)).toThrow("Cannot resolve type reference 'Nope'");
    expect(() => resolveAnnotation("string | Nope", ns)).toThrow(UnresolvedTypeError);
  });

  it("satisfies everything without a constraint", () => {
    expect(satisfies(undefined, Symbol("x"))).toBe(true);
  });
});
