import { describe, it, expect } from "vitest";
import { describeSource, isNativeSource, parseCallable } from "../index.js";

describe("describeSource", () => {
  describe("parameters", () => {
    it("reads a function declaration with defaults", () => {
      expect(describeSource("function area(w, h = 1) { return w * h; }")).toEqual({
        name: "area",
        params: ["w", "h"],
        defaults: [1],
      });
    });

    it("reads arrow functions", () => {
      expect(describeSource("(a, b) => a + b")).toEqual({ params: ["a", "b"] });
      expect(describeSource("a => a")).toEqual({ params: ["a"] });
    });

    it("reads method shorthand", () => {
      expect(describeSource("area(w, h) { return w * h; }")).toEqual({
        name: "area",
        params: ["w", "h"],
      });
      expect(describeSource("*items(a) {}")).toEqual({ name: "items", params: ["a"] });
    });

    it("tolerates a trailing line comment", () => {
      expect(describeSource("(a) => a // identity")).toEqual({ params: ["a"] });
    });

    it("maps a rest parameter to the positional collector", () => {
      expect(describeSource("function f(a, ...rest) {}")).toEqual({
        name: "f",
        params: ["a"],
        rest: "rest",
      });
    });

    it("counts only the trailing run of defaults", () => {
      expect(describeSource("function f(a = 1, b, c = 3) {}")).toEqual({
        name: "f",
        params: ["a", "b", "c"],
        defaults: [3],
      });
    });

    it("evaluates literal defaults and leaves others unknown", () => {
      const descriptor = describeSource(
        "function f(a = -1, b = 'x', c = true, d = null, e = undefined, g = 10n, h = `t`, i = [], j = +2) {}",
      );

      expect(descriptor?.defaults).toEqual([-1, "x", true, null, undefined, 10n, "t", undefined, 2]);
    });

    it("treats leading destructured parameters as positional-only", () => {
      expect(describeSource("function f([x, y], {z}, c) {}")).toEqual({
        name: "f",
        params: ["$0", "$1", "c"],
        positionalOnly: 2,
      });
    });
  });

  describe("keyword section", () => {
    it("reads a trailing object pattern as keyword-only parameters", () => {
      expect(describeSource('function f(a, { mode = "fast", ...options } = {}) {}')).toEqual({
        name: "f",
        params: ["a"],
        keywordOnly: ["mode"],
        keywordDefaults: { mode: "fast" },
        restKeywords: "options",
      });
    });

    it("makes every element optional when the pattern has a default", () => {
      expect(describeSource("function f(a, { b, c = 1 } = {}) {}")).toStrictEqual({
        name: "f",
        params: ["a"],
        keywordOnly: ["b", "c"],
        keywordDefaults: { b: undefined, c: 1 },
      });
    });

    it("uses the property name of renamed elements", () => {
      expect(describeSource("function f({ from: start, to = 10 }) {}")).toEqual({
        name: "f",
        params: [],
        keywordOnly: ["from", "to"],
        keywordDefaults: { to: 10 },
      });
    });

    it("reads async functions", () => {
      expect(describeSource("async function load(url, { retries = 3 } = {}) {}")).toEqual({
        name: "load",
        params: ["url"],
        keywordOnly: ["retries"],
        keywordDefaults: { retries: 3 },
      });
    });

    it("can treat the trailing pattern as positional", () => {
      expect(
        describeSource('function f(a, { mode = "fast", ...options } = {}) {}', {
          keywordPattern: false,
        }),
      ).toEqual({
        name: "f",
        params: ["a", "$1"],
        defaults: [undefined],
      });
    });
  });

  describe("classes", () => {
    it("reads the constructor's parameters", () => {
      expect(describeSource("class Point { constructor(x, y = 0) { this.x = x; } }")).toEqual({
        name: "Point",
        params: ["x", "y"],
        defaults: [0],
      });
    });

    it("returns undefined without an explicit constructor", () => {
      expect(describeSource("class Empty {}")).toBeUndefined();
    });
  });

  describe("documentation", () => {
    it("takes the first block comment inside the body", () => {
      const descriptor = describeSource(
        "function area(w, h) {\n  /** Area of a rectangle. */\n  return w * h;\n}",
      );
      expect(descriptor?.doc).toBe("Area of a rectangle.");
    });

    it("finds a comment on the same line as the brace", () => {
      expect(describeSource("function f() { /* Same line. */ }")?.doc).toBe("Same line.");
    });

    it("strips the leading stars of multi-line comments", () => {
      const descriptor = describeSource(
        "class Shape {\n  /**\n   * A shape.\n   * With lines.\n   */\n  constructor(kind) {}\n}",
      );
      expect(descriptor).toEqual({
        name: "Shape",
        doc: "A shape.\nWith lines.",
        params: ["kind"],
      });
    });

    it("ignores line comments", () => {
      expect(describeSource("function f() {\n  // not a doc\n  return 1;\n}")?.doc).toBeUndefined();
    });
  });

  describe("unparseable sources", () => {
    it("returns undefined for native code", () => {
      expect(isNativeSource("function max() { [native code] }")).toBe(true);
      expect(describeSource("function max() { [native code] }")).toBeUndefined();
    });

    it("returns undefined for text that is not a callable", () => {
      expect(describeSource("42")).toBeUndefined();
    });
  });
});

describe("parseCallable", () => {
  it("tells classes from functions", () => {
    expect(parseCallable("class A { constructor() {} }")?.kind).toBe("class");
    expect(parseCallable("function a() {}")?.kind).toBe("function");
  });

  it("has no body start for expression-bodied arrows", () => {
    expect(parseCallable("() => 1")?.bodyStart).toBeUndefined();
  });
});
