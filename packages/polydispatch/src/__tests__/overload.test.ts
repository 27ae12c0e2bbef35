import { describe, it, expect } from "vitest";
import {
  classMethod,
  createConfig,
  createRegistry,
  declareSignature,
  finalize,
  Int,
  keyByName,
  kw,
  MalformedOverloadTargetError,
  NoMatchingOverloadError,
  overload,
  staticMethod,
  type OverloadedFunction,
} from "../index.js";

describe("overload", () => {
  describe("wrapping", () => {
    it("keeps the name and doc of the first overload", () => {
      const overloaded = overload(function func(arg: unknown) { return arg; }, {
        signature: { doc: "doc" },
      }).add(function func(...args: unknown[]) { return args; }, { signature: { doc: "doc2" } });

      expect(overloaded.name).toBe("func");
      expect(overloaded.doc).toBe("doc");
    });

    it("finalizes under a wrapper declaration", () => {
      const group = overload(function impl(a: unknown) { return a; });

      const wrapped = finalize(function measure() { return undefined; }, {
        key: group.key,
        doc: "Measure something.",
      });

      expect(wrapped).toBe(group);
      expect(wrapped.name).toBe("measure");
      expect(wrapped.doc).toBe("Measure something.");
    });
  });

  describe("methods", () => {
    it("overloads instance methods", () => {
      class A {
        declare method: OverloadedFunction;
      }
      A.prototype.method = overload(function method() { return "ok"; }).add(
        function method(...args: unknown[]) { return "args"; },
      );

      expect(new A().method()).toBe("ok");
      expect(new A().method(1)).toBe("args");
    });

    it("passes the instance as the receiver", () => {
      class Counter {
        count = 0;
        declare bump: OverloadedFunction;
      }
      Counter.prototype.bump = overload(function bump(this: Counter) {
        return ++this.count;
      }).add(function bump(this: Counter, by: unknown) {
        if (typeof by !== "number") throw new TypeError("by must be a number");
        return (this.count += by);
      });
      const counter = new Counter();

      expect(counter.bump()).toBe(1);
      expect(counter.bump(5)).toBe(6);
      expect(() => counter.bump("x")).toThrow(NoMatchingOverloadError);
    });

    it("overloads class methods", () => {
      class A {
        static method = overload(
          classMethod(function method(cls: unknown) { return cls === A ? "ok" : "wrong receiver"; }),
        ).add(classMethod(function method(cls: unknown, ...args: unknown[]) { return "args"; }));
      }

      expect(A.method()).toBe("ok");
      expect(A.method(1)).toBe("args");
    });

    it("overloads static methods", () => {
      class A {
        static method = overload(staticMethod(function method() { return "ok"; })).add(
          staticMethod(function method(...args: unknown[]) { return "args"; }),
        );
      }

      expect(A.method()).toBe("ok");
      expect(A.method(1)).toBe("args");
    });

    it("keeps methods of unrelated classes independent", () => {
      class A {
        declare method: OverloadedFunction;
      }
      class B {
        declare method: OverloadedFunction;
      }
      A.prototype.method = overload(function method() { return "a"; });
      B.prototype.method = overload(function method() { return "b"; });

      expect(new A().method()).toBe("a");
      expect(new B().method()).toBe("b");
      expect(A.prototype.method.signatures()).toHaveLength(1);
    });
  });

  describe("classes", () => {
    it("constructs the first class whose constructor accepts the call", () => {
      class First {
        readonly first = true;
        constructor() {}
      }
      class Second {
        readonly first = false;
        constructor(a: unknown) {}
      }
      const A = overload(First).add(Second);

      expect(A()).toBeInstanceOf(First);
      expect(A(1)).toBeInstanceOf(Second);
      expect(A(1)).toMatchObject({ first: false });
    });

    it("rejects a class without a constructor", () => {
      class Empty {}

      expect(() => overload(Empty)).toThrow(MalformedOverloadTargetError);
    });

    it("constructs a subclass through the constructor it inherits", () => {
      class Polygon {
        constructor(readonly sides: number) {}
      }
      class Square extends Polygon {}
      const makeSquare = overload(Square);

      expect(makeSquare(4)).toBeInstanceOf(Square);
      expect(makeSquare(4)).toMatchObject({ sides: 4 });
      expect(() => makeSquare()).toThrow(NoMatchingOverloadError);
    });

    it("rejects a subclass with no constructor in its chain", () => {
      class Empty {}
      class StillEmpty extends Empty {}

      expect(() => overload(StillEmpty)).toThrow(
        "Overloaded class 'StillEmpty' requires a constructor implementation",
      );
    });
  });

  describe("argument patterns", () => {
    it("dispatches on the number of arguments", () => {
      const overloaded = overload(function func(a: unknown) { return "with a"; }).add(
        function func(a: unknown, b: unknown) { return "with a and b"; },
      );

      expect(overloaded("a")).toBe("with a");
      expect(overloaded("a", "b")).toBe("with a and b");
      expect(() => overloaded()).toThrow(TypeError);
      expect(() => overloaded("a", "b", "c")).toThrow(TypeError);
      expect(() => overloaded(kw({ b: 1 }))).toThrow(TypeError);
    });

    it("dispatches on argument types", () => {
      const overloaded = overload(function func(a: unknown) { return "int"; }, { types: { a: Int } }).add(
        function func(a: unknown) { return "str"; },
        { types: { a: "string" } },
      );

      expect(overloaded(1)).toBe("int");
      expect(overloaded("1")).toBe("str");
      expect(() => overloaded(1.5)).toThrow(NoMatchingOverloadError);
    });

    it("prefers hand-declared signatures over the source", () => {
      const countArgs = overload(
        declareSignature(function count(...args: unknown[]) { return args.length; }, {
          params: ["x"],
          types: { x: Number },
        }),
      );

      expect(countArgs(7)).toBe(1);
      expect(() => countArgs(7, 8)).toThrow(NoMatchingOverloadError);
    });
  });

  describe("rest parameters", () => {
    it("falls back to a rest collector", () => {
      const overloaded = overload(function func(a: unknown) { return "a"; }).add(
        function func(...args: unknown[]) { return `*args ${args.length}`; },
      );

      expect(overloaded(1)).toBe("a");
      expect(overloaded(1, 2)).toBe("*args 2");
    });

    it("collects only the extra arguments", () => {
      const overloaded = overload(function func(a: unknown) { return "a"; }).add(
        function func(a: unknown, ...args: unknown[]) { return `*args ${args.length}`; },
      );

      expect(overloaded(1)).toBe("a");
      expect(overloaded(1, 2)).toBe("*args 1");
      expect(overloaded(1, 2, 3)).toBe("*args 2");
    });
  });

  describe("keyword arguments", () => {
    it("collects keywords in a trailing object pattern", () => {
      const overloaded = overload(function func(a: unknown) { return "a"; }).add(
        function func({ ...options }: Record<string, unknown>) { return `**kw ${Object.keys(options).length}`; },
      );

      expect(overloaded(1)).toBe("a");
      expect(overloaded(kw({ a: 1 }))).toBe("a");
      expect(overloaded(kw({ a: 1, b: 2 }))).toBe("**kw 2");
    });

    it("binds named positional parameters before collecting", () => {
      const overloaded = overload(function func(a: unknown) { return "a"; }).add(
        function func(a: unknown, { ...options }: Record<string, unknown>) {
          return `**kw ${Object.keys(options).length}`;
        },
      );

      expect(overloaded(1)).toBe("a");
      expect(overloaded(kw({ a: 1 }))).toBe("a");
      expect(overloaded(kw({ a: 1, b: 2 }))).toBe("**kw 1");
    });

    it("binds defaulted parameters by keyword", () => {
      const overloaded = overload(function func(a: unknown) { return "a"; }).add(
        function func(c = 1, { ...options }: Record<string, unknown> = {}) {
          return `**kw ${Object.keys(options).length}`;
        },
      );

      expect(overloaded(1)).toBe("a");
      expect(overloaded(kw({ a: 1 }))).toBe("a");
      expect(overloaded(kw({ c: 1, a: 2 }))).toBe("**kw 1");
    });

    it("fills the defaults of parameters not given", () => {
      const overloaded = overload(function func(a: unknown) { return "a"; }).add(
        function func(a = 1, b = 2, c = 3, { ...options }: Record<string, unknown> = {}) {
          return `a ${a}, b ${b}, c ${c}, **kw ${Object.keys(options).length}`;
        },
      );

      expect(overloaded(1)).toBe("a");
      expect(overloaded(kw({ a: 1 }))).toBe("a");
      expect(overloaded(kw({ a: 4, c: 5, d: 0 }))).toBe("a 4, b 2, c 5, **kw 1");
    });

    it("passes keyword-only parameters with their defaults", () => {
      const formatValue = overload(function format(value: number, { digits = 2, unit = "" }: { digits?: number; unit?: string } = {}) {
        return `${value.toFixed(digits)}${unit}`;
      });

      expect(formatValue(1.5)).toBe("1.50");
      expect(formatValue(1.5, kw({ unit: "m" }))).toBe("1.50m");
      expect(formatValue(kw({ value: 2, digits: 0 }))).toBe("2");
      expect(() => formatValue(1.5, kw({ precision: 1 }))).toThrow(NoMatchingOverloadError);
    });

    it("makes every keyword optional when the pattern has a default", () => {
      const withUnit = overload(function label(value: unknown, { unit }: { unit?: string } = {}) {
        return `${String(value)} ${String(unit)}`;
      });

      expect(withUnit(1)).toBe("1 undefined");
      expect(withUnit(1, kw({ unit: "m" }))).toBe("1 m");
    });

    it("applies a computed default when it is not given", () => {
      const start = { at: 10 };
      const fromOffset = overload(function from(offset = start.at) { return offset; });

      expect(fromOffset()).toBe(10);
      expect(fromOffset(3)).toBe(3);
    });
  });
});

describe("createRegistry", () => {
  it("groups by name with keyByName", () => {
    const registry = createRegistry({ config: createConfig({}, {}), keyOf: keyByName });
    registry.register(function size(a: unknown) { return 1; });
    registry.register(function size(a: unknown, b: unknown) { return 2; });

    const sizeOf = registry.finalize(function size() { return undefined; }, { doc: "Size." });

    expect(sizeOf(1)).toBe(1);
    expect(sizeOf(1, 2)).toBe(2);
    expect(sizeOf.doc).toBe("Size.");
  });

  it("passes keywordPattern to the source introspector", () => {
    const registry = createRegistry({ config: createConfig({}, {}), keywordPattern: false });
    const takeOptions = registry.register(function take(options: { a?: number } = {}) {
      return options;
    });
    const withPattern = registry.register(function pattern({ a = 0 }: { a?: number } = {}) { return a; });

    expect(takeOptions({ a: 1 })).toEqual({ a: 1 });
    expect(withPattern({ a: 2 })).toBe(2);
    expect(withPattern.signatures().map(String)).toEqual(["pattern($0 = undefined, /)"]);
  });
});
