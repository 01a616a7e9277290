import { test, expect, describe } from "vitest";
import { Attr, Fallback, Item } from "./bearing.ts";
import { ROOT, course } from "./course.ts";
import { formatBearing, formatCourse, formatValue } from "./format.ts";

// -- Primitives --

describe("formatValue primitives", () => {
  test("string", () => {
    expect(formatValue("hello")).toBe('"hello"');
    expect(formatValue("")).toBe('""');
    expect(formatValue('has "quotes"')).toBe('"has \\"quotes\\""');
  });

  test("number", () => {
    expect(formatValue(42)).toBe("42");
    expect(formatValue(-1.5)).toBe("-1.5");
    expect(formatValue(NaN)).toBe("NaN");
    expect(formatValue(-0)).toBe("-0");
  });

  test("boolean, null and undefined", () => {
    expect(formatValue(true)).toBe("true");
    expect(formatValue(null)).toBe("null");
    expect(formatValue(undefined)).toBe("undefined");
  });

  test("bigint and symbol", () => {
    expect(formatValue(42n)).toBe("42n");
    expect(formatValue(Symbol("desc"))).toBe('Symbol("desc")');
    expect(formatValue(Symbol())).toBe("Symbol()");
  });

  test("functions", () => {
    function named() {}
    expect(formatValue(named)).toBe("[Function named]");
    expect(formatValue(() => 1)).toBe("[Function]");
  });
});

// -- Built-in objects --

describe("formatValue built-ins", () => {
  test("Date and RegExp", () => {
    expect(formatValue(new Date("2024-01-01T00:00:00.000Z"))).toBe(
      'Date("2024-01-01T00:00:00.000Z")',
    );
    expect(formatValue(new Date(NaN))).toBe("Date(Invalid)");
    expect(formatValue(/a+/g)).toBe("/a+/g");
  });

  test("Map and Set", () => {
    const m = new Map<unknown, unknown>([
      ["a", 1],
      [true, "yes"],
    ]);
    expect(formatValue(m)).toBe('Map("a" => 1, true => "yes")');
    expect(formatValue(new Set([1, 2]))).toBe("Set(1, 2)");
    expect(formatValue(new Map())).toBe("Map()");
  });

  test("arrays", () => {
    expect(formatValue([1, [2, "three"]])).toBe('[1, [2, "three"]]');
    expect(formatValue([1, , 3])).toBe("[1, <hole>, 3]");
  });
});

// -- Objects --

describe("formatValue objects", () => {
  test("records", () => {
    expect(formatValue({ a: 1, b: { c: null } })).toBe("{a: 1, b: {c: null}}");
    expect(formatValue({ "weird-key": 1 })).toBe('{"weird-key": 1}');
    expect(formatValue({})).toBe("{}");
  });

  test("null-prototype object", () => {
    const obj: Record<string, unknown> = Object.create(null);
    obj.a = 1;
    expect(formatValue(obj)).toBe("[Object: null prototype] {a: 1}");
  });

  test("class instances show their constructor", () => {
    class Point {
      x = 1;
      y = 2;
    }
    expect(formatValue(new Point())).toBe("Point {x: 1, y: 2}");
  });

  test("circular references", () => {
    const obj: Record<string, unknown> = { a: 1 };
    obj.self = obj;
    expect(formatValue(obj)).toBe("{a: 1, self: $0}");

    const arr: unknown[] = [1];
    arr.push(arr);
    expect(formatValue(arr)).toBe("[1, $0]");
  });
});

// -- Custom reducers --

describe("formatValue custom reducers", () => {
  class Money {
    constructor(
      public amount: number,
      public currency: string,
    ) {}
  }

  const reducers = {
    Money: (v: unknown) => v instanceof Money && [v.amount, v.currency],
  };

  test("custom type nested in a record", () => {
    expect(formatValue({ price: new Money(5, "EUR") }, reducers)).toBe(
      '{price: Money(5, "EUR")}',
    );
  });

  test("reducer returns false for non-matching value", () => {
    expect(formatValue("plain", reducers)).toBe('"plain"');
  });
});

// -- Bearings and courses --

describe("bearings and courses", () => {
  test("formatBearing shows kind, name and factory", () => {
    expect(formatBearing(new Item(0))).toBe("Item(0)");
    expect(formatBearing(new Item("0"))).toBe('Item("0")');
    expect(formatBearing(new Attr("name", { factory: Map }))).toBe(
      'Attr("name", factory=Map)',
    );
    expect(formatBearing(new Fallback("x"))).toBe('Fallback("x")');
  });

  test("formatCourse", () => {
    expect(formatCourse(course("a/[0]/@b"))).toBe(
      'Fallback("a") / Item(0) / Attr("b")',
    );
    expect(formatCourse(ROOT)).toBe("<root>");
  });

  test("formatValue renders both", () => {
    expect(formatValue({ at: course("a"), step: new Item(1) })).toBe(
      '{at: Course(Fallback("a")), step: Item(1)}',
    );
  });
});
