import { test, expect, describe } from "vitest";
import { Compass } from "./compass.ts";
import { extendCourseConfig } from "./course.ts";
import {
  NonNavigableError,
  SuppressedErrors,
  type ChartEntry,
} from "./errors.ts";
import { Surveyor } from "./surveyor.ts";

class Point {
  x = 1;
  y = 2;
}

function shorthand(entries: Iterable<ChartEntry>): [string, unknown][] {
  return [...entries].map(([c, v]) => [c.toString(), v]);
}

const recordsOnly = new Surveyor({
  compasses: [new Compass({ targetTypes: ["record"] })],
});

test("charts nested records depth first", () => {
  const chart = new Surveyor().chart({ a: 1, nested: { x: 2 } });
  expect(shorthand(chart)).toEqual([
    ["[a]", 1],
    ["[nested]", { x: 2 }],
    ["[nested]/[x]", 2],
  ]);
});

test("arrays, Maps and objects are descended", () => {
  const chart = new Surveyor().chart({
    list: ["a"],
    map: new Map([["k", true]]),
    point: new Point(),
  });
  expect(shorthand(chart).map(([c]) => c)).toEqual([
    "[list]",
    "[list]/[0]",
    "[map]",
    "[map]/[k]",
    "[point]",
    "[point]/@x",
    "[point]/@y",
  ]);
});

test("null and undefined are listed but not descended", () => {
  expect(shorthand(new Surveyor().chart({ a: null, b: undefined }))).toEqual([
    ["[a]", null],
    ["[b]", undefined],
  ]);
});

test("the root is never listed", () => {
  const surveyor = new Surveyor();
  expect(surveyor.chart("text")).toEqual([]);
  expect(surveyor.chart(null)).toEqual([]);
  expect(surveyor.chart({})).toEqual([]);
});

describe("non-navigable nodes", () => {
  const origin = { a: 1, list: [1, 2, 3] };

  test("throw by default", () => {
    expect(() => recordsOnly.chart(origin)).toThrow(NonNavigableError);
    expect(() => recordsOnly.chart(origin)).toThrow(
      "No compass can navigate [1, 2, 3]",
    );
  });

  test("are listed before the failure in strict mode", () => {
    const entries: ChartEntry[] = [];
    expect(() => {
      for (const entry of recordsOnly.chartIter(origin)) entries.push(entry);
    }).toThrow("No compass can navigate [1, 2, 3]");
    expect(shorthand(entries)).toEqual([
      ["[a]", 1],
      ["[list]", [1, 2, 3]],
    ]);
  });

  test("are reported after the last entry in tolerant mode", () => {
    const iter = recordsOnly.chartIter(origin, { exceptions: false });
    const first = iter.next();
    expect(first.done).toBe(false);
    expect(shorthand(first.done ? [] : [first.value])).toEqual([["[a]", 1]]);
    expect(() => iter.next()).toThrow(SuppressedErrors);
    expect(iter.next().done).toBe(true);
  });

  test("the eager form keeps the partial chart", () => {
    let caught: unknown;
    try {
      recordsOnly.chart(origin, { exceptions: false });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SuppressedErrors);
    if (!(caught instanceof SuppressedErrors)) return;
    expect(caught.errors).toHaveLength(1);
    expect(caught.types).toEqual([NonNavigableError]);
    expect(shorthand(caught.chartPartial)).toEqual([["[a]", 1]]);
  });

  test("a non-navigable root", () => {
    expect(() => recordsOnly.chart([1])).toThrow(NonNavigableError);
    expect(() => recordsOnly.chart([1], { exceptions: false })).toThrow(
      SuppressedErrors,
    );
  });
});

describe("options", () => {
  test("extra end points stop descent", () => {
    const origin = { m: new Map([["k", 1]]) };
    expect(new Surveyor().chart(origin)).toHaveLength(2);
    const chart = new Surveyor({ endPointsExtra: [Map] }).chart(origin);
    expect(shorthand(chart)).toEqual([["[m]", origin.m]]);
  });

  test("end points replace the defaults", () => {
    const chart = new Surveyor({ endPoints: ["number"] }).chart({ s: "ab" });
    // Strings are navigable once they stop being end points
    expect(shorthand(chart)).toEqual([["[s]", "ab"]]);
  });

  test("extra compasses are tried first", () => {
    const surveyor = new Surveyor({
      compassesExtra: [new Compass({ targetTypes: [Point], attrs: ["x"] })],
    });
    expect(shorthand(surveyor.chart({ p: new Point() })).map(([c]) => c)).toEqual([
      "[p]",
      "[p]/@x",
    ]);
  });

  test("maxDepth", () => {
    const surveyor = new Surveyor({ maxDepth: 1 });
    const origin = { a: 1, b: { c: 2 } };
    expect(() => surveyor.chart(origin)).toThrow(NonNavigableError);

    let caught: unknown;
    try {
      surveyor.chart(origin, { exceptions: false });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SuppressedErrors);
    if (!(caught instanceof SuppressedErrors)) return;
    expect(shorthand(caught.chartPartial)).toEqual([["[a]", 1]]);
  });

  test("courses carry the surveyor's config", () => {
    const config = extendCourseConfig([]);
    const [entry] = new Surveyor({ course: config }).chart({ a: 1 });
    expect(entry?.[0].config).toBe(config);
  });
});

describe("chartIter", () => {
  test("each call starts a fresh traversal", () => {
    const surveyor = new Surveyor();
    const origin = { a: [1, 2] };
    expect(shorthand(surveyor.chartIter(origin))).toEqual(
      shorthand(surveyor.chartIter(origin)),
    );
  });

  test("stopping early leaves the rest untouched", () => {
    let calls = 0;
    const surveyor = new Surveyor({
      compasses: [new Compass({ calls: ["next"] })],
    });
    const counter = {
      next() {
        calls += 1;
        return calls;
      },
    };
    for (const [c] of surveyor.chartIter({ first: 1, later: counter })) {
      expect(c.toString()).toBe("[first]");
      break;
    }
    expect(calls).toBe(0);
  });

  test("a node's children are listed only after the node is seen", () => {
    let calls = 0;
    const surveyor = new Surveyor({
      compasses: [new Compass({ attrs: false, calls: ["next"] })],
    });
    class Counter {
      next() {
        calls += 1;
        return calls;
      }
    }
    const iter = surveyor.chartIter({ counter: new Counter() });
    const first = iter.next();
    expect(first.done ? undefined : first.value[0].toString()).toBe("[counter]");
    expect(calls).toBe(0);
    const second = iter.next();
    expect(second.done ? undefined : second.value[0].toString()).toBe("[counter]/next()");
    expect(calls).toBe(1);
  });
});
