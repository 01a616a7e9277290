/**
 * Human-readable formatting for values, bearings and courses.
 *
 * Produces unambiguous strings like `{a: 1, list: [1, 2]}` for values and
 * `Item("list") / Item(0)` for courses. Used in error messages and in the
 * diagnostic events a Cartographer emits.
 *
 * Supports the same `reducers` interface as devalue's `stringify()`.
 */

import { Bearing } from "./bearing.ts";
import { Course } from "./course.ts";

export type Reducers = Record<string, (value: unknown) => false | unknown[]>;

const IS_IDENT = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function formatValue(value: unknown, reducers?: Reducers): string {
  return fmt(value, new Map(), reducers);
}

/** Debug form of a bearing: `Item(0)`, `Attr("name", factory=Map)`. */
export function formatBearing(bearing: Bearing): string {
  const kind = bearing.kind.tag;
  const label = kind.charAt(0).toUpperCase() + kind.slice(1);
  const factory = bearing.factory ? `, factory=${bearing.factory.name}` : "";
  return `${label}(${fmt(bearing.name, new Map(), undefined)}${factory})`;
}

export function formatCourse(course: Course): string {
  if (course.length === 0) return "<root>";
  return [...course].map(formatBearing).join(" / ");
}

function fmt(
  thing: unknown,
  seen: Map<object, number>,
  reducers: Reducers | undefined,
): string {
  if (thing === undefined) return "undefined";
  if (thing === null) return "null";

  switch (typeof thing) {
    case "string":
      return JSON.stringify(thing);
    case "number":
      if (Object.is(thing, -0)) return "-0";
      return String(thing);
    case "boolean":
      return String(thing);
    case "bigint":
      return thing + "n";
    case "symbol":
      return (
        "Symbol(" +
        (thing.description !== undefined
          ? JSON.stringify(thing.description)
          : "") +
        ")"
      );
    case "function":
      return thing.name ? `[Function ${thing.name}]` : "[Function]";
  }

  if (typeof thing !== "object") return String(thing);

  // Objects: circular reference tracking
  const index = seen.get(thing);
  if (index !== undefined) return "$" + index;
  seen.set(thing, seen.size);

  if (reducers) {
    for (const name of Object.getOwnPropertyNames(reducers)) {
      const reduce = reducers[name];
      const result = reduce ? reduce(thing) : false;
      if (result) {
        return (
          name + "(" + result.map((a) => fmt(a, seen, reducers)).join(", ") + ")"
        );
      }
    }
  }

  if (thing instanceof Bearing) return formatBearing(thing);
  if (thing instanceof Course) return "Course(" + formatCourse(thing) + ")";

  if (thing instanceof Date) {
    return isNaN(thing.getTime())
      ? "Date(Invalid)"
      : "Date(" + JSON.stringify(thing.toISOString()) + ")";
  }
  if (thing instanceof RegExp) return "/" + thing.source + "/" + thing.flags;

  if (thing instanceof Map) {
    const entries: string[] = [];
    for (const [k, v] of thing) {
      entries.push(fmt(k, seen, reducers) + " => " + fmt(v, seen, reducers));
    }
    return "Map(" + entries.join(", ") + ")";
  }
  if (thing instanceof Set) {
    const items: string[] = [];
    for (const v of thing) items.push(fmt(v, seen, reducers));
    return "Set(" + items.join(", ") + ")";
  }

  if (Array.isArray(thing)) {
    const items: string[] = [];
    for (let i = 0; i < thing.length; i++) {
      items.push(i in thing ? fmt(thing[i], seen, reducers) : "<hole>");
    }
    return "[" + items.join(", ") + "]";
  }

  const proto = Object.getPrototypeOf(thing);
  const entries: string[] = [];
  for (const [key, value] of Object.entries(thing)) {
    const fmtKey = IS_IDENT.test(key) ? key : JSON.stringify(key);
    entries.push(fmtKey + ": " + fmt(value, seen, reducers));
  }
  if (proto === null) {
    return "[Object: null prototype] {" + entries.join(", ") + "}";
  }
  if (proto === Object.prototype) return "{" + entries.join(", ") + "}";

  // Class instances show their constructor and own enumerable fields
  const name = thing.constructor?.name || "Object";
  return name + " {" + entries.join(", ") + "}";
}
