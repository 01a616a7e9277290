/**
 * Runtime type matching shared by compasses (which targets they accept)
 * and surveyors (which values end a course).
 *
 * JavaScript has no single notion of "the type of a value", so a matcher
 * is either a `typeof` tag, one of the structural tags below, or a
 * constructor tested with `instanceof`.
 */

export type TypeTag =
  | "string"
  | "number"
  | "bigint"
  | "boolean"
  | "symbol"
  | "function"
  | "undefined"
  | "null"
  /** Plain object: prototype is `Object.prototype` or `null`. */
  | "record"
  | "array";

export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

export type TypeMatcher = TypeTag | Constructor;

/** Zero-argument constructor used to build missing containers during `place`. */
export type Factory<T = unknown> = new () => T;

export function isRecord(value: unknown): value is Record<PropertyKey, unknown> {
  if (value === null || typeof value !== "object") return false;
  if (value === Object.prototype) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

export function matchesType(value: unknown, matcher: TypeMatcher): boolean {
  if (typeof matcher === "function") {
    return value instanceof matcher;
  }
  switch (matcher) {
    case "null":
      return value === null;
    case "record":
      return isRecord(value);
    case "array":
      return Array.isArray(value);
    default:
      return typeof value === matcher;
  }
}

export function matchesAny(
  value: unknown,
  matchers: readonly TypeMatcher[],
): boolean {
  return matchers.some((m) => matchesType(value, m));
}

/** Name of a value's runtime type, as used for bearing ordering. */
export function runtimeTypeName(value: unknown): string {
  return value === null ? "null" : typeof value;
}
