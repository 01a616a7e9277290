/**
 * Course: an immutable path from a root object to a nested value.
 *
 * A course is an ordered list of bearings. Raw inputs are cast to bearings
 * through the kinds listed in the course's config, so
 * `course("users", 0, "@name")` reads as item-or-call-or-attr `users`,
 * index `0`, attribute `name`.
 */

import { Bearing, DEFAULT_KINDS, bearing, type BearingKind } from "./bearing.ts";
import { MissingAddressError, UnsupportedOperationError } from "./errors.ts";
import { isRecord, type Factory } from "./types.ts";

export interface CourseConfig {
  /** Candidate kinds for casting raw inputs, tried in order. */
  readonly kinds: readonly BearingKind[];
}

export const DEFAULT_COURSE_CONFIG: CourseConfig = { kinds: DEFAULT_KINDS };

/** A config whose extra kinds are tried ahead of `base`'s. */
export function extendCourseConfig(
  extraKinds: readonly BearingKind[],
  base: CourseConfig = DEFAULT_COURSE_CONFIG,
): CourseConfig {
  return { kinds: [...extraKinds, ...base.kinds] };
}

export class Course implements Iterable<Bearing> {
  readonly bearings: readonly Bearing[];
  readonly config: CourseConfig;

  constructor(
    inputs: Iterable<unknown> = [],
    config: CourseConfig = DEFAULT_COURSE_CONFIG,
  ) {
    this.config = config;
    this.bearings = Object.freeze([...castInputs(inputs, config)]);
  }

  /** Parses `a/[0]/@b/c()` shorthand. The empty string is the root course. */
  static parse(
    text: string,
    config: CourseConfig = DEFAULT_COURSE_CONFIG,
  ): Course {
    return new Course(text === "" ? [] : [text], config);
  }

  get length(): number {
    return this.bearings.length;
  }

  /** Course of every bearing but the last. */
  get parent(): Course {
    return this.slice(0, -1);
  }

  get endPoint(): Bearing | undefined {
    return this.bearings.at(-1);
  }

  at(index: number): Bearing | undefined {
    return this.bearings.at(index);
  }

  slice(start?: number, end?: number): Course {
    return new Course(this.bearings.slice(start, end), this.config);
  }

  append(...inputs: unknown[]): Course {
    return new Course([this, ...inputs], this.config);
  }

  withEndPoint(endPoint: unknown): Course {
    return new Course([this.parent, endPoint], this.config);
  }

  /**
   * Replaces the bearing at `index`, or the bearings in `[start, end)`,
   * with `replacement`. Negative positions count from the end.
   */
  replace(
    index: number | readonly [start: number, end: number],
    replacement: unknown,
  ): Course {
    const [start, end] =
      typeof index === "number"
        ? [normalize(index, this.length), normalize(index, this.length) + 1]
        : [normalize(index[0], this.length), normalize(index[1], this.length)];
    return new Course(
      [
        ...this.bearings.slice(0, start),
        replacement,
        ...this.bearings.slice(end),
      ],
      this.config,
    );
  }

  equals(other: unknown): boolean {
    const that = other instanceof Course ? other : new Course([other], this.config);
    if (that.length !== this.length) return false;
    return this.bearings.every((b, i) => {
      const o = that.bearings[i];
      return o !== undefined && b.equals(o);
    });
  }

  /** Whether `other` appears as a contiguous run of bearings. */
  includes(other: Bearing | Course): boolean {
    const needle = other instanceof Course ? other : new Course([other]);
    for (let i = 0; i + needle.length <= this.length; i++) {
      if (this.slice(i, i + needle.length).equals(needle)) return true;
    }
    return false;
  }

  startsWith(other: Bearing | Course): boolean {
    const needle = other instanceof Course ? other : new Course([other]);
    return (
      needle.length <= this.length &&
      this.slice(0, needle.length).equals(needle)
    );
  }

  endsWith(other: Bearing | Course): boolean {
    const needle = other instanceof Course ? other : new Course([other]);
    return (
      needle.length <= this.length &&
      this.slice(this.length - needle.length).equals(needle)
    );
  }

  /**
   * Walks `root` along the course and returns the value at the end.
   *
   * A missing address throws `MissingAddressError`, unless a default value
   * was passed, in which case that is returned instead.
   */
  fetch(root: unknown, ...fallback: [] | [defaultValue: unknown]): unknown {
    let target = root;
    for (const step of this.bearings) {
      try {
        target = step.fetch(target);
      } catch (error) {
        if (error instanceof MissingAddressError && fallback.length > 0) {
          return fallback[0];
        }
        throw error;
      }
    }
    return target;
  }

  /**
   * Writes `value` at the end of the course.
   *
   * Intermediate bearings that carry a factory build their container when
   * the address is missing or holds a value of another type.
   */
  place(root: unknown, value: unknown): void {
    const endPoint = this.endPoint;
    if (!endPoint) throw new UnsupportedOperationError("place", "the root course");

    let target = root;
    for (const step of this.parent) {
      const current = lookup(step, target);
      if (step.factory && shouldConstruct(current, step.factory)) {
        const node = step.initFactory();
        step.place(target, node);
        target = node;
      } else if (current.found) {
        target = current.value;
      } else {
        throw current.error;
      }
    }
    endPoint.place(target, value);
  }

  [Symbol.iterator](): Iterator<Bearing> {
    return this.bearings[Symbol.iterator]();
  }

  toString(): string {
    return this.bearings.map(String).join("/");
  }
}

export type Lookup =
  | { found: true; value: unknown }
  | { found: false; error: MissingAddressError };

export function lookup(step: Bearing, target: unknown): Lookup {
  try {
    return { found: true, value: step.fetch(target) };
  } catch (error) {
    if (error instanceof MissingAddressError) return { found: false, error };
    throw error;
  }
}

/**
 * Whether `place` must build a new container: the address is missing, or
 * what is there is not what the factory builds. Every object inherits from
 * `Object`, so that factory only accepts plain records.
 */
export function shouldConstruct(current: Lookup, factory: Factory): boolean {
  if (!current.found) return true;
  if (factory === Object) return !isRecord(current.value);
  return !(current.value instanceof factory);
}

/** Builds a course with the default config. */
export function course(...inputs: unknown[]): Course {
  return new Course(inputs);
}

export const ROOT: Course = new Course();

function* castInputs(
  inputs: Iterable<unknown>,
  config: CourseConfig,
): Generator<Bearing> {
  for (const input of inputs) {
    if (input instanceof Course) {
      yield* input.bearings;
    } else if (input instanceof Bearing) {
      yield input;
    } else if (typeof input === "string") {
      for (const part of input.split("/")) {
        yield bearing(part, { kinds: config.kinds });
      }
    } else {
      yield bearing(input, { kinds: config.kinds });
    }
  }
}

function normalize(index: number, length: number): number {
  return Math.max(0, Math.min(length, index < 0 ? index + length : index));
}
