import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { Course } from "./course.ts";
import { ValidationError } from "./errors.ts";

/** Marks a coordinate (or one origin of it) as having no default value. */
export const NO_DEFAULT: unique symbol = Symbol("charted.noDefault");
export type NoDefault = typeof NO_DEFAULT;

/** Shared by every coordinate of one `Cartographer.map()` call. */
export type MapCache = Map<string, unknown>;

/**
 * Per-coordinate scratch record of one `map()` call. Hooks see the values
 * cleaned so far: origins are replaced one by one as they are cleaned.
 */
export interface CleanData {
  origins: Course[];
  /** `undefined` entries mirror the first origin. */
  destinations: (Course | undefined)[];
  value: unknown;
}

export type CleanHook<In, Out = In> = (
  input: In,
  coordinate: Coordinate,
  cache: MapCache,
  scratch: CleanData,
) => Out;

export interface CoordinateOptions {
  /** One course, or several whose values are fetched as an array. */
  origin: Course | readonly Course[];
  /** Omitted: write to the course mirroring the first origin. */
  destination?: Course | readonly Course[];
  cleanOrigin?: CleanHook<Course>;
  cleanValue?: CleanHook<unknown>;
  cleanDestination?: CleanHook<Course | undefined, Course>;
  /**
   * Value used when an origin is missing. With several origins this is
   * an array holding one default (or `NO_DEFAULT`) per origin.
   */
  default?: unknown;
  /** Checked against the cleaned value before it is written. */
  schema?: StandardSchemaV1;
}

/** One transfer instruction for `Cartographer.map()`. */
export class Coordinate {
  readonly origin: Course | readonly Course[];
  readonly destination: Course | readonly Course[] | undefined;
  readonly cleanOrigin: CleanHook<Course> | undefined;
  readonly cleanValue: CleanHook<unknown> | undefined;
  readonly cleanDestination: CleanHook<Course | undefined, Course> | undefined;
  readonly default: unknown;
  readonly schema: StandardSchemaV1 | undefined;

  constructor(options: CoordinateOptions) {
    // Lists are copied so later changes by the caller cannot unbalance them
    this.origin = freezeList(options.origin);
    this.destination =
      options.destination === undefined ? undefined : freezeList(options.destination);
    this.cleanOrigin = options.cleanOrigin;
    this.cleanValue = options.cleanValue;
    this.cleanDestination = options.cleanDestination;
    const defaults = "default" in options ? options.default : NO_DEFAULT;
    this.default =
      isCourseList(this.origin) && Array.isArray(defaults)
        ? Object.freeze([...defaults])
        : defaults;
    this.schema = options.schema;

    if (isCourseList(this.origin)) {
      if (this.origin.length === 0) {
        throw new ValidationError([{ message: "A coordinate needs at least one origin" }]);
      }
      if (this.default !== NO_DEFAULT) {
        if (!Array.isArray(this.default) || this.default.length !== this.origin.length) {
          throw new ValidationError([
            {
              message: `Expected ${this.origin.length} defaults, one per origin`,
              path: ["default"],
            },
          ]);
        }
      }
    }
  }

  get origins(): readonly Course[] {
    return isCourseList(this.origin) ? this.origin : [this.origin];
  }

  get destinations(): readonly (Course | undefined)[] {
    if (this.destination === undefined) return [undefined];
    return isCourseList(this.destination) ? this.destination : [this.destination];
  }

  /** Default for each origin, `NO_DEFAULT` where there is none. */
  get defaults(): readonly unknown[] {
    if (isCourseList(this.origin) && Array.isArray(this.default)) {
      return this.default;
    }
    return this.origins.map(() => this.default);
  }
}

function isCourseList(
  value: Course | readonly Course[] | undefined,
): value is readonly Course[] {
  return Array.isArray(value);
}

function freezeList(value: Course | readonly Course[]): Course | readonly Course[] {
  return isCourseList(value) ? Object.freeze([...value]) : value;
}
