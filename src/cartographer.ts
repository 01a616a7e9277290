/**
 * Cartographer: copies values from one object graph into another.
 *
 * Each Coordinate names where a value comes from and where it goes, plus
 * optional cleaning hooks. A Surveyor can also be given, in which case
 * every leaf of the origin not already covered by a coordinate is copied
 * to the same place in the destination.
 *
 * Cleaning order per coordinate: origins, value, destinations. A hook
 * given on the coordinate replaces the Cartographer's method of the same
 * name, so subclasses can change the defaults for every coordinate.
 */

import { Fallback } from "./bearing.ts";
import {
  Coordinate,
  NO_DEFAULT,
  type CleanData,
  type MapCache,
} from "./coordinate.ts";
import { Course } from "./course.ts";
import {
  ChartError,
  MissingAddressError,
  NonNavigableError,
  SuppressedErrors,
  ValidationError,
  type ChartEntry,
} from "./errors.ts";
import type {
  CartographerEvent,
  CartographerEvents,
  MapErrorInfo,
  PlaceInfo,
} from "./hooks.ts";
import { validateValue } from "./schema.ts";
import type { Surveyor } from "./surveyor.ts";

export interface MapOptions {
  coordinates?: Iterable<Coordinate>;
  /** Charts the origin and copies every leaf no coordinate covered. */
  surveyor?: Surveyor;
  /**
   * When false, mapping errors are collected and thrown together as one
   * `SuppressedErrors` once every coordinate has run. Defaults to true.
   */
  exceptions?: boolean;
}

type HandlerSets = { [E in CartographerEvent]: Set<CartographerEvents[E]> };

export class Cartographer {
  readonly #handlers: HandlerSets = { place: new Set(), error: new Set() };

  on<E extends CartographerEvent>(event: E, handler: CartographerEvents[E]): void {
    this.#handlers[event].add(handler);
  }

  off<E extends CartographerEvent>(event: E, handler: CartographerEvents[E]): void {
    this.#handlers[event].delete(handler);
  }

  cleanOrigin(
    origin: Course,
    _coordinate: Coordinate,
    _cache: MapCache,
    _scratch: CleanData,
  ): Course {
    return origin;
  }

  cleanValue(
    value: unknown,
    _coordinate: Coordinate,
    _cache: MapCache,
    _scratch: CleanData,
  ): unknown {
    return value;
  }

  /** Without a destination, mirrors the first cleaned origin. */
  cleanDestination(
    destination: Course | undefined,
    _coordinate: Coordinate,
    _cache: MapCache,
    scratch: CleanData,
  ): Course {
    if (destination) return destination;
    const origin = scratch.origins[0];
    if (!origin) {
      throw new ValidationError([{ message: "Cannot mirror a coordinate without origins" }]);
    }
    return mirror(origin);
  }

  map(originRoot: unknown, destinationRoot: unknown, options: MapOptions = {}): void {
    const exceptions = options.exceptions ?? true;
    const cache: MapCache = new Map();
    const errors: ChartError[] = [];
    const mapped: Course[] = [];

    const fail = (error: unknown, info: MapErrorInfo): void => {
      if (!isMappingError(error)) throw error;
      for (const handler of this.#handlers.error) handler(error, info);
      if (exceptions) throw error;
      errors.push(error);
    };

    for (const coordinate of options.coordinates ?? []) {
      const scratch = createScratch(coordinate);
      try {
        this.#mapCoordinate(originRoot, destinationRoot, coordinate, cache, scratch, undefined);
        mapped.push(...scratch.origins);
      } catch (error) {
        fail(error, { coordinate, origins: scratch.origins, implicit: false });
      }
    }

    if (options.surveyor) {
      let chart: ChartEntry[] = [];
      try {
        chart = options.surveyor.chart(originRoot, { exceptions });
      } catch (error) {
        if (!(error instanceof SuppressedErrors)) {
          fail(error, { origins: [], implicit: true });
        } else {
          for (const suppressed of error.errors) {
            for (const handler of this.#handlers.error) {
              handler(suppressed, { origins: [], implicit: true });
            }
          }
          errors.push(...error.errors);
          chart = error.chartPartial;
        }
      }

      for (const [origin, value] of leaves(chart)) {
        if (origin.length === 0) continue;
        if (mapped.some((m) => m.startsWith(origin) || origin.startsWith(m))) {
          continue;
        }
        const coordinate = new Coordinate({ origin });
        const scratch = createScratch(coordinate);
        try {
          this.#mapCoordinate(originRoot, destinationRoot, coordinate, cache, scratch, { value });
        } catch (error) {
          fail(error, { coordinate, origins: scratch.origins, implicit: true });
        }
        mapped.push(origin);
      }
    }

    if (errors.length > 0) {
      throw new SuppressedErrors("Some coordinates could not be mapped", errors);
    }
  }

  #mapCoordinate(
    originRoot: unknown,
    destinationRoot: unknown,
    coordinate: Coordinate,
    cache: MapCache,
    scratch: CleanData,
    charted: { value: unknown } | undefined,
  ): void {
    const cleanOrigin = coordinate.cleanOrigin ?? this.cleanOrigin.bind(this);
    const cleanValue = coordinate.cleanValue ?? this.cleanValue.bind(this);
    const cleanDestination =
      coordinate.cleanDestination ?? this.cleanDestination.bind(this);

    scratch.origins.forEach((origin, i) => {
      scratch.origins[i] = cleanOrigin(origin, coordinate, cache, scratch);
    });

    if (charted) {
      scratch.value = charted.value;
    } else {
      const defaults = coordinate.defaults;
      const values = scratch.origins.map((origin, i) => {
        const fallback = i < defaults.length ? defaults[i] : NO_DEFAULT;
        return fallback === NO_DEFAULT
          ? origin.fetch(originRoot)
          : origin.fetch(originRoot, fallback);
      });
      scratch.value = values.length === 1 ? values[0] : values;
    }

    scratch.value = cleanValue(scratch.value, coordinate, cache, scratch);
    if (coordinate.schema) {
      scratch.value = validateValue(coordinate.schema, scratch.value, "value");
    }

    scratch.destinations.forEach((destination, i) => {
      scratch.destinations[i] = cleanDestination(destination, coordinate, cache, scratch);
    });

    const writes = positional(scratch.destinations, scratch.value);
    for (const [destination, value] of writes) {
      destination.place(destinationRoot, value);
      const info: PlaceInfo = {
        coordinate,
        origins: scratch.origins,
        destination,
        value,
        path: `${scratch.origins.map(String).join(", ")} -> ${destination.toString()}`,
        implicit: charted !== undefined,
      };
      for (const handler of this.#handlers.place) handler(info);
    }
  }
}

/**
 * Course of Fallback bearings with the same names as `origin`'s.
 * Intermediate bearings build a missing container: an array when the next
 * name is a number, a plain object otherwise.
 */
export function mirror(origin: Course): Course {
  const { bearings } = origin;
  return new Course(
    bearings.map((b, i) => {
      const next = bearings[i + 1];
      if (!next) return new Fallback(b.name);
      return new Fallback(b.name, {
        factory: typeof next.name === "number" ? Array : Object,
      });
    }),
    origin.config,
  );
}

function createScratch(coordinate: Coordinate): CleanData {
  return {
    origins: [...coordinate.origins],
    destinations: [...coordinate.destinations],
    value: undefined,
  };
}

/** Entries with no descendant in a pre-order chart. */
function* leaves(chart: readonly ChartEntry[]): Generator<ChartEntry> {
  for (let i = 0; i < chart.length; i++) {
    const entry = chart[i];
    if (!entry) continue;
    const next = chart[i + 1];
    if (next && next[0].length > entry[0].length && next[0].startsWith(entry[0])) {
      continue;
    }
    yield entry;
  }
}

function positional(
  destinations: readonly (Course | undefined)[],
  value: unknown,
): [Course, unknown][] {
  const courses = destinations.filter((d): d is Course => d !== undefined);
  if (courses.length !== destinations.length) {
    throw new ValidationError([{ message: "Every destination must clean to a course" }]);
  }
  const [only] = courses;
  if (only && courses.length === 1) return [[only, value]];

  if (!Array.isArray(value) || value.length !== courses.length) {
    throw new ValidationError([
      { message: `Expected an array of ${courses.length} values, one per destination` },
    ]);
  }
  return courses.map((course, i): [Course, unknown] => [course, value[i]]);
}

function isMappingError(error: unknown): error is ChartError {
  return (
    error instanceof MissingAddressError ||
    error instanceof NonNavigableError ||
    error instanceof ValidationError
  );
}
