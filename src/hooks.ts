/**
 * Types for Cartographer events.
 *
 * Handlers run synchronously inside `map()`. An error thrown by a handler
 * propagates out of `map()` like any other caller error.
 */

import type { Coordinate } from "./coordinate.ts";
import type { Course } from "./course.ts";
import type { ChartError } from "./errors.ts";

export interface PlaceInfo {
  coordinate: Coordinate;
  /** Cleaned origin courses the value was read from. */
  origins: readonly Course[];
  /** Cleaned destination course the value was written to. */
  destination: Course;
  value: unknown;
  /** Human-readable transfer, e.g. `width, height -> resolution`. */
  path: string;
  /** True when the coordinate was derived from a surveyor chart. */
  implicit: boolean;
}

export interface MapErrorInfo {
  /** Absent when the error came from charting the origin. */
  coordinate?: Coordinate;
  origins: readonly Course[];
  implicit: boolean;
}

export interface CartographerEvents {
  place: (info: PlaceInfo) => void;
  error: (error: ChartError, info: MapErrorInfo) => void;
}

export type CartographerEvent = keyof CartographerEvents;
