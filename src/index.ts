// Bearings
export {
  Bearing,
  Item,
  Attr,
  Call,
  Fallback,
  ItemKind,
  AttrKind,
  CallKind,
  FallbackKind,
  DEFAULT_KINDS,
  bearing,
  compareBearings,
  defineKind,
} from "./bearing.ts";
export type {
  BearingKind,
  BearingOptions,
  BearingFactoryOptions,
  FallbackOptions,
  KindCreateOptions,
  KindDefinition,
} from "./bearing.ts";

// Courses
export {
  Course,
  ROOT,
  course,
  lookup,
  shouldConstruct,
  extendCourseConfig,
  DEFAULT_COURSE_CONFIG,
} from "./course.ts";
export type { CourseConfig, Lookup } from "./course.ts";

// Navigation
export { Compass } from "./compass.ts";
export type { CompassOptions, BearingEntry } from "./compass.ts";
export { Surveyor, DEFAULT_END_POINTS } from "./surveyor.ts";
export type { SurveyorOptions, ChartOptions } from "./surveyor.ts";

// Mapping
export { Coordinate, NO_DEFAULT } from "./coordinate.ts";
export type {
  CoordinateOptions,
  CleanData,
  CleanHook,
  MapCache,
  NoDefault,
} from "./coordinate.ts";
export { Cartographer, mirror } from "./cartographer.ts";
export type { MapOptions } from "./cartographer.ts";

// Hooks
export type {
  PlaceInfo,
  MapErrorInfo,
  CartographerEvents,
  CartographerEvent,
} from "./hooks.ts";

// Errors
export {
  ChartError,
  FormatError,
  TypeMismatchError,
  NonNavigableError,
  MissingAddressError,
  UnsupportedOperationError,
  ValidationError,
  SuppressedErrors,
} from "./errors.ts";
export type { ChartEntry } from "./errors.ts";

// Formatting
export { formatValue, formatBearing, formatCourse } from "./format.ts";
export type { Reducers } from "./format.ts";

// Serialization
export { createSerializer } from "./serialization.ts";
export type { Serializer, SerializerOptions, Revivers } from "./serialization.ts";

// Standard Schema
export { courseSchema, validateValue, isStandardSchema } from "./schema.ts";

// Types
export { matchesType, matchesAny, isRecord } from "./types.ts";
export type { TypeTag, TypeMatcher, Constructor, Factory } from "./types.ts";
