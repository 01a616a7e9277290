/**
 * Serialization layer using devalue with custom reducers/revivers.
 *
 * Courses, bearings and the error classes survive a round trip. Bearings
 * are stored by kind tag, so a serializer that reads courses with custom
 * kinds must be created with those kinds. Factories are stored by name and
 * looked up in `factories` on the way back.
 */

import { stringify, parse, unflatten } from "devalue";
import {
  Bearing,
  DEFAULT_KINDS,
  Fallback,
  type BearingKind,
} from "./bearing.ts";
import { Course, DEFAULT_COURSE_CONFIG, type CourseConfig } from "./course.ts";
import {
  ChartError,
  FormatError,
  MissingAddressError,
  NonNavigableError,
  SuppressedErrors,
  TypeMismatchError,
  UnsupportedOperationError,
  ValidationError,
} from "./errors.ts";
import type { Reducers } from "./format.ts";
import type { Factory } from "./types.ts";

export type Revivers = Record<string, (value: unknown) => unknown>;

export interface Serializer {
  stringify(value: unknown): string;
  parse(str: string): unknown;
  revive(flattened: number | unknown[]): unknown;
}

export interface SerializerOptions {
  reducers?: Reducers;
  revivers?: Revivers;
  /** Config given to revived courses. Its kinds also resolve bearing tags. */
  course?: CourseConfig;
  /** Factories by name. Defaults to `Array`, `Object` and `Map`. */
  factories?: Record<string, Factory>;
}

const DEFAULT_FACTORIES: Record<string, Factory> = { Array, Object, Map };

const errorReducers: Reducers = {
  FormatError: (v) => v instanceof FormatError && [v.text, v.kind],
  TypeMismatchError: (v) =>
    v instanceof TypeMismatchError && [v.bearingName, v.kind],
  NonNavigableError: (v) => v instanceof NonNavigableError && [v.message],
  MissingAddressError: (v) => v instanceof MissingAddressError && [v.address],
  UnsupportedOperationError: (v) =>
    v instanceof UnsupportedOperationError && [v.operation, v.address],
  ValidationError: (v) => v instanceof ValidationError && [v.issues],
  SuppressedErrors: (v) =>
    v instanceof SuppressedErrors && [v.summary, v.errors],
  ChartError: (v) =>
    v instanceof ChartError && v.constructor === ChartError && [v.code, v.message],
};

const errorRevivers: Revivers = {
  FormatError: (v) => {
    const [text, kind] = fields(v, "FormatError");
    return new FormatError(str(text), str(kind));
  },
  TypeMismatchError: (v) => {
    const [name, kind] = fields(v, "TypeMismatchError");
    return new TypeMismatchError(name, str(kind));
  },
  NonNavigableError: (v) => new NonNavigableError(str(fields(v, "NonNavigableError")[0])),
  MissingAddressError: (v) =>
    new MissingAddressError(str(fields(v, "MissingAddressError")[0])),
  UnsupportedOperationError: (v) => {
    const [operation, address] = fields(v, "UnsupportedOperationError");
    return new UnsupportedOperationError(str(operation), str(address));
  },
  ValidationError: (v) => {
    const [issues] = fields(v, "ValidationError");
    return new ValidationError(
      fields(issues, "ValidationError").map((issue) => ({
        message: str(Reflect.get(Object(issue), "message")),
        path: optionalPath(Reflect.get(Object(issue), "path")),
      })),
    );
  },
  SuppressedErrors: (v) => {
    const [summary, errors] = fields(v, "SuppressedErrors");
    return new SuppressedErrors(
      str(summary),
      fields(errors, "SuppressedErrors").filter(
        (e): e is ChartError => e instanceof ChartError,
      ),
    );
  },
  ChartError: (v) => {
    const [code, message] = fields(v, "ChartError");
    return new ChartError(str(code), str(message));
  },
};

function courseCodec(
  config: CourseConfig,
  factories: Record<string, Factory>,
): { reducers: Reducers; revivers: Revivers } {
  const kindsByTag = new Map<string, BearingKind>();
  for (const kind of [...config.kinds, ...DEFAULT_KINDS]) {
    if (!kindsByTag.has(kind.tag)) kindsByTag.set(kind.tag, kind);
  }
  const kindOf = (tag: unknown): BearingKind => {
    const kind = kindsByTag.get(str(tag));
    if (!kind) {
      throw new ValidationError([{ message: `Unknown bearing kind: ${String(tag)}` }]);
    }
    return kind;
  };
  const factoryOf = (name: unknown): Factory | undefined => {
    if (name === null) return undefined;
    const factory = factories[str(name)];
    if (!factory) {
      throw new ValidationError([{ message: `Unknown factory: ${String(name)}` }]);
    }
    return factory;
  };

  return {
    reducers: {
      Course: (v) => v instanceof Course && [[...v.bearings]],
      Bearing: (v) =>
        v instanceof Bearing && [
          v.kind.tag,
          v.name,
          v.factory?.name ?? null,
          v instanceof Fallback ? v.equivalents.map((kind) => kind.tag) : null,
        ],
    },
    revivers: {
      Course: (v) => {
        const [bearings] = fields(v, "Course");
        return new Course(fields(bearings, "Course"), config);
      },
      Bearing: (v) => {
        const [tag, name, factory, equivalents] = fields(v, "Bearing");
        return kindOf(tag).create(name, {
          factory: factoryOf(factory),
          candidates:
            equivalents === null
              ? undefined
              : fields(equivalents, "Bearing").map(kindOf),
        });
      },
    },
  };
}

function buildSerializer(reducers: Reducers, revivers: Revivers): Serializer {
  return {
    stringify(value: unknown): string {
      return stringify(value, reducers);
    },
    parse(text: string): unknown {
      return parse(text, revivers);
    },
    revive(flattened: number | unknown[]): unknown {
      return unflatten(flattened, revivers);
    },
  };
}

export function createSerializer(options: SerializerOptions = {}): Serializer {
  const codec = courseCodec(
    options.course ?? DEFAULT_COURSE_CONFIG,
    options.factories ?? DEFAULT_FACTORIES,
  );
  return buildSerializer(
    { ...options.reducers, ...errorReducers, ...codec.reducers },
    { ...options.revivers, ...errorRevivers, ...codec.revivers },
  );
}

function fields(value: unknown, type: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ValidationError([{ message: `Malformed ${type} payload` }]);
  }
  return value;
}

function str(value: unknown): string {
  if (typeof value !== "string") {
    throw new ValidationError([{ message: `Expected a string, got ${typeof value}` }]);
  }
  return value;
}

function optionalPath(value: unknown): PropertyKey[] | undefined {
  if (value === undefined) return undefined;
  return fields(value, "ValidationError").filter(
    (key): key is PropertyKey =>
      typeof key === "string" || typeof key === "number" || typeof key === "symbol",
  );
}
