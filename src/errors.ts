import type { Course } from "./course.ts";

export class ChartError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = this.constructor.name;
  }
}

/** Shorthand text does not match a bearing kind's pattern. */
export class FormatError extends ChartError {
  readonly text: string;
  readonly kind: string;

  constructor(text: string, kind: string) {
    super("FORMAT_ERROR", `${JSON.stringify(text)} is not ${kind} shorthand`);
    this.text = text;
    this.kind = kind;
  }
}

/** A bearing was constructed with a name its kind does not allow. */
export class TypeMismatchError extends ChartError {
  readonly bearingName: unknown;
  readonly kind: string;

  constructor(bearingName: unknown, kind: string) {
    super(
      "TYPE_MISMATCH",
      `${typeName(bearingName)} is not a valid ${kind} name`,
    );
    this.bearingName = bearingName;
    this.kind = kind;
  }
}

export class NonNavigableError extends ChartError {
  constructor(message: string) {
    super("NON_NAVIGABLE", message);
  }
}

/** The address named by a bearing does not exist on the walked object. */
export class MissingAddressError extends ChartError {
  readonly address: string;

  constructor(address: string) {
    super("MISSING_ADDRESS", `Address not found: ${address}`);
    this.address = address;
  }
}

export class UnsupportedOperationError extends ChartError {
  readonly operation: string;
  readonly address: string;

  constructor(operation: string, address: string) {
    super(
      "UNSUPPORTED_OPERATION",
      `${operation} is not supported by ${address}`,
    );
    this.operation = operation;
    this.address = address;
  }
}

export class ValidationError extends ChartError {
  readonly issues: ReadonlyArray<{
    message: string;
    path?: ReadonlyArray<PropertyKey>;
  }>;

  constructor(
    issues: ReadonlyArray<{
      message: string;
      path?: ReadonlyArray<PropertyKey>;
    }>,
  ) {
    super(
      "VALIDATION_ERROR",
      `Validation failed: ${issues.map((i) => i.message).join(", ")}`,
    );
    this.issues = issues;
  }
}

export type ChartEntry = readonly [course: Course, value: unknown];

/**
 * Raised once at the end of a tolerant run, bundling every failure that
 * was caught along the way.
 *
 * `chartPartial` holds the entries produced before the error was raised
 * when it comes from `Surveyor.chart()`.
 */
export class SuppressedErrors extends ChartError {
  readonly summary: string;
  readonly errors: ChartError[];
  chartPartial: ChartEntry[] = [];

  constructor(summary: string, errors: readonly ChartError[]) {
    super("SUPPRESSED_ERRORS", `${summary} (${errors.length} suppressed)`);
    this.summary = summary;
    this.errors = [...errors];
  }

  /** Distinct constructors of the collected errors, in first-seen order. */
  get types(): Function[] {
    return [...new Set(this.errors.map((error) => error.constructor))];
  }
}

function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object" || typeof value === "function") {
    return value.constructor?.name ?? typeof value;
  }
  return typeof value;
}
