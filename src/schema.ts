/**
 * Standard Schema adapters: a schema that coerces input into a Course, and
 * synchronous validation of mapped values against any Standard Schema
 * (zod, valibot, arktype, ...).
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { Course, DEFAULT_COURSE_CONFIG, type CourseConfig } from "./course.ts";
import { ChartError, ValidationError } from "./errors.ts";
import { formatValue } from "./format.ts";

export function isStandardSchema(v: unknown): v is StandardSchemaV1 {
  return (
    typeof v === "object" &&
    v !== null &&
    "~standard" in v &&
    typeof v["~standard"] === "object"
  );
}

/**
 * Validates `value` and returns the schema's output. Issues are raised as
 * one `ValidationError`; schemas that validate asynchronously are rejected.
 */
export function validateValue<Output>(
  schema: StandardSchemaV1<unknown, Output>,
  value: unknown,
  label?: string,
): Output {
  const result = schema["~standard"].validate(value);
  if (result instanceof Promise) {
    throw new ValidationError([
      { message: "Asynchronous schemas are not supported" },
    ]);
  }
  if (result.issues) {
    throw new ValidationError(
      result.issues.map((issue) => ({
        message: label ? `${label}: ${issue.message}` : issue.message,
        path: issue.path?.map((segment) =>
          typeof segment === "object" ? segment.key : segment,
        ),
      })),
    );
  }
  return result.value;
}

/**
 * Schema accepting shorthand strings, arrays of course inputs and Courses,
 * producing a Course under `config`.
 */
export function courseSchema(
  config: CourseConfig = DEFAULT_COURSE_CONFIG,
): StandardSchemaV1<unknown, Course> {
  return {
    "~standard": {
      version: 1,
      vendor: "charted",
      validate(value) {
        if (value instanceof Course && value.config === config) {
          return { value };
        }
        if (
          !(value instanceof Course) &&
          typeof value !== "string" &&
          !Array.isArray(value)
        ) {
          return {
            issues: [
              {
                message: `Expected a course, string or array, got ${formatValue(value)}`,
              },
            ],
          };
        }
        try {
          return {
            value:
              typeof value === "string"
                ? Course.parse(value, config)
                : new Course(value, config),
          };
        } catch (error) {
          if (error instanceof ChartError) {
            return { issues: [{ message: error.message }] };
          }
          throw error;
        }
      },
    },
  };
}
