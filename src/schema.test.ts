import { test, expect } from "vitest";
import type { StandardSchemaV1 } from "@standard-schema/spec";
import { z } from "zod";
import { Item } from "./bearing.ts";
import { Course, course, extendCourseConfig } from "./course.ts";
import { ValidationError } from "./errors.ts";
import { courseSchema, isStandardSchema, validateValue } from "./schema.ts";

test("courseSchema coerces strings, arrays and courses", () => {
  const schema = courseSchema();
  const fromText = validateValue(schema, "a/[0]");
  expect(fromText).toBeInstanceOf(Course);
  expect(fromText.toString()).toBe("a/[0]");

  const fromArray = validateValue(schema, ["a", 0]);
  expect(fromArray.equals(course("a/[0]"))).toBe(true);

  const existing = course("b");
  expect(validateValue(schema, existing)).toBe(existing);
});

test("courseSchema moves courses onto its config", () => {
  const config = extendCourseConfig([]);
  const result = validateValue(courseSchema(config), course("a"));
  expect(result.config).toBe(config);
  expect(result.toString()).toBe("a");
});

test("courseSchema rejects other values", () => {
  const result = courseSchema()["~standard"].validate(42);
  expect(result).toEqual({
    issues: [{ message: "Expected a course, string or array, got 42" }],
  });
});

test("courseSchema composes with zod", () => {
  const schema = z.object({ from: z.string(), to: z.string() });
  const parsed = schema.parse({ from: "a/b", to: "c" });
  const from = validateValue(courseSchema(), parsed.from);
  expect(from.at(1)?.name).toBe("b");
});

test("validateValue returns the schema output", () => {
  expect(validateValue(z.coerce.number(), "12")).toBe(12);
});

test("validateValue raises issues with their paths", () => {
  const schema = z.object({ size: z.object({ w: z.number() }) });
  let caught: unknown;
  try {
    validateValue(schema, { size: { w: "wide" } }, "value");
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(ValidationError);
  if (!(caught instanceof ValidationError)) return;
  expect(caught.issues).toHaveLength(1);
  expect(caught.issues[0]?.path).toEqual(["size", "w"]);
  expect(caught.issues[0]?.message.startsWith("value: ")).toBe(true);
});

test("validateValue rejects asynchronous schemas", () => {
  const asyncSchema: StandardSchemaV1<unknown, unknown> = {
    "~standard": {
      version: 1,
      vendor: "test",
      validate: async (value) => ({ value }),
    },
  };
  expect(() => validateValue(asyncSchema, 1)).toThrow(
    "Validation failed: Asynchronous schemas are not supported",
  );
});

test("isStandardSchema", () => {
  expect(isStandardSchema(z.string())).toBe(true);
  expect(isStandardSchema(courseSchema())).toBe(true);
  expect(isStandardSchema({})).toBe(false);
  expect(isStandardSchema(new Item(0))).toBe(false);
});
