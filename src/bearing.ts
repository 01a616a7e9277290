/**
 * Bearings: single-step addresses into an object.
 *
 * A bearing pairs a name with an access kind. The built-in kinds are
 *
 *   item      `[name]`   Map entries, array indices, plain-object keys
 *   attr      `@name`    existing properties of any object
 *   call      `name()`   zero-argument methods (read only)
 *   fallback  `name`     tries its equivalent kinds in order
 *
 * Each kind is described by a `BearingKind`, which is what course casting,
 * shorthand parsing and fallback equivalence refer to. Adding a kind means
 * subclassing `Bearing` and describing it with `defineKind()`.
 */

import {
  FormatError,
  MissingAddressError,
  TypeMismatchError,
  UnsupportedOperationError,
} from "./errors.ts";
import { isRecord, runtimeTypeName, type Factory } from "./types.ts";

export interface BearingOptions {
  /** Builds the container when `Course.place` finds this address missing. */
  factory?: Factory;
}

export interface KindCreateOptions extends BearingOptions {
  /** Candidate kinds the bearing was resolved against, in order. */
  candidates?: readonly BearingKind[];
}

export interface BearingKind<B extends Bearing = Bearing> {
  readonly tag: string;
  /** Shorthand pattern; the first capture group holds the name. */
  readonly pattern: RegExp;
  /** Catch-all kinds sort last and never act as another fallback's equivalent. */
  readonly catchAll: boolean;
  accepts(name: unknown): boolean;
  nameFromString(text: string): unknown;
  create(name: unknown, options?: KindCreateOptions): B;
  fromString(text: string, options?: KindCreateOptions): B;
}

export interface KindDefinition<B extends Bearing> {
  tag: string;
  pattern: RegExp;
  catchAll?: boolean;
  accepts(name: unknown): boolean;
  nameFromString?(text: string): unknown;
  create(name: unknown, options: KindCreateOptions): B;
}

export function defineKind<B extends Bearing>(
  def: KindDefinition<B>,
): BearingKind<B> {
  const nameFromString =
    def.nameFromString ?? ((text: string): unknown => text);
  const kind: BearingKind<B> = {
    tag: def.tag,
    pattern: def.pattern,
    catchAll: def.catchAll ?? false,
    accepts: def.accepts,
    nameFromString,
    create(name, options = {}) {
      if (!def.accepts(name)) throw new TypeMismatchError(name, def.tag);
      return def.create(name, options);
    },
    fromString(text, options = {}) {
      const match = def.pattern.exec(text);
      if (!match) throw new FormatError(text, def.tag);
      return kind.create(nameFromString(match[1] ?? text), options);
    },
  };
  return kind;
}

export abstract class Bearing<N = unknown> {
  readonly kind: BearingKind;
  readonly name: N;
  readonly factory: Factory | undefined;

  protected constructor(kind: BearingKind, name: N, options: BearingOptions) {
    if (!kind.accepts(name)) throw new TypeMismatchError(name, kind.tag);
    this.kind = kind;
    this.name = name;
    this.factory = options.factory;
  }

  abstract fetch(target: unknown): unknown;
  abstract place(target: unknown, value: unknown): void;
  /** Canonical shorthand. */
  abstract toString(): string;

  /**
   * Builds a fresh container for `Course.place`. Kinds that need more than
   * a bare constructor call override this.
   */
  initFactory(): unknown {
    if (!this.factory) {
      throw new UnsupportedOperationError("initFactory", this.toString());
    }
    return new this.factory();
  }

  /** Whether this bearing treats bearings of `kind` as interchangeable. */
  equates(_kind: BearingKind): boolean {
    return false;
  }

  equals(other: Bearing): boolean {
    if (!sameName(this.name, other.name)) return false;
    if (this.kind === other.kind) return true;
    return this.equates(other.kind) || other.equates(this.kind);
  }

  compare(other: Bearing): number {
    return compareBearings(this, other);
  }

  protected missing(): MissingAddressError {
    return new MissingAddressError(this.toString());
  }
}

// -- Built-in kinds --

export class Item extends Bearing<unknown> {
  constructor(name: unknown, options: BearingOptions = {}) {
    super(ItemKind, name, options);
  }

  fetch(target: unknown): unknown {
    if (target instanceof Map) {
      if (!target.has(this.name)) throw this.missing();
      return target.get(this.name);
    }
    if (Array.isArray(target)) {
      const index = arrayIndex(this.name, target.length);
      if (index === undefined || index < 0 || index >= target.length) {
        throw this.missing();
      }
      return target[index];
    }
    if (isRecord(target)) {
      const key = recordKey(this.name);
      if (key === undefined || !Object.hasOwn(target, key)) {
        throw this.missing();
      }
      return target[key];
    }
    throw this.missing();
  }

  place(target: unknown, value: unknown): void {
    if (target instanceof Map) {
      target.set(this.name, value);
      return;
    }
    if (Array.isArray(target)) {
      const index = arrayIndex(this.name, target.length);
      if (index === undefined || index < 0) throw this.missing();
      if (index >= target.length && !Object.isExtensible(target)) {
        throw this.missing();
      }
      // Gaps between the old end and the new index are filled with null
      while (target.length < index) target.push(null);
      if (!Reflect.set(target, index, value)) throw this.missing();
      return;
    }
    if (isRecord(target)) {
      const key = recordKey(this.name);
      if (key === undefined || !writeKey(target, key, value)) {
        throw this.missing();
      }
      return;
    }
    throw this.missing();
  }

  /** String names that would read back as a number are quoted: `["1"]`. */
  toString(): string {
    const { name } = this;
    if (typeof name === "string" && (INTEGER_TEXT.test(name) || QUOTED_TEXT.test(name))) {
      return `[${JSON.stringify(name)}]`;
    }
    return `[${String(name)}]`;
  }
}

export class Attr extends Bearing<string> {
  constructor(name: string, options: BearingOptions = {}) {
    super(AttrKind, name, options);
  }

  fetch(target: unknown): unknown {
    if (target === null || target === undefined) throw this.missing();
    if (this.name === PROTO) throw this.missing();
    const holder: object = Object(target);
    if (!(this.name in holder)) throw this.missing();
    return Reflect.get(holder, this.name);
  }

  /** Attributes are never created: the property must already exist. */
  place(target: unknown, value: unknown): void {
    if (
      !isObjectLike(target) ||
      this.name === PROTO ||
      !(this.name in target)
    ) {
      throw this.missing();
    }
    if (typeof Reflect.get(target, this.name) === "function") {
      throw new UnsupportedOperationError("Replacing a method", this.toString());
    }
    if (!Reflect.set(target, this.name, value)) throw this.missing();
  }

  toString(): string {
    return `@${this.name}`;
  }
}

export class Call extends Bearing<string> {
  constructor(name: string, options: BearingOptions = {}) {
    super(CallKind, name, options);
  }

  fetch(target: unknown): unknown {
    if (target === null || target === undefined) throw this.missing();
    const member: unknown = Reflect.get(Object(target), this.name);
    if (typeof member !== "function") throw this.missing();
    return Reflect.apply(member, target, []);
  }

  place(_target: unknown, _value: unknown): void {
    throw new UnsupportedOperationError("place", this.toString());
  }

  toString(): string {
    return `${this.name}()`;
  }
}

export interface FallbackOptions extends BearingOptions {
  /** Kinds tried, in order, on fetch and place; also the kinds this bearing equals. */
  equivalents?: readonly BearingKind[];
}

export class Fallback extends Bearing<unknown> {
  readonly equivalents: readonly BearingKind[];

  constructor(name: unknown, options: FallbackOptions = {}) {
    super(FallbackKind, name, options);
    this.equivalents = options.equivalents ?? DEFAULT_EQUIVALENTS;
  }

  fetch(target: unknown): unknown {
    for (const candidate of this.#candidates()) {
      try {
        return candidate.fetch(target);
      } catch (error) {
        if (!isRecoverable(error)) throw error;
      }
    }
    throw this.missing();
  }

  place(target: unknown, value: unknown): void {
    for (const candidate of this.#candidates()) {
      try {
        candidate.place(target, value);
        return;
      } catch (error) {
        if (!isRecoverable(error)) throw error;
      }
    }
    throw this.missing();
  }

  override equates(kind: BearingKind): boolean {
    return this.equivalents.includes(kind);
  }

  toString(): string {
    return String(this.name);
  }

  *#candidates(): Generator<Bearing> {
    for (const kind of this.equivalents) {
      if (kind.accepts(this.name)) yield kind.create(this.name);
    }
  }
}

const INTEGER_TEXT = /^-?(0|[1-9][0-9]*)$/;
const QUOTED_TEXT = /^".*"$/s;

function itemName(text: string): unknown {
  if (INTEGER_TEXT.test(text)) return Number(text);
  if (!QUOTED_TEXT.test(text)) return text;
  let name: unknown;
  try {
    name = JSON.parse(text);
  } catch {
    throw new FormatError(`[${text}]`, "item");
  }
  if (typeof name !== "string") throw new FormatError(`[${text}]`, "item");
  return name;
}

export const ItemKind: BearingKind<Item> = defineKind({
  tag: "item",
  pattern: /^\[(.+)\]$/s,
  accepts: () => true,
  nameFromString: itemName,
  create: (name, options) => new Item(name, options),
});

export const AttrKind: BearingKind<Attr> = defineKind({
  tag: "attr",
  pattern: /^@(.+)$/s,
  accepts: (name) => typeof name === "string",
  create: (name, options) => new Attr(String(name), options),
});

export const CallKind: BearingKind<Call> = defineKind({
  tag: "call",
  pattern: /^(.+?)\(\)$/s,
  accepts: (name) => typeof name === "string",
  create: (name, options) => new Call(String(name), options),
});

export const FallbackKind: BearingKind<Fallback> = defineKind({
  tag: "fallback",
  pattern: /^(.+)$/s,
  catchAll: true,
  accepts: () => true,
  create: (name, options) =>
    new Fallback(name, {
      factory: options.factory,
      equivalents: options.candidates?.filter((kind) => !kind.catchAll),
    }),
});

const DEFAULT_EQUIVALENTS: readonly BearingKind[] = [ItemKind, CallKind, AttrKind];

/** Casting order for raw course inputs. */
export const DEFAULT_KINDS: readonly BearingKind[] = [
  ItemKind,
  CallKind,
  AttrKind,
  FallbackKind,
];

// -- Casting --

export interface BearingFactoryOptions extends BearingOptions {
  kinds?: readonly BearingKind[];
}

/**
 * Turns a raw value, shorthand string or existing bearing into a bearing.
 *
 * Strings are matched against each candidate's shorthand pattern in order.
 * Any other value (including the name of a bearing passed in) goes to the
 * first candidate whose kind accepts its type. When nothing matches, the
 * last candidate wraps the value.
 */
export function bearing(
  input: unknown,
  options: BearingFactoryOptions = {},
): Bearing {
  const kinds = options.kinds ?? DEFAULT_KINDS;
  const name = input instanceof Bearing ? input.name : input;
  const createOptions: KindCreateOptions = {
    factory:
      options.factory ??
      (input instanceof Bearing ? input.factory : undefined),
    candidates: kinds,
  };

  if (typeof input === "string") {
    for (const kind of kinds) {
      if (!kind.pattern.test(input)) continue;
      try {
        return kind.fromString(input, createOptions);
      } catch (error) {
        if (!(error instanceof TypeMismatchError)) throw error;
      }
    }
  } else {
    for (const kind of kinds) {
      if (kind.accepts(name)) return kind.create(name, createOptions);
    }
  }

  const last = kinds.at(-1);
  if (!last) throw new TypeMismatchError(name, "bearing");
  return last.create(name, createOptions);
}

// -- Ordering --

const BUILTIN_RANK = ["item", "attr", "call"];
const OTHER_RANK = BUILTIN_RANK.length;
const CATCH_ALL_RANK = OTHER_RANK + 1;

function kindRank(kind: BearingKind): number {
  if (kind.catchAll) return CATCH_ALL_RANK;
  const index = BUILTIN_RANK.indexOf(kind.tag);
  return index === -1 ? OTHER_RANK : index;
}

/**
 * Total order: kind rank (item, attr, call, other kinds by tag, catch-all
 * kinds), then the runtime type name of the name, then the name itself.
 */
export function compareBearings(a: Bearing, b: Bearing): number {
  return (
    kindRank(a.kind) - kindRank(b.kind) ||
    compareText(a.kind.tag, b.kind.tag) ||
    compareText(runtimeTypeName(a.name), runtimeTypeName(b.name)) ||
    compareNames(a.name, b.name)
  );
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareNames(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b || 0;
  if (typeof a === "bigint" && typeof b === "bigint") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") return compareText(a, b);
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return 0;
}

// -- Helpers --

function sameName(a: unknown, b: unknown): boolean {
  return a === b || Object.is(a, b);
}

function isRecoverable(error: unknown): boolean {
  return (
    error instanceof MissingAddressError ||
    error instanceof TypeMismatchError ||
    error instanceof UnsupportedOperationError
  );
}

function isObjectLike(value: unknown): value is object {
  return (
    (typeof value === "object" && value !== null) || typeof value === "function"
  );
}

function arrayIndex(name: unknown, length: number): number | undefined {
  let index: number | undefined;
  if (typeof name === "number" && Number.isInteger(name)) index = name;
  else if (typeof name === "string" && INTEGER_TEXT.test(name)) {
    index = Number(name);
  }
  if (index === undefined) return undefined;
  return index < 0 ? index + length : index;
}

// Reading or assigning it reaches the prototype, not a property
const PROTO = "__proto__";

/** New keys become own data properties so that `__proto__` stays a plain key. */
function writeKey(
  target: Record<PropertyKey, unknown>,
  key: PropertyKey,
  value: unknown,
): boolean {
  if (Object.hasOwn(target, key)) return Reflect.set(target, key, value);
  return Reflect.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

function recordKey(name: unknown): PropertyKey | undefined {
  switch (typeof name) {
    case "string":
    case "number":
    case "symbol":
      return name;
    default:
      return undefined;
  }
}
