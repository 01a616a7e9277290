import { Attr, Call, Item, type Bearing } from "./bearing.ts";
import { NonNavigableError } from "./errors.ts";
import { formatValue } from "./format.ts";
import { isRecord, matchesAny, type TypeMatcher } from "./types.ts";

export type BearingEntry = readonly [bearing: Bearing, value: unknown];

export interface CompassOptions {
  /** Types this compass navigates. Empty accepts anything. */
  targetTypes?: readonly TypeMatcher[];
  /** Enumerate items: all of them, none, or only the listed names. */
  items?: boolean | readonly unknown[];
  /** Enumerate public attributes: all of them, none, or only the listed names. */
  attrs?: boolean | readonly string[];
  /** Methods to invoke. Calls are never enumerated implicitly. */
  calls?: false | readonly string[];
}

/**
 * Decides whether an object can be navigated and lists its one-step
 * children as `[bearing, value]` pairs.
 *
 * Children come in a fixed order: items, then attributes, then calls.
 * Subclasses can narrow `isNavigable()`, override the per-kind
 * generators, or extend `walk()` with categories of their own.
 */
export class Compass {
  readonly targetTypes: readonly TypeMatcher[];
  readonly items: boolean | readonly unknown[];
  readonly attrs: boolean | readonly string[];
  readonly calls: false | readonly string[];

  constructor(options: CompassOptions = {}) {
    this.targetTypes = options.targetTypes ?? [];
    this.items = options.items ?? true;
    this.attrs = options.attrs ?? true;
    this.calls = options.calls ?? false;
  }

  isNavigable(target: unknown): boolean {
    return this.targetTypes.length === 0 || matchesAny(target, this.targetTypes);
  }

  bearings(target: unknown): BearingEntry[] {
    return [...this.bearingsIter(target)];
  }

  /** Lazy form of `bearings()`. Navigability is checked before returning. */
  bearingsIter(target: unknown): IterableIterator<BearingEntry> {
    if (!this.isNavigable(target)) {
      throw new NonNavigableError(
        `${this.constructor.name} cannot navigate ${formatValue(target)}`,
      );
    }
    return this.walk(target);
  }

  protected *itemBearings(target: unknown): Generator<BearingEntry> {
    if (this.items === false) return;
    const allowed = allowList(this.items);

    if (target instanceof Map) {
      for (const [key, value] of target) {
        if (allowed(key)) yield [new Item(key), value];
      }
    } else if (Array.isArray(target)) {
      for (let i = 0; i < target.length; i++) {
        if (i in target && allowed(i)) yield [new Item(i), target[i]];
      }
    } else if (isRecord(target)) {
      for (const key of Object.keys(target)) {
        if (allowed(key)) yield [new Item(key), target[key]];
      }
    }
  }

  protected *attrBearings(target: unknown): Generator<BearingEntry> {
    if (this.attrs === false || !hasAttributes(target)) return;

    const names =
      this.attrs === true
        ? Object.keys(target).filter((name) => !name.startsWith("_"))
        : this.attrs.filter((name) => name in target);
    for (const name of names) {
      const value: unknown = Reflect.get(target, name);
      if (typeof value !== "function") yield [new Attr(name), value];
    }
  }

  protected *callBearings(target: unknown): Generator<BearingEntry> {
    if (this.calls === false || target === null || target === undefined) {
      return;
    }
    for (const name of this.calls) {
      const member: unknown = Reflect.get(Object(target), name);
      if (typeof member === "function") {
        yield [new Call(name), Reflect.apply(member, target, [])];
      }
    }
  }

  /** Chains the categories. Override to add one. */
  protected *walk(target: unknown): Generator<BearingEntry> {
    yield* this.itemBearings(target);
    yield* this.attrBearings(target);
    yield* this.callBearings(target);
  }
}

function allowList(setting: true | readonly unknown[]): (name: unknown) => boolean {
  if (setting === true) return () => true;
  return (name) => setting.some((allowed) => Object.is(allowed, name));
}

// Containers expose their children as items, never as attributes
function hasAttributes(value: unknown): value is object {
  if (value === null) return false;
  if (typeof value !== "object" && typeof value !== "function") return false;
  return !(value instanceof Map || Array.isArray(value) || isRecord(value));
}
