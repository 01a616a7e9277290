import { Compass, type BearingEntry } from "./compass.ts";
import { Course, DEFAULT_COURSE_CONFIG, type CourseConfig } from "./course.ts";
import {
  ChartError,
  NonNavigableError,
  SuppressedErrors,
  type ChartEntry,
} from "./errors.ts";
import { formatValue } from "./format.ts";
import { matchesAny, type TypeMatcher } from "./types.ts";

export const DEFAULT_END_POINTS: readonly TypeMatcher[] = [
  "string",
  "number",
  "bigint",
  "boolean",
  "symbol",
  "function",
];

const DEFAULT_COMPASSES: readonly Compass[] = [new Compass()];

export interface SurveyorOptions {
  /** Compasses tried in order; the first that navigates a node wins. */
  compasses?: readonly Compass[];
  /** Tried ahead of `compasses`. */
  compassesExtra?: readonly Compass[];
  /** Types whose values are emitted but never descended into. */
  endPoints?: readonly TypeMatcher[];
  endPointsExtra?: readonly TypeMatcher[];
  /** Config for the courses the surveyor builds. */
  course?: CourseConfig;
  /**
   * Longest course the surveyor emits. Containers found at this depth are
   * non-navigable. Unbounded by default.
   */
  maxDepth?: number;
}

export interface ChartOptions {
  /**
   * When false, non-navigable nodes are skipped and reported together as
   * one `SuppressedErrors` after the last entry. Defaults to true.
   */
  exceptions?: boolean;
}

export class Surveyor {
  readonly compasses: readonly Compass[];
  readonly endPoints: readonly TypeMatcher[];
  readonly courseConfig: CourseConfig;
  readonly maxDepth: number;

  constructor(options: SurveyorOptions = {}) {
    this.compasses = [
      ...(options.compassesExtra ?? []),
      ...(options.compasses ?? DEFAULT_COMPASSES),
    ];
    this.endPoints = [
      ...(options.endPointsExtra ?? []),
      ...(options.endPoints ?? DEFAULT_END_POINTS),
    ];
    this.courseConfig = options.course ?? DEFAULT_COURSE_CONFIG;
    this.maxDepth = options.maxDepth ?? Infinity;
  }

  isEndPoint(value: unknown): boolean {
    return value === null || value === undefined || matchesAny(value, this.endPoints);
  }

  chooseCompass(target: unknown): Compass {
    const compass = this.compasses.find((c) => c.isNavigable(target));
    if (!compass) {
      throw new NonNavigableError(`No compass can navigate ${formatValue(target)}`);
    }
    return compass;
  }

  /**
   * Pre-order listing of every `[course, value]` reachable from `root`.
   * The root itself is not listed. Each call starts a fresh traversal.
   */
  chartIter(root: unknown, options: ChartOptions = {}): IterableIterator<ChartEntry> {
    return new ChartIterator(this, root, options.exceptions ?? true);
  }

  /**
   * Eager form of `chartIter()`. A `SuppressedErrors` thrown in tolerant
   * mode carries the collected entries in `chartPartial`.
   */
  chart(root: unknown, options: ChartOptions = {}): ChartEntry[] {
    const entries: ChartEntry[] = [];
    try {
      for (const entry of this.chartIter(root, options)) entries.push(entry);
    } catch (error) {
      if (error instanceof SuppressedErrors) error.chartPartial = entries;
      throw error;
    }
    return entries;
  }
}

interface PendingNode {
  course: Course;
  value: unknown;
  compass?: Compass;
}

/**
 * Depth-first traversal over an explicit stack of pending nodes. A node is
 * emitted before its children are listed; they are listed on the next pull.
 */
class ChartIterator implements IterableIterator<ChartEntry> {
  readonly #surveyor: Surveyor;
  readonly #exceptions: boolean;
  readonly #root: unknown;
  #stack: PendingNode[] | undefined;
  #emitted: PendingNode | undefined;
  #errors: ChartError[] = [];

  constructor(surveyor: Surveyor, root: unknown, exceptions: boolean) {
    this.#surveyor = surveyor;
    this.#root = root;
    this.#exceptions = exceptions;
  }

  next(): IteratorResult<ChartEntry> {
    try {
      if (!this.#stack) {
        this.#stack = [];
        if (!this.#surveyor.isEndPoint(this.#root)) {
          this.#expand({
            course: new Course([], this.#surveyor.courseConfig),
            value: this.#root,
          });
        }
      }
      const emitted = this.#emitted;
      this.#emitted = undefined;
      if (emitted) this.#expand(emitted);

      let node = this.#stack.pop();
      while (node) {
        const { course, value } = node;
        if (this.#surveyor.isEndPoint(value)) {
          return { done: false, value: [course, value] };
        }
        // Tolerant mode skips a non-navigable node without listing it
        if (this.#exceptions || this.#accepts(node)) {
          this.#emitted = node;
          return { done: false, value: [course, value] };
        }
        node = this.#stack.pop();
      }
    } catch (error) {
      this.#reset();
      throw error;
    }
    return this.#finish();
  }

  return(): IteratorResult<ChartEntry> {
    this.#reset();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): IterableIterator<ChartEntry> {
    return this;
  }

  #compassFor(course: Course, value: unknown): Compass {
    if (course.length >= this.#surveyor.maxDepth) {
      throw new NonNavigableError(
        `Cannot descend below ${formatValue(course)}: maximum depth is ${this.#surveyor.maxDepth}`,
      );
    }
    return this.#surveyor.chooseCompass(value);
  }

  /** Picks the node's compass ahead of time; false records why there is none. */
  #accepts(node: PendingNode): boolean {
    try {
      node.compass = this.#compassFor(node.course, node.value);
      return true;
    } catch (error) {
      if (!(error instanceof NonNavigableError)) throw error;
      this.#errors.push(error);
      return false;
    }
  }

  #expand(node: PendingNode): void {
    let children: BearingEntry[];
    try {
      const compass = node.compass ?? this.#compassFor(node.course, node.value);
      children = compass.bearings(node.value);
    } catch (error) {
      if (this.#exceptions || !(error instanceof NonNavigableError)) throw error;
      this.#errors.push(error);
      return;
    }

    const stack = this.#stack ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) {
        stack.push({ course: node.course.append(child[0]), value: child[1] });
      }
    }
    this.#stack = stack;
  }

  #reset(): void {
    this.#stack = [];
    this.#emitted = undefined;
    this.#errors = [];
  }

  #finish(): IteratorResult<ChartEntry> {
    const errors = this.#errors;
    this.#errors = [];
    if (errors.length > 0) {
      throw new SuppressedErrors("Some objects could not be charted", errors);
    }
    return { done: true, value: undefined };
  }
}
