/**
 * Coordinate: A point in an arbitrary keyed space
 *
 * Adds to MathContainer:
 * - A listing order: the instance's own, else its space's default, else the
 *   keys in reverse lexicographic order ("zyx")
 * - Positional construction from values plus an order
 * - A validation hook, run once at the end of every construction
 *
 * Arithmetic results keep the left operand's own order and space, and are
 * validated like any other instance.
 *
 * @example
 * const c = new Coordinate({ a: 1, b: 2 }, { order: "ba" });
 * c.add(1).toList(); // [3, 2]
 * new Coordinate([1, 2, 3], { order: "abc" }).equals({ a: 1, b: 2, c: 3 }); // true
 */

import { reported } from "@/debug/CoordinateDebugLogger";
import { ConstructionError, ImmutableError } from "@/errors";
import { mergeExtra, parseInput } from "@/math/inputs";
import { MathContainer } from "@/math/MathContainer";
import type { CoordinateInput } from "@/types";
import { type CoordinateSpace, defineCoordinateSpace } from "./CoordinateSpace";

export interface CoordinateConstructionOptions<K extends string> {
  /** Instance order: any iterable of keys, e.g. "zyx" or ["z", "y", "x"]. May be a superset of the keys. */
  readonly order?: Iterable<K> | null;
  /** Space supplying the type name, default order and validation */
  readonly space?: CoordinateSpace<K>;
  /** Fields merged over the input; they win over input fields with the same key */
  readonly extra?: Partial<Record<K, number>>;
}

function plainSpace<K extends string>(): CoordinateSpace<K> {
  return defineCoordinateSpace<K>({ name: "Coordinate" });
}

/** First non-empty candidate, or null */
function firstOrder<K extends string>(...candidates: Array<readonly K[] | null>): readonly K[] | null {
  for (const candidate of candidates) {
    if (candidate && candidate.length > 0) return candidate;
  }
  return null;
}

function reverseLexicographic(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

export class Coordinate<K extends string = string> extends MathContainer<K, Coordinate<K>> {
  readonly space: CoordinateSpace<K>;
  /** Instance order override, null when unset */
  private readonly _order: readonly K[] | null;

  /**
   * Build from a mapping, or from positional values when an order is known
   * (the `order` option, else the space's default order).
   *
   * @throws ConstructionError if the input is neither, if no order is known for
   *   positional values, or if their count differs from the order's length
   * @throws whatever the space's validation throws (ValidationError for fixed key sets)
   */
  constructor(input: CoordinateInput<K> = [], options: CoordinateConstructionOptions<K> = {}) {
    const space = options.space ?? plainSpace<K>();
    const order = options.order ? Object.freeze(Array.from(options.order)) : null;

    super(Coordinate.read(input, order, space, options.extra));

    this.space = space;
    this._order = order;
    space.validate(this);
    Object.freeze(this);
  }

  /**
   * Lazily build one coordinate per input; a failing element throws when it is pulled.
   * Each call returns a fresh, single-pass iterator.
   *
   * @example
   * [...Coordinate.fromSequence([{ a: 1, b: 2 }, { a: 4, b: 5 }], { extra: { c: 10 } })]
   */
  static *fromSequence<K extends string = string>(
    inputs: Iterable<CoordinateInput<K>>,
    options: CoordinateConstructionOptions<K> = {}
  ): Generator<Coordinate<K>, void, undefined> {
    const order = options.order ? Array.from(options.order) : null;
    for (const input of inputs) {
      yield new Coordinate(input, { ...options, order });
    }
  }

  private static read<K extends string>(
    input: CoordinateInput<K>,
    order: readonly K[] | null,
    space: CoordinateSpace<K>,
    extra: Partial<Record<K, number>> | undefined
  ): Map<K, number> {
    const parsed = parseInput(input, space.name);
    if (parsed.kind === "mapping") {
      return mergeExtra(parsed.values, extra, space.name);
    }

    const keys = firstOrder(order, space.defaultOrder);
    if (keys === null) {
      throw reported(new ConstructionError(`Cannot parse ${space.name} values with no order`));
    }
    if (parsed.values.length !== keys.length) {
      throw reported(
        new ConstructionError(
          `${parsed.values.length} values do not match length of order [${keys.join(", ")}]`
        )
      );
    }

    const values = new Map<K, number>();
    parsed.values.forEach((value, index) => {
      const key = keys[index];
      if (key !== undefined) values.set(key, value);
    });
    return mergeExtra(values, extra, space.name);
  }

  get typeName(): string {
    return this.space.name;
  }

  protected withValues(values: ReadonlyMap<K, number>): Coordinate<K> {
    return new Coordinate(values, { order: this._order, space: this.space });
  }

  // ===========================================================================
  // ORDER
  // ===========================================================================

  /**
   * Effective listing order, resolved on every access.
   */
  get order(): readonly K[] {
    return (
      firstOrder(this._order, this.space.defaultOrder) ??
      Array.from(this._values.keys()).sort(reverseLexicographic)
    );
  }

  /** The order given at construction, if any */
  get instanceOrder(): readonly K[] | null {
    return this._order;
  }

  /**
   * Create a copy listed in a different order.
   */
  withOrder(order: Iterable<K> | null): Coordinate<K> {
    return new Coordinate(this._values, { order, space: this.space });
  }

  // ===========================================================================
  // ORDERED VIEWS
  // ===========================================================================

  /**
   * Keys in `order` (default: the effective order). Entries of `order` the
   * instance does not hold are skipped.
   */
  keys(order?: Iterable<K> | null): K[] {
    const requested = firstOrder(order ? Array.from(order) : null) ?? this.order;
    return Array.from(new Set(requested)).filter((key) => this.has(key));
  }

  values(order?: Iterable<K> | null): number[] {
    return this.keys(order).map((key) => this.get(key));
  }

  entries(order?: Iterable<K> | null): Array<[K, number]> {
    return this.keys(order).map((key): [K, number] => [key, this.get(key)]);
  }

  toList(order?: Iterable<K> | null): number[] {
    return this.values(order);
  }

  /**
   * Coordinates are read-only.
   * @throws ImmutableError always
   */
  set(_key: K, _value: number): never {
    throw reported(new ImmutableError(this.typeName));
  }
}
