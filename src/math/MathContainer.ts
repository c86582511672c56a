/**
 * MathContainer: Immutable key -> number mapping with elementwise arithmetic
 *
 * The other operand of a binary op is either a number, which is broadcast over
 * every value, or another mapping with exactly the same keys (in any order),
 * which is zipped by key.
 *
 * Design Principles:
 * - Immutability: every operation returns a new instance, the receiver never changes
 * - Same-variant results: concrete variants supply `withValues`, so `add` on a
 *   Coordinate returns a Coordinate without inspecting runtime types
 * - "In-place" forms are the same methods: `a = a.add(b)` replaces `a += b`
 */

import { reported } from "@/debug/CoordinateDebugLogger";
import { KeyMismatchError, MissingKeyError } from "@/errors";
import type { BinaryOperator, MappingInput, NumericMapping, Operand, UnaryOperator } from "@/types";
import { parseInput } from "./inputs";
import { BinaryOps, UnaryOps, reflect } from "./operators";

/** `{"a": 1, "b": 2}` */
function formatEntries(entries: ReadonlyArray<readonly [string, number]>): string {
  return `{${entries.map(([key, value]) => `${JSON.stringify(key)}: ${value}`).join(", ")}}`;
}

export abstract class MathContainer<K extends string, Self extends MathContainer<K, Self>>
  implements NumericMapping<K>
{
  /** Stored values, in insertion order */
  protected readonly _values: ReadonlyMap<K, number>;

  protected constructor(values: ReadonlyMap<K, number>) {
    this._values = new Map(values);
  }

  /** Name used in representations and error messages */
  abstract get typeName(): string;

  /**
   * Build a new instance of the same variant holding `values`.
   * Variants carry over whatever else they hold (order, space, ...).
   */
  protected abstract withValues(values: ReadonlyMap<K, number>): Self;

  // ===========================================================================
  // READ ACCESS
  // ===========================================================================

  get size(): number {
    return this._values.size;
  }

  has(key: string): key is K {
    const lookup: ReadonlyMap<string, number> = this._values;
    return lookup.has(key);
  }

  /**
   * Get the value stored under `key`.
   * @throws MissingKeyError if the key is absent
   */
  get(key: K): number {
    const value = this._values.get(key);
    if (value === undefined) {
      throw reported(new MissingKeyError(this.typeName, key));
    }
    return value;
  }

  keys(): K[] {
    return Array.from(this._values.keys());
  }

  /**
   * Every stored key, independent of any listing order.
   */
  keySet(): ReadonlySet<K> {
    return new Set(this._values.keys());
  }

  values(): number[] {
    return this.keys().map((key) => this.get(key));
  }

  entries(): Array<[K, number]> {
    return this.keys().map((key): [K, number] => [key, this.get(key)]);
  }

  [Symbol.iterator](): Iterator<K> {
    return this.keys()[Symbol.iterator]();
  }

  /**
   * Plain object copy, in listing order.
   */
  toRecord(): Record<string, number> {
    return Object.fromEntries(this.entries());
  }

  // ===========================================================================
  // UNARY OPERATIONS
  // ===========================================================================

  /**
   * Apply `fn` to every value.
   */
  map(fn: UnaryOperator): Self {
    const values = new Map<K, number>();
    for (const [key, value] of this._values) {
      values.set(key, fn(value));
    }
    return this.withValues(values);
  }

  neg(): Self {
    return this.map(UnaryOps.neg);
  }

  pos(): Self {
    return this.map(UnaryOps.pos);
  }

  abs(): Self {
    return this.map(UnaryOps.abs);
  }

  ceil(): Self {
    return this.map(UnaryOps.ceil);
  }

  floor(): Self {
    return this.map(UnaryOps.floor);
  }

  trunc(): Self {
    return this.map(UnaryOps.trunc);
  }

  round(ndigits = 0): Self {
    return this.map((value) => UnaryOps.round(value, ndigits));
  }

  // ===========================================================================
  // BINARY OPERATIONS
  // ===========================================================================

  /**
   * True if `other` holds exactly this container's keys, ignoring order.
   */
  hasSameKeys(other: NumericMapping<string>): boolean {
    if (other.size !== this._values.size) return false;
    for (const key of this._values.keys()) {
      if (!other.has(key)) return false;
    }
    return true;
  }

  /**
   * Combine every value with the matching value of `other`: `op(value, rhs)`.
   * @throws KeyMismatchError if `other` is a mapping with different keys
   */
  protected combine(op: BinaryOperator, other: Operand<K>): Self {
    const rhs = this.resolveOperand(other);
    const values = new Map<K, number>();
    for (const [key, value] of this._values) {
      values.set(key, op(value, rhs(key)));
    }
    return this.withValues(values);
  }

  private resolveOperand(other: Operand<K>): (key: K) => number {
    if (typeof other === "number") {
      const scalar = other;
      return () => scalar;
    }
    const mapping = other;
    if (!this.hasSameKeys(mapping)) {
      throw reported(
        new KeyMismatchError(
          `${this.toString()} and ${MathContainer.formatOperand(mapping)} do not have the same keys`,
          Array.from(this._values.keys()),
          mapping.keys()
        )
      );
    }
    return (key) => mapping.get(key);
  }

  private static formatOperand(mapping: NumericMapping<string>): string {
    return mapping instanceof MathContainer ? mapping.toString() : formatEntries(mapping.entries());
  }

  add(other: Operand<K>): Self {
    return this.combine(BinaryOps.add, other);
  }

  sub(other: Operand<K>): Self {
    return this.combine(BinaryOps.sub, other);
  }

  mul(other: Operand<K>): Self {
    return this.combine(BinaryOps.mul, other);
  }

  floorDiv(other: Operand<K>): Self {
    return this.combine(BinaryOps.floorDiv, other);
  }

  /** True division */
  div(other: Operand<K>): Self {
    return this.combine(BinaryOps.div, other);
  }

  mod(other: Operand<K>): Self {
    return this.combine(BinaryOps.mod, other);
  }

  pow(other: Operand<K>): Self {
    return this.combine(BinaryOps.pow, other);
  }

  /**
   * Floored quotient and remainder, as two containers.
   */
  divmod(other: Operand<K>): [Self, Self] {
    return [this.floorDiv(other), this.mod(other)];
  }

  // Reflected forms: the operand is on the left, e.g. rsub(s) is `s - value`

  radd(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.add), other);
  }

  rsub(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.sub), other);
  }

  rmul(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.mul), other);
  }

  rfloorDiv(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.floorDiv), other);
  }

  rdiv(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.div), other);
  }

  rmod(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.mod), other);
  }

  rpow(other: Operand<K>): Self {
    return this.combine(reflect(BinaryOps.pow), other);
  }

  rdivmod(other: Operand<K>): [Self, Self] {
    return [this.rfloorDiv(other), this.rmod(other)];
  }

  // ===========================================================================
  // REDUCTIONS
  // ===========================================================================

  sum(): number {
    let total = 0;
    for (const value of this._values.values()) {
      total += value;
    }
    return total;
  }

  /**
   * Product of the values (1 when empty).
   */
  prod(): number {
    let product = 1;
    for (const value of this._values.values()) {
      product *= value;
    }
    return product;
  }

  /**
   * Minkowski p-norm: (Σ|v|^order)^(1/order). The default is Euclidean.
   */
  norm(order = 2): number {
    let total = 0;
    for (const value of this._values.values()) {
      total += Math.abs(value) ** order;
    }
    return total ** (1 / order);
  }

  // ===========================================================================
  // EQUALITY & REPRESENTATION
  // ===========================================================================

  /**
   * Same keys and same values. Order, variant and space are not compared.
   */
  equals(other: MappingInput<string>): boolean {
    const parsed = parseInput(other, this.typeName);
    if (parsed.kind !== "mapping" || parsed.values.size !== this._values.size) {
      return false;
    }
    for (const [key, value] of parsed.values) {
      if (!this.has(key) || this.get(key) !== value) return false;
    }
    return true;
  }

  toString(): string {
    return `${this.typeName}(${formatEntries(this.entries())})`;
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }
}
