/**
 * Core type definitions for keyed numeric containers
 */

// =============================================================================
// MAPPING TYPES
// =============================================================================

/** A single key/value pair */
export type Entry<K extends string = string> = readonly [K, number];

/**
 * Read-only mapping capability: key lookup, key iteration and length.
 * Implemented by every container; accepted wherever another container is.
 */
export interface NumericMapping<K extends string = string> extends Iterable<K> {
  readonly size: number;
  has(key: string): key is K;
  get(key: K): number;
  keys(): K[];
  values(): number[];
  entries(): Array<[K, number]>;
}

/** Anything that can be read as a key -> value mapping */
export type MappingInput<K extends string = string> =
  | NumericMapping<K>
  | ReadonlyMap<K, number>
  | Iterable<Entry<K>>
  | { readonly [P in K]?: number };

/** Values listed positionally; only meaningful together with an order */
export type SequenceInput = Iterable<number>;

/** Anything a coordinate can be built from */
export type CoordinateInput<K extends string = string> = MappingInput<K> | SequenceInput;

/** Result of reading a CoordinateInput */
export type ParsedInput<K extends string> =
  | { readonly kind: "mapping"; readonly values: Map<K, number> }
  | { readonly kind: "sequence"; readonly values: number[] };

// =============================================================================
// OPERATOR TYPES
// =============================================================================

/** Right-hand side of a binary op: broadcast scalar or a container with the same keys */
export type Operand<K extends string = string> = number | NumericMapping<K>;

export type UnaryOperator = (value: number) => number;

export type BinaryOperator = (a: number, b: number) => number;
