/**
 * Reading constructor input
 *
 * Inputs are checked at runtime as well as by the compiler, since values often
 * arrive from parsed JSON or other untyped sources.
 */

import { reported } from "@/debug/CoordinateDebugLogger";
import { ConstructionError } from "@/errors";
import type { CoordinateInput, Entry, NumericMapping, ParsedInput } from "@/types";

function isReadonlyMap<K extends string>(value: CoordinateInput<K>): value is ReadonlyMap<K, number> {
  return value instanceof Map;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

function isEntry<K extends string>(value: unknown): value is Entry<K> {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "string" &&
    typeof value[1] === "number"
  );
}

function formatItem(item: unknown): string {
  return Array.isArray(item) ? `[${item.map(formatItem).join(", ")}]` : JSON.stringify(item) ?? String(item);
}

/**
 * Structural check for the read-only mapping capability.
 * Maps are excluded: their entries() is an iterator, not an array.
 */
export function isNumericMapping<K extends string = string>(value: unknown): value is NumericMapping<K> {
  return (
    typeof value === "object" &&
    value !== null &&
    !(value instanceof Map) &&
    "size" in value &&
    typeof value.size === "number" &&
    "has" in value &&
    typeof value.has === "function" &&
    "get" in value &&
    typeof value.get === "function" &&
    "entries" in value &&
    typeof value.entries === "function"
  );
}

/**
 * Read constructor input as either a mapping or a positional sequence.
 *
 * - Maps, containers, iterables of pairs and plain records are mappings;
 *   undefined record fields are skipped
 * - A non-empty iterable holding only numbers is a sequence
 * - An empty iterable is an empty mapping
 *
 * @param typeName - Used in error messages
 */
export function parseInput<K extends string>(input: CoordinateInput<K>, typeName: string): ParsedInput<K> {
  let items: unknown[];

  if (isReadonlyMap(input) || isNumericMapping<K>(input)) {
    items = Array.from(input.entries());
  } else if (isIterable(input)) {
    const elements = Array.from<unknown>(input);
    if (elements.length > 0 && elements.every(isNumber)) {
      return { kind: "sequence", values: elements };
    }
    items = elements;
  } else if (typeof input === "object" && input !== null) {
    // Optional fields left undefined are absent, as in mergeExtra
    items = Object.entries(input).filter((item) => item[1] !== undefined);
  } else {
    throw reported(new ConstructionError(`Cannot build ${typeName} from ${formatItem(input)}`));
  }

  const values = new Map<K, number>();
  items.forEach((item, index) => {
    if (!isEntry<K>(item)) {
      throw reported(
        new ConstructionError(
          `Cannot convert ${typeName} element #${index} (${formatItem(item)}) to a key/value pair`
        )
      );
    }
    values.set(item[0], item[1]);
  });
  return { kind: "mapping", values };
}

/**
 * Merge extra fields over parsed values, the way keyword arguments override a
 * dict literal. Undefined fields are skipped. Mutates and returns `values`.
 */
export function mergeExtra<K extends string>(
  values: Map<K, number>,
  extra: Partial<Record<K, number>> | undefined,
  typeName: string
): Map<K, number> {
  if (!extra) return values;

  for (const item of Object.entries(extra)) {
    if (item[1] === undefined) continue;
    if (!isEntry<K>(item)) {
      throw reported(new ConstructionError(`Extra field ${formatItem(item)} of ${typeName} is not a number`));
    }
    values.set(item[0], item[1]);
  }
  return values;
}
