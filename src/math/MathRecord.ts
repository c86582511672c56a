import { reported } from "@/debug/CoordinateDebugLogger";
import { ConstructionError } from "@/errors";
import type { MappingInput } from "@/types";
import { mergeExtra, parseInput } from "./inputs";
import { MathContainer } from "./MathContainer";

/**
 * MathRecord - The plain container: no ordering policy, no validation.
 * Listing follows insertion order.
 *
 * @example
 * new MathRecord({ a: 1, b: 2 }).mul(10); // MathRecord({"a": 10, "b": 20})
 */
export class MathRecord<K extends string = string> extends MathContainer<K, MathRecord<K>> {
  constructor(input: MappingInput<K> = [], extra?: Partial<Record<K, number>>) {
    super(MathRecord.read(input, extra));
    Object.freeze(this);
  }

  get typeName(): string {
    return "MathRecord";
  }

  protected withValues(values: ReadonlyMap<K, number>): MathRecord<K> {
    return new MathRecord(values);
  }

  private static read<K extends string>(
    input: MappingInput<K>,
    extra: Partial<Record<K, number>> | undefined
  ): Map<K, number> {
    const parsed = parseInput(input, "MathRecord");
    if (parsed.kind === "sequence") {
      throw reported(
        new ConstructionError(`Cannot build MathRecord from ${parsed.values.length} values without keys`)
      );
    }
    return mergeExtra(parsed.values, extra, "MathRecord");
  }
}
