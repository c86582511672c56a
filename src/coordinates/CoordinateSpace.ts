/**
 * CoordinateSpace: What a family of coordinates shares
 *
 * A space plays the part a subclass would: it names the coordinates built in it,
 * may fix their default listing order, and may validate every instance at the
 * end of its construction (including instances produced by arithmetic).
 *
 * Spaces are plain frozen descriptors, not classes. Build them with
 * `defineCoordinateSpace`, or `spacedCoordinate` for a fixed key set.
 */

import { reported } from "@/debug/CoordinateDebugLogger";
import { ValidationError } from "@/errors";
import type { Coordinate } from "./Coordinate";

export interface CoordinateSpace<K extends string = string> {
  /** Type name used in representations and error messages */
  readonly name: string;
  /** Keys every instance must hold exactly; null when unconstrained */
  readonly requiredKeys: readonly K[] | null;
  /** Listing order for instances without their own; null for reverse-lexicographic */
  readonly defaultOrder: readonly K[] | null;
  /** Called once at the end of every construction; throws to reject the instance */
  validate(coordinate: Coordinate<K>): void;
}

export interface CoordinateSpaceConfig<K extends string> {
  readonly name: string;
  readonly requiredKeys?: Iterable<K> | null;
  readonly defaultOrder?: Iterable<K> | null;
  readonly validate?: (coordinate: Coordinate<K>) => void;
}

function freezeKeys<K extends string>(keys: Iterable<K> | null | undefined): readonly K[] | null {
  return keys ? Object.freeze(Array.from(keys)) : null;
}

/**
 * Create a space. Without `validate`, every instance is accepted.
 */
export function defineCoordinateSpace<K extends string = string>(
  config: CoordinateSpaceConfig<K>
): CoordinateSpace<K> {
  return Object.freeze({
    name: config.name,
    requiredKeys: freezeKeys(config.requiredKeys),
    defaultOrder: freezeKeys(config.defaultOrder),
    validate: config.validate ?? (() => undefined),
  });
}

/**
 * Create a space whose coordinates must have exactly the given keys.
 *
 * @param name - Type name of the coordinates, e.g. "Point3D"
 * @param keys - Keys which instances must exclusively have, e.g. "xyz" or ["x", "y", "z"]
 * @param ordered - Whether `keys` also becomes the default listing order
 *
 * @example
 * const Point3D = spacedCoordinate("Point3D", ["x", "y", "z"] as const);
 * new Coordinate([1, 2, 3], { space: Point3D }); // Point3D({"x": 1, "y": 2, "z": 3})
 */
export function spacedCoordinate<K extends string>(
  name: string,
  keys: Iterable<K>,
  ordered = true
): CoordinateSpace<K> {
  const requiredKeys = Array.from(keys);
  const required = new Set<string>(requiredKeys);

  return defineCoordinateSpace<K>({
    name,
    requiredKeys,
    defaultOrder: ordered ? requiredKeys : null,
    validate(coordinate) {
      const actual = coordinate.keySet();
      const matches = actual.size === required.size && [...actual].every((key) => required.has(key));
      if (!matches) {
        throw reported(new ValidationError(name, requiredKeys, [...actual]));
      }
    },
  });
}
