import { Coordinate } from "@/coordinates/Coordinate";
import { defineCoordinateSpace, spacedCoordinate } from "@/coordinates/CoordinateSpace";
import { ConstructionError, ValidationError } from "@/errors";
import { describe, expect, it } from "vitest";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}

describe("defineCoordinateSpace", () => {
  it("should default to no constraints", () => {
    const space = defineCoordinateSpace({ name: "Free" });
    expect(space.name).toBe("Free");
    expect(space.requiredKeys).toBeNull();
    expect(space.defaultOrder).toBeNull();
    expect(() => new Coordinate({ anything: 1 }, { space })).not.toThrow();
  });

  it("should freeze the descriptor and its orders", () => {
    const space = defineCoordinateSpace({ name: "Frozen", defaultOrder: "zyx" });
    expect(Object.isFrozen(space)).toBe(true);
    expect(space.defaultOrder).toEqual(["z", "y", "x"]);
    expect(Object.isFrozen(space.defaultOrder)).toBe(true);
  });

  it("should copy a one-shot order iterable", () => {
    function* order(): Generator<string> {
      yield "b";
      yield "a";
    }
    const space = defineCoordinateSpace({ name: "OneShot", defaultOrder: order() });
    const c = new Coordinate({ a: 1, b: 2 }, { space });
    expect(c.order).toEqual(["b", "a"]);
    expect(c.add(1).order).toEqual(["b", "a"]);
  });
});

describe("spacedCoordinate", () => {
  const CAB = spacedCoordinate("CoordinateCAB", "cab");

  it("should expose its required keys", () => {
    expect(CAB.name).toBe("CoordinateCAB");
    expect(CAB.requiredKeys).toEqual(["c", "a", "b"]);
  });

  it("should use its keys as the default order", () => {
    const c = new Coordinate({ a: 1, b: 2, c: 3 }, { space: CAB });
    expect(c.order).toEqual(["c", "a", "b"]);
    expect(c.toList()).toEqual([3, 1, 2]);
  });

  it("should let an instance order override the default", () => {
    const c = new Coordinate({ a: 1, b: 2, c: 3 }, { space: CAB, order: "abc" });
    expect(c.toList()).toEqual([1, 2, 3]);
  });

  it("should build from positional values in its order", () => {
    const c = new Coordinate([1, 2, 3], { space: CAB });
    expect(c.toRecord()).toEqual({ c: 1, a: 2, b: 3 });
  });

  it("should reject a different key set", () => {
    expect(() => new Coordinate({ d: 5 }, { space: CAB })).toThrow(ValidationError);
    expect(() => new Coordinate({ d: 5 }, { space: CAB })).toThrow(
      "CoordinateCAB needs keys [c, a, b] and got [d]"
    );
  });

  it("should reject a superset of its keys", () => {
    const error = thrownBy(() => new Coordinate({ a: 1, b: 2, c: 3, d: 4 }, { space: CAB }));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      kind: "validation",
      typeName: "CoordinateCAB",
      requiredKeys: ["c", "a", "b"],
      actualKeys: ["a", "b", "c", "d"],
    });
  });

  it("should reject a subset of its keys", () => {
    expect(() => new Coordinate({ a: 1, b: 2 }, { space: CAB })).toThrow(
      "CoordinateCAB needs keys [c, a, b] and got [a, b]"
    );
  });

  it("should keep arithmetic results in the space", () => {
    const c = new Coordinate({ a: 1, b: 2, c: 3 }, { space: CAB });
    const doubled = c.mul(2);
    expect(doubled.space).toBe(CAB);
    expect(doubled.toString()).toBe('CoordinateCAB({"c": 6, "a": 2, "b": 4})');
  });

  describe("unordered", () => {
    const Unordered = spacedCoordinate("Unordered", "cab", false);

    it("should list keys in reverse lexicographic order", () => {
      expect(Unordered.defaultOrder).toBeNull();
      expect(new Coordinate({ a: 1, b: 2, c: 3 }, { space: Unordered }).order).toEqual(["c", "b", "a"]);
    });

    it("should still validate its keys", () => {
      expect(() => new Coordinate({ a: 1 }, { space: Unordered })).toThrow(ValidationError);
    });

    it("should not parse positional values without an order", () => {
      expect(() => new Coordinate([1, 2, 3], { space: Unordered })).toThrow(ConstructionError);
      expect(() => new Coordinate([1, 2, 3], { space: Unordered })).toThrow(
        "Cannot parse Unordered values with no order"
      );
    });
  });

  describe("Point3D", () => {
    const Point3D = spacedCoordinate("Point3D", ["x", "y", "z"] as const);

    it("should build points positionally", () => {
      const p = new Coordinate([1, 2, 3], { space: Point3D });
      expect(p.get("z")).toBe(3);
      expect(String(p)).toBe('Point3D({"x": 1, "y": 2, "z": 3})');
    });

    it("should build a stream of points", () => {
      const points = [...Coordinate.fromSequence([[0, 0, 0], [1, 1, 1]], { space: Point3D })];
      expect(points.map((p) => p.norm(1))).toEqual([0, 3]);
    });

    it("should reject a point missing an axis", () => {
      expect(() => new Coordinate([1, 2], { space: Point3D })).toThrow(
        "2 values do not match length of order [x, y, z]"
      );
    });
  });
});
