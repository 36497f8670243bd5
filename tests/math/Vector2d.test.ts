import { Direction2d, Vector2d } from "@/math/Vector2d";
import { describe, expect, it } from "vitest";

describe("Vector2d", () => {
  describe("create", () => {
    it("should create a vector with given components", () => {
      expect(Vector2d.create(3, 4)).toEqual({ x: 3, y: 4 });
    });
  });

  describe("add", () => {
    it("should add two vectors", () => {
      expect(Vector2d.add({ x: 1, y: 2 }, { x: 3, y: 4 })).toEqual({ x: 4, y: 6 });
    });

    it("should handle negative values", () => {
      expect(Vector2d.add({ x: -1, y: 2 }, { x: 3, y: -4 })).toEqual({ x: 2, y: -2 });
    });
  });

  describe("subtract", () => {
    it("should subtract two vectors", () => {
      expect(Vector2d.subtract({ x: 5, y: 7 }, { x: 2, y: 3 })).toEqual({ x: 3, y: 4 });
    });
  });

  describe("scale", () => {
    it("should scale a vector by a scalar", () => {
      expect(Vector2d.scale({ x: 2, y: 3 }, 2)).toEqual({ x: 4, y: 6 });
    });

    it("should handle negative scalar", () => {
      expect(Vector2d.scale({ x: 2, y: 3 }, -1)).toEqual({ x: -2, y: -3 });
    });
  });

  describe("dot and cross", () => {
    it("should calculate dot product", () => {
      expect(Vector2d.dot({ x: 1, y: 2 }, { x: 3, y: 4 })).toBe(11); // 1*3 + 2*4
    });

    it("should calculate the z component of the cross product", () => {
      expect(Vector2d.cross({ x: 1, y: 2 }, { x: 3, y: 4 })).toBe(-2); // 1*4 - 2*3
    });

    it("should give a positive cross product for counterclockwise order", () => {
      expect(Vector2d.cross({ x: 1, y: 0 }, { x: 0, y: 1 })).toBe(1);
    });
  });

  describe("length", () => {
    it("should calculate squared length", () => {
      expect(Vector2d.lengthSquared({ x: 3, y: 4 })).toBe(25);
    });

    it("should calculate vector length", () => {
      expect(Vector2d.length({ x: 3, y: 4 })).toBe(5);
    });
  });

  describe("direction", () => {
    it("should normalize to unit length", () => {
      const dir = Vector2d.direction({ x: 3, y: 4 });
      expect(dir).not.toBeNull();
      expect(dir?.x).toBeCloseTo(0.6);
      expect(dir?.y).toBeCloseTo(0.8);
    });

    it("should return null for the zero vector", () => {
      expect(Vector2d.direction(Vector2d.zero())).toBeNull();
    });
  });

  describe("frame bases", () => {
    it("should place a local vector into a rotated basis", () => {
      const placed = Vector2d.placeIn({ x: 2, y: 3 }, { x: 0, y: 1 }, { x: -1, y: 0 });
      expect(placed).toEqual({ x: -3, y: 2 });
    });

    it("should express a global vector in a rotated basis", () => {
      const local = Vector2d.relativeTo({ x: -3, y: 2 }, { x: 0, y: 1 }, { x: -1, y: 0 });
      expect(local).toEqual({ x: 2, y: 3 });
    });
  });

  describe("unit conversion", () => {
    it("should multiply by the factor", () => {
      expect(Vector2d.convert({ x: 1.5, y: -2 }, 1000)).toEqual({ x: 1500, y: -2000 });
    });

    it("should divide by the factor", () => {
      expect(Vector2d.convertInverse({ x: 1500, y: -2000 }, 1000)).toEqual({ x: 1.5, y: -2 });
    });
  });
});

describe("Direction2d", () => {
  it("should build unit axes", () => {
    expect(Direction2d.x()).toEqual({ x: 1, y: 0 });
    expect(Direction2d.y()).toEqual({ x: 0, y: 1 });
  });

  it("should round-trip an angle", () => {
    expect(Direction2d.angle(Direction2d.fromAngle(0.75))).toBeCloseTo(0.75);
  });

  it("should rotate 90° counterclockwise", () => {
    expect(Direction2d.perpendicular({ x: 0.6, y: 0.8 })).toEqual({ x: -0.8, y: 0.6 });
  });
});
