import type { Meters, Millimeters } from "@/types";
import { Quantity } from "@/math/Quantity";
import { describe, expect, it } from "vitest";

describe("Quantity", () => {
  const a = Quantity.of<Meters>(2.5);
  const b = Quantity.of<Meters>(0.75);

  it("should start from zero", () => {
    expect(Quantity.zero<Meters>()).toEqual({ value: 0 });
  });

  it("should add and subtract quantities of the same unit", () => {
    expect(Quantity.add(a, b)).toEqual({ value: 3.25 });
    expect(Quantity.subtract(a, b)).toEqual({ value: 1.75 });
  });

  it("should scale by a plain factor", () => {
    expect(Quantity.multiply(b, 4)).toEqual({ value: 3 });
  });

  it("should order quantities", () => {
    expect([a, b, Quantity.zero<Meters>()].sort(Quantity.compare)).toEqual([
      { value: 0 },
      { value: 0.75 },
      { value: 2.5 },
    ]);
    expect(Quantity.compare(a, Quantity.of<Meters>(2.5))).toBe(0);
  });

  describe("isPositive", () => {
    it("should accept values above zero including infinity", () => {
      expect(Quantity.isPositive(a)).toBe(true);
      expect(Quantity.isPositive(Quantity.of(Number.POSITIVE_INFINITY))).toBe(true);
    });

    it.each([0, -0, -1, Number.NaN])("should reject %s", (value) => {
      expect(Quantity.isPositive(Quantity.of(value))).toBe(false);
    });
  });

  it("should carry a conversion factor as a rate", () => {
    expect(Quantity.rate<Millimeters, Meters>(1000)).toEqual({ value: 1000 });
  });
});
