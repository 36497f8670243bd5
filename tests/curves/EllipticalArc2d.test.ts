import { Curve2d } from "@/curves/Curve2d";
import { EllipticalArc2d } from "@/curves/EllipticalArc2d";
import { Axis2d } from "@/math/Axis2d";
import { Frame2d } from "@/math/Frame2d";
import { Transform2d } from "@/math/Transform2d";
import { Direction2d } from "@/math/Vector2d";
import { expectPointClose, maxDeviation } from "@test/helpers/curveHelpers";
import { describe, expect, it } from "vitest";

describe("EllipticalArc2d", () => {
  const ellipse = EllipticalArc2d.fromEllipse({
    center: { x: 1, y: 2 },
    xVector: { x: 3, y: 0 },
    yVector: { x: 0, y: 2 },
  });

  describe("evaluation", () => {
    it("should start at center + xVector", () => {
      expect(EllipticalArc2d.startPoint(ellipse)).toEqual({ x: 4, y: 2 });
    });

    it("should reach center + yVector a quarter of the way round", () => {
      expectPointClose(EllipticalArc2d.pointOn(ellipse, 0.25), { x: 1, y: 4 });
    });

    it("should span a full turn when built from an ellipse", () => {
      expect(ellipse.startAngle).toBe(0);
      expect(ellipse.endAngle).toBe(2 * Math.PI);
    });
  });

  describe("reverse", () => {
    it("should give back the original when applied twice", () => {
      const arc = EllipticalArc2d.from({ x: 0, y: 0 }, { x: 2, y: 1 }, { x: -1, y: 1.5 }, 0.3, 4);
      expect(EllipticalArc2d.reverse(EllipticalArc2d.reverse(arc))).toEqual(arc);
    });

    it("should run from the old end to the old start", () => {
      const arc = EllipticalArc2d.from({ x: 0, y: 0 }, { x: 2, y: 1 }, { x: -1, y: 1.5 }, 0.3, 4);
      const reversed = EllipticalArc2d.reverse(arc);
      expect(EllipticalArc2d.startPoint(reversed)).toEqual(EllipticalArc2d.endPoint(arc));
      expect(EllipticalArc2d.endPoint(reversed)).toEqual(EllipticalArc2d.startPoint(arc));
    });
  });

  describe("majorRadius", () => {
    it("should be the longer semi-axis of an axis-aligned ellipse", () => {
      expect(EllipticalArc2d.majorRadius(ellipse)).toBe(3);
    });

    it("should account for non-perpendicular vectors", () => {
      const sheared = EllipticalArc2d.from({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, 0, 1);
      expect(EllipticalArc2d.majorRadius(sheared)).toBeCloseTo((1 + Math.sqrt(5)) / 2);
    });
  });

  describe("boundingBox", () => {
    it("should use the half-extents for a full ellipse", () => {
      expect(EllipticalArc2d.boundingBox(ellipse)).toEqual({ minX: -2, maxX: 4, minY: 0, maxY: 4 });
    });

    it("should stop at the ends of a partial arc", () => {
      const arc = EllipticalArc2d.from(
        { x: 0, y: 0 },
        { x: 2, y: 0 },
        { x: 0, y: 1 },
        0,
        Math.PI / 2
      );
      const box = EllipticalArc2d.boundingBox(arc);
      expect(box.minX).toBeCloseTo(0);
      expect(box.maxX).toBe(2);
      expect(box.minY).toBe(0);
      expect(box.maxY).toBe(1);
    });

    it("should be tight for a sheared arc", () => {
      const arc = EllipticalArc2d.from({ x: 1, y: -1 }, { x: 2, y: 1 }, { x: -1, y: 1.5 }, 0.3, 4);
      const box = EllipticalArc2d.boundingBox(arc);

      let minX = Number.POSITIVE_INFINITY;
      let maxX = Number.NEGATIVE_INFINITY;
      let minY = Number.POSITIVE_INFINITY;
      let maxY = Number.NEGATIVE_INFINITY;
      for (let i = 0; i <= 20000; i++) {
        const p = EllipticalArc2d.pointOn(arc, i / 20000);
        minX = Math.min(minX, p.x);
        maxX = Math.max(maxX, p.x);
        minY = Math.min(minY, p.y);
        maxY = Math.max(maxY, p.y);
      }

      expect(box.minX).toBeLessThanOrEqual(minX + 1e-12);
      expect(box.maxX).toBeGreaterThanOrEqual(maxX - 1e-12);
      expect(box.minY).toBeLessThanOrEqual(minY + 1e-12);
      expect(box.maxY).toBeGreaterThanOrEqual(maxY - 1e-12);
      expect(box.minX).toBeCloseTo(minX, 5);
      expect(box.maxX).toBeCloseTo(maxX, 5);
      expect(box.minY).toBeCloseTo(minY, 5);
      expect(box.maxY).toBeCloseTo(maxY, 5);
    });
  });

  describe("transforms", () => {
    it("should accept non-uniform stretching", () => {
      const stretch = Transform2d.scaleAlong(Axis2d.x(), 2);
      const stretched = EllipticalArc2d.transformBy(ellipse, stretch);
      expect(stretched.center).toEqual({ x: 2, y: 2 });
      expect(stretched.xVector).toEqual({ x: 6, y: 0 });
      expect(stretched.yVector).toEqual({ x: 0, y: 2 });
      expectPointClose(
        EllipticalArc2d.pointOn(stretched, 0.4),
        Transform2d.applyToPoint(stretch, EllipticalArc2d.pointOn(ellipse, 0.4))
      );
    });

    it("should round-trip through a quarter-turn frame exactly", () => {
      const frame = Frame2d.withXDirection({ x: 1, y: 1 }, Direction2d.y());
      const placed = EllipticalArc2d.placeIn(ellipse, frame);
      expect(placed.xVector).toEqual({ x: 0, y: 3 });
      expect(EllipticalArc2d.relativeTo(placed, frame)).toEqual(ellipse);
    });
  });

  describe("approximation", () => {
    it("should use the second-derivative bound over the angle range", () => {
      // 2π · sqrt(3 / 2) = 7.7
      expect(EllipticalArc2d.numApproximationSegments(ellipse, { value: 0.25 })).toEqual({
        ok: true,
        value: 8,
      });
    });

    it("should reject a non-positive tolerance", () => {
      expect(EllipticalArc2d.numApproximationSegments(ellipse, { value: 0 })).toEqual({
        ok: false,
        error: { type: "invalid_tolerance", maxError: 0 },
      });
    });

    it("should stay within the tolerance", () => {
      const arc = EllipticalArc2d.from({ x: 1, y: -1 }, { x: 2, y: 1 }, { x: -1, y: 1.5 }, 0.3, 4);
      for (const e of [0.2, 0.02, 0.002]) {
        const result = EllipticalArc2d.approximate(arc, { value: e });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(maxDeviation(Curve2d.ellipticalArc(arc), result.value)).toBeLessThanOrEqual(e);
      }
    });
  });
});
