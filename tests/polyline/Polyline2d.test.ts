import type { Meters, Millimeters } from "@/types";
import { Frame2d } from "@/math/Frame2d";
import { Point2d } from "@/math/Point2d";
import { Quantity } from "@/math/Quantity";
import { Transform2d } from "@/math/Transform2d";
import { Polyline2d } from "@/polyline/Polyline2d";
import { describe, expect, it } from "vitest";

const corner = Polyline2d.fromVertices([Point2d.xy(0, 0), Point2d.xy(2, 0), Point2d.xy(2, 2)]);

describe("Polyline2d", () => {
  describe("construction", () => {
    it("should copy the vertex list", () => {
      const vertices = [Point2d.xy(0, 0), Point2d.xy(1, 1)];
      const polyline = Polyline2d.fromVertices(vertices);
      vertices.push(Point2d.xy(5, 5));
      expect(Polyline2d.numVertices(polyline)).toBe(2);
    });
  });

  describe("segments", () => {
    it("should pair consecutive vertices", () => {
      expect(Polyline2d.segments(corner)).toEqual([
        { start: { x: 0, y: 0 }, end: { x: 2, y: 0 } },
        { start: { x: 2, y: 0 }, end: { x: 2, y: 2 } },
      ]);
    });

    it("should have no segments for a single vertex", () => {
      expect(Polyline2d.segments(Polyline2d.fromVertices([Point2d.xy(1, 1)]))).toEqual([]);
    });
  });

  describe("length", () => {
    it("should sum the segment lengths", () => {
      expect(Polyline2d.length(corner).value).toBe(4);
    });

    it("should be zero for empty and single-vertex polylines", () => {
      expect(Polyline2d.length(Polyline2d.fromVertices([])).value).toBe(0);
      expect(Polyline2d.length(Polyline2d.fromVertices([Point2d.xy(3, 4)])).value).toBe(0);
    });

    it("should use the Euclidean distance", () => {
      const diagonal = Polyline2d.fromVertices([Point2d.xy(0, 0), Point2d.xy(3, 4)]);
      expect(Polyline2d.length(diagonal).value).toBe(5);
    });
  });

  describe("boundingBox", () => {
    it("should hull every vertex", () => {
      expect(Polyline2d.boundingBox(corner)).toEqual({ minX: 0, maxX: 2, minY: 0, maxY: 2 });
    });

    it("should be null without vertices", () => {
      expect(Polyline2d.boundingBox(Polyline2d.fromVertices([]))).toBeNull();
    });
  });

  describe("centroid", () => {
    it("should be null without vertices", () => {
      expect(Polyline2d.centroid(Polyline2d.fromVertices([]))).toBeNull();
    });

    it("should return the only vertex", () => {
      expect(Polyline2d.centroid(Polyline2d.fromVertices([Point2d.xy(3, -1)]))).toEqual({
        x: 3,
        y: -1,
      });
    });

    it("should return the first vertex when all vertices coincide", () => {
      const collapsed = Polyline2d.fromVertices([Point2d.xy(1, 2), Point2d.xy(1, 2)]);
      expect(Polyline2d.centroid(collapsed)).toEqual({ x: 1, y: 2 });
    });

    it("should pull the box center toward each segment midpoint in order", () => {
      // center (1, 1) -> halfway to (1, 0) -> halfway to (2, 1)
      expect(Polyline2d.centroid(corner)).toEqual({ x: 1.5, y: 0.75 });
    });

    it("should depend on traversal order", () => {
      // center (1, 1) -> halfway to (2, 1) -> halfway to (1, 0)
      expect(Polyline2d.centroid(Polyline2d.reverse(corner))).toEqual({ x: 1.25, y: 0.5 });
    });

    it("should give the midpoint of a single segment", () => {
      const segment = Polyline2d.fromVertices([Point2d.xy(-2, 1), Point2d.xy(4, 3)]);
      expect(Polyline2d.centroid(segment)).toEqual({ x: 1, y: 2 });
    });
  });

  describe("transforms", () => {
    it("should reverse the vertex order", () => {
      expect(Polyline2d.reverse(corner).vertices).toEqual([
        { x: 2, y: 2 },
        { x: 2, y: 0 },
        { x: 0, y: 0 },
      ]);
    });

    it("should translate every vertex", () => {
      const moved = Polyline2d.transformBy(corner, Transform2d.translateBy({ x: 1, y: -1 }));
      expect(moved.vertices).toEqual([
        { x: 1, y: -1 },
        { x: 3, y: -1 },
        { x: 3, y: 1 },
      ]);
    });

    it("should round-trip through a translated frame", () => {
      const frame = Frame2d.atPoint(Point2d.xy(0.5, 0.25));
      const local = Polyline2d.relativeTo(corner, frame);
      expect(local.vertices[0]).toEqual({ x: -0.5, y: -0.25 });
      expect(Polyline2d.placeIn(local, frame)).toEqual(corner);
    });

    it("should convert units in both directions", () => {
      const inMeters = Polyline2d.fromVertices([
        Point2d.xy<"global", Meters>(0.25, 1),
        Point2d.xy<"global", Meters>(2, 0.5),
      ]);
      const rate = Quantity.rate<Millimeters, Meters>(1000);
      const inMillimeters = Polyline2d.at(inMeters, rate);
      expect(inMillimeters.vertices).toEqual([
        { x: 250, y: 1000 },
        { x: 2000, y: 500 },
      ]);
      expect(Polyline2d.length(inMillimeters).value).toBeCloseTo(
        1000 * Polyline2d.length(inMeters).value,
        9
      );
      expect(Polyline2d.at_(inMillimeters, rate)).toEqual(inMeters);
    });
  });
});
