import type { Global, Unitless } from "@/types";
import { Bounds3d } from "@/math/Bounds3d";
import { Point3d } from "@/math/Point3d";
import { Quantity } from "@/math/Quantity";
import { polylineCentroid, polylineLength, type VertexOps } from "./PolylineMeasures";

/** Ordered 3D vertices; consecutive pairs form the segments */
export interface Polyline3d<S = Global, U = Unitless> {
  readonly vertices: readonly Point3d<S, U>[];
}

export interface PolylineSegment3d<S = Global, U = Unitless> {
  readonly start: Point3d<S, U>;
  readonly end: Point3d<S, U>;
}

function vertexOps<S, U>(): VertexOps<Point3d<S, U>, Bounds3d<S, U>> {
  return {
    distance: Point3d.distance,
    midpoint: Point3d.midpoint,
    interpolate: Point3d.interpolate,
    hull: Bounds3d.hull,
    center: Bounds3d.center,
  };
}

/**
 * Polyline3d - Pure functions over 3D polylines
 */
export const Polyline3d = {
  fromVertices<S, U>(vertices: readonly Point3d<S, U>[]): Polyline3d<S, U> {
    return { vertices: [...vertices] };
  },

  numVertices<S, U>(polyline: Polyline3d<S, U>): number {
    return polyline.vertices.length;
  },

  segments<S, U>(polyline: Polyline3d<S, U>): PolylineSegment3d<S, U>[] {
    const result: PolylineSegment3d<S, U>[] = [];
    for (let i = 1; i < polyline.vertices.length; i++) {
      result.push({ start: polyline.vertices[i - 1]!, end: polyline.vertices[i]! });
    }
    return result;
  },

  length<S, U>(polyline: Polyline3d<S, U>): Quantity<U> {
    return Quantity.of(polylineLength(polyline.vertices, vertexOps<S, U>()));
  },

  boundingBox<S, U>(polyline: Polyline3d<S, U>): Bounds3d<S, U> | null {
    return Bounds3d.hull(polyline.vertices);
  },

  centroid<S, U>(polyline: Polyline3d<S, U>): Point3d<S, U> | null {
    return polylineCentroid(polyline.vertices, vertexOps<S, U>());
  },

  reverse<S, U>(polyline: Polyline3d<S, U>): Polyline3d<S, U> {
    return { vertices: [...polyline.vertices].reverse() };
  },
};
