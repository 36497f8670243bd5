import type { Global, TransformClass, Unitless } from "@/types";
import { Bounds2d } from "@/math/Bounds2d";
import type { Frame2d } from "@/math/Frame2d";
import { Point2d } from "@/math/Point2d";
import { Quantity, type Rate } from "@/math/Quantity";
import { Transform2d } from "@/math/Transform2d";
import { polylineCentroid, polylineLength, type VertexOps } from "./PolylineMeasures";

/**
 * Ordered 2D vertices; consecutive pairs form the segments.
 *
 * A polyline is a plain value: it keeps no link to the curve it was sampled
 * from and is never modified after construction.
 */
export interface Polyline2d<S = Global, U = Unitless> {
  readonly vertices: readonly Point2d<S, U>[];
}

/** One straight piece of a polyline */
export interface PolylineSegment2d<S = Global, U = Unitless> {
  readonly start: Point2d<S, U>;
  readonly end: Point2d<S, U>;
}

function vertexOps<S, U>(): VertexOps<Point2d<S, U>, Bounds2d<S, U>> {
  return {
    distance: Point2d.distance,
    midpoint: Point2d.midpoint,
    interpolate: Point2d.interpolate,
    hull: Bounds2d.hull,
    center: Bounds2d.center,
  };
}

/**
 * Polyline2d - Pure functions over 2D polylines
 */
export const Polyline2d = {
  fromVertices<S, U>(vertices: readonly Point2d<S, U>[]): Polyline2d<S, U> {
    return { vertices: [...vertices] };
  },

  numVertices<S, U>(polyline: Polyline2d<S, U>): number {
    return polyline.vertices.length;
  },

  /**
   * Segments between consecutive vertices; empty for 0 or 1 vertices
   */
  segments<S, U>(polyline: Polyline2d<S, U>): PolylineSegment2d<S, U>[] {
    const result: PolylineSegment2d<S, U>[] = [];
    for (let i = 1; i < polyline.vertices.length; i++) {
      result.push({ start: polyline.vertices[i - 1]!, end: polyline.vertices[i]! });
    }
    return result;
  },

  length<S, U>(polyline: Polyline2d<S, U>): Quantity<U> {
    return Quantity.of(polylineLength(polyline.vertices, vertexOps<S, U>()));
  },

  /**
   * Hull of all vertices; null for an empty polyline
   */
  boundingBox<S, U>(polyline: Polyline2d<S, U>): Bounds2d<S, U> | null {
    return Bounds2d.hull(polyline.vertices);
  },

  /**
   * Iteratively refined centroid; see polylineCentroid
   */
  centroid<S, U>(polyline: Polyline2d<S, U>): Point2d<S, U> | null {
    return polylineCentroid(polyline.vertices, vertexOps<S, U>());
  },

  reverse<S, U>(polyline: Polyline2d<S, U>): Polyline2d<S, U> {
    return { vertices: [...polyline.vertices].reverse() };
  },

  transformBy<C extends TransformClass, S, U>(
    polyline: Polyline2d<S, U>,
    transform: Transform2d<C, S, U>
  ): Polyline2d<S, U> {
    return { vertices: polyline.vertices.map((v) => Transform2d.applyToPoint(transform, v)) };
  },

  placeIn<G, L, U>(polyline: Polyline2d<L, U>, frame: Frame2d<G, L, U>): Polyline2d<G, U> {
    return {
      vertices: polyline.vertices.map((v) =>
        Point2d.placeIn(v, frame.origin, frame.xDirection, frame.yDirection)
      ),
    };
  },

  relativeTo<G, L, U>(polyline: Polyline2d<G, U>, frame: Frame2d<G, L, U>): Polyline2d<L, U> {
    return {
      vertices: polyline.vertices.map((v) =>
        Point2d.relativeTo<G, L, U>(v, frame.origin, frame.xDirection, frame.yDirection)
      ),
    };
  },

  /**
   * Convert units by multiplying every coordinate by the rate
   */
  at<S, From, To>(polyline: Polyline2d<S, From>, rate: Rate<To, From>): Polyline2d<S, To> {
    return {
      vertices: polyline.vertices.map((v) => Point2d.convert<S, From, To>(v, rate.value)),
    };
  },

  /**
   * Convert units by dividing every coordinate by the rate
   */
  at_<S, From, To>(polyline: Polyline2d<S, From>, rate: Rate<From, To>): Polyline2d<S, To> {
    return {
      vertices: polyline.vertices.map((v) =>
        Point2d.convertInverse<S, From, To>(v, rate.value)
      ),
    };
  },
};
