import type { Coordinates, Global, Tagged, Unitless } from "@/types";
import type { Direction2d } from "./Vector2d";
import { Vector2d } from "./Vector2d";

/** 2D position in space `S` with coordinates in units `U` (immutable) */
export interface Point2d<S = Global, U = Unitless> extends Tagged<Coordinates<S, U>> {
  readonly x: number;
  readonly y: number;
}

/**
 * Point2d - Pure utility functions for 2D positions
 *
 * Points and vectors are kept apart: a point minus a point is a vector,
 * a point plus a vector is a point, and points never add.
 */
export const Point2d = {
  /**
   * Create a point from coordinates
   */
  xy<S = Global, U = Unitless>(x: number, y: number): Point2d<S, U> {
    return { x, y };
  },

  origin<S = Global, U = Unitless>(): Point2d<S, U> {
    return { x: 0, y: 0 };
  },

  /**
   * Point at `radius` from `center` in the direction of `angle`
   */
  polar<S, U>(center: Point2d<S, U>, radius: number, angle: number): Point2d<S, U> {
    return {
      x: center.x + radius * Math.cos(angle),
      y: center.y + radius * Math.sin(angle),
    };
  },

  /**
   * Displacement from `from` to `to`
   */
  vectorFrom<S, U>(from: Point2d<S, U>, to: Point2d<S, U>): Vector2d<S, U> {
    return { x: to.x - from.x, y: to.y - from.y };
  },

  translateBy<S, U>(p: Point2d<S, U>, v: Vector2d<S, U>): Point2d<S, U> {
    return { x: p.x + v.x, y: p.y + v.y };
  },

  /**
   * Calculate distance between two points
   */
  distance<S, U>(a: Point2d<S, U>, b: Point2d<S, U>): number {
    return Vector2d.length(Point2d.vectorFrom(a, b));
  },

  /**
   * Get midpoint of two points
   */
  midpoint<S, U>(a: Point2d<S, U>, b: Point2d<S, U>): Point2d<S, U> {
    return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
  },

  /**
   * Linear interpolation: t = 0 gives `a`, t = 1 gives `b`
   */
  interpolate<S, U>(a: Point2d<S, U>, b: Point2d<S, U>, t: number): Point2d<S, U> {
    return { x: a.x + t * (b.x - a.x), y: a.y + t * (b.y - a.y) };
  },

  /**
   * Exact coordinate equality (no tolerance)
   */
  equals<S, U>(a: Point2d<S, U>, b: Point2d<S, U>): boolean {
    return a.x === b.x && a.y === b.y;
  },

  /**
   * Convert a point given in a frame's local space into global space
   */
  placeIn<G, L, U>(
    p: Point2d<L, U>,
    origin: Point2d<G, U>,
    xDirection: Direction2d<G>,
    yDirection: Direction2d<G>
  ): Point2d<G, U> {
    return {
      x: origin.x + p.x * xDirection.x + p.y * yDirection.x,
      y: origin.y + p.x * xDirection.y + p.y * yDirection.y,
    };
  },

  /**
   * Convert a global point into a frame's local space
   */
  relativeTo<G, L, U>(
    p: Point2d<G, U>,
    origin: Point2d<G, U>,
    xDirection: Direction2d<G>,
    yDirection: Direction2d<G>
  ): Point2d<L, U> {
    const dx = p.x - origin.x;
    const dy = p.y - origin.y;
    return {
      x: dx * xDirection.x + dy * xDirection.y,
      y: dx * yDirection.x + dy * yDirection.y,
    };
  },

  /**
   * Rescale coordinates by a conversion factor, changing the units tag
   */
  convert<S, From, To>(p: Point2d<S, From>, factor: number): Point2d<S, To> {
    return { x: p.x * factor, y: p.y * factor };
  },

  /**
   * Rescale coordinates by the inverse of a conversion factor
   */
  convertInverse<S, From, To>(p: Point2d<S, From>, factor: number): Point2d<S, To> {
    return { x: p.x / factor, y: p.y / factor };
  },

  /**
   * Shortest distance from a point to a line segment
   */
  distanceToSegment<S, U>(
    point: Point2d<S, U>,
    segmentStart: Point2d<S, U>,
    segmentEnd: Point2d<S, U>
  ): number {
    const v = Point2d.vectorFrom(segmentStart, segmentEnd);
    const w = Point2d.vectorFrom(segmentStart, point);

    const c1 = Vector2d.dot(w, v);
    if (c1 <= 0) {
      // Point is before segment start
      return Point2d.distance(point, segmentStart);
    }

    const c2 = Vector2d.dot(v, v);
    if (c2 <= c1) {
      // Point is after segment end
      return Point2d.distance(point, segmentEnd);
    }

    // Point projects onto segment
    const projection = Point2d.translateBy(segmentStart, Vector2d.scale(v, c1 / c2));
    return Point2d.distance(point, projection);
  },
};
