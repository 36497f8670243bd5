import type { Coordinates, Global, Tagged, Unitless } from "@/types";
import type { Point2d } from "./Point2d";

/**
 * Axis-aligned 2D bounding box.
 *
 * There is no empty box: the hull of no points is `null`.
 */
export interface Bounds2d<S = Global, U = Unitless> extends Tagged<Coordinates<S, U>> {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
}

/**
 * Bounds2d - Pure utility functions for axis-aligned 2D boxes
 */
export const Bounds2d = {
  /**
   * Smallest box containing both points
   */
  fromCorners<S, U>(a: Point2d<S, U>, b: Point2d<S, U>): Bounds2d<S, U> {
    return {
      minX: Math.min(a.x, b.x),
      maxX: Math.max(a.x, b.x),
      minY: Math.min(a.y, b.y),
      maxY: Math.max(a.y, b.y),
    };
  },

  /**
   * Smallest box containing every point, or null for no points
   */
  hull<S, U>(points: readonly Point2d<S, U>[]): Bounds2d<S, U> | null {
    const first = points[0];
    if (first === undefined) return null;

    let minX = first.x;
    let maxX = first.x;
    let minY = first.y;
    let maxY = first.y;
    for (const p of points) {
      if (p.x < minX) minX = p.x;
      if (p.x > maxX) maxX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.y > maxY) maxY = p.y;
    }
    return { minX, maxX, minY, maxY };
  },

  /**
   * Hull of a non-empty point list (first point given separately)
   */
  hullOf<S, U>(first: Point2d<S, U>, ...rest: Point2d<S, U>[]): Bounds2d<S, U> {
    return rest.reduce(
      (bounds, p) => Bounds2d.union(bounds, Bounds2d.fromCorners(p, p)),
      Bounds2d.fromCorners(first, first)
    );
  },

  union<S, U>(a: Bounds2d<S, U>, b: Bounds2d<S, U>): Bounds2d<S, U> {
    return {
      minX: Math.min(a.minX, b.minX),
      maxX: Math.max(a.maxX, b.maxX),
      minY: Math.min(a.minY, b.minY),
      maxY: Math.max(a.maxY, b.maxY),
    };
  },

  /**
   * Geometric center of the box
   */
  center<S, U>(b: Bounds2d<S, U>): Point2d<S, U> {
    return { x: (b.minX + b.maxX) / 2, y: (b.minY + b.maxY) / 2 };
  },

  /**
   * Whether the point lies inside or on the box, expanded by `tolerance`
   */
  contains<S, U>(b: Bounds2d<S, U>, p: Point2d<S, U>, tolerance = 0): boolean {
    return (
      p.x >= b.minX - tolerance &&
      p.x <= b.maxX + tolerance &&
      p.y >= b.minY - tolerance &&
      p.y <= b.maxY + tolerance
    );
  },
};
