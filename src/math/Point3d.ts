import type { Coordinates, Global, Tagged, Unitless } from "@/types";

/** 3D position in space `S` with coordinates in units `U` (immutable) */
export interface Point3d<S = Global, U = Unitless> extends Tagged<Coordinates<S, U>> {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Point3d - Pure utility functions for 3D positions
 */
export const Point3d = {
  xyz<S = Global, U = Unitless>(x: number, y: number, z: number): Point3d<S, U> {
    return { x, y, z };
  },

  distance<S, U>(a: Point3d<S, U>, b: Point3d<S, U>): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const dz = b.z - a.z;
    return Math.sqrt(dx * dx + dy * dy + dz * dz);
  },

  midpoint<S, U>(a: Point3d<S, U>, b: Point3d<S, U>): Point3d<S, U> {
    return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2, z: (a.z + b.z) / 2 };
  },

  /**
   * Move `from` toward `to` by the fraction `t` of the displacement between them
   */
  interpolate<S, U>(from: Point3d<S, U>, to: Point3d<S, U>, t: number): Point3d<S, U> {
    return {
      x: from.x + (to.x - from.x) * t,
      y: from.y + (to.y - from.y) * t,
      z: from.z + (to.z - from.z) * t,
    };
  },
};
