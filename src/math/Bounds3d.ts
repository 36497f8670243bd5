import type { Coordinates, Global, Tagged, Unitless } from "@/types";
import type { Point3d } from "./Point3d";

/** Axis-aligned 3D bounding box; the hull of no points is `null` */
export interface Bounds3d<S = Global, U = Unitless> extends Tagged<Coordinates<S, U>> {
  readonly minX: number;
  readonly maxX: number;
  readonly minY: number;
  readonly maxY: number;
  readonly minZ: number;
  readonly maxZ: number;
}

export const Bounds3d = {
  hull<S, U>(points: readonly Point3d<S, U>[]): Bounds3d<S, U> | null {
    const first = points[0];
    if (first === undefined) return null;

    let minX = first.x;
    let maxX = first.x;
    let minY = first.y;
    let maxY = first.y;
    let minZ = first.z;
    let maxZ = first.z;
    for (const p of points) {
      if (p.x < minX) minX = p.x;
      if (p.x > maxX) maxX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.y > maxY) maxY = p.y;
      if (p.z < minZ) minZ = p.z;
      if (p.z > maxZ) maxZ = p.z;
    }
    return { minX, maxX, minY, maxY, minZ, maxZ };
  },

  center<S, U>(b: Bounds3d<S, U>): Point3d<S, U> {
    return {
      x: (b.minX + b.maxX) / 2,
      y: (b.minY + b.maxY) / 2,
      z: (b.minZ + b.maxZ) / 2,
    };
  },
};
