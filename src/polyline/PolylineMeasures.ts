/**
 * PolylineMeasures - Dimension-independent polyline measurements
 *
 * Shared by Polyline2d and Polyline3d. Each works through a small table of
 * point operations, so the fold order (and therefore the floating-point
 * result) is the same in every dimension.
 */

/**
 * Point operations a polyline measurement needs.
 */
export interface VertexOps<P, B> {
  distance(a: P, b: P): number;
  midpoint(a: P, b: P): P;
  /** `from + (to - from) * t` */
  interpolate(from: P, to: P, t: number): P;
  /** Bounding box of the points, or null for none */
  hull(points: readonly P[]): B | null;
  center(bounds: B): P;
}

/**
 * Sum of the Euclidean lengths of consecutive vertex pairs.
 * Zero for 0 or 1 vertices.
 */
export function polylineLength<P, B>(vertices: readonly P[], ops: VertexOps<P, B>): number {
  let total = 0;
  for (let i = 1; i < vertices.length; i++) {
    const a = vertices[i - 1]!;
    const b = vertices[i]!;
    total += ops.distance(a, b);
  }
  return total;
}

/**
 * Approximate length-weighted centroid.
 *
 * Algorithm:
 * 1. No vertices: null
 * 2. Zero total length (all vertices coincide): the first vertex
 * 3. Otherwise start at the bounding box center and, for each segment in
 *    vertex order, move the estimate toward the segment midpoint by
 *    segmentLength / totalLength of the remaining displacement
 *
 * This is not the exact first moment; the result depends on traversal order.
 */
export function polylineCentroid<P, B>(vertices: readonly P[], ops: VertexOps<P, B>): P | null {
  const bounds = ops.hull(vertices);
  if (bounds === null) return null;

  const totalLength = polylineLength(vertices, ops);
  if (totalLength === 0) {
    return vertices[0]!;
  }

  let estimate = ops.center(bounds);
  for (let i = 1; i < vertices.length; i++) {
    const a = vertices[i - 1]!;
    const b = vertices[i]!;
    const weight = ops.distance(a, b) / totalLength;
    estimate = ops.interpolate(estimate, ops.midpoint(a, b), weight);
  }
  return estimate;
}
