import type { Point2d } from "@/math/Point2d";
import type { Polyline2d } from "@/polyline/Polyline2d";

/**
 * Sample a curve at `count + 1` evenly spaced normalized parameters.
 *
 * The first and last vertices are the curve's own endpoints rather than
 * evaluations at 0 and 1, so they match startPoint/endPoint exactly.
 *
 * @param count - Number of segments (already validated as a positive integer)
 * @param pointAt - Curve evaluation at normalized parameter t ∈ [0, 1]
 */
export function sampleUniform<S, U>(
  count: number,
  start: Point2d<S, U>,
  end: Point2d<S, U>,
  pointAt: (t: number) => Point2d<S, U>
): Polyline2d<S, U> {
  const vertices: Point2d<S, U>[] = [start];
  for (let i = 1; i < count; i++) {
    vertices.push(pointAt(i / count));
  }
  vertices.push(end);
  return { vertices };
}
