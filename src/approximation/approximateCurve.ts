import type { CurveType } from "@/types";
import {
  type ApproximationConfig,
  createApproximationConfig,
} from "@/config/approximationConfig";
import type { CurveError, CurveResult } from "@/errors/CurveError";
import { err } from "@/errors/Result";
import type { Quantity } from "@/math/Quantity";
import type { Polyline2d } from "@/polyline/Polyline2d";
import { ApproximationDebugLogger } from "./ApproximationDebugLogger";

/**
 * The two discretization entry points every curve kind provides.
 */
export interface Discretizable<C, S, U> {
  segments(curve: C, count: number): CurveResult<Polyline2d<S, U>>;
  numApproximationSegments(curve: C, maxError: Quantity<U>): CurveResult<number>;
}

/**
 * Approximate a curve within `maxError`: segments(numApproximationSegments(maxError)).
 *
 * Fails with `segment_limit_exceeded` before sampling when the required count
 * is above `maxSegments`.
 */
export function approximateCurve<C, S, U>(
  type: CurveType,
  curve: C,
  maxError: Quantity<U>,
  kind: Discretizable<C, S, U>,
  options: Partial<ApproximationConfig> = {}
): CurveResult<Polyline2d<S, U>> {
  const config = createApproximationConfig(options);

  const count = kind.numApproximationSegments(curve, maxError);
  if (!count.ok) return count;

  if (count.value > config.maxSegments) {
    return err<CurveError>({
      type: "segment_limit_exceeded",
      count: count.value,
      limit: config.maxSegments,
    });
  }

  const polyline = kind.segments(curve, count.value);
  if (polyline.ok && config.logApproximations) {
    ApproximationDebugLogger.logApproximation({
      kind: type,
      maxError: maxError.value,
      segmentCount: count.value,
      vertexCount: polyline.value.vertices.length,
    });
  }
  return polyline;
}
