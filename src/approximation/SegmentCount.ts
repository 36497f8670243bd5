/**
 * SegmentCount - Minimal segment counts for a maximum deviation
 *
 * Every count here is the smallest n >= 1 for which sampling n + 1 evenly
 * spaced parameter values keeps the whole curve within `maxError` of the
 * resulting polyline. The tolerance is assumed already validated (> 0).
 */

/**
 * Segment count for a circular arc.
 *
 * A chord spanning angle φ deviates from the arc by the sagitta
 *   s = r (1 - cos(φ/2)) = 2 r sin²(φ/4)
 * so the largest allowed angle per segment is
 *   φ = 4 asin(sqrt(e / 2r))      (e < 2r)
 *   φ = 2π                        (e >= 2r: any chord is within tolerance)
 *
 * The sin² form stays accurate when e / r is tiny, where 1 - e/r rounds to 1.
 *
 * @param radius - Arc radius (>= 0)
 * @param sweptAngle - Signed angle swept by the arc, in radians
 * @param maxError - Maximum allowed deviation
 */
export function arcSegmentCount(radius: number, sweptAngle: number, maxError: number): number {
  const sweep = Math.abs(sweptAngle);
  if (radius === 0 || sweep === 0) return 1;

  const ratio = maxError / (2 * radius);
  const maxAngle = ratio >= 1 ? 2 * Math.PI : 4 * Math.asin(Math.sqrt(ratio));
  return Math.max(1, Math.ceil(sweep / maxAngle));
}

/**
 * Segment count from a bound on the second derivative.
 *
 * For a C² curve p(t) sampled with parameter step h, the chord error is
 *   |p(t) - chord(t)| <= (t - t0)(t1 - t) / 2 * max|p''| <= h² / 8 * max|p''|
 * so h <= sqrt(8 e / M) and n = ceil(span * sqrt(M / 8e)).
 *
 * @param parameterSpan - Length of the parameter domain (1 for splines,
 *   the angle range for elliptical arcs)
 * @param maxSecondDerivative - Upper bound M of |p''| over the domain
 * @param maxError - Maximum allowed deviation
 */
export function secondDerivativeSegmentCount(
  parameterSpan: number,
  maxSecondDerivative: number,
  maxError: number
): number {
  const span = Math.abs(parameterSpan);
  if (span === 0 || maxSecondDerivative === 0) return 1;

  return Math.max(1, Math.ceil(span * Math.sqrt(maxSecondDerivative / (8 * maxError))));
}
