import { err, ok } from "@/errors/Result";
import type { CurveError, CurveResult } from "@/errors/CurveError";
import { Quantity } from "@/math/Quantity";

/**
 * Accept only positive integer segment counts.
 */
export function validateSegmentCount(count: number): CurveResult<number> {
  if (!Number.isInteger(count) || count <= 0) {
    return err<CurveError>({ type: "invalid_segment_count", count });
  }
  return ok(count);
}

/**
 * Accept only strictly positive tolerances (NaN is rejected, +Infinity accepted).
 *
 * @returns The raw tolerance value
 */
export function validateTolerance<U>(maxError: Quantity<U>): CurveResult<number> {
  if (!Quantity.isPositive(maxError)) {
    return err<CurveError>({ type: "invalid_tolerance", maxError: maxError.value });
  }
  return ok(maxError.value);
}
