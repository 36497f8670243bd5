import type { Result } from "./Result";
import { unwrap } from "./Result";

/** Error kinds reported by discretization */
export type CurveErrorType =
  | "invalid_segment_count" // segments(n) with n not a positive integer
  | "invalid_tolerance" // maxError not strictly positive
  | "segment_limit_exceeded"; // required count above the configured maximum

export interface InvalidSegmentCount {
  readonly type: "invalid_segment_count";
  readonly count: number;
}

export interface InvalidTolerance {
  readonly type: "invalid_tolerance";
  readonly maxError: number;
}

export interface SegmentLimitExceeded {
  readonly type: "segment_limit_exceeded";
  readonly count: number;
  readonly limit: number;
}

export type CurveError = InvalidSegmentCount | InvalidTolerance | SegmentLimitExceeded;

export type CurveResult<T> = Result<T, CurveError>;

export function describeCurveError(error: CurveError): string {
  switch (error.type) {
    case "invalid_segment_count":
      return `Segment count must be a positive integer, got ${error.count}`;
    case "invalid_tolerance":
      return `Approximation tolerance must be strictly positive, got ${error.maxError}`;
    case "segment_limit_exceeded":
      return `Approximation needs ${error.count} segments, above the limit of ${error.limit}`;
  }
}

/**
 * Extract a successful value or throw an Error describing the curve error.
 */
export function unwrapCurve<T>(result: CurveResult<T>): T {
  return unwrap(result, describeCurveError);
}
