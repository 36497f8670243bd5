export type { Ok, Err, Result } from "./Result";
export { ok, err, mapResult, flatMapResult, unwrap } from "./Result";

export type {
  CurveError,
  CurveErrorType,
  CurveResult,
  InvalidSegmentCount,
  InvalidTolerance,
  SegmentLimitExceeded,
} from "./CurveError";
export { describeCurveError, unwrapCurve } from "./CurveError";
