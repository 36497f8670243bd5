/**
 * Approximation Module Exports
 *
 * Error-bounded discretization: validation, per-kind segment counts and
 * uniform sampling.
 */

export { approximateCurve, type Discretizable } from "./approximateCurve";
export { arcSegmentCount, secondDerivativeSegmentCount } from "./SegmentCount";
export { sampleUniform } from "./Sampling";
export { validateSegmentCount, validateTolerance } from "./Validation";
export { ApproximationDebugLogger, type ApproximationDebugLog } from "./ApproximationDebugLogger";
