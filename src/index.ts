/**
 * Parametric curve algebra
 *
 * - Curve primitives and the Curve2d tagged union
 * - Error-bounded discretization into polylines
 * - Polyline measurements (length, bounds, centroid)
 */

export * from "./types";
export * from "./math";
export * from "./curves";
export * from "./approximation";
export * from "./polyline";
export * from "./errors";
export {
  createApproximationConfig,
  DEFAULT_APPROXIMATION_CONFIG,
  type ApproximationConfig,
} from "./config/approximationConfig";
