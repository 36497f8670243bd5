/**
 * Curves Module Exports
 */

export { LineSegment2d } from "./LineSegment2d";
export { Arc2d, type Circle2d } from "./Arc2d";
export { EllipticalArc2d, type Ellipse2d } from "./EllipticalArc2d";
export { QuadraticSpline2d } from "./QuadraticSpline2d";
export { CubicSpline2d } from "./CubicSpline2d";
export type { CurveKind, CurvePrimitives } from "./CurveKind";
export {
  Curve2d,
  CURVE_KINDS,
  isArcCurve,
  isCubicSplineCurve,
  isEllipticalArcCurve,
  isLineCurve,
  isQuadraticSplineCurve,
  type ArcCurve,
  type CubicSplineCurve,
  type EllipticalArcCurve,
  type LineCurve,
  type QuadraticSplineCurve,
} from "./Curve2d";
