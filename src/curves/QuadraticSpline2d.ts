import type { Global, TransformClass, Unitless } from "@/types";
import { approximateCurve } from "@/approximation/approximateCurve";
import { sampleUniform } from "@/approximation/Sampling";
import { secondDerivativeSegmentCount } from "@/approximation/SegmentCount";
import { validateSegmentCount, validateTolerance } from "@/approximation/Validation";
import type { ApproximationConfig } from "@/config/approximationConfig";
import type { CurveResult } from "@/errors/CurveError";
import { mapResult } from "@/errors/Result";
import { Bounds2d } from "@/math/Bounds2d";
import { Frame2d } from "@/math/Frame2d";
import { Point2d } from "@/math/Point2d";
import type { Quantity, Rate } from "@/math/Quantity";
import { Transform2d } from "@/math/Transform2d";
import type { Polyline2d } from "@/polyline/Polyline2d";

/** Quadratic Bézier curve: passes through p1 and p3, pulled toward p2 */
export interface QuadraticSpline2d<S = Global, U = Unitless> {
  readonly p1: Point2d<S, U>;
  readonly p2: Point2d<S, U>;
  readonly p3: Point2d<S, U>;
}

/**
 * Parameter in (0, 1) where a quadratic Bernstein coordinate has zero
 * derivative, or null when it is monotonic on [0, 1].
 */
function extremeParameter(a: number, b: number, c: number): number | null {
  const denominator = a - 2 * b + c;
  if (denominator === 0) return null;
  const t = (a - b) / denominator;
  return t > 0 && t < 1 ? t : null;
}

/**
 * QuadraticSpline2d - Pure functions for quadratic Bézier curves
 *
 *   p(t) = (1-t)² p1 + 2t(1-t) p2 + t² p3
 *
 * The control points transform like ordinary points, so any affine
 * transform applies to the curve exactly.
 */
export const QuadraticSpline2d = {
  fromControlPoints<S, U>(
    p1: Point2d<S, U>,
    p2: Point2d<S, U>,
    p3: Point2d<S, U>
  ): QuadraticSpline2d<S, U> {
    return { p1, p2, p3 };
  },

  startPoint<S, U>(spline: QuadraticSpline2d<S, U>): Point2d<S, U> {
    return spline.p1;
  },

  endPoint<S, U>(spline: QuadraticSpline2d<S, U>): Point2d<S, U> {
    return spline.p3;
  },

  pointOn<S, U>(spline: QuadraticSpline2d<S, U>, t: number): Point2d<S, U> {
    const { p1, p2, p3 } = spline;
    const s = 1 - t;
    const b1 = s * s;
    const b2 = 2 * t * s;
    const b3 = t * t;
    return {
      x: b1 * p1.x + b2 * p2.x + b3 * p3.x,
      y: b1 * p1.y + b2 * p2.y + b3 * p3.y,
    };
  },

  reverse<S, U>(spline: QuadraticSpline2d<S, U>): QuadraticSpline2d<S, U> {
    return { p1: spline.p3, p2: spline.p2, p3: spline.p1 };
  },

  transformBy<C extends TransformClass, S, U>(
    spline: QuadraticSpline2d<S, U>,
    transform: Transform2d<C, S, U>
  ): QuadraticSpline2d<S, U> {
    return {
      p1: Transform2d.applyToPoint(transform, spline.p1),
      p2: Transform2d.applyToPoint(transform, spline.p2),
      p3: Transform2d.applyToPoint(transform, spline.p3),
    };
  },

  placeIn<G, L, U>(
    spline: QuadraticSpline2d<L, U>,
    frame: Frame2d<G, L, U>
  ): QuadraticSpline2d<G, U> {
    return {
      p1: Frame2d.placePoint(frame, spline.p1),
      p2: Frame2d.placePoint(frame, spline.p2),
      p3: Frame2d.placePoint(frame, spline.p3),
    };
  },

  relativeTo<G, L, U>(
    spline: QuadraticSpline2d<G, U>,
    frame: Frame2d<G, L, U>
  ): QuadraticSpline2d<L, U> {
    return {
      p1: Frame2d.relativePoint(frame, spline.p1),
      p2: Frame2d.relativePoint(frame, spline.p2),
      p3: Frame2d.relativePoint(frame, spline.p3),
    };
  },

  at<S, From, To>(
    spline: QuadraticSpline2d<S, From>,
    rate: Rate<To, From>
  ): QuadraticSpline2d<S, To> {
    return {
      p1: Point2d.convert<S, From, To>(spline.p1, rate.value),
      p2: Point2d.convert<S, From, To>(spline.p2, rate.value),
      p3: Point2d.convert<S, From, To>(spline.p3, rate.value),
    };
  },

  at_<S, From, To>(
    spline: QuadraticSpline2d<S, From>,
    rate: Rate<From, To>
  ): QuadraticSpline2d<S, To> {
    return {
      p1: Point2d.convertInverse<S, From, To>(spline.p1, rate.value),
      p2: Point2d.convertInverse<S, From, To>(spline.p2, rate.value),
      p3: Point2d.convertInverse<S, From, To>(spline.p3, rate.value),
    };
  },

  /**
   * Magnitude of the (constant) second derivative: |2 (p1 - 2 p2 + p3)|
   */
  secondDerivativeMagnitude<S, U>(spline: QuadraticSpline2d<S, U>): number {
    const { p1, p2, p3 } = spline;
    return 2 * Math.hypot(p1.x - 2 * p2.x + p3.x, p1.y - 2 * p2.y + p3.y);
  },

  /**
   * Tight bounds: endpoints plus the per-axis turning points
   */
  boundingBox<S, U>(spline: QuadraticSpline2d<S, U>): Bounds2d<S, U> {
    const { p1, p2, p3 } = spline;
    const extremes: Point2d<S, U>[] = [];
    for (const t of [extremeParameter(p1.x, p2.x, p3.x), extremeParameter(p1.y, p2.y, p3.y)]) {
      if (t !== null) extremes.push(QuadraticSpline2d.pointOn(spline, t));
    }
    return Bounds2d.hullOf(p1, p3, ...extremes);
  },

  segments<S, U>(spline: QuadraticSpline2d<S, U>, count: number): CurveResult<Polyline2d<S, U>> {
    return mapResult(validateSegmentCount(count), (n) =>
      sampleUniform(n, spline.p1, spline.p3, (t) => QuadraticSpline2d.pointOn(spline, t))
    );
  },

  numApproximationSegments<S, U>(
    spline: QuadraticSpline2d<S, U>,
    maxError: Quantity<U>
  ): CurveResult<number> {
    return mapResult(validateTolerance(maxError), (e) =>
      secondDerivativeSegmentCount(1, QuadraticSpline2d.secondDerivativeMagnitude(spline), e)
    );
  },

  approximate<S, U>(
    spline: QuadraticSpline2d<S, U>,
    maxError: Quantity<U>,
    options: Partial<ApproximationConfig> = {}
  ): CurveResult<Polyline2d<S, U>> {
    return approximateCurve<QuadraticSpline2d<S, U>, S, U>("quadraticSpline", spline, maxError, QuadraticSpline2d, options);
  },
};
