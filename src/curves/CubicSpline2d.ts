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

/** Cubic Bézier curve from p1 to p4 with inner control points p2 and p3 */
export interface CubicSpline2d<S = Global, U = Unitless> {
  readonly p1: Point2d<S, U>;
  readonly p2: Point2d<S, U>;
  readonly p3: Point2d<S, U>;
  readonly p4: Point2d<S, U>;
}

/**
 * Parameters in (0, 1) where one cubic Bernstein coordinate has zero derivative.
 *
 * With a = c2 - c1, b = c3 - c2, c = c4 - c3 the derivative is proportional to
 *   (a - 2b + c) t² + 2 (b - a) t + a
 */
function extremeParameters(c1: number, c2: number, c3: number, c4: number): number[] {
  const a = c2 - c1;
  const b = c3 - c2;
  const c = c4 - c3;

  const qa = a - 2 * b + c;
  const qb = 2 * (b - a);
  const qc = a;

  const roots: number[] = [];
  if (qa === 0) {
    if (qb !== 0) roots.push(-qc / qb);
  } else {
    const discriminant = qb * qb - 4 * qa * qc;
    if (discriminant >= 0) {
      const sqrtD = Math.sqrt(discriminant);
      roots.push((-qb + sqrtD) / (2 * qa), (-qb - sqrtD) / (2 * qa));
    }
  }
  return roots.filter((t) => t > 0 && t < 1);
}

/**
 * CubicSpline2d - Pure functions for cubic Bézier curves
 *
 *   p(t) = (1-t)³ p1 + 3t(1-t)² p2 + 3t²(1-t) p3 + t³ p4
 */
export const CubicSpline2d = {
  fromControlPoints<S, U>(
    p1: Point2d<S, U>,
    p2: Point2d<S, U>,
    p3: Point2d<S, U>,
    p4: Point2d<S, U>
  ): CubicSpline2d<S, U> {
    return { p1, p2, p3, p4 };
  },

  startPoint<S, U>(spline: CubicSpline2d<S, U>): Point2d<S, U> {
    return spline.p1;
  },

  endPoint<S, U>(spline: CubicSpline2d<S, U>): Point2d<S, U> {
    return spline.p4;
  },

  pointOn<S, U>(spline: CubicSpline2d<S, U>, t: number): Point2d<S, U> {
    const { p1, p2, p3, p4 } = spline;
    const s = 1 - t;
    const b1 = s * s * s;
    const b2 = 3 * t * s * s;
    const b3 = 3 * t * t * s;
    const b4 = t * t * t;
    return {
      x: b1 * p1.x + b2 * p2.x + b3 * p3.x + b4 * p4.x,
      y: b1 * p1.y + b2 * p2.y + b3 * p3.y + b4 * p4.y,
    };
  },

  reverse<S, U>(spline: CubicSpline2d<S, U>): CubicSpline2d<S, U> {
    return { p1: spline.p4, p2: spline.p3, p3: spline.p2, p4: spline.p1 };
  },

  transformBy<C extends TransformClass, S, U>(
    spline: CubicSpline2d<S, U>,
    transform: Transform2d<C, S, U>
  ): CubicSpline2d<S, U> {
    return {
      p1: Transform2d.applyToPoint(transform, spline.p1),
      p2: Transform2d.applyToPoint(transform, spline.p2),
      p3: Transform2d.applyToPoint(transform, spline.p3),
      p4: Transform2d.applyToPoint(transform, spline.p4),
    };
  },

  placeIn<G, L, U>(spline: CubicSpline2d<L, U>, frame: Frame2d<G, L, U>): CubicSpline2d<G, U> {
    return {
      p1: Frame2d.placePoint(frame, spline.p1),
      p2: Frame2d.placePoint(frame, spline.p2),
      p3: Frame2d.placePoint(frame, spline.p3),
      p4: Frame2d.placePoint(frame, spline.p4),
    };
  },

  relativeTo<G, L, U>(spline: CubicSpline2d<G, U>, frame: Frame2d<G, L, U>): CubicSpline2d<L, U> {
    return {
      p1: Frame2d.relativePoint(frame, spline.p1),
      p2: Frame2d.relativePoint(frame, spline.p2),
      p3: Frame2d.relativePoint(frame, spline.p3),
      p4: Frame2d.relativePoint(frame, spline.p4),
    };
  },

  at<S, From, To>(spline: CubicSpline2d<S, From>, rate: Rate<To, From>): CubicSpline2d<S, To> {
    return {
      p1: Point2d.convert<S, From, To>(spline.p1, rate.value),
      p2: Point2d.convert<S, From, To>(spline.p2, rate.value),
      p3: Point2d.convert<S, From, To>(spline.p3, rate.value),
      p4: Point2d.convert<S, From, To>(spline.p4, rate.value),
    };
  },

  at_<S, From, To>(spline: CubicSpline2d<S, From>, rate: Rate<From, To>): CubicSpline2d<S, To> {
    return {
      p1: Point2d.convertInverse<S, From, To>(spline.p1, rate.value),
      p2: Point2d.convertInverse<S, From, To>(spline.p2, rate.value),
      p3: Point2d.convertInverse<S, From, To>(spline.p3, rate.value),
      p4: Point2d.convertInverse<S, From, To>(spline.p4, rate.value),
    };
  },

  /**
   * Bound on |p''(t)| over [0, 1].
   *
   * p'' is linear in t between 6 (p1 - 2p2 + p3) and 6 (p2 - 2p3 + p4), so
   * its magnitude peaks at one end.
   */
  maxSecondDerivative<S, U>(spline: CubicSpline2d<S, U>): number {
    const { p1, p2, p3, p4 } = spline;
    const start = Math.hypot(p1.x - 2 * p2.x + p3.x, p1.y - 2 * p2.y + p3.y);
    const end = Math.hypot(p2.x - 2 * p3.x + p4.x, p2.y - 2 * p3.y + p4.y);
    return 6 * Math.max(start, end);
  },

  boundingBox<S, U>(spline: CubicSpline2d<S, U>): Bounds2d<S, U> {
    const { p1, p2, p3, p4 } = spline;
    const extremes = [
      ...extremeParameters(p1.x, p2.x, p3.x, p4.x),
      ...extremeParameters(p1.y, p2.y, p3.y, p4.y),
    ].map((t) => CubicSpline2d.pointOn(spline, t));
    return Bounds2d.hullOf(p1, p4, ...extremes);
  },

  segments<S, U>(spline: CubicSpline2d<S, U>, count: number): CurveResult<Polyline2d<S, U>> {
    return mapResult(validateSegmentCount(count), (n) =>
      sampleUniform(n, spline.p1, spline.p4, (t) => CubicSpline2d.pointOn(spline, t))
    );
  },

  numApproximationSegments<S, U>(
    spline: CubicSpline2d<S, U>,
    maxError: Quantity<U>
  ): CurveResult<number> {
    return mapResult(validateTolerance(maxError), (e) =>
      secondDerivativeSegmentCount(1, CubicSpline2d.maxSecondDerivative(spline), e)
    );
  },

  approximate<S, U>(
    spline: CubicSpline2d<S, U>,
    maxError: Quantity<U>,
    options: Partial<ApproximationConfig> = {}
  ): CurveResult<Polyline2d<S, U>> {
    return approximateCurve<CubicSpline2d<S, U>, S, U>("cubicSpline", spline, maxError, CubicSpline2d, options);
  },
};
