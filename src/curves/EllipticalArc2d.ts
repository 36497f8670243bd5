/**
 * EllipticalArc2d - Arcs of ellipses
 *
 * Parameterized by angle θ between startAngle and endAngle:
 *
 *   p(θ) = center + xVector cos θ + yVector sin θ
 *
 * The two vectors need not be perpendicular or equal in length, which makes
 * the form closed under every affine transform: transforming the center and
 * both vectors transforms every point, and the angles never change.
 */

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
import { Vector2d } from "@/math/Vector2d";
import type { Polyline2d } from "@/polyline/Polyline2d";

/** Full ellipse; converts one way into a 360° elliptical arc */
export interface Ellipse2d<S = Global, U = Unitless> {
  readonly center: Point2d<S, U>;
  readonly xVector: Vector2d<S, U>;
  readonly yVector: Vector2d<S, U>;
}

export interface EllipticalArc2d<S = Global, U = Unitless> {
  readonly center: Point2d<S, U>;
  readonly xVector: Vector2d<S, U>;
  readonly yVector: Vector2d<S, U>;
  readonly startAngle: number;
  readonly endAngle: number;
}

const FULL_TURN = 2 * Math.PI;

/**
 * Parameter values in [lo, hi] where one coordinate is extreme.
 *
 * A coordinate a cos θ + b sin θ is extreme where tan θ = b / a, i.e. at
 * atan2(b, a) + kπ.
 */
function extremeAngles(a: number, b: number, lo: number, hi: number): number[] {
  if (a === 0 && b === 0) return [];

  const base = Math.atan2(b, a);
  const angles: number[] = [];
  for (let k = Math.ceil((lo - base) / Math.PI); base + k * Math.PI <= hi; k++) {
    angles.push(base + k * Math.PI);
  }
  return angles;
}

export const EllipticalArc2d = {
  from<S, U>(
    center: Point2d<S, U>,
    xVector: Vector2d<S, U>,
    yVector: Vector2d<S, U>,
    startAngle: number,
    endAngle: number
  ): EllipticalArc2d<S, U> {
    return { center, xVector, yVector, startAngle, endAngle };
  },

  /**
   * Degree conversion: the whole ellipse as a single 360° arc
   */
  fromEllipse<S, U>(ellipse: Ellipse2d<S, U>): EllipticalArc2d<S, U> {
    return {
      center: ellipse.center,
      xVector: ellipse.xVector,
      yVector: ellipse.yVector,
      startAngle: 0,
      endAngle: FULL_TURN,
    };
  },

  /**
   * Point at parameter angle θ
   */
  pointAtAngle<S, U>(arc: EllipticalArc2d<S, U>, angle: number): Point2d<S, U> {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return {
      x: arc.center.x + arc.xVector.x * cos + arc.yVector.x * sin,
      y: arc.center.y + arc.xVector.y * cos + arc.yVector.y * sin,
    };
  },

  startPoint<S, U>(arc: EllipticalArc2d<S, U>): Point2d<S, U> {
    return EllipticalArc2d.pointAtAngle(arc, arc.startAngle);
  },

  endPoint<S, U>(arc: EllipticalArc2d<S, U>): Point2d<S, U> {
    return EllipticalArc2d.pointAtAngle(arc, arc.endAngle);
  },

  pointOn<S, U>(arc: EllipticalArc2d<S, U>, t: number): Point2d<S, U> {
    return EllipticalArc2d.pointAtAngle(arc, arc.startAngle + t * (arc.endAngle - arc.startAngle));
  },

  reverse<S, U>(arc: EllipticalArc2d<S, U>): EllipticalArc2d<S, U> {
    return {
      center: arc.center,
      xVector: arc.xVector,
      yVector: arc.yVector,
      startAngle: arc.endAngle,
      endAngle: arc.startAngle,
    };
  },

  transformBy<C extends TransformClass, S, U>(
    arc: EllipticalArc2d<S, U>,
    transform: Transform2d<C, S, U>
  ): EllipticalArc2d<S, U> {
    return {
      center: Transform2d.applyToPoint(transform, arc.center),
      xVector: Transform2d.applyToVector(transform, arc.xVector),
      yVector: Transform2d.applyToVector(transform, arc.yVector),
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  placeIn<G, L, U>(arc: EllipticalArc2d<L, U>, frame: Frame2d<G, L, U>): EllipticalArc2d<G, U> {
    return {
      center: Frame2d.placePoint(frame, arc.center),
      xVector: Frame2d.placeVector(frame, arc.xVector),
      yVector: Frame2d.placeVector(frame, arc.yVector),
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  relativeTo<G, L, U>(
    arc: EllipticalArc2d<G, U>,
    frame: Frame2d<G, L, U>
  ): EllipticalArc2d<L, U> {
    return {
      center: Frame2d.relativePoint(frame, arc.center),
      xVector: Frame2d.relativeVector(frame, arc.xVector),
      yVector: Frame2d.relativeVector(frame, arc.yVector),
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  at<S, From, To>(arc: EllipticalArc2d<S, From>, rate: Rate<To, From>): EllipticalArc2d<S, To> {
    return {
      center: Point2d.convert<S, From, To>(arc.center, rate.value),
      xVector: Vector2d.convert<S, From, To>(arc.xVector, rate.value),
      yVector: Vector2d.convert<S, From, To>(arc.yVector, rate.value),
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  at_<S, From, To>(arc: EllipticalArc2d<S, From>, rate: Rate<From, To>): EllipticalArc2d<S, To> {
    return {
      center: Point2d.convertInverse<S, From, To>(arc.center, rate.value),
      xVector: Vector2d.convertInverse<S, From, To>(arc.xVector, rate.value),
      yVector: Vector2d.convertInverse<S, From, To>(arc.yVector, rate.value),
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  /**
   * Length of the longest semi-axis: the largest singular value of [xVector yVector].
   *
   * Bounds |p''(θ)| = |xVector cos θ + yVector sin θ| over every θ.
   */
  majorRadius<S, U>(arc: EllipticalArc2d<S, U>): number {
    const a = Vector2d.lengthSquared(arc.xVector);
    const b = Vector2d.lengthSquared(arc.yVector);
    const c = Vector2d.dot(arc.xVector, arc.yVector);
    const halfDiff = (a - b) / 2;
    return Math.sqrt((a + b) / 2 + Math.sqrt(halfDiff * halfDiff + c * c));
  },

  /**
   * Tight bounds: endpoints plus the x- and y-extreme points inside the angle range
   */
  boundingBox<S, U>(arc: EllipticalArc2d<S, U>): Bounds2d<S, U> {
    const { center, xVector, yVector } = arc;
    const lo = Math.min(arc.startAngle, arc.endAngle);
    const hi = Math.max(arc.startAngle, arc.endAngle);

    if (hi - lo >= FULL_TURN) {
      const halfWidth = Math.hypot(xVector.x, yVector.x);
      const halfHeight = Math.hypot(xVector.y, yVector.y);
      return {
        minX: center.x - halfWidth,
        maxX: center.x + halfWidth,
        minY: center.y - halfHeight,
        maxY: center.y + halfHeight,
      };
    }

    const extremes = [
      ...extremeAngles(xVector.x, yVector.x, lo, hi),
      ...extremeAngles(xVector.y, yVector.y, lo, hi),
    ].map((angle) => EllipticalArc2d.pointAtAngle(arc, angle));

    return Bounds2d.hullOf(
      EllipticalArc2d.startPoint(arc),
      EllipticalArc2d.endPoint(arc),
      ...extremes
    );
  },

  /**
   * Uniform in the parameter angle θ
   */
  segments<S, U>(arc: EllipticalArc2d<S, U>, count: number): CurveResult<Polyline2d<S, U>> {
    return mapResult(validateSegmentCount(count), (n) =>
      sampleUniform(
        n,
        EllipticalArc2d.startPoint(arc),
        EllipticalArc2d.endPoint(arc),
        (t) => EllipticalArc2d.pointOn(arc, t)
      )
    );
  },

  /**
   * Second-derivative bound with |p''| <= major radius
   */
  numApproximationSegments<S, U>(
    arc: EllipticalArc2d<S, U>,
    maxError: Quantity<U>
  ): CurveResult<number> {
    return mapResult(validateTolerance(maxError), (e) =>
      secondDerivativeSegmentCount(
        arc.endAngle - arc.startAngle,
        EllipticalArc2d.majorRadius(arc),
        e
      )
    );
  },

  approximate<S, U>(
    arc: EllipticalArc2d<S, U>,
    maxError: Quantity<U>,
    options: Partial<ApproximationConfig> = {}
  ): CurveResult<Polyline2d<S, U>> {
    return approximateCurve<EllipticalArc2d<S, U>, S, U>("ellipticalArc", arc, maxError, EllipticalArc2d, options);
  },
};
