/**
 * Arc2d - Circular arcs
 *
 * An arc is stored as center, radius and the two end angles. The direction
 * of travel is implicit: counterclockwise when endAngle > startAngle,
 * clockwise otherwise. Reversal swaps the angles, so reversing twice gives
 * back the identical arc.
 *
 * Arcs only accept uniform transforms (rotation, mirror, translation,
 * uniform scale): those map circles to circles. Non-uniform stretching
 * needs an EllipticalArc2d.
 */

import type { Global, UniformClass, Unitless } from "@/types";
import { approximateCurve } from "@/approximation/approximateCurve";
import { sampleUniform } from "@/approximation/Sampling";
import { arcSegmentCount } from "@/approximation/SegmentCount";
import { validateSegmentCount, validateTolerance } from "@/approximation/Validation";
import type { ApproximationConfig } from "@/config/approximationConfig";
import type { CurveResult } from "@/errors/CurveError";
import { mapResult } from "@/errors/Result";
import { Bounds2d } from "@/math/Bounds2d";
import { Frame2d } from "@/math/Frame2d";
import { Point2d } from "@/math/Point2d";
import type { Quantity, Rate } from "@/math/Quantity";
import { type Similarity, Transform2d } from "@/math/Transform2d";
import type { Polyline2d } from "@/polyline/Polyline2d";

/** Full circle; converts one way into a 360° arc */
export interface Circle2d<S = Global, U = Unitless> {
  readonly center: Point2d<S, U>;
  readonly radius: number;
}

export interface Arc2d<S = Global, U = Unitless> {
  readonly center: Point2d<S, U>;
  /** Non-negative; zero gives a degenerate arc whose every point is the center */
  readonly radius: number;
  /** Radians, counterclockwise from the positive x axis */
  readonly startAngle: number;
  readonly endAngle: number;
}

const QUARTER_TURN = Math.PI / 2;
const FULL_TURN = 2 * Math.PI;

/**
 * Map an angle through a similarity: mirrored similarities reverse orientation.
 */
function mapAngle(angle: number, similarity: Similarity): number {
  return similarity.mirrored ? similarity.rotation - angle : angle + similarity.rotation;
}

/**
 * Inverse of mapAngle for a rigid similarity.
 */
function unmapAngle(angle: number, similarity: Similarity): number {
  return similarity.mirrored ? similarity.rotation - angle : angle - similarity.rotation;
}

/**
 * Offset of the circle point at a multiple of 90°, without trigonometric rounding.
 */
function quadrantPoint<S, U>(
  center: Point2d<S, U>,
  radius: number,
  quadrant: number
): Point2d<S, U> {
  switch (((quadrant % 4) + 4) % 4) {
    case 0:
      return { x: center.x + radius, y: center.y };
    case 1:
      return { x: center.x, y: center.y + radius };
    case 2:
      return { x: center.x - radius, y: center.y };
    default:
      return { x: center.x, y: center.y - radius };
  }
}

export const Arc2d = {
  from<S, U>(
    center: Point2d<S, U>,
    radius: number,
    startAngle: number,
    endAngle: number
  ): Arc2d<S, U> {
    return { center, radius, startAngle, endAngle };
  },

  /**
   * Degree conversion: the full counterclockwise circle starting at angle 0
   */
  fromCircle<S, U>(circle: Circle2d<S, U>): Arc2d<S, U> {
    return { center: circle.center, radius: circle.radius, startAngle: 0, endAngle: FULL_TURN };
  },

  /**
   * Signed angle from start to end (positive counterclockwise)
   */
  sweptAngle<S, U>(arc: Arc2d<S, U>): number {
    return arc.endAngle - arc.startAngle;
  },

  startPoint<S, U>(arc: Arc2d<S, U>): Point2d<S, U> {
    return Point2d.polar(arc.center, arc.radius, arc.startAngle);
  },

  endPoint<S, U>(arc: Arc2d<S, U>): Point2d<S, U> {
    return Point2d.polar(arc.center, arc.radius, arc.endAngle);
  },

  /**
   * Point at the fraction t of the swept angle
   */
  pointOn<S, U>(arc: Arc2d<S, U>, t: number): Point2d<S, U> {
    return Point2d.polar(arc.center, arc.radius, arc.startAngle + t * Arc2d.sweptAngle(arc));
  },

  reverse<S, U>(arc: Arc2d<S, U>): Arc2d<S, U> {
    return {
      center: arc.center,
      radius: arc.radius,
      startAngle: arc.endAngle,
      endAngle: arc.startAngle,
    };
  },

  transformBy<S, U>(arc: Arc2d<S, U>, transform: Transform2d<UniformClass, S, U>): Arc2d<S, U> {
    const similarity = Transform2d.similarity(transform);
    return {
      center: Transform2d.applyToPoint(transform, arc.center),
      radius: arc.radius * similarity.scale,
      startAngle: mapAngle(arc.startAngle, similarity),
      endAngle: mapAngle(arc.endAngle, similarity),
    };
  },

  placeIn<G, L, U>(arc: Arc2d<L, U>, frame: Frame2d<G, L, U>): Arc2d<G, U> {
    const similarity = Frame2d.similarity(frame);
    return {
      center: Frame2d.placePoint(frame, arc.center),
      radius: arc.radius,
      startAngle: mapAngle(arc.startAngle, similarity),
      endAngle: mapAngle(arc.endAngle, similarity),
    };
  },

  relativeTo<G, L, U>(arc: Arc2d<G, U>, frame: Frame2d<G, L, U>): Arc2d<L, U> {
    const similarity = Frame2d.similarity(frame);
    return {
      center: Frame2d.relativePoint(frame, arc.center),
      radius: arc.radius,
      startAngle: unmapAngle(arc.startAngle, similarity),
      endAngle: unmapAngle(arc.endAngle, similarity),
    };
  },

  at<S, From, To>(arc: Arc2d<S, From>, rate: Rate<To, From>): Arc2d<S, To> {
    return {
      center: Point2d.convert<S, From, To>(arc.center, rate.value),
      radius: arc.radius * rate.value,
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  at_<S, From, To>(arc: Arc2d<S, From>, rate: Rate<From, To>): Arc2d<S, To> {
    return {
      center: Point2d.convertInverse<S, From, To>(arc.center, rate.value),
      radius: arc.radius / rate.value,
      startAngle: arc.startAngle,
      endAngle: arc.endAngle,
    };
  },

  /**
   * Tight bounds: the endpoints plus every axis-extreme point (multiples of 90°)
   * inside the swept range.
   */
  boundingBox<S, U>(arc: Arc2d<S, U>): Bounds2d<S, U> {
    const { center, radius } = arc;
    const lo = Math.min(arc.startAngle, arc.endAngle);
    const hi = Math.max(arc.startAngle, arc.endAngle);

    if (hi - lo >= FULL_TURN) {
      return {
        minX: center.x - radius,
        maxX: center.x + radius,
        minY: center.y - radius,
        maxY: center.y + radius,
      };
    }

    const extremes: Point2d<S, U>[] = [];
    for (let q = Math.ceil(lo / QUARTER_TURN); q * QUARTER_TURN <= hi; q++) {
      extremes.push(quadrantPoint(center, radius, q));
    }
    return Bounds2d.hullOf(Arc2d.startPoint(arc), Arc2d.endPoint(arc), ...extremes);
  },

  /**
   * Uniform in angle
   */
  segments<S, U>(arc: Arc2d<S, U>, count: number): CurveResult<Polyline2d<S, U>> {
    return mapResult(validateSegmentCount(count), (n) =>
      sampleUniform(n, Arc2d.startPoint(arc), Arc2d.endPoint(arc), (t) => Arc2d.pointOn(arc, t))
    );
  },

  /**
   * Sagitta bound; see arcSegmentCount
   */
  numApproximationSegments<S, U>(arc: Arc2d<S, U>, maxError: Quantity<U>): CurveResult<number> {
    return mapResult(validateTolerance(maxError), (e) =>
      arcSegmentCount(arc.radius, Arc2d.sweptAngle(arc), e)
    );
  },

  approximate<S, U>(
    arc: Arc2d<S, U>,
    maxError: Quantity<U>,
    options: Partial<ApproximationConfig> = {}
  ): CurveResult<Polyline2d<S, U>> {
    return approximateCurve<Arc2d<S, U>, S, U>("arc", arc, maxError, Arc2d, options);
  },
};
