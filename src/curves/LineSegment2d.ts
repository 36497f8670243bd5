import type { Global, TransformClass, Unitless } from "@/types";
import { approximateCurve } from "@/approximation/approximateCurve";
import { sampleUniform } from "@/approximation/Sampling";
import { validateSegmentCount } from "@/approximation/Validation";
import type { ApproximationConfig } from "@/config/approximationConfig";
import type { CurveResult } from "@/errors/CurveError";
import { mapResult, ok } from "@/errors/Result";
import { Bounds2d } from "@/math/Bounds2d";
import type { Frame2d } from "@/math/Frame2d";
import { Point2d } from "@/math/Point2d";
import type { Quantity, Rate } from "@/math/Quantity";
import { Transform2d } from "@/math/Transform2d";
import type { Polyline2d } from "@/polyline/Polyline2d";

/** Straight segment from `start` to `end` (may be zero-length) */
export interface LineSegment2d<S = Global, U = Unitless> {
  readonly start: Point2d<S, U>;
  readonly end: Point2d<S, U>;
}

/**
 * LineSegment2d - Pure functions for straight segments
 *
 * A line has zero deviation from its own chord, so one segment always
 * suffices whatever the tolerance.
 */
export const LineSegment2d = {
  from<S, U>(start: Point2d<S, U>, end: Point2d<S, U>): LineSegment2d<S, U> {
    return { start, end };
  },

  startPoint<S, U>(line: LineSegment2d<S, U>): Point2d<S, U> {
    return line.start;
  },

  endPoint<S, U>(line: LineSegment2d<S, U>): Point2d<S, U> {
    return line.end;
  },

  pointOn<S, U>(line: LineSegment2d<S, U>, t: number): Point2d<S, U> {
    return Point2d.interpolate(line.start, line.end, t);
  },

  length<S, U>(line: LineSegment2d<S, U>): Quantity<U> {
    return { value: Point2d.distance(line.start, line.end) };
  },

  reverse<S, U>(line: LineSegment2d<S, U>): LineSegment2d<S, U> {
    return { start: line.end, end: line.start };
  },

  /**
   * Lines stay lines under any affine transform
   */
  transformBy<C extends TransformClass, S, U>(
    line: LineSegment2d<S, U>,
    transform: Transform2d<C, S, U>
  ): LineSegment2d<S, U> {
    return {
      start: Transform2d.applyToPoint(transform, line.start),
      end: Transform2d.applyToPoint(transform, line.end),
    };
  },

  placeIn<G, L, U>(line: LineSegment2d<L, U>, frame: Frame2d<G, L, U>): LineSegment2d<G, U> {
    const { origin, xDirection, yDirection } = frame;
    return {
      start: Point2d.placeIn(line.start, origin, xDirection, yDirection),
      end: Point2d.placeIn(line.end, origin, xDirection, yDirection),
    };
  },

  relativeTo<G, L, U>(line: LineSegment2d<G, U>, frame: Frame2d<G, L, U>): LineSegment2d<L, U> {
    const { origin, xDirection, yDirection } = frame;
    return {
      start: Point2d.relativeTo<G, L, U>(line.start, origin, xDirection, yDirection),
      end: Point2d.relativeTo<G, L, U>(line.end, origin, xDirection, yDirection),
    };
  },

  at<S, From, To>(line: LineSegment2d<S, From>, rate: Rate<To, From>): LineSegment2d<S, To> {
    return {
      start: Point2d.convert<S, From, To>(line.start, rate.value),
      end: Point2d.convert<S, From, To>(line.end, rate.value),
    };
  },

  at_<S, From, To>(line: LineSegment2d<S, From>, rate: Rate<From, To>): LineSegment2d<S, To> {
    return {
      start: Point2d.convertInverse<S, From, To>(line.start, rate.value),
      end: Point2d.convertInverse<S, From, To>(line.end, rate.value),
    };
  },

  boundingBox<S, U>(line: LineSegment2d<S, U>): Bounds2d<S, U> {
    return Bounds2d.fromCorners(line.start, line.end);
  },

  segments<S, U>(line: LineSegment2d<S, U>, count: number): CurveResult<Polyline2d<S, U>> {
    return mapResult(validateSegmentCount(count), (n) =>
      sampleUniform(n, line.start, line.end, (t) => LineSegment2d.pointOn(line, t))
    );
  },

  /**
   * Always 1; the tolerance is not read
   */
  numApproximationSegments<S, U>(
    _line: LineSegment2d<S, U>,
    _maxError: Quantity<U>
  ): CurveResult<number> {
    return ok(1);
  },

  /**
   * The two endpoints, for any tolerance
   */
  approximate<S, U>(
    line: LineSegment2d<S, U>,
    maxError: Quantity<U>,
    options: Partial<ApproximationConfig> = {}
  ): CurveResult<Polyline2d<S, U>> {
    return approximateCurve<LineSegment2d<S, U>, S, U>("line", line, maxError, LineSegment2d, options);
  },
};
