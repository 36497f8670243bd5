/**
 * CurveKind - The contract every curve primitive implements
 *
 * Each primitive module exports a namespace object registered in
 * CURVE_KINDS, which checks it against CurveKind<K>. The primitive types
 * are looked up through CurvePrimitives, so an operation that changes
 * the coordinate space or units (placeIn, relativeTo, at, at_) still
 * returns the same kind.
 *
 * Adding a curve kind means adding it to CurveType, to CurvePrimitives and
 * to every dispatch in Curve2d; the compiler reports each missing piece.
 */

import type { CurveType, UniformClass } from "@/types";
import type { ApproximationConfig } from "@/config/approximationConfig";
import type { CurveResult } from "@/errors/CurveError";
import type { Bounds2d } from "@/math/Bounds2d";
import type { Frame2d } from "@/math/Frame2d";
import type { Point2d } from "@/math/Point2d";
import type { Quantity, Rate } from "@/math/Quantity";
import type { Transform2d } from "@/math/Transform2d";
import type { Polyline2d } from "@/polyline/Polyline2d";
import type { Arc2d } from "./Arc2d";
import type { CubicSpline2d } from "./CubicSpline2d";
import type { EllipticalArc2d } from "./EllipticalArc2d";
import type { LineSegment2d } from "./LineSegment2d";
import type { QuadraticSpline2d } from "./QuadraticSpline2d";

/**
 * Primitive type of each curve kind, in space `S` with units `U`.
 */
export interface CurvePrimitives<S, U> {
  line: LineSegment2d<S, U>;
  arc: Arc2d<S, U>;
  ellipticalArc: EllipticalArc2d<S, U>;
  quadraticSpline: QuadraticSpline2d<S, U>;
  cubicSpline: CubicSpline2d<S, U>;
}

export interface CurveKind<K extends CurveType> {
  startPoint<S, U>(curve: CurvePrimitives<S, U>[K]): Point2d<S, U>;
  endPoint<S, U>(curve: CurvePrimitives<S, U>[K]): Point2d<S, U>;

  /**
   * Evaluate at normalized parameter t ∈ [0, 1]
   */
  pointOn<S, U>(curve: CurvePrimitives<S, U>[K], t: number): Point2d<S, U>;

  /**
   * Same kind with endpoints swapped; reversing twice gives back identical fields
   */
  reverse<S, U>(curve: CurvePrimitives<S, U>[K]): CurvePrimitives<S, U>[K];

  /**
   * Apply a rigid or uniform-scaling transform to the defining parameters
   */
  transformBy<S, U>(
    curve: CurvePrimitives<S, U>[K],
    transform: Transform2d<UniformClass, S, U>
  ): CurvePrimitives<S, U>[K];

  placeIn<G, L, U>(
    curve: CurvePrimitives<L, U>[K],
    frame: Frame2d<G, L, U>
  ): CurvePrimitives<G, U>[K];

  relativeTo<G, L, U>(
    curve: CurvePrimitives<G, U>[K],
    frame: Frame2d<G, L, U>
  ): CurvePrimitives<L, U>[K];

  /**
   * Convert units by multiplying every length by the rate
   */
  at<S, From, To>(
    curve: CurvePrimitives<S, From>[K],
    rate: Rate<To, From>
  ): CurvePrimitives<S, To>[K];

  /**
   * Convert units by dividing every length by the rate
   */
  at_<S, From, To>(
    curve: CurvePrimitives<S, From>[K],
    rate: Rate<From, To>
  ): CurvePrimitives<S, To>[K];

  /**
   * Axis-aligned box containing every point of the curve
   */
  boundingBox<S, U>(curve: CurvePrimitives<S, U>[K]): Bounds2d<S, U>;

  /**
   * Polyline through `count + 1` evenly spaced parameter values
   */
  segments<S, U>(curve: CurvePrimitives<S, U>[K], count: number): CurveResult<Polyline2d<S, U>>;

  /**
   * Smallest segment count keeping the polyline within `maxError` of the curve
   */
  numApproximationSegments<S, U>(
    curve: CurvePrimitives<S, U>[K],
    maxError: Quantity<U>
  ): CurveResult<number>;

  approximate<S, U>(
    curve: CurvePrimitives<S, U>[K],
    maxError: Quantity<U>,
    options?: Partial<ApproximationConfig>
  ): CurveResult<Polyline2d<S, U>>;
}
