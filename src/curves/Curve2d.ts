/**
 * Curve2d - Tagged union over the five curve kinds
 *
 * Every operation dispatches through one exhaustive switch (mapCurve for
 * operations that return a curve, foldCurve for the rest) onto the kind's
 * own module, looked up in CURVE_KINDS. A variant never changes its `type`;
 * only the circle and ellipse constructors convert between degrees.
 */

import type { CurveType, Global, UniformClass, Unitless } from "@/types";
import type { ApproximationConfig } from "@/config/approximationConfig";
import type { CurveResult } from "@/errors/CurveError";
import type { Axis2d } from "@/math/Axis2d";
import type { Bounds2d } from "@/math/Bounds2d";
import type { Frame2d } from "@/math/Frame2d";
import type { Point2d } from "@/math/Point2d";
import type { Quantity, Rate } from "@/math/Quantity";
import { Transform2d } from "@/math/Transform2d";
import type { Vector2d } from "@/math/Vector2d";
import type { Polyline2d } from "@/polyline/Polyline2d";
import { Arc2d, type Circle2d } from "./Arc2d";
import { CubicSpline2d } from "./CubicSpline2d";
import type { CurveKind, CurvePrimitives } from "./CurveKind";
import { type Ellipse2d, EllipticalArc2d } from "./EllipticalArc2d";
import { LineSegment2d } from "./LineSegment2d";
import { QuadraticSpline2d } from "./QuadraticSpline2d";

export interface LineCurve<S = Global, U = Unitless> {
  readonly type: "line";
  readonly primitive: LineSegment2d<S, U>;
}

export interface ArcCurve<S = Global, U = Unitless> {
  readonly type: "arc";
  readonly primitive: Arc2d<S, U>;
}

export interface EllipticalArcCurve<S = Global, U = Unitless> {
  readonly type: "ellipticalArc";
  readonly primitive: EllipticalArc2d<S, U>;
}

export interface QuadraticSplineCurve<S = Global, U = Unitless> {
  readonly type: "quadraticSpline";
  readonly primitive: QuadraticSpline2d<S, U>;
}

export interface CubicSplineCurve<S = Global, U = Unitless> {
  readonly type: "cubicSpline";
  readonly primitive: CubicSpline2d<S, U>;
}

export type Curve2d<S = Global, U = Unitless> =
  | LineCurve<S, U>
  | ArcCurve<S, U>
  | EllipticalArcCurve<S, U>
  | QuadraticSplineCurve<S, U>
  | CubicSplineCurve<S, U>;

/**
 * Implementation of the kind contract for every curve type.
 *
 * A kind module missing an operation, or implementing one with the wrong
 * signature, fails to type-check here.
 */
export const CURVE_KINDS: { readonly [K in CurveType]: CurveKind<K> } = {
  line: LineSegment2d,
  arc: Arc2d,
  ellipticalArc: EllipticalArc2d,
  quadraticSpline: QuadraticSpline2d,
  cubicSpline: CubicSpline2d,
};

/** Operation applied to one primitive, producing a primitive of the same kind */
type PrimitiveMap<S1, U1, S2, U2> = <K extends CurveType>(
  kind: CurveKind<K>,
  primitive: CurvePrimitives<S1, U1>[K]
) => CurvePrimitives<S2, U2>[K];

/** Operation applied to one primitive, producing a kind-independent value */
type PrimitiveFold<S, U, R> = <K extends CurveType>(
  kind: CurveKind<K>,
  primitive: CurvePrimitives<S, U>[K]
) => R;

function assertNever(value: never): never {
  throw new Error(`Unknown curve variant: ${JSON.stringify(value)}`);
}

function mapCurve<S1, U1, S2, U2>(
  curve: Curve2d<S1, U1>,
  fn: PrimitiveMap<S1, U1, S2, U2>
): Curve2d<S2, U2> {
  switch (curve.type) {
    case "line":
      return { type: "line", primitive: fn(CURVE_KINDS.line, curve.primitive) };
    case "arc":
      return { type: "arc", primitive: fn(CURVE_KINDS.arc, curve.primitive) };
    case "ellipticalArc":
      return { type: "ellipticalArc", primitive: fn(CURVE_KINDS.ellipticalArc, curve.primitive) };
    case "quadraticSpline":
      return {
        type: "quadraticSpline",
        primitive: fn(CURVE_KINDS.quadraticSpline, curve.primitive),
      };
    case "cubicSpline":
      return { type: "cubicSpline", primitive: fn(CURVE_KINDS.cubicSpline, curve.primitive) };
    default:
      return assertNever(curve);
  }
}

function foldCurve<S, U, R>(curve: Curve2d<S, U>, fn: PrimitiveFold<S, U, R>): R {
  switch (curve.type) {
    case "line":
      return fn(CURVE_KINDS.line, curve.primitive);
    case "arc":
      return fn(CURVE_KINDS.arc, curve.primitive);
    case "ellipticalArc":
      return fn(CURVE_KINDS.ellipticalArc, curve.primitive);
    case "quadraticSpline":
      return fn(CURVE_KINDS.quadraticSpline, curve.primitive);
    case "cubicSpline":
      return fn(CURVE_KINDS.cubicSpline, curve.primitive);
    default:
      return assertNever(curve);
  }
}

export function isLineCurve<S, U>(curve: Curve2d<S, U>): curve is LineCurve<S, U> {
  return curve.type === "line";
}

export function isArcCurve<S, U>(curve: Curve2d<S, U>): curve is ArcCurve<S, U> {
  return curve.type === "arc";
}

export function isEllipticalArcCurve<S, U>(
  curve: Curve2d<S, U>
): curve is EllipticalArcCurve<S, U> {
  return curve.type === "ellipticalArc";
}

export function isQuadraticSplineCurve<S, U>(
  curve: Curve2d<S, U>
): curve is QuadraticSplineCurve<S, U> {
  return curve.type === "quadraticSpline";
}

export function isCubicSplineCurve<S, U>(curve: Curve2d<S, U>): curve is CubicSplineCurve<S, U> {
  return curve.type === "cubicSpline";
}

export const Curve2d = {
  // ===========================================================================
  // CONSTRUCTORS
  // ===========================================================================

  lineSegment<S, U>(primitive: LineSegment2d<S, U>): Curve2d<S, U> {
    return { type: "line", primitive };
  },

  arc<S, U>(primitive: Arc2d<S, U>): Curve2d<S, U> {
    return { type: "arc", primitive };
  },

  ellipticalArc<S, U>(primitive: EllipticalArc2d<S, U>): Curve2d<S, U> {
    return { type: "ellipticalArc", primitive };
  },

  quadraticSpline<S, U>(primitive: QuadraticSpline2d<S, U>): Curve2d<S, U> {
    return { type: "quadraticSpline", primitive };
  },

  cubicSpline<S, U>(primitive: CubicSpline2d<S, U>): Curve2d<S, U> {
    return { type: "cubicSpline", primitive };
  },

  /**
   * Full circle as a 360° arc variant
   */
  circle<S, U>(circle: Circle2d<S, U>): Curve2d<S, U> {
    return { type: "arc", primitive: Arc2d.fromCircle(circle) };
  },

  /**
   * Full ellipse as a 360° elliptical arc variant
   */
  ellipse<S, U>(ellipse: Ellipse2d<S, U>): Curve2d<S, U> {
    return { type: "ellipticalArc", primitive: EllipticalArc2d.fromEllipse(ellipse) };
  },

  // ===========================================================================
  // CONTRACT OPERATIONS
  // ===========================================================================

  startPoint<S, U>(curve: Curve2d<S, U>): Point2d<S, U> {
    return foldCurve<S, U, Point2d<S, U>>(curve, (kind, primitive) =>
      kind.startPoint<S, U>(primitive)
    );
  },

  endPoint<S, U>(curve: Curve2d<S, U>): Point2d<S, U> {
    return foldCurve<S, U, Point2d<S, U>>(curve, (kind, primitive) =>
      kind.endPoint<S, U>(primitive)
    );
  },

  pointOn<S, U>(curve: Curve2d<S, U>, t: number): Point2d<S, U> {
    return foldCurve<S, U, Point2d<S, U>>(curve, (kind, primitive) =>
      kind.pointOn<S, U>(primitive, t)
    );
  },

  reverse<S, U>(curve: Curve2d<S, U>): Curve2d<S, U> {
    return mapCurve<S, U, S, U>(curve, (kind, primitive) => kind.reverse<S, U>(primitive));
  },

  /**
   * Apply a rigid or uniform-scaling transform
   */
  transformBy<S, U>(
    curve: Curve2d<S, U>,
    transform: Transform2d<UniformClass, S, U>
  ): Curve2d<S, U> {
    return mapCurve<S, U, S, U>(curve, (kind, primitive) =>
      kind.transformBy<S, U>(primitive, transform)
    );
  },

  placeIn<G, L, U>(curve: Curve2d<L, U>, frame: Frame2d<G, L, U>): Curve2d<G, U> {
    return mapCurve<L, U, G, U>(curve, (kind, primitive) =>
      kind.placeIn<G, L, U>(primitive, frame)
    );
  },

  relativeTo<G, L, U>(curve: Curve2d<G, U>, frame: Frame2d<G, L, U>): Curve2d<L, U> {
    return mapCurve<G, U, L, U>(curve, (kind, primitive) =>
      kind.relativeTo<G, L, U>(primitive, frame)
    );
  },

  /**
   * Convert units by multiplying every length by the rate
   */
  at<S, From, To>(curve: Curve2d<S, From>, rate: Rate<To, From>): Curve2d<S, To> {
    return mapCurve<S, From, S, To>(curve, (kind, primitive) =>
      kind.at<S, From, To>(primitive, rate)
    );
  },

  /**
   * Convert units by dividing every length by the rate
   */
  at_<S, From, To>(curve: Curve2d<S, From>, rate: Rate<From, To>): Curve2d<S, To> {
    return mapCurve<S, From, S, To>(curve, (kind, primitive) =>
      kind.at_<S, From, To>(primitive, rate)
    );
  },

  boundingBox<S, U>(curve: Curve2d<S, U>): Bounds2d<S, U> {
    return foldCurve<S, U, Bounds2d<S, U>>(curve, (kind, primitive) =>
      kind.boundingBox<S, U>(primitive)
    );
  },

  segments<S, U>(curve: Curve2d<S, U>, count: number): CurveResult<Polyline2d<S, U>> {
    return foldCurve<S, U, CurveResult<Polyline2d<S, U>>>(curve, (kind, primitive) =>
      kind.segments<S, U>(primitive, count)
    );
  },

  numApproximationSegments<S, U>(
    curve: Curve2d<S, U>,
    maxError: Quantity<U>
  ): CurveResult<number> {
    return foldCurve<S, U, CurveResult<number>>(curve, (kind, primitive) =>
      kind.numApproximationSegments<S, U>(primitive, maxError)
    );
  },

  /**
   * Polyline within `maxError` of the curve, using the fewest segments the
   * kind's error bound allows.
   */
  approximate<S, U>(
    curve: Curve2d<S, U>,
    maxError: Quantity<U>,
    options: Partial<ApproximationConfig> = {}
  ): CurveResult<Polyline2d<S, U>> {
    return foldCurve<S, U, CurveResult<Polyline2d<S, U>>>(curve, (kind, primitive) =>
      kind.approximate<S, U>(primitive, maxError, options)
    );
  },

  // ===========================================================================
  // TRANSFORM CONVENIENCES
  // ===========================================================================

  translateBy<S, U>(curve: Curve2d<S, U>, displacement: Vector2d<S, U>): Curve2d<S, U> {
    return Curve2d.transformBy(curve, Transform2d.translateBy(displacement));
  },

  /**
   * Counterclockwise rotation by `angle` radians about `center`
   */
  rotateAround<S, U>(curve: Curve2d<S, U>, center: Point2d<S, U>, angle: number): Curve2d<S, U> {
    return Curve2d.transformBy(curve, Transform2d.rotateAround(center, angle));
  },

  mirrorAcross<S, U>(curve: Curve2d<S, U>, axis: Axis2d<S, U>): Curve2d<S, U> {
    return Curve2d.transformBy(curve, Transform2d.mirrorAcross(axis));
  },

  scaleAbout<S, U>(curve: Curve2d<S, U>, center: Point2d<S, U>, factor: number): Curve2d<S, U> {
    return Curve2d.transformBy(curve, Transform2d.scaleAbout(center, factor));
  },
};
