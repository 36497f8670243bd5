/**
 * Transform2d - Affine maps of a 2D space onto itself
 *
 * A transform is stored as the images of the space's origin and of its two
 * unit basis vectors, so applying it is two multiply-adds per coordinate:
 *
 *   T(p) = origin + xVector * p.x + yVector * p.y
 *
 * The transform class (rigid, uniform, affine) is a phantom tag. Rigid
 * transforms are accepted wherever uniform or affine ones are, so arcs can
 * require a uniform transform and still take a rotation.
 */

import type {
  AffineClass,
  Global,
  RigidClass,
  Tagged,
  TransformClass,
  UniformClass,
  Unitless,
} from "@/types";
import type { Axis2d } from "./Axis2d";
import { Point2d } from "./Point2d";
import { Vector2d } from "./Vector2d";

interface TransformTag<C, S, U> {
  readonly transformClass: C;
  readonly space: S;
  readonly units: U;
}

export interface Transform2d<C extends TransformClass = AffineClass, S = Global, U = Unitless>
  extends Tagged<TransformTag<C, S, U>> {
  /** Image of the origin */
  readonly origin: Point2d<S, U>;
  /** Image of the unit x vector */
  readonly xVector: Vector2d<S, Unitless>;
  /** Image of the unit y vector */
  readonly yVector: Vector2d<S, Unitless>;
}

/**
 * Decomposition of a uniform transform into scale, rotation and mirroring.
 *
 * A mirrored similarity maps the direction at angle θ to angle `rotation - θ`;
 * an unmirrored one maps it to `rotation + θ`.
 */
export interface Similarity {
  readonly scale: number;
  readonly rotation: number;
  readonly mirrored: boolean;
}

export const Transform2d = {
  identity<S = Global, U = Unitless>(): Transform2d<RigidClass, S, U> {
    return {
      origin: Point2d.origin(),
      xVector: { x: 1, y: 0 },
      yVector: { x: 0, y: 1 },
    };
  },

  translateBy<S, U>(displacement: Vector2d<S, U>): Transform2d<RigidClass, S, U> {
    return {
      origin: { x: displacement.x, y: displacement.y },
      xVector: { x: 1, y: 0 },
      yVector: { x: 0, y: 1 },
    };
  },

  /**
   * Counterclockwise rotation by `angle` radians about `center`
   */
  rotateAround<S, U>(center: Point2d<S, U>, angle: number): Transform2d<RigidClass, S, U> {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return {
      origin: {
        x: center.x - (cos * center.x - sin * center.y),
        y: center.y - (sin * center.x + cos * center.y),
      },
      xVector: { x: cos, y: sin },
      yVector: { x: -sin, y: cos },
    };
  },

  /**
   * Reflection through an axis.
   *
   * For axis direction d = (c, s) the linear part is
   *   [c² - s²   2cs    ]
   *   [2cs       s² - c²]
   * and the origin maps to its mirror image: 2 * projection - origin.
   */
  mirrorAcross<S, U>(axis: Axis2d<S, U>): Transform2d<RigidClass, S, U> {
    const { x: c, y: s } = axis.direction;
    const o = axis.originPoint;

    // Projection of the space origin onto the axis
    const t = -(o.x * c + o.y * s);
    const projX = o.x + t * c;
    const projY = o.y + t * s;

    return {
      origin: { x: 2 * projX, y: 2 * projY },
      xVector: { x: c * c - s * s, y: 2 * c * s },
      yVector: { x: 2 * c * s, y: s * s - c * c },
    };
  },

  /**
   * Uniform scaling by `factor` about `center` (negative factors flip through the center)
   */
  scaleAbout<S, U>(center: Point2d<S, U>, factor: number): Transform2d<UniformClass, S, U> {
    return {
      origin: { x: center.x - factor * center.x, y: center.y - factor * center.y },
      xVector: { x: factor, y: 0 },
      yVector: { x: 0, y: factor },
    };
  },

  /**
   * Stretch by `factor` along an axis, leaving distances perpendicular to it unchanged.
   *
   * Linear part: I + (factor - 1) d dᵀ
   */
  scaleAlong<S, U>(axis: Axis2d<S, U>, factor: number): Transform2d<AffineClass, S, U> {
    const { x: c, y: s } = axis.direction;
    const k = factor - 1;
    const xVector = { x: 1 + k * c * c, y: k * c * s };
    const yVector = { x: k * c * s, y: 1 + k * s * s };
    const o = axis.originPoint;
    return {
      origin: {
        x: o.x - (xVector.x * o.x + yVector.x * o.y),
        y: o.y - (xVector.y * o.x + yVector.y * o.y),
      },
      xVector,
      yVector,
    };
  },

  applyToPoint<C extends TransformClass, S, U>(
    t: Transform2d<C, S, U>,
    p: Point2d<S, U>
  ): Point2d<S, U> {
    return {
      x: t.origin.x + t.xVector.x * p.x + t.yVector.x * p.y,
      y: t.origin.y + t.xVector.y * p.x + t.yVector.y * p.y,
    };
  },

  applyToVector<C extends TransformClass, S, U>(
    t: Transform2d<C, S, U>,
    v: Vector2d<S, U>
  ): Vector2d<S, U> {
    return {
      x: t.xVector.x * v.x + t.yVector.x * v.y,
      y: t.xVector.y * v.x + t.yVector.y * v.y,
    };
  },

  /**
   * Signed area scale of the linear part; negative for mirroring transforms
   */
  determinant<C extends TransformClass, S, U>(t: Transform2d<C, S, U>): number {
    return Vector2d.cross(t.xVector, t.yVector);
  },

  similarity<S, U>(t: Transform2d<UniformClass, S, U>): Similarity {
    return {
      scale: Vector2d.length(t.xVector),
      rotation: Math.atan2(t.xVector.y, t.xVector.x),
      mirrored: Transform2d.determinant(t) < 0,
    };
  },
};
