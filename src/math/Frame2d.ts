import type { Global, Local, Tagged, Unitless } from "@/types";
import { Point2d } from "./Point2d";
import type { Similarity } from "./Transform2d";
import { Direction2d, Vector2d } from "./Vector2d";

interface FrameTag<G, L, U> {
  readonly global: G;
  readonly local: L;
  readonly units: U;
}

/**
 * A named local coordinate system placed in a global space.
 *
 * `origin` and both directions are expressed in the global space `G`; the
 * frame's own coordinates live in the space `L`. Converting with `placeIn`
 * maps `L` to `G`, and `relativeTo` maps `G` back to `L`.
 */
export interface Frame2d<G = Global, L = Local, U = Unitless>
  extends Tagged<FrameTag<G, L, U>> {
  readonly origin: Point2d<G, U>;
  readonly xDirection: Direction2d<G>;
  readonly yDirection: Direction2d<G>;
}

export const Frame2d = {
  /**
   * Frame aligned with the global axes, centered at `origin`
   */
  atPoint<G, U, L = Local>(origin: Point2d<G, U>): Frame2d<G, L, U> {
    return { origin, xDirection: Direction2d.x(), yDirection: Direction2d.y() };
  },

  /**
   * Right-handed frame whose x axis points along `xDirection`
   */
  withXDirection<G, U, L = Local>(
    origin: Point2d<G, U>,
    xDirection: Direction2d<G>
  ): Frame2d<G, L, U> {
    return { origin, xDirection, yDirection: Direction2d.perpendicular(xDirection) };
  },

  /**
   * Right-handed frame rotated counterclockwise by `angle` radians
   */
  withAngle<G, U, L = Local>(origin: Point2d<G, U>, angle: number): Frame2d<G, L, U> {
    return Frame2d.withXDirection(origin, Direction2d.fromAngle(angle));
  },

  /**
   * Same origin and x axis with the y axis flipped (left-handed)
   */
  reverseY<G, L, U>(frame: Frame2d<G, L, U>): Frame2d<G, L, U> {
    return {
      origin: frame.origin,
      xDirection: frame.xDirection,
      yDirection: { x: -frame.yDirection.x, y: -frame.yDirection.y },
    };
  },

  isRightHanded<G, L, U>(frame: Frame2d<G, L, U>): boolean {
    return Vector2d.cross(frame.xDirection, frame.yDirection) > 0;
  },

  placePoint<G, L, U>(frame: Frame2d<G, L, U>, p: Point2d<L, U>): Point2d<G, U> {
    return Point2d.placeIn(p, frame.origin, frame.xDirection, frame.yDirection);
  },

  relativePoint<G, L, U>(frame: Frame2d<G, L, U>, p: Point2d<G, U>): Point2d<L, U> {
    return Point2d.relativeTo<G, L, U>(p, frame.origin, frame.xDirection, frame.yDirection);
  },

  placeVector<G, L, U>(frame: Frame2d<G, L, U>, v: Vector2d<L, U>): Vector2d<G, U> {
    return Vector2d.placeIn(v, frame.xDirection, frame.yDirection);
  },

  relativeVector<G, L, U>(frame: Frame2d<G, L, U>, v: Vector2d<G, U>): Vector2d<L, U> {
    return Vector2d.relativeTo<G, L, U>(v, frame.xDirection, frame.yDirection);
  },

  /**
   * Rigid motion taking local directions to global ones (scale is always 1)
   */
  similarity<G, L, U>(frame: Frame2d<G, L, U>): Similarity {
    return {
      scale: 1,
      rotation: Direction2d.angle(frame.xDirection),
      mirrored: !Frame2d.isRightHanded(frame),
    };
  },
};
