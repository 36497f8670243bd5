import type { Global, Unitless } from "@/types";
import { Point2d } from "./Point2d";
import { Direction2d } from "./Vector2d";

/** Infinite directed line through `originPoint` */
export interface Axis2d<S = Global, U = Unitless> {
  readonly originPoint: Point2d<S, U>;
  readonly direction: Direction2d<S>;
}

export const Axis2d = {
  through<S, U>(originPoint: Point2d<S, U>, direction: Direction2d<S>): Axis2d<S, U> {
    return { originPoint, direction };
  },

  /**
   * The x axis of space `S`
   */
  x<S = Global, U = Unitless>(): Axis2d<S, U> {
    return { originPoint: Point2d.origin(), direction: Direction2d.x() };
  },

  /**
   * The y axis of space `S`
   */
  y<S = Global, U = Unitless>(): Axis2d<S, U> {
    return { originPoint: Point2d.origin(), direction: Direction2d.y() };
  },
};
