/**
 * Math Module Exports
 */

export { Quantity, type Rate } from "./Quantity";
export { Vector2d, Direction2d } from "./Vector2d";
export { Point2d } from "./Point2d";
export { Point3d } from "./Point3d";
export { Bounds2d } from "./Bounds2d";
export { Bounds3d } from "./Bounds3d";
export { Axis2d } from "./Axis2d";
export { Frame2d } from "./Frame2d";
export { Transform2d, type Similarity } from "./Transform2d";
