import type { Coordinates, Global, Tagged, Unitless } from "@/types";

/** 2D displacement in space `S` with length units `U` (immutable) */
export interface Vector2d<S = Global, U = Unitless> extends Tagged<Coordinates<S, U>> {
  readonly x: number;
  readonly y: number;
}

/** Unit-length 2D vector; carries a space but no units */
export interface Direction2d<S = Global> extends Tagged<Coordinates<S, Unitless>> {
  readonly x: number;
  readonly y: number;
}

/**
 * Vector2d - Pure utility functions for 2D vector operations
 * All functions are immutable and return new vectors
 */
export const Vector2d = {
  /**
   * Create a new vector
   */
  create<S = Global, U = Unitless>(x: number, y: number): Vector2d<S, U> {
    return { x, y };
  },

  /**
   * Return a zero vector
   */
  zero<S = Global, U = Unitless>(): Vector2d<S, U> {
    return { x: 0, y: 0 };
  },

  /**
   * Add two vectors
   */
  add<S, U>(a: Vector2d<S, U>, b: Vector2d<S, U>): Vector2d<S, U> {
    return { x: a.x + b.x, y: a.y + b.y };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract<S, U>(a: Vector2d<S, U>, b: Vector2d<S, U>): Vector2d<S, U> {
    return { x: a.x - b.x, y: a.y - b.y };
  },

  /**
   * Scale a vector by a scalar
   */
  scale<S, U>(v: Vector2d<S, U>, scalar: number): Vector2d<S, U> {
    return { x: v.x * scalar, y: v.y * scalar };
  },

  /**
   * Calculate dot product of two vectors
   */
  dot<S, U>(a: Vector2d<S, U>, b: Vector2d<S, U>): number {
    return a.x * b.x + a.y * b.y;
  },

  /**
   * 2D cross product (z component of the 3D cross product)
   */
  cross<S, U>(a: Vector2d<S, U>, b: Vector2d<S, U>): number {
    return a.x * b.y - a.y * b.x;
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared<S, U>(v: Vector2d<S, U>): number {
    return v.x * v.x + v.y * v.y;
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length<S, U>(v: Vector2d<S, U>): number {
    return Math.sqrt(Vector2d.lengthSquared(v));
  },

  /**
   * Normalize a vector to unit length
   * Returns null for a zero vector, which has no direction
   */
  direction<S, U>(v: Vector2d<S, U>): Direction2d<S> | null {
    const len = Vector2d.length(v);
    if (len === 0) return null;
    return { x: v.x / len, y: v.y / len };
  },

  /**
   * Express a local vector in the global space of a frame's basis
   */
  placeIn<G, L, U>(
    v: Vector2d<L, U>,
    xDirection: Direction2d<G>,
    yDirection: Direction2d<G>
  ): Vector2d<G, U> {
    return {
      x: v.x * xDirection.x + v.y * yDirection.x,
      y: v.x * xDirection.y + v.y * yDirection.y,
    };
  },

  /**
   * Express a global vector in the local basis of a frame
   */
  relativeTo<G, L, U>(
    v: Vector2d<G, U>,
    xDirection: Direction2d<G>,
    yDirection: Direction2d<G>
  ): Vector2d<L, U> {
    return {
      x: v.x * xDirection.x + v.y * xDirection.y,
      y: v.x * yDirection.x + v.y * yDirection.y,
    };
  },

  /**
   * Rescale by a conversion factor, changing the units tag
   */
  convert<S, From, To>(v: Vector2d<S, From>, factor: number): Vector2d<S, To> {
    return { x: v.x * factor, y: v.y * factor };
  },

  /**
   * Rescale by the inverse of a conversion factor, changing the units tag
   */
  convertInverse<S, From, To>(v: Vector2d<S, From>, factor: number): Vector2d<S, To> {
    return { x: v.x / factor, y: v.y / factor };
  },
};

/**
 * Direction2d - Unit vector helpers
 */
export const Direction2d = {
  x<S = Global>(): Direction2d<S> {
    return { x: 1, y: 0 };
  },

  y<S = Global>(): Direction2d<S> {
    return { x: 0, y: 1 };
  },

  fromAngle<S = Global>(angle: number): Direction2d<S> {
    return { x: Math.cos(angle), y: Math.sin(angle) };
  },

  /**
   * Angle measured counterclockwise from the positive x axis
   */
  angle<S>(d: Direction2d<S>): number {
    return Math.atan2(d.y, d.x);
  },

  /**
   * Rotate 90° counterclockwise
   */
  perpendicular<S>(d: Direction2d<S>): Direction2d<S> {
    return { x: -d.y, y: d.x };
  },
};
