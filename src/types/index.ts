/**
 * Core type definitions for the curve algebra
 */

// =============================================================================
// PHANTOM TAGS
// =============================================================================

declare const phantom: unique symbol;

/**
 * Carries a compile-time tag with no runtime data.
 *
 * Values tagged with incompatible `T` cannot be assigned to each other, so
 * a point in one coordinate space (or a length in one unit) cannot be passed
 * where another is expected. Plain object literals are still assignable, so
 * no cast is needed to construct a tagged value.
 */
export interface Tagged<T> {
  readonly [phantom]?: T;
}

/** Coordinate space and units carried by points, vectors, bounds and curves */
export interface Coordinates<S, U> {
  readonly space: S;
  readonly units: U;
}

/** Units carried by a scalar quantity */
export interface Units<U> {
  readonly units: U;
}

// =============================================================================
// COORDINATE SPACES
// =============================================================================

/** Default coordinate space */
export type Global = "global";

/** Conventional name for a space local to some frame */
export type Local = "local";

// =============================================================================
// UNITS
// =============================================================================

export type Unitless = "unitless";
export type Meters = "meters";
export type Millimeters = "millimeters";
export type Radians = "radians";

/** Unit of a rate: `To` per `From` */
export interface Per<To, From> {
  readonly numerator: To;
  readonly denominator: From;
}

// =============================================================================
// TRANSFORM CLASSES
// =============================================================================

/** Any affine map: may shear or scale non-uniformly */
export interface AffineClass {
  readonly affine: true;
}

/** Similarity: rotation, mirror, translation and uniform scale */
export interface UniformClass extends AffineClass {
  readonly uniform: true;
}

/** Isometry: rotation, mirror and translation only */
export interface RigidClass extends UniformClass {
  readonly rigid: true;
}

export type TransformClass = AffineClass | UniformClass | RigidClass;

// =============================================================================
// CURVE TYPES
// =============================================================================

/** Discriminator of the curve variants */
export type CurveType =
  | "line"
  | "arc"
  | "ellipticalArc"
  | "quadraticSpline"
  | "cubicSpline";
