import type { Per, Tagged, Unitless, Units } from "@/types";

/**
 * A scalar tagged with a measurement unit.
 *
 * Only `at`/`at_` conversions on curves and polylines change the unit of
 * the lengths they produce; quantities of different units never compare.
 */
export interface Quantity<U = Unitless> extends Tagged<Units<U>> {
  readonly value: number;
}

/** Conversion factor from `From` to `To` (e.g. 1000 millimeters per meter) */
export type Rate<To, From> = Quantity<Per<To, From>>;

/**
 * Quantity - Pure utility functions for unit-tagged scalars
 */
export const Quantity = {
  of<U>(value: number): Quantity<U> {
    return { value };
  },

  zero<U>(): Quantity<U> {
    return { value: 0 };
  },

  add<U>(a: Quantity<U>, b: Quantity<U>): Quantity<U> {
    return { value: a.value + b.value };
  },

  subtract<U>(a: Quantity<U>, b: Quantity<U>): Quantity<U> {
    return { value: a.value - b.value };
  },

  multiply<U>(q: Quantity<U>, factor: number): Quantity<U> {
    return { value: q.value * factor };
  },

  /**
   * Three-way comparison, usable as a sort comparator
   */
  compare<U>(a: Quantity<U>, b: Quantity<U>): number {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  },

  /**
   * Strictly greater than zero; false for NaN
   */
  isPositive<U>(q: Quantity<U>): boolean {
    return q.value > 0;
  },

  /**
   * Create a rate converting `From` into `To`
   */
  rate<To, From>(value: number): Rate<To, From> {
    return { value };
  },
};
