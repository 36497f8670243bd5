/** Configuration for curve approximation */
export interface ApproximationConfig {
  /** Largest segment count `approximate` will sample; larger requests fail */
  readonly maxSegments: number;
  /** Forward each approximation to the debug logger (recorded only while it is enabled) */
  readonly logApproximations: boolean;
}

/**
 * Default approximation configuration
 */
export const DEFAULT_APPROXIMATION_CONFIG: ApproximationConfig = {
  maxSegments: 1_000_000,
  logApproximations: true,
};

/**
 * Merge overrides onto the defaults
 */
export function createApproximationConfig(
  options: Partial<ApproximationConfig> = {}
): ApproximationConfig {
  return { ...DEFAULT_APPROXIMATION_CONFIG, ...options };
}
