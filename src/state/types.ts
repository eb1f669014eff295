/**
 * Decaying State Types
 */

/**
 * Serializable form of a decaying bounded value
 */
export interface DecayingValueData {
  /** Stable baseline (trait-like component) */
  base: number;
  /** Transient deviation from events, decays toward zero */
  delta: number;
  /** Slow-moving deviation, decays at CHRONIC_HALF_LIFE_MULTIPLIER x the half-life */
  chronicDelta: number;
  /** Lower clamp for the effective value */
  lowerBound: number;
  /** Upper clamp for the effective value */
  upperBound: number;
  /** Half-life of the delta in milliseconds, null for values that never decay */
  halfLifeMs: number | null;
}

/**
 * Chronic deltas decay this many times slower than acute ones
 */
export const CHRONIC_HALF_LIFE_MULTIPLIER = 4;
