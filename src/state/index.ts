/**
 * State Module
 *
 * The decaying bounded value every other dimension is built from.
 */

export { CHRONIC_HALF_LIFE_MULTIPLIER, type DecayingValueData } from './types';
export { DecayingValue, DEFAULT_HALF_LIFE_MS, clamp, clamp01 } from './decaying-value';
