/**
 * Decaying Value
 *
 * A bounded numeric dimension made of a stable base plus a transient delta
 * that halves every `halfLifeMs`. Every trust, risk and relationship
 * dimension in the package is one of these, embedded in an owner.
 */

import { days } from '../time/duration';
import { CHRONIC_HALF_LIFE_MULTIPLIER, DecayingValueData } from './types';

/** Half-life used when none is given */
export const DEFAULT_HALF_LIFE_MS = days(7);

/**
 * Clamp a number into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Clamp a number into [0, 1]
 */
export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export class DecayingValue {
  private data: DecayingValueData;

  constructor(base: number = 0.5) {
    this.data = {
      base,
      delta: 0,
      chronicDelta: 0,
      lowerBound: 0,
      upperBound: 1,
      halfLifeMs: DEFAULT_HALF_LIFE_MS,
    };
  }

  /**
   * Create a value whose delta never decays
   */
  static noDecay(base: number): DecayingValue {
    return new DecayingValue(base).withNoDecay();
  }

  /**
   * Restore a value from persisted data
   */
  static fromJSON(data: DecayingValueData): DecayingValue {
    const value = new DecayingValue(data.base);
    value.data = { ...data };
    return value;
  }

  withBounds(lowerBound: number, upperBound: number): this {
    this.data.lowerBound = lowerBound;
    this.data.upperBound = upperBound;
    return this;
  }

  withHalfLife(halfLifeMs: number): this {
    this.data.halfLifeMs = halfLifeMs;
    return this;
  }

  withNoDecay(): this {
    this.data.halfLifeMs = null;
    return this;
  }

  withDelta(delta: number): this {
    this.setDelta(delta);
    return this;
  }

  get base(): number {
    return this.data.base;
  }

  /**
   * Total deviation from base (acute + chronic)
   */
  get delta(): number {
    return this.data.delta + this.data.chronicDelta;
  }

  get chronicDelta(): number {
    return this.data.chronicDelta;
  }

  get lowerBound(): number {
    return this.data.lowerBound;
  }

  get upperBound(): number {
    return this.data.upperBound;
  }

  get halfLifeMs(): number | null {
    return this.data.halfLifeMs;
  }

  get decays(): boolean {
    return this.data.halfLifeMs !== null;
  }

  /**
   * base + delta, clamped to the bounds
   */
  effective(): number {
    return clamp(this.effectiveRaw(), this.data.lowerBound, this.data.upperBound);
  }

  /**
   * base + delta without clamping
   */
  effectiveRaw(): number {
    return this.data.base + this.data.delta + this.data.chronicDelta;
  }

  setBase(base: number): void {
    this.data.base = base;
  }

  addDelta(amount: number): void {
    this.data.delta += amount;
  }

  addChronicDelta(amount: number): void {
    this.data.chronicDelta += amount;
  }

  /**
   * Replace the delta; clears any chronic component
   */
  setDelta(delta: number): void {
    this.data.delta = delta;
    this.data.chronicDelta = 0;
  }

  setHalfLife(halfLifeMs: number | null): void {
    this.data.halfLifeMs = halfLifeMs;
  }

  /**
   * Decay the delta toward zero: delta *= 0.5^(elapsed / halfLife)
   */
  applyDecay(elapsedMs: number): void {
    const halfLife = this.data.halfLifeMs;
    if (halfLife === null || halfLife <= 0 || elapsedMs <= 0) {
      return;
    }

    this.data.delta *= Math.pow(0.5, elapsedMs / halfLife);

    const chronicHalfLife = halfLife * CHRONIC_HALF_LIFE_MULTIPLIER;
    this.data.chronicDelta *= Math.pow(0.5, elapsedMs / chronicHalfLife);
  }

  resetDelta(): void {
    this.data.delta = 0;
    this.data.chronicDelta = 0;
  }

  toJSON(): DecayingValueData {
    return { ...this.data };
  }
}
