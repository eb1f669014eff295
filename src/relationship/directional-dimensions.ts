/**
 * Directional Dimensions
 *
 * How one entity feels about the other. Each direction of a
 * relationship owns its own set.
 */

import { DecayingValue } from '../state/decaying-value';
import { days } from '../time/duration';
import { DirectionalDimension, DirectionalDimensionsData, DIRECTIONAL_DIMENSIONS } from './types';

interface DirectionalDefault {
  base: number;
  halfLifeMs: number;
}

export const DIRECTIONAL_DEFAULTS: Record<DirectionalDimension, DirectionalDefault> = {
  [DirectionalDimension.WARMTH]: { base: 0.2, halfLifeMs: days(14) },
  [DirectionalDimension.RESENTMENT]: { base: 0, halfLifeMs: days(14) },
  [DirectionalDimension.DEPENDENCE]: { base: 0, halfLifeMs: days(14) },
  [DirectionalDimension.ATTRACTION]: { base: 0, halfLifeMs: days(14) },
  [DirectionalDimension.ATTACHMENT]: { base: 0, halfLifeMs: days(30) },
  [DirectionalDimension.JEALOUSY]: { base: 0, halfLifeMs: days(7) },
  [DirectionalDimension.FEAR]: { base: 0, halfLifeMs: days(7) },
  [DirectionalDimension.OBLIGATION]: { base: 0, halfLifeMs: days(30) },
};

function defaultValue(dimension: DirectionalDimension): DecayingValue {
  const { base, halfLifeMs } = DIRECTIONAL_DEFAULTS[dimension];
  return new DecayingValue(base).withHalfLife(halfLifeMs);
}

export class DirectionalDimensions {
  private values: Record<DirectionalDimension, DecayingValue>;

  constructor() {
    this.values = {
      [DirectionalDimension.WARMTH]: defaultValue(DirectionalDimension.WARMTH),
      [DirectionalDimension.RESENTMENT]: defaultValue(DirectionalDimension.RESENTMENT),
      [DirectionalDimension.DEPENDENCE]: defaultValue(DirectionalDimension.DEPENDENCE),
      [DirectionalDimension.ATTRACTION]: defaultValue(DirectionalDimension.ATTRACTION),
      [DirectionalDimension.ATTACHMENT]: defaultValue(DirectionalDimension.ATTACHMENT),
      [DirectionalDimension.JEALOUSY]: defaultValue(DirectionalDimension.JEALOUSY),
      [DirectionalDimension.FEAR]: defaultValue(DirectionalDimension.FEAR),
      [DirectionalDimension.OBLIGATION]: defaultValue(DirectionalDimension.OBLIGATION),
    };
  }

  static fromJSON(data: DirectionalDimensionsData): DirectionalDimensions {
    const dimensions = new DirectionalDimensions();
    for (const dimension of DIRECTIONAL_DIMENSIONS) {
      const stored = data[dimension];
      if (stored) {
        dimensions.values[dimension] = DecayingValue.fromJSON(stored);
      }
    }
    return dimensions;
  }

  get(dimension: DirectionalDimension): DecayingValue {
    return this.values[dimension];
  }

  effective(dimension: DirectionalDimension): number {
    return this.values[dimension].effective();
  }

  addDelta(dimension: DirectionalDimension, amount: number): void {
    this.values[dimension].addDelta(amount);
  }

  applyDecay(elapsedMs: number): void {
    for (const dimension of DIRECTIONAL_DIMENSIONS) {
      this.values[dimension].applyDecay(elapsedMs);
    }
  }

  resetDeltas(): void {
    for (const dimension of DIRECTIONAL_DIMENSIONS) {
      this.values[dimension].resetDelta();
    }
  }

  toJSON(): DirectionalDimensionsData {
    return {
      [DirectionalDimension.WARMTH]: this.values[DirectionalDimension.WARMTH].toJSON(),
      [DirectionalDimension.RESENTMENT]: this.values[DirectionalDimension.RESENTMENT].toJSON(),
      [DirectionalDimension.DEPENDENCE]: this.values[DirectionalDimension.DEPENDENCE].toJSON(),
      [DirectionalDimension.ATTRACTION]: this.values[DirectionalDimension.ATTRACTION].toJSON(),
      [DirectionalDimension.ATTACHMENT]: this.values[DirectionalDimension.ATTACHMENT].toJSON(),
      [DirectionalDimension.JEALOUSY]: this.values[DirectionalDimension.JEALOUSY].toJSON(),
      [DirectionalDimension.FEAR]: this.values[DirectionalDimension.FEAR].toJSON(),
      [DirectionalDimension.OBLIGATION]: this.values[DirectionalDimension.OBLIGATION].toJSON(),
    };
  }
}
