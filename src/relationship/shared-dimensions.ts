/**
 * Shared Dimensions
 *
 * Symmetric state both entities hold in common. History only ever grows.
 */

import { DecayingValue } from '../state/decaying-value';
import { days } from '../time/duration';
import { SharedDimensionsData, SharedPath, SHARED_PATHS } from './types';

interface SharedDefault {
  base: number;
  /** null means the value never decays */
  halfLifeMs: number | null;
}

export const SHARED_DEFAULTS: Record<SharedPath, SharedDefault> = {
  [SharedPath.AFFINITY]: { base: 0.1, halfLifeMs: days(14) },
  [SharedPath.RESPECT]: { base: 0.2, halfLifeMs: days(21) },
  [SharedPath.TENSION]: { base: 0, halfLifeMs: days(7) },
  [SharedPath.INTIMACY]: { base: 0, halfLifeMs: days(30) },
  [SharedPath.HISTORY]: { base: 0, halfLifeMs: null },
};

function defaultValue(path: SharedPath): DecayingValue {
  const { base, halfLifeMs } = SHARED_DEFAULTS[path];
  return halfLifeMs === null ? DecayingValue.noDecay(base) : new DecayingValue(base).withHalfLife(halfLifeMs);
}

export class SharedDimensions {
  private values: Record<SharedPath, DecayingValue>;

  constructor() {
    this.values = {
      [SharedPath.AFFINITY]: defaultValue(SharedPath.AFFINITY),
      [SharedPath.RESPECT]: defaultValue(SharedPath.RESPECT),
      [SharedPath.TENSION]: defaultValue(SharedPath.TENSION),
      [SharedPath.INTIMACY]: defaultValue(SharedPath.INTIMACY),
      [SharedPath.HISTORY]: defaultValue(SharedPath.HISTORY),
    };
  }

  static fromJSON(data: SharedDimensionsData): SharedDimensions {
    const shared = new SharedDimensions();
    for (const path of SHARED_PATHS) {
      const stored = data[path];
      if (stored) {
        shared.values[path] = DecayingValue.fromJSON(stored);
      }
    }
    return shared;
  }

  get(path: SharedPath): DecayingValue {
    return this.values[path];
  }

  get affinity(): DecayingValue {
    return this.values[SharedPath.AFFINITY];
  }

  get respect(): DecayingValue {
    return this.values[SharedPath.RESPECT];
  }

  get tension(): DecayingValue {
    return this.values[SharedPath.TENSION];
  }

  get intimacy(): DecayingValue {
    return this.values[SharedPath.INTIMACY];
  }

  get history(): DecayingValue {
    return this.values[SharedPath.HISTORY];
  }

  /**
   * Effective history in [0, 1]; how much the pair has been through together
   */
  historyStrength(): number {
    return this.history.effective();
  }

  /**
   * Grow shared history. Non-positive amounts are ignored.
   */
  addHistoryDelta(amount: number): void {
    if (amount <= 0) {
      return;
    }
    this.history.addDelta(amount);
  }

  /**
   * Add to any shared value; history keeps its no-shrink rule
   */
  addDelta(path: SharedPath, amount: number): void {
    if (path === SharedPath.HISTORY) {
      this.addHistoryDelta(amount);
      return;
    }
    this.values[path].addDelta(amount);
  }

  applyDecay(elapsedMs: number): void {
    for (const path of SHARED_PATHS) {
      if (path !== SharedPath.HISTORY) {
        this.values[path].applyDecay(elapsedMs);
      }
    }
  }

  /**
   * Reset transient deltas; accumulated history is kept
   */
  resetDeltas(): void {
    for (const path of SHARED_PATHS) {
      if (path !== SharedPath.HISTORY) {
        this.values[path].resetDelta();
      }
    }
  }

  toJSON(): SharedDimensionsData {
    return {
      [SharedPath.AFFINITY]: this.affinity.toJSON(),
      [SharedPath.RESPECT]: this.respect.toJSON(),
      [SharedPath.TENSION]: this.tension.toJSON(),
      [SharedPath.INTIMACY]: this.intimacy.toJSON(),
      [SharedPath.HISTORY]: this.history.toJSON(),
    };
  }
}
