/**
 * Trust Antecedent
 *
 * A single observation about a trustee's ability, benevolence or integrity.
 * Antecedents are immutable; the log of them is the source of truth for
 * trustworthiness deltas.
 */

import { clamp01 } from '../state/decaying-value';
import {
  AntecedentDirection,
  AntecedentType,
  ANTECEDENT_TRUST_DOMAINS,
  LifeDomain,
  TrustAntecedentData,
  TrustDomain,
} from './types';

export interface TrustAntecedentInit {
  timestamp: Date;
  antecedentType: AntecedentType;
  direction: AntecedentDirection;
  /** Clamped to [0, 1] */
  magnitude: number;
  context: string;
  lifeDomain?: LifeDomain | null;
}

export class TrustAntecedent {
  /** Epoch milliseconds; `timestamp` hands out copies */
  readonly time: number;
  readonly antecedentType: AntecedentType;
  readonly direction: AntecedentDirection;
  readonly magnitude: number;
  readonly context: string;
  /** Only meaningful for ability antecedents; null means every domain */
  readonly lifeDomain: LifeDomain | null;

  constructor(init: TrustAntecedentInit) {
    this.time = init.timestamp.getTime();
    this.antecedentType = init.antecedentType;
    this.direction = init.direction;
    this.magnitude = clamp01(init.magnitude);
    this.context = init.context;
    this.lifeDomain = init.lifeDomain ?? null;
  }

  static positive(
    timestamp: Date,
    antecedentType: AntecedentType,
    magnitude: number,
    context: string
  ): TrustAntecedent {
    return new TrustAntecedent({
      timestamp,
      antecedentType,
      direction: AntecedentDirection.POSITIVE,
      magnitude,
      context,
    });
  }

  static negative(
    timestamp: Date,
    antecedentType: AntecedentType,
    magnitude: number,
    context: string
  ): TrustAntecedent {
    return new TrustAntecedent({
      timestamp,
      antecedentType,
      direction: AntecedentDirection.NEGATIVE,
      magnitude,
      context,
    });
  }

  static fromJSON(data: TrustAntecedentData): TrustAntecedent {
    return new TrustAntecedent({
      timestamp: new Date(data.timestamp),
      antecedentType: data.antecedentType,
      direction: data.direction,
      magnitude: data.magnitude,
      context: data.context,
      lifeDomain: data.lifeDomain,
    });
  }

  get timestamp(): Date {
    return new Date(this.time);
  }

  /**
   * Trust domain this antecedent feeds
   */
  get trustDomain(): TrustDomain {
    return ANTECEDENT_TRUST_DOMAINS[this.antecedentType];
  }

  get isPositive(): boolean {
    return this.direction === AntecedentDirection.POSITIVE;
  }

  get isNegative(): boolean {
    return this.direction === AntecedentDirection.NEGATIVE;
  }

  /**
   * Copy of this antecedent scoped to one life domain
   */
  withLifeDomain(lifeDomain: LifeDomain): TrustAntecedent {
    return new TrustAntecedent({
      timestamp: this.timestamp,
      antecedentType: this.antecedentType,
      direction: this.direction,
      magnitude: this.magnitude,
      context: this.context,
      lifeDomain,
    });
  }

  toJSON(): TrustAntecedentData {
    return {
      timestamp: this.timestamp.toISOString(),
      antecedentType: this.antecedentType,
      direction: this.direction,
      magnitude: this.magnitude,
      context: this.context,
      lifeDomain: this.lifeDomain,
    };
  }
}
