/**
 * Trust Context
 *
 * Situational factors around a trust decision. Norms, safeguards,
 * institutional support and cultural expectations encourage trust; time
 * pressure discourages it. The result is a multiplier on the weighted
 * propensity and trustworthiness terms.
 */

import { clamp, clamp01 } from '../state/decaying-value';

export const MIN_CONTEXT_MULTIPLIER = 0.5;
export const MAX_SITUATIONAL_MULTIPLIER = 1.5;

/** Penalty per unit of time pressure */
const TIME_PRESSURE_PENALTY = 0.1;

/** Offset between the mean encouraging factor and the multiplier it maps to */
const FROM_MULTIPLIER_OFFSET = 0.45;

export interface TrustContextData {
  socialNorms: number;
  institutionalSafeguards: number;
  timePressure: number;
  institutionalSupport: number;
  culturalExpectations: number;
}

export class TrustContext {
  private data: TrustContextData;

  constructor(data: Partial<TrustContextData> = {}) {
    this.data = {
      socialNorms: clamp01(data.socialNorms ?? 0.5),
      institutionalSafeguards: clamp01(data.institutionalSafeguards ?? 0.5),
      timePressure: clamp01(data.timePressure ?? 0.5),
      institutionalSupport: clamp01(data.institutionalSupport ?? 0.5),
      culturalExpectations: clamp01(data.culturalExpectations ?? 0.5),
    };
  }

  /**
   * A context whose encouraging factors approximate the given multiplier,
   * with neutral time pressure
   */
  static fromMultiplier(multiplier: number): TrustContext {
    const bounded = clamp(multiplier, MIN_CONTEXT_MULTIPLIER, MAX_SITUATIONAL_MULTIPLIER);
    const factor = clamp01(bounded - FROM_MULTIPLIER_OFFSET);
    return new TrustContext({
      socialNorms: factor,
      institutionalSafeguards: factor,
      institutionalSupport: factor,
      culturalExpectations: factor,
      timePressure: 0.5,
    });
  }

  static fromJSON(data: TrustContextData): TrustContext {
    return new TrustContext(data);
  }

  get socialNorms(): number {
    return this.data.socialNorms;
  }

  get institutionalSafeguards(): number {
    return this.data.institutionalSafeguards;
  }

  get timePressure(): number {
    return this.data.timePressure;
  }

  get institutionalSupport(): number {
    return this.data.institutionalSupport;
  }

  get culturalExpectations(): number {
    return this.data.culturalExpectations;
  }

  /**
   * clamp(0.5 + mean(encouraging factors) - 0.1 * timePressure, 0.5, 1.5)
   */
  computeMultiplier(): number {
    const encouraging =
      (this.data.socialNorms +
        this.data.institutionalSafeguards +
        this.data.institutionalSupport +
        this.data.culturalExpectations) /
      4;
    const raw = 0.5 + encouraging - TIME_PRESSURE_PENALTY * this.data.timePressure;
    return clamp(raw, MIN_CONTEXT_MULTIPLIER, MAX_SITUATIONAL_MULTIPLIER);
  }

  toJSON(): TrustContextData {
    return { ...this.data };
  }
}
