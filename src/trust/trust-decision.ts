/**
 * Trust Decision
 *
 * Willingness to be vulnerable in each trust domain, with the certainty
 * of the decision and the trustor's confidence in the trustee.
 */

import { clamp, clamp01 } from '../state/decaying-value';

/** Weight of perceived risk subtracted from each willingness */
export const RISK_WEIGHT = 0.5;

/** History contribution to decision certainty; the stage supplies the rest */
export const CERTAINTY_HISTORY_WEIGHT = 0.3;
export const CERTAINTY_STAGE_WEIGHT = 0.7;

/** History contribution to trustee confidence; the stage supplies the rest */
export const CONFIDENCE_HISTORY_WEIGHT = 0.4;
export const CONFIDENCE_STAGE_WEIGHT = 0.6;

/** Context multipliers outside this range are clamped */
export const MAX_CONTEXT_MULTIPLIER = 2;

export interface TrustDecisionData {
  taskWillingness: number;
  supportWillingness: number;
  disclosureWillingness: number;
  decisionCertainty: number;
  trusteeConfidence: number;
}

export class TrustDecision {
  readonly taskWillingness: number;
  readonly supportWillingness: number;
  readonly disclosureWillingness: number;
  readonly decisionCertainty: number;
  readonly trusteeConfidence: number;

  constructor(data: TrustDecisionData) {
    this.taskWillingness = clamp01(data.taskWillingness);
    this.supportWillingness = clamp01(data.supportWillingness);
    this.disclosureWillingness = clamp01(data.disclosureWillingness);
    this.decisionCertainty = clamp01(data.decisionCertainty);
    this.trusteeConfidence = clamp01(data.trusteeConfidence);
  }

  static noTrust(): TrustDecision {
    return new TrustDecision({
      taskWillingness: 0,
      supportWillingness: 0,
      disclosureWillingness: 0,
      decisionCertainty: 0,
      trusteeConfidence: 0,
    });
  }

  static fullTrust(): TrustDecision {
    return new TrustDecision({
      taskWillingness: 1,
      supportWillingness: 1,
      disclosureWillingness: 1,
      decisionCertainty: 1,
      trusteeConfidence: 1,
    });
  }

  static moderate(): TrustDecision {
    return new TrustDecision({
      taskWillingness: 0.3,
      supportWillingness: 0.3,
      disclosureWillingness: 0.2,
      decisionCertainty: 0.3,
      trusteeConfidence: 0.3,
    });
  }

  static fromJSON(data: TrustDecisionData): TrustDecision {
    return new TrustDecision(data);
  }

  /**
   * Alias of decisionCertainty
   */
  get confidence(): number {
    return this.decisionCertainty;
  }

  wouldDelegateTask(threshold: number): boolean {
    return this.taskWillingness > threshold;
  }

  wouldSeekSupport(threshold: number): boolean {
    return this.supportWillingness > threshold;
  }

  wouldDisclose(threshold: number): boolean {
    return this.disclosureWillingness > threshold;
  }

  /**
   * Willing in all three domains
   */
  fullyWilling(threshold: number): boolean {
    return this.wouldDelegateTask(threshold) && this.wouldSeekSupport(threshold) && this.wouldDisclose(threshold);
  }

  /**
   * Willing in at least one domain
   */
  anyWilling(threshold: number): boolean {
    return this.wouldDelegateTask(threshold) || this.wouldSeekSupport(threshold) || this.wouldDisclose(threshold);
  }

  toJSON(): TrustDecisionData {
    return {
      taskWillingness: this.taskWillingness,
      supportWillingness: this.supportWillingness,
      disclosureWillingness: this.disclosureWillingness,
      decisionCertainty: this.decisionCertainty,
      trusteeConfidence: this.trusteeConfidence,
    };
  }
}

/**
 * Everything a trust decision is computed from
 */
export interface TrustDecisionInputs {
  propensity: number;
  competence: number;
  benevolence: number;
  integrity: number;
  perceivedRisk: number;
  propensityWeight: number;
  trustworthinessWeight: number;
  /** Defaults to RISK_WEIGHT */
  riskWeight?: number;
  /** Defaults to 1 */
  contextMultiplier?: number;
  historyStrength: number;
  stageCertainty: number;
  stageConfidence: number;
}

/**
 * Combine propensity, trustworthiness and risk into a decision.
 *
 * willingness = clamp((pw * propensity + tw * factor) * multiplier - rw * risk)
 * with task driven by competence, support by benevolence and disclosure
 * by integrity.
 */
export function computeTrustDecision(inputs: TrustDecisionInputs): TrustDecision {
  const propensity = clamp01(inputs.propensity);
  const multiplier = clamp(inputs.contextMultiplier ?? 1, 0, MAX_CONTEXT_MULTIPLIER);
  const riskWeight = inputs.riskWeight ?? RISK_WEIGHT;
  const riskPenalty = riskWeight * inputs.perceivedRisk;

  const willingness = (factor: number): number =>
    clamp01((inputs.propensityWeight * propensity + inputs.trustworthinessWeight * factor) * multiplier - riskPenalty);

  const history = clamp01(inputs.historyStrength);

  return new TrustDecision({
    taskWillingness: willingness(inputs.competence),
    supportWillingness: willingness(inputs.benevolence),
    disclosureWillingness: willingness(inputs.integrity),
    decisionCertainty: history * CERTAINTY_HISTORY_WEIGHT + inputs.stageCertainty * CERTAINTY_STAGE_WEIGHT,
    trusteeConfidence: history * CONFIDENCE_HISTORY_WEIGHT + inputs.stageConfidence * CONFIDENCE_STAGE_WEIGHT,
  });
}
