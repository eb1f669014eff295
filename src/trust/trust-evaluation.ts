/**
 * Trust Evaluation
 *
 * A snapshot of everything a trust decision needs, evaluated without a
 * Relationship. Useful when trustworthiness and risk come from elsewhere.
 */

import { clamp, clamp01 } from '../state/decaying-value';
import { STAGE_WEIGHTS } from '../relationship/stage';
import { RelationshipStage } from '../relationship/types';
import {
  computeTrustDecision,
  MAX_CONTEXT_MULTIPLIER,
  RISK_WEIGHT,
  TrustDecision,
} from './trust-decision';
import { StakesLevel, STAKES_RISK_CONTRIBUTION } from './types';

export interface TrustWeights {
  propensityWeight: number;
  trustworthinessWeight: number;
  riskWeight: number;
}

export const TrustWeights = {
  /**
   * Stage weights with the constant risk weight
   */
  fromStage(stage: RelationshipStage): TrustWeights {
    const weights = STAGE_WEIGHTS[stage];
    return {
      propensityWeight: weights.propensityWeight,
      trustworthinessWeight: weights.trustworthinessWeight,
      riskWeight: RISK_WEIGHT,
    };
  },
};

export interface TrustEvaluationInit {
  propensity: number;
  competence: number;
  benevolence: number;
  integrity: number;
  baseRisk: number;
  stage?: RelationshipStage;
  historyStrength?: number;
  contextMultiplier?: number;
}

export class TrustEvaluation {
  readonly propensity: number;
  readonly competence: number;
  readonly benevolence: number;
  readonly integrity: number;
  readonly baseRisk: number;
  readonly stage: RelationshipStage;
  readonly historyStrength: number;
  readonly contextMultiplier: number;

  constructor(init: TrustEvaluationInit) {
    this.propensity = clamp01(init.propensity);
    this.competence = clamp01(init.competence);
    this.benevolence = clamp01(init.benevolence);
    this.integrity = clamp01(init.integrity);
    this.baseRisk = clamp01(init.baseRisk);
    this.stage = init.stage ?? RelationshipStage.STRANGER;
    this.historyStrength = clamp01(init.historyStrength ?? 0);
    this.contextMultiplier = clamp(init.contextMultiplier ?? 1, 0, MAX_CONTEXT_MULTIPLIER);
  }

  get weights(): TrustWeights {
    return TrustWeights.fromStage(this.stage);
  }

  /**
   * clamp(baseRisk + stakes contribution + stage modifier)
   */
  computeRisk(stakes: StakesLevel): number {
    return clamp01(this.baseRisk + STAKES_RISK_CONTRIBUTION[stakes] + STAGE_WEIGHTS[this.stage].riskModifier);
  }

  computeDecision(stakes: StakesLevel): TrustDecision {
    const stageWeights = STAGE_WEIGHTS[this.stage];
    const weights = this.weights;
    return computeTrustDecision({
      propensity: this.propensity,
      competence: this.competence,
      benevolence: this.benevolence,
      integrity: this.integrity,
      perceivedRisk: this.computeRisk(stakes),
      propensityWeight: weights.propensityWeight,
      trustworthinessWeight: weights.trustworthinessWeight,
      riskWeight: weights.riskWeight,
      contextMultiplier: this.contextMultiplier,
      historyStrength: this.historyStrength,
      stageCertainty: stageWeights.decisionCertainty,
      stageConfidence: stageWeights.trusteeConfidence,
    });
  }
}
