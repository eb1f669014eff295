/**
 * Relationship Stage
 *
 * Per-stage weights for trust decisions and the transition check used by
 * Relationship.setStage.
 */

import { RelationshipStage } from './types';

export interface StageWeights {
  /** Weight of the trustor's propensity in willingness */
  propensityWeight: number;
  /** Weight of perceived trustworthiness in willingness */
  trustworthinessWeight: number;
  /** Added to perceived risk */
  riskModifier: number;
  /** Stage share of decision certainty */
  decisionCertainty: number;
  /** Stage share of confidence in the trustee */
  trusteeConfidence: number;
}

/**
 * Propensity dominates for strangers; trustworthiness dominates once the
 * relationship develops. Propensity and trustworthiness weights sum to 1.
 */
export const STAGE_WEIGHTS: Record<RelationshipStage, StageWeights> = {
  [RelationshipStage.STRANGER]: {
    propensityWeight: 0.6,
    trustworthinessWeight: 0.4,
    riskModifier: 0.3,
    decisionCertainty: 0.1,
    trusteeConfidence: 0.1,
  },
  [RelationshipStage.ACQUAINTANCE]: {
    propensityWeight: 0.4,
    trustworthinessWeight: 0.6,
    riskModifier: 0.2,
    decisionCertainty: 0.3,
    trusteeConfidence: 0.4,
  },
  [RelationshipStage.ESTABLISHED]: {
    propensityWeight: 0.2,
    trustworthinessWeight: 0.8,
    riskModifier: 0,
    decisionCertainty: 0.6,
    trusteeConfidence: 0.7,
  },
  [RelationshipStage.INTIMATE]: {
    propensityWeight: 0.1,
    trustworthinessWeight: 0.9,
    riskModifier: -0.1,
    decisionCertainty: 0.9,
    trusteeConfidence: 0.9,
  },
  [RelationshipStage.ESTRANGED]: {
    propensityWeight: 0.3,
    trustworthinessWeight: 0.7,
    riskModifier: 0.4,
    decisionCertainty: 0.5,
    trusteeConfidence: 0.8,
  },
};

export const STAGE_NAMES: Record<RelationshipStage, string> = {
  [RelationshipStage.STRANGER]: 'Stranger',
  [RelationshipStage.ACQUAINTANCE]: 'Acquaintance',
  [RelationshipStage.ESTABLISHED]: 'Established',
  [RelationshipStage.INTIMATE]: 'Intimate',
  [RelationshipStage.ESTRANGED]: 'Estranged',
};

export const STAGE_DESCRIPTIONS: Record<RelationshipStage, string> = {
  [RelationshipStage.STRANGER]: 'No significant interaction history',
  [RelationshipStage.ACQUAINTANCE]: 'Limited interactions, forming impressions',
  [RelationshipStage.ESTABLISHED]: 'Regular relationship with consistent patterns',
  [RelationshipStage.INTIMATE]: 'Deep trust and extensive history',
  [RelationshipStage.ESTRANGED]: 'Previously close but now deteriorated',
};

export const DEFAULT_STAGE = RelationshipStage.STRANGER;

export function isPositiveStage(stage: RelationshipStage): boolean {
  return (
    stage === RelationshipStage.ACQUAINTANCE ||
    stage === RelationshipStage.ESTABLISHED ||
    stage === RelationshipStage.INTIMATE
  );
}

export function isDevelopedStage(stage: RelationshipStage): boolean {
  return stage === RelationshipStage.ESTABLISHED || stage === RelationshipStage.INTIMATE;
}

/**
 * Rejected stage transition
 */
export class StageTransitionError extends Error {
  readonly from: RelationshipStage;
  readonly to: RelationshipStage;

  constructor(from: RelationshipStage, to: RelationshipStage) {
    super(`Invalid stage transition: ${from} -> ${to}`);
    this.name = 'StageTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Check whether a stage may move from one stage to another.
 * Every transition is currently allowed, including to the same stage.
 */
export function checkStageTransition(
  _from: RelationshipStage,
  _to: RelationshipStage
): StageTransitionError | null {
  return null;
}
