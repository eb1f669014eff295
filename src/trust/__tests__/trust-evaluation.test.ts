/**
 * Trust Evaluation Tests
 */

import { describe, it, expect } from 'vitest';
import { TrustEvaluation, TrustWeights } from '../trust-evaluation';
import { StakesLevel } from '../types';
import { RelationshipStage } from '../../relationship/types';

describe('TrustWeights', () => {
  it('takes propensity and trustworthiness weights from the stage', () => {
    expect(TrustWeights.fromStage(RelationshipStage.ESTABLISHED)).toEqual({
      propensityWeight: 0.2,
      trustworthinessWeight: 0.8,
      riskWeight: 0.5,
    });
    expect(TrustWeights.fromStage(RelationshipStage.STRANGER).propensityWeight).toBe(0.6);
  });
});

describe('TrustEvaluation', () => {
  it('defaults to the stranger stage with no history', () => {
    const evaluation = new TrustEvaluation({
      propensity: 0.5,
      competence: 0.5,
      benevolence: 0.5,
      integrity: 0.5,
      baseRisk: 0.3,
    });
    expect(evaluation.stage).toBe(RelationshipStage.STRANGER);
    expect(evaluation.historyStrength).toBe(0);
    expect(evaluation.contextMultiplier).toBe(1);
  });

  it('computeRisk adds stakes and stage modifier without betrayal', () => {
    const stranger = new TrustEvaluation({
      propensity: 0.5,
      competence: 0.5,
      benevolence: 0.5,
      integrity: 0.5,
      baseRisk: 0.3,
    });
    expect(stranger.computeRisk(StakesLevel.MEDIUM)).toBeCloseTo(0.8, 10);

    const intimate = new TrustEvaluation({
      propensity: 0.5,
      competence: 0.5,
      benevolence: 0.5,
      integrity: 0.5,
      baseRisk: 0.3,
      stage: RelationshipStage.INTIMATE,
    });
    expect(intimate.computeRisk(StakesLevel.LOW)).toBeCloseTo(0.2, 10);
  });

  it('computes a decision with the stage weights', () => {
    const evaluation = new TrustEvaluation({
      propensity: 0.5,
      competence: 0.6,
      benevolence: 0.7,
      integrity: 0.8,
      baseRisk: 0.2,
      stage: RelationshipStage.ESTABLISHED,
      historyStrength: 0.5,
    });
    const decision = evaluation.computeDecision(StakesLevel.LOW);
    expect(decision.taskWillingness).toBeCloseTo(0.48, 10);
    expect(decision.supportWillingness).toBeCloseTo(0.56, 10);
    expect(decision.disclosureWillingness).toBeCloseTo(0.64, 10);
    expect(decision.decisionCertainty).toBeCloseTo(0.57, 10);
    expect(decision.trusteeConfidence).toBeCloseTo(0.62, 10);
  });

  it('clamps its inputs', () => {
    const evaluation = new TrustEvaluation({
      propensity: 2,
      competence: -1,
      benevolence: 0.5,
      integrity: 0.5,
      baseRisk: 5,
      contextMultiplier: 9,
    });
    expect(evaluation.propensity).toBe(1);
    expect(evaluation.competence).toBe(0);
    expect(evaluation.baseRisk).toBe(1);
    expect(evaluation.contextMultiplier).toBe(2);
  });
});
