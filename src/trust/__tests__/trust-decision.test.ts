/**
 * Trust Decision Tests
 */

import { describe, it, expect } from 'vitest';
import { TrustDecision, computeTrustDecision } from '../trust-decision';

describe('TrustDecision', () => {
  it('clamps every field', () => {
    const decision = new TrustDecision({
      taskWillingness: 1.4,
      supportWillingness: -0.3,
      disclosureWillingness: 0.5,
      decisionCertainty: 2,
      trusteeConfidence: -1,
    });
    expect(decision.taskWillingness).toBe(1);
    expect(decision.supportWillingness).toBe(0);
    expect(decision.disclosureWillingness).toBe(0.5);
    expect(decision.decisionCertainty).toBe(1);
    expect(decision.trusteeConfidence).toBe(0);
  });

  it('provides canned decisions', () => {
    expect(TrustDecision.noTrust().toJSON()).toEqual({
      taskWillingness: 0,
      supportWillingness: 0,
      disclosureWillingness: 0,
      decisionCertainty: 0,
      trusteeConfidence: 0,
    });
    expect(TrustDecision.fullTrust().anyWilling(0.99)).toBe(true);
    expect(TrustDecision.moderate().toJSON()).toEqual({
      taskWillingness: 0.3,
      supportWillingness: 0.3,
      disclosureWillingness: 0.2,
      decisionCertainty: 0.3,
      trusteeConfidence: 0.3,
    });
  });

  it('confidence aliases decision certainty', () => {
    expect(TrustDecision.moderate().confidence).toBe(0.3);
  });

  it('uses strict thresholds', () => {
    const decision = TrustDecision.moderate();
    expect(decision.wouldDelegateTask(0.3)).toBe(false);
    expect(decision.wouldDelegateTask(0.29)).toBe(true);
    expect(decision.wouldSeekSupport(0.3)).toBe(false);
    expect(decision.wouldDisclose(0.19)).toBe(true);
  });

  it('fullyWilling needs every domain, anyWilling needs one', () => {
    const decision = TrustDecision.moderate();
    expect(decision.fullyWilling(0.25)).toBe(false);
    expect(decision.fullyWilling(0.1)).toBe(true);
    expect(decision.anyWilling(0.25)).toBe(true);
    expect(decision.anyWilling(0.3)).toBe(false);
  });
});

describe('computeTrustDecision', () => {
  const strangerInputs = {
    propensity: 0.5,
    competence: 0.3,
    benevolence: 0.3,
    integrity: 0.3,
    perceivedRisk: 0.6,
    propensityWeight: 0.6,
    trustworthinessWeight: 0.4,
    historyStrength: 0,
    stageCertainty: 0.1,
    stageConfidence: 0.1,
  };

  it('weights propensity and trustworthiness, then subtracts half the risk', () => {
    const decision = computeTrustDecision(strangerInputs);
    // 0.6 * 0.5 + 0.4 * 0.3 - 0.5 * 0.6
    expect(decision.taskWillingness).toBeCloseTo(0.12, 10);
    expect(decision.supportWillingness).toBeCloseTo(0.12, 10);
    expect(decision.disclosureWillingness).toBeCloseTo(0.12, 10);
    expect(decision.decisionCertainty).toBeCloseTo(0.07, 10);
    expect(decision.trusteeConfidence).toBeCloseTo(0.06, 10);
  });

  it('clamps the context multiplier to [0, 2]', () => {
    const decision = computeTrustDecision({ ...strangerInputs, contextMultiplier: 5 });
    expect(decision.taskWillingness).toBeCloseTo(0.42 * 2 - 0.3, 10);

    const zeroed = computeTrustDecision({ ...strangerInputs, contextMultiplier: -1 });
    expect(zeroed.taskWillingness).toBe(0);
  });

  it('clamps propensity and history', () => {
    const decision = computeTrustDecision({ ...strangerInputs, propensity: 3, historyStrength: 4 });
    expect(decision.taskWillingness).toBeCloseTo(0.6 + 0.12 - 0.3, 10);
    expect(decision.decisionCertainty).toBeCloseTo(0.3 + 0.07, 10);
    expect(decision.trusteeConfidence).toBeCloseTo(0.4 + 0.06, 10);
  });

  it('maps each domain to its factor', () => {
    const decision = computeTrustDecision({
      ...strangerInputs,
      competence: 1,
      benevolence: 0.5,
      integrity: 0,
      perceivedRisk: 0,
    });
    expect(decision.taskWillingness).toBeCloseTo(0.7, 10);
    expect(decision.supportWillingness).toBeCloseTo(0.5, 10);
    expect(decision.disclosureWillingness).toBeCloseTo(0.3, 10);
  });
});
