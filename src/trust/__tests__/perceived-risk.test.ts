/**
 * Perceived Risk Tests
 */

import { describe, it, expect } from 'vitest';
import { PerceivedRisk } from '../perceived-risk';
import { STAKES_LEVELS, StakesLevel, VulnerabilityType } from '../types';
import { days } from '../../time/duration';

describe('PerceivedRisk', () => {
  it('defaults to 0.3 with a 7 day half-life', () => {
    const risk = new PerceivedRisk();
    expect(risk.effective()).toBe(0.3);
    expect(risk.value.halfLifeMs).toBe(days(7));
    expect(risk.hasBetrayalHistory).toBe(false);
  });

  describe('computeForStakes', () => {
    it('adds the stakes contribution', () => {
      const risk = new PerceivedRisk();
      expect(risk.computeForStakes(StakesLevel.LOW)).toBeCloseTo(0.3, 10);
      expect(risk.computeForStakes(StakesLevel.MEDIUM)).toBeCloseTo(0.5, 10);
      expect(risk.computeForStakes(StakesLevel.HIGH)).toBeCloseTo(0.7, 10);
      expect(risk.computeForStakes(StakesLevel.CRITICAL)).toBeCloseTo(0.9, 10);
    });

    it('never decreases as stakes rise', () => {
      for (const base of [0, 0.3, 0.8]) {
        const risk = new PerceivedRisk(base);
        const values = STAKES_LEVELS.map((stakes) => risk.computeForStakes(stakes));
        for (let i = 1; i < values.length; i++) {
          expect(values[i]).toBeGreaterThanOrEqual(values[i - 1]);
        }
      }
    });

    it('adds 0.3 once a betrayal has been recorded', () => {
      const risk = new PerceivedRisk();
      risk.markBetrayal();
      expect(risk.hasBetrayalHistory).toBe(true);
      expect(risk.computeForStakes(StakesLevel.LOW)).toBeCloseTo(0.6, 10);
      expect(risk.computeForStakes(StakesLevel.HIGH)).toBe(1);
    });

    it('keeps the betrayal latch until cleared explicitly', () => {
      const risk = new PerceivedRisk();
      risk.markBetrayal();
      risk.resetDelta();
      risk.applyDecay(days(365));
      expect(risk.hasBetrayalHistory).toBe(true);

      risk.clearBetrayalHistory();
      expect(risk.computeForStakes(StakesLevel.LOW)).toBeCloseTo(0.3, 10);
    });

    it('uses the stakes of a vulnerability', () => {
      const risk = new PerceivedRisk();
      expect(risk.computeForVulnerability({ type: VulnerabilityType.SAFETY, stakes: StakesLevel.HIGH })).toBe(
        risk.computeForStakes(StakesLevel.HIGH)
      );
    });
  });

  describe('modifiers', () => {
    it('adds the stage modifier and clamps', () => {
      const risk = new PerceivedRisk();
      expect(risk.computeWithStageModifier(StakesLevel.LOW, 0.3)).toBeCloseTo(0.6, 10);
      expect(risk.computeWithStageModifier(StakesLevel.LOW, -0.5)).toBe(0);
      expect(risk.computeWithStageModifier(StakesLevel.CRITICAL, 0.4)).toBe(1);
    });

    it('scales trustor sensitivity around 0.5', () => {
      const risk = new PerceivedRisk();
      expect(risk.computeForTrustor(StakesLevel.LOW, 1)).toBeCloseTo(0.5, 10);
      expect(risk.computeForTrustor(StakesLevel.LOW, 0)).toBeCloseTo(0.1, 10);
      expect(risk.computeForTrustor(StakesLevel.LOW, 7)).toBeCloseTo(0.5, 10);
    });

    it('combines stage and sensitivity', () => {
      const risk = new PerceivedRisk();
      expect(risk.computeSubjective(StakesLevel.MEDIUM, 0.2, 1)).toBeCloseTo(0.9, 10);
    });

    it('agrees across queries with no modifier and neutral sensitivity', () => {
      const risk = new PerceivedRisk(0.45);
      risk.markBetrayal();
      for (const stakes of STAKES_LEVELS) {
        const plain = risk.computeForStakes(stakes);
        expect(risk.computeWithStageModifier(stakes, 0)).toBe(plain);
        expect(risk.computeForTrustor(stakes, 0.5)).toBe(plain);
        expect(risk.computeSubjective(stakes, 0, 0.5)).toBe(plain);
      }
    });
  });

  describe('state', () => {
    it('decays its delta', () => {
      const risk = new PerceivedRisk();
      risk.addDelta(0.4);
      risk.applyDecay(days(7));
      expect(risk.effective()).toBeCloseTo(0.5, 10);
    });

    it('setDelta and setBase replace values', () => {
      const risk = new PerceivedRisk();
      risk.addDelta(0.4);
      risk.setDelta(0.1);
      risk.setBase(0.2);
      expect(risk.effective()).toBeCloseTo(0.3, 10);
    });

    it('round-trips through JSON', () => {
      const risk = new PerceivedRisk(0.25);
      risk.addDelta(0.1);
      risk.markBetrayal();
      const restored = PerceivedRisk.fromJSON(risk.toJSON());
      expect(restored.toJSON()).toEqual(risk.toJSON());
      expect(restored.hasBetrayalHistory).toBe(true);
    });
  });
});
