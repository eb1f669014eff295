/**
 * Trustworthiness Tests
 *
 * Covers path access and the antecedent replay: asymmetric weights, the
 * rebuilding window, age decay and per-domain competence.
 */

import { describe, it, expect } from 'vitest';
import { TrustAntecedent } from '../antecedent';
import { TrustworthinessFactors } from '../trustworthiness';
import { AntecedentType, LIFE_DOMAINS, LifeDomain, TrustPath } from '../types';
import { days } from '../../time/duration';

const t0 = new Date('2024-01-01T00:00:00.000Z');

function after(ms: number): Date {
  return new Date(t0.getTime() + ms);
}

describe('TrustworthinessFactors', () => {
  describe('construction', () => {
    it('starts every factor at 0.3', () => {
      const factors = new TrustworthinessFactors();
      for (const domain of LIFE_DOMAINS) {
        expect(factors.competenceIn(domain)).toBe(0.3);
      }
      expect(factors.competenceEffective()).toBeCloseTo(0.3, 10);
      expect(factors.benevolenceEffective()).toBe(0.3);
      expect(factors.integrityEffective()).toBe(0.3);
      expect(factors.overall()).toBeCloseTo(0.3, 10);
    });

    it('uses the documented half-lives', () => {
      const factors = new TrustworthinessFactors();
      expect(factors.competenceValue(LifeDomain.HEALTH).halfLifeMs).toBe(days(30));
      expect(factors.benevolenceValue.halfLifeMs).toBe(days(14));
      expect(factors.integrityValue.halfLifeMs).toBe(days(60));
    });

    it('withBases sets every competence domain', () => {
      const factors = TrustworthinessFactors.withBases(0.6, 0.5, 0.4);
      expect(factors.competenceIn(LifeDomain.ATHLETIC)).toBe(0.6);
      expect(factors.benevolenceEffective()).toBe(0.5);
      expect(factors.integrityEffective()).toBe(0.4);
    });
  });

  describe('paths', () => {
    it('competence resolves to the work domain', () => {
      const factors = new TrustworthinessFactors();
      expect(factors.get(TrustPath.COMPETENCE)).toBe(factors.competenceValue(LifeDomain.WORK));
      expect(factors.get(TrustPath.BENEVOLENCE)).toBe(factors.benevolenceValue);
      expect(factors.get(TrustPath.INTEGRITY)).toBe(factors.integrityValue);
    });

    it('support willingness has no stored value', () => {
      const factors = new TrustworthinessFactors();
      expect(factors.get(TrustPath.SUPPORT_WILLINGNESS)).toBeUndefined();
      expect(factors.addDelta(TrustPath.SUPPORT_WILLINGNESS, 0.1)).toBe(false);
    });

    it('addDelta through a path changes only that value', () => {
      const factors = new TrustworthinessFactors();
      expect(factors.addDelta(TrustPath.COMPETENCE, 0.2)).toBe(true);
      expect(factors.competenceIn(LifeDomain.WORK)).toBeCloseTo(0.5, 10);
      expect(factors.competenceIn(LifeDomain.SOCIAL)).toBe(0.3);
    });

    it('addCompetenceDelta touches every domain', () => {
      const factors = new TrustworthinessFactors();
      factors.addCompetenceDelta(0.1);
      for (const domain of LIFE_DOMAINS) {
        expect(factors.competenceIn(domain)).toBeCloseTo(0.4, 10);
      }
    });
  });

  describe('recomputeFromAntecedents', () => {
    it('weighs a negative 2.5 times an equal positive', () => {
      const negative = new TrustworthinessFactors();
      negative.recomputeFromAntecedents([
        TrustAntecedent.negative(t0, AntecedentType.INTEGRITY, 0.2, 'broke_promise'),
      ]);

      const positive = new TrustworthinessFactors();
      positive.recomputeFromAntecedents([
        TrustAntecedent.positive(t0, AntecedentType.INTEGRITY, 0.2, 'kept_promise'),
      ]);

      const negativeDelta = negative.integrityValue.delta;
      const positiveDelta = positive.integrityValue.delta;
      expect(negativeDelta).toBeCloseTo(-0.2, 10);
      expect(positiveDelta).toBeCloseTo(0.08, 10);
      expect(Math.abs(negativeDelta) / positiveDelta).toBeCloseTo(2.5, 10);
    });

    it('discounts positives to 0.7 inside the rebuilding window', () => {
      const factors = new TrustworthinessFactors();
      factors.recomputeFromAntecedents([
        TrustAntecedent.negative(t0, AntecedentType.INTEGRITY, 0.2, 'broke_promise'),
        TrustAntecedent.positive(after(days(1)), AntecedentType.BENEVOLENCE, 0.2, 'support'),
      ]);
      expect(factors.benevolenceValue.delta).toBeCloseTo(0.2 * 0.7 * 0.4, 10);
      expect(factors.benevolenceValue.delta / 0.08).toBeCloseTo(0.7, 10);
    });

    it('treats the rebuilding window as inclusive', () => {
      const factors = new TrustworthinessFactors();
      factors.recomputeFromAntecedents([
        TrustAntecedent.negative(t0, AntecedentType.INTEGRITY, 0.2, 'broke_promise'),
        TrustAntecedent.positive(after(days(180)), AntecedentType.BENEVOLENCE, 0.2, 'support'),
      ]);
      expect(factors.benevolenceValue.delta).toBeCloseTo(0.056, 10);
    });

    it('restores full weight once the window has passed', () => {
      const factors = new TrustworthinessFactors();
      factors.recomputeFromAntecedents([
        TrustAntecedent.negative(t0, AntecedentType.INTEGRITY, 0.2, 'broke_promise'),
        TrustAntecedent.positive(after(days(181)), AntecedentType.BENEVOLENCE, 0.2, 'support'),
      ]);
      expect(factors.benevolenceValue.delta).toBeCloseTo(0.08, 10);
    });

    it('halves the influence of an antecedent 180 days older than the newest', () => {
      const factors = new TrustworthinessFactors();
      factors.recomputeFromAntecedents([
        TrustAntecedent.positive(after(days(180)), AntecedentType.BENEVOLENCE, 0.5, 'support'),
        TrustAntecedent.positive(t0, AntecedentType.BENEVOLENCE, 0.5, 'support'),
      ]);
      // old: 0.5 * 0.5 * 0.4 = 0.1; new: 0.6 * 0.1 + 0.4 * 0.5 = 0.26
      expect(factors.benevolenceValue.delta).toBeCloseTo(0.26, 10);
    });

    it('keeps effective values within [0, 1]', () => {
      const factors = new TrustworthinessFactors();
      const betrayals = [1, 2, 3, 4, 5].map((n) =>
        TrustAntecedent.negative(after(n), AntecedentType.INTEGRITY, 1, 'betrayed_confidence')
      );
      factors.recomputeFromAntecedents(betrayals);
      expect(factors.integrityEffective()).toBe(0);
      expect(factors.integrityValue.delta).toBeCloseTo(-0.3, 10);
    });

    it('applies domain-less ability antecedents to every domain', () => {
      const factors = new TrustworthinessFactors();
      factors.recomputeFromAntecedents([
        TrustAntecedent.positive(t0, AntecedentType.ABILITY, 0.5, 'task_completed_well'),
      ]);
      for (const domain of LIFE_DOMAINS) {
        expect(factors.competenceIn(domain)).toBeCloseTo(0.5, 10);
      }
    });

    it('leaves competence domains without ability antecedents untouched', () => {
      const factors = new TrustworthinessFactors();
      factors.addCompetenceDeltaIn(LifeDomain.SOCIAL, 0.1);
      factors.recomputeFromAntecedents([
        TrustAntecedent.positive(t0, AntecedentType.ABILITY, 0.5, 'task_completed_well').withLifeDomain(
          LifeDomain.WORK
        ),
      ]);
      expect(factors.competenceIn(LifeDomain.WORK)).toBeCloseTo(0.5, 10);
      expect(factors.competenceIn(LifeDomain.SOCIAL)).toBeCloseTo(0.4, 10);
      expect(factors.competenceIn(LifeDomain.ACADEMIC)).toBe(0.3);
    });

    it('re-anchors benevolence and integrity on every pass', () => {
      const factors = new TrustworthinessFactors();
      factors.addBenevolenceDelta(0.2);
      factors.addIntegrityDelta(-0.1);
      factors.recomputeFromAntecedents([
        TrustAntecedent.positive(t0, AntecedentType.ABILITY, 0.5, 'task_completed_well'),
      ]);
      expect(factors.benevolenceValue.delta).toBe(0);
      expect(factors.integrityValue.delta).toBe(0);
    });

    it('ignores antecedents naming an untracked life domain', () => {
      const factors = new TrustworthinessFactors();
      const stray = TrustAntecedent.fromJSON(
        JSON.parse(
          '{"timestamp":"2024-01-01T00:00:00.000Z","antecedentType":"ability","direction":"positive",' +
            '"magnitude":0.5,"context":"x","lifeDomain":"underwater"}'
        )
      );
      factors.recomputeFromAntecedents([stray]);
      for (const domain of LIFE_DOMAINS) {
        expect(factors.competenceValue(domain).delta).toBe(0);
      }
    });

    it('resets every delta for an empty history', () => {
      const factors = new TrustworthinessFactors();
      factors.addCompetenceDelta(0.2);
      factors.addBenevolenceDelta(0.2);
      factors.addIntegrityDelta(0.2);
      factors.recomputeFromAntecedents([]);
      expect(factors.competenceEffective()).toBeCloseTo(0.3, 10);
      expect(factors.benevolenceValue.delta).toBe(0);
      expect(factors.integrityValue.delta).toBe(0);
    });

    it('does not depend on input order', () => {
      const history = [
        TrustAntecedent.positive(after(days(10)), AntecedentType.BENEVOLENCE, 0.4, 'support'),
        TrustAntecedent.negative(t0, AntecedentType.BENEVOLENCE, 0.3, 'conflict'),
        TrustAntecedent.positive(after(days(20)), AntecedentType.BENEVOLENCE, 0.2, 'support'),
      ];
      const forward = new TrustworthinessFactors();
      forward.recomputeFromAntecedents(history);
      const backward = new TrustworthinessFactors();
      backward.recomputeFromAntecedents([...history].reverse());
      expect(backward.benevolenceValue.delta).toBe(forward.benevolenceValue.delta);
    });
  });

  describe('decay and serialization', () => {
    it('decays each factor by its own half-life', () => {
      const factors = new TrustworthinessFactors();
      factors.addBenevolenceDelta(0.2);
      factors.addIntegrityDelta(0.2);
      factors.applyDecay(days(14));
      expect(factors.benevolenceValue.delta).toBeCloseTo(0.1, 10);
      expect(factors.integrityValue.delta).toBeCloseTo(0.2 * Math.pow(0.5, 14 / 60), 10);
    });

    it('round-trips through JSON', () => {
      const factors = TrustworthinessFactors.withBases(0.4, 0.5, 0.6);
      factors.addCompetenceDeltaIn(LifeDomain.CREATIVE, 0.15);
      factors.addIntegrityDelta(-0.05);

      const restored = TrustworthinessFactors.fromJSON(factors.toJSON());
      expect(restored.toJSON()).toEqual(factors.toJSON());
      expect(restored.competenceIn(LifeDomain.CREATIVE)).toBeCloseTo(0.55, 10);
    });
  });
});
