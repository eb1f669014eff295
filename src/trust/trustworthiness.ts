/**
 * Trustworthiness Factors
 *
 * The trustor's perception of a trustee's ability (tracked per life
 * domain), benevolence and integrity. Deltas are rebuilt from the
 * antecedent log by recomputeFromAntecedents; bases move only through
 * setBase or withBases.
 */

import { DecayingValue, clamp01 } from '../state/decaying-value';
import { MS_PER_DAY } from '../time/duration';
import { TrustAntecedent } from './antecedent';
import {
  AntecedentType,
  ANTECEDENT_DECAY_HALF_LIFE_DAYS,
  ANTECEDENT_SMOOTHING_ALPHA,
  BENEVOLENCE_HALF_LIFE_MS,
  COMPETENCE_HALF_LIFE_MS,
  DEFAULT_TRUSTWORTHINESS_BASE,
  INTEGRITY_HALF_LIFE_MS,
  LIFE_DOMAINS,
  LifeDomain,
  NEGATIVE_ANTECEDENT_WEIGHT,
  REBUILDING_POSITIVE_WEIGHT,
  REBUILDING_WINDOW_MS,
  TrustPath,
  TrustworthinessData,
} from './types';

function competenceValue(base: number): DecayingValue {
  return new DecayingValue(base).withHalfLife(COMPETENCE_HALF_LIFE_MS);
}

function buildCompetence(make: (domain: LifeDomain) => DecayingValue): Record<LifeDomain, DecayingValue> {
  return {
    [LifeDomain.WORK]: make(LifeDomain.WORK),
    [LifeDomain.ACADEMIC]: make(LifeDomain.ACADEMIC),
    [LifeDomain.SOCIAL]: make(LifeDomain.SOCIAL),
    [LifeDomain.ATHLETIC]: make(LifeDomain.ATHLETIC),
    [LifeDomain.CREATIVE]: make(LifeDomain.CREATIVE),
    [LifeDomain.FINANCIAL]: make(LifeDomain.FINANCIAL),
    [LifeDomain.HEALTH]: make(LifeDomain.HEALTH),
    [LifeDomain.RELATIONSHIP]: make(LifeDomain.RELATIONSHIP),
  };
}

function isTrackedDomain(domain: LifeDomain): boolean {
  return LIFE_DOMAINS.includes(domain);
}

function smooth(previous: number, signed: number): number {
  return (1 - ANTECEDENT_SMOOTHING_ALPHA) * previous + ANTECEDENT_SMOOTHING_ALPHA * signed;
}

/**
 * Move a value's delta so that base + delta lands on clamp(base + ema)
 */
function reanchor(value: DecayingValue, ema: number): void {
  const target = clamp01(value.base + ema);
  value.setDelta(target - value.base);
}

export class TrustworthinessFactors {
  private competence: Record<LifeDomain, DecayingValue>;
  private benevolence: DecayingValue;
  private integrity: DecayingValue;

  constructor() {
    this.competence = buildCompetence(() => competenceValue(DEFAULT_TRUSTWORTHINESS_BASE));
    this.benevolence = new DecayingValue(DEFAULT_TRUSTWORTHINESS_BASE).withHalfLife(BENEVOLENCE_HALF_LIFE_MS);
    this.integrity = new DecayingValue(DEFAULT_TRUSTWORTHINESS_BASE).withHalfLife(INTEGRITY_HALF_LIFE_MS);
  }

  /**
   * Factors with custom bases; competence base applies to every domain
   */
  static withBases(competence: number, benevolence: number, integrity: number): TrustworthinessFactors {
    const factors = new TrustworthinessFactors();
    for (const domain of LIFE_DOMAINS) {
      factors.competence[domain].setBase(competence);
    }
    factors.benevolence.setBase(benevolence);
    factors.integrity.setBase(integrity);
    return factors;
  }

  static fromJSON(data: TrustworthinessData): TrustworthinessFactors {
    const factors = new TrustworthinessFactors();
    factors.competence = buildCompetence((domain) => {
      const stored = data.competence[domain];
      return stored ? DecayingValue.fromJSON(stored) : competenceValue(DEFAULT_TRUSTWORTHINESS_BASE);
    });
    factors.benevolence = DecayingValue.fromJSON(data.benevolence);
    factors.integrity = DecayingValue.fromJSON(data.integrity);
    return factors;
  }

  /**
   * Live competence value for one domain
   */
  competenceValue(domain: LifeDomain): DecayingValue {
    return this.competence[domain];
  }

  get benevolenceValue(): DecayingValue {
    return this.benevolence;
  }

  get integrityValue(): DecayingValue {
    return this.integrity;
  }

  competenceIn(domain: LifeDomain): number {
    return this.competence[domain].effective();
  }

  /**
   * Mean competence across all life domains
   */
  competenceEffective(): number {
    let total = 0;
    for (const domain of LIFE_DOMAINS) {
      total += this.competence[domain].effective();
    }
    return total / LIFE_DOMAINS.length;
  }

  benevolenceEffective(): number {
    return this.benevolence.effective();
  }

  integrityEffective(): number {
    return this.integrity.effective();
  }

  /**
   * Mean of competence, benevolence and integrity
   */
  overall(): number {
    return (this.competenceEffective() + this.benevolenceEffective() + this.integrityEffective()) / 3;
  }

  /**
   * Stored value behind a path. Competence resolves to the work domain;
   * support willingness is computed per decision and has none.
   */
  get(path: TrustPath): DecayingValue | undefined {
    switch (path) {
      case TrustPath.COMPETENCE:
        return this.competence[LifeDomain.WORK];
      case TrustPath.BENEVOLENCE:
        return this.benevolence;
      case TrustPath.INTEGRITY:
        return this.integrity;
      case TrustPath.SUPPORT_WILLINGNESS:
        return undefined;
    }
  }

  /**
   * Add to the delta behind a path; false when the path has no stored value
   */
  addDelta(path: TrustPath, amount: number): boolean {
    const value = this.get(path);
    if (!value) {
      return false;
    }
    value.addDelta(amount);
    return true;
  }

  addCompetenceDeltaIn(domain: LifeDomain, amount: number): void {
    this.competence[domain].addDelta(amount);
  }

  /**
   * Add the same delta to every competence domain
   */
  addCompetenceDelta(amount: number): void {
    for (const domain of LIFE_DOMAINS) {
      this.competence[domain].addDelta(amount);
    }
  }

  addBenevolenceDelta(amount: number): void {
    this.benevolence.addDelta(amount);
  }

  addIntegrityDelta(amount: number): void {
    this.integrity.addDelta(amount);
  }

  /**
   * Rebuild deltas from an antecedent history.
   *
   * Entries are replayed oldest first. Each contributes its magnitude,
   * signed by direction, scaled by an age decay relative to the newest
   * entry and by an asymmetry weight: negatives count 2.5x, positives
   * inside the rebuilding window after a negative count 0.7x. The signed
   * values feed an exponential moving average per target.
   */
  recomputeFromAntecedents(history: readonly TrustAntecedent[]): void {
    if (history.length === 0) {
      this.resetDeltas();
      return;
    }

    const sorted = [...history].sort((a, b) => a.time - b.time);
    const reference = sorted[sorted.length - 1].time;

    const competenceEma = new Map<LifeDomain, number>();
    let benevolenceEma = 0;
    let integrityEma = 0;
    let lastNegative: number | null = null;

    for (const antecedent of sorted) {
      const time = antecedent.time;
      const ageDays = (reference - time) / MS_PER_DAY;
      const decay = Math.exp((-ageDays * Math.LN2) / ANTECEDENT_DECAY_HALF_LIFE_DAYS);

      let weight: number;
      if (antecedent.isNegative) {
        weight = NEGATIVE_ANTECEDENT_WEIGHT;
        lastNegative = time;
      } else if (lastNegative !== null && time - lastNegative <= REBUILDING_WINDOW_MS) {
        weight = REBUILDING_POSITIVE_WEIGHT;
      } else {
        weight = 1;
      }

      const sign = antecedent.isNegative ? -1 : 1;
      const signed = sign * antecedent.magnitude * weight * decay;

      switch (antecedent.antecedentType) {
        case AntecedentType.ABILITY: {
          const domain = antecedent.lifeDomain;
          if (domain === null) {
            for (const each of LIFE_DOMAINS) {
              competenceEma.set(each, smooth(competenceEma.get(each) ?? 0, signed));
            }
          } else if (isTrackedDomain(domain)) {
            competenceEma.set(domain, smooth(competenceEma.get(domain) ?? 0, signed));
          }
          break;
        }
        case AntecedentType.BENEVOLENCE:
          benevolenceEma = smooth(benevolenceEma, signed);
          break;
        case AntecedentType.INTEGRITY:
          integrityEma = smooth(integrityEma, signed);
          break;
      }
    }

    for (const [domain, ema] of competenceEma) {
      reanchor(this.competence[domain], ema);
    }
    reanchor(this.benevolence, benevolenceEma);
    reanchor(this.integrity, integrityEma);
  }

  applyDecay(elapsedMs: number): void {
    for (const domain of LIFE_DOMAINS) {
      this.competence[domain].applyDecay(elapsedMs);
    }
    this.benevolence.applyDecay(elapsedMs);
    this.integrity.applyDecay(elapsedMs);
  }

  resetDeltas(): void {
    for (const domain of LIFE_DOMAINS) {
      this.competence[domain].resetDelta();
    }
    this.benevolence.resetDelta();
    this.integrity.resetDelta();
  }

  toJSON(): TrustworthinessData {
    return {
      competence: {
        [LifeDomain.WORK]: this.competence[LifeDomain.WORK].toJSON(),
        [LifeDomain.ACADEMIC]: this.competence[LifeDomain.ACADEMIC].toJSON(),
        [LifeDomain.SOCIAL]: this.competence[LifeDomain.SOCIAL].toJSON(),
        [LifeDomain.ATHLETIC]: this.competence[LifeDomain.ATHLETIC].toJSON(),
        [LifeDomain.CREATIVE]: this.competence[LifeDomain.CREATIVE].toJSON(),
        [LifeDomain.FINANCIAL]: this.competence[LifeDomain.FINANCIAL].toJSON(),
        [LifeDomain.HEALTH]: this.competence[LifeDomain.HEALTH].toJSON(),
        [LifeDomain.RELATIONSHIP]: this.competence[LifeDomain.RELATIONSHIP].toJSON(),
      },
      benevolence: this.benevolence.toJSON(),
      integrity: this.integrity.toJSON(),
    };
  }
}
