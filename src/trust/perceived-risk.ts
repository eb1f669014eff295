/**
 * Perceived Risk
 *
 * How risky the trustor believes it is to be vulnerable to the trustee.
 * A decaying base risk plus a one-way betrayal latch that raises every
 * query once set.
 */

import { DecayingValue, clamp01 } from '../state/decaying-value';
import {
  BETRAYAL_RISK_INCREASE,
  DEFAULT_PERCEIVED_RISK_BASE,
  PERCEIVED_RISK_HALF_LIFE_MS,
  PerceivedRiskData,
  SENSITIVITY_RISK_FACTOR,
  StakesLevel,
  STAKES_RISK_CONTRIBUTION,
  Vulnerability,
} from './types';

/**
 * Risk term contributed by a trustor's risk sensitivity; zero at 0.5
 */
function sensitivityTerm(riskSensitivity: number): number {
  return (clamp01(riskSensitivity) - 0.5) * SENSITIVITY_RISK_FACTOR;
}

export class PerceivedRisk {
  private risk: DecayingValue;
  private betrayalHistory: boolean;

  constructor(base: number = DEFAULT_PERCEIVED_RISK_BASE) {
    this.risk = new DecayingValue(base).withHalfLife(PERCEIVED_RISK_HALF_LIFE_MS);
    this.betrayalHistory = false;
  }

  static fromJSON(data: PerceivedRiskData): PerceivedRisk {
    const perceived = new PerceivedRisk();
    perceived.risk = DecayingValue.fromJSON(data.risk);
    perceived.betrayalHistory = data.betrayalHistory;
    return perceived;
  }

  /**
   * The underlying decaying value
   */
  get value(): DecayingValue {
    return this.risk;
  }

  get hasBetrayalHistory(): boolean {
    return this.betrayalHistory;
  }

  effective(): number {
    return this.risk.effective();
  }

  /**
   * Latch the betrayal flag; it stays set for the life of the relationship
   */
  markBetrayal(): void {
    this.betrayalHistory = true;
  }

  /** Test helper */
  clearBetrayalHistory(): void {
    this.betrayalHistory = false;
  }

  computeForStakes(stakes: StakesLevel): number {
    const betrayal = this.betrayalHistory ? BETRAYAL_RISK_INCREASE : 0;
    return clamp01(this.risk.effective() + STAKES_RISK_CONTRIBUTION[stakes] + betrayal);
  }

  computeForVulnerability(vulnerability: Vulnerability): number {
    return this.computeForStakes(vulnerability.stakes);
  }

  computeWithStageModifier(stakes: StakesLevel, stageModifier: number): number {
    return clamp01(this.computeForStakes(stakes) + stageModifier);
  }

  computeForTrustor(stakes: StakesLevel, riskSensitivity: number): number {
    return clamp01(this.computeForStakes(stakes) + sensitivityTerm(riskSensitivity));
  }

  /**
   * Stage modifier and trustor sensitivity together
   */
  computeSubjective(stakes: StakesLevel, stageModifier: number, riskSensitivity: number): number {
    return clamp01(this.computeWithStageModifier(stakes, stageModifier) + sensitivityTerm(riskSensitivity));
  }

  addDelta(amount: number): void {
    this.risk.addDelta(amount);
  }

  setDelta(delta: number): void {
    this.risk.setDelta(delta);
  }

  setBase(base: number): void {
    this.risk.setBase(base);
  }

  applyDecay(elapsedMs: number): void {
    this.risk.applyDecay(elapsedMs);
  }

  resetDelta(): void {
    this.risk.resetDelta();
  }

  toJSON(): PerceivedRiskData {
    return {
      risk: this.risk.toJSON(),
      betrayalHistory: this.betrayalHistory,
    };
  }
}
