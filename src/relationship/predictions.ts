/**
 * Behavioral Predictions
 *
 * Yes/no answers to "would the trustor confide in / help the trustee",
 * derived from a trust decision at the stakes implied by a risk level.
 */

import { StakesLevel } from '../trust/types';
import type { Relationship } from './relationship';
import { Direction } from './types';

/** Disclosure willingness must exceed this plus the risk share */
export const CONFIDE_BASE_THRESHOLD = 0.6;

/** Support willingness must exceed this plus the risk share */
export const HELP_BASE_THRESHOLD = 0.4;

/** Share of the risk level added to each threshold */
export const RISK_THRESHOLD_FACTOR = 0.3;

/**
 * Bucket a [0, 1] risk level into stakes
 */
export function riskToStakes(riskLevel: number): StakesLevel {
  if (riskLevel < 0.25) {
    return StakesLevel.LOW;
  }
  if (riskLevel < 0.5) {
    return StakesLevel.MEDIUM;
  }
  if (riskLevel < 0.75) {
    return StakesLevel.HIGH;
  }
  return StakesLevel.CRITICAL;
}

/**
 * Would the trustor in `direction` share a confidence of the given risk
 */
export function wouldConfide(
  relationship: Relationship,
  direction: Direction,
  propensity: number,
  riskLevel: number
): boolean {
  const decision = relationship.computeTrustDecision(direction, propensity, riskToStakes(riskLevel));
  return decision.disclosureWillingness > CONFIDE_BASE_THRESHOLD + riskLevel * RISK_THRESHOLD_FACTOR;
}

/**
 * Would the trustor in `direction` help with something of the given risk
 */
export function wouldHelp(
  relationship: Relationship,
  direction: Direction,
  propensity: number,
  riskLevel: number
): boolean {
  const decision = relationship.computeTrustDecision(direction, propensity, riskToStakes(riskLevel));
  return decision.supportWillingness > HELP_BASE_THRESHOLD + riskLevel * RISK_THRESHOLD_FACTOR;
}
