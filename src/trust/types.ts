/**
 * Trust Model Types
 *
 * Mayer's integrative model: trust follows from the trustor's propensity,
 * the trustee's perceived trustworthiness (ability, benevolence,
 * integrity) and the perceived risk of the action.
 */

import { days } from '../time/duration';
import type { DecayingValueData } from '../state/types';

/**
 * Life areas in which competence is tracked separately
 */
export enum LifeDomain {
  WORK = 'work',
  ACADEMIC = 'academic',
  SOCIAL = 'social',
  ATHLETIC = 'athletic',
  CREATIVE = 'creative',
  FINANCIAL = 'financial',
  HEALTH = 'health',
  RELATIONSHIP = 'relationship',
}

/**
 * Every life domain, in declaration order
 */
export const LIFE_DOMAINS: readonly LifeDomain[] = [
  LifeDomain.WORK,
  LifeDomain.ACADEMIC,
  LifeDomain.SOCIAL,
  LifeDomain.ATHLETIC,
  LifeDomain.CREATIVE,
  LifeDomain.FINANCIAL,
  LifeDomain.HEALTH,
  LifeDomain.RELATIONSHIP,
];

/**
 * Which trustworthiness factor an antecedent speaks to
 */
export enum AntecedentType {
  /** Competence: can they do it */
  ABILITY = 'ability',
  /** Care: do they want good things for me */
  BENEVOLENCE = 'benevolence',
  /** Principles: do they keep their word */
  INTEGRITY = 'integrity',
}

export enum AntecedentDirection {
  POSITIVE = 'positive',
  NEGATIVE = 'negative',
}

/**
 * Kinds of vulnerability a trustor can accept
 */
export enum TrustDomain {
  /** Delegating a task (driven by competence) */
  TASK = 'task',
  /** Relying on help or support (driven by benevolence) */
  SUPPORT = 'support',
  /** Sharing confidences (driven by integrity) */
  DISCLOSURE = 'disclosure',
}

/**
 * Trust domain fed by each antecedent type
 */
export const ANTECEDENT_TRUST_DOMAINS: Record<AntecedentType, TrustDomain> = {
  [AntecedentType.ABILITY]: TrustDomain.TASK,
  [AntecedentType.BENEVOLENCE]: TrustDomain.SUPPORT,
  [AntecedentType.INTEGRITY]: TrustDomain.DISCLOSURE,
};

/**
 * How much is at stake in a trust-requiring action
 */
export enum StakesLevel {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Stakes levels from least to most at risk
 */
export const STAKES_LEVELS: readonly StakesLevel[] = [
  StakesLevel.LOW,
  StakesLevel.MEDIUM,
  StakesLevel.HIGH,
  StakesLevel.CRITICAL,
];

/**
 * Additive risk contribution of each stakes level
 */
export const STAKES_RISK_CONTRIBUTION: Record<StakesLevel, number> = {
  [StakesLevel.LOW]: 0,
  [StakesLevel.MEDIUM]: 0.2,
  [StakesLevel.HIGH]: 0.4,
  [StakesLevel.CRITICAL]: 0.6,
};

export const STAKES_LEVEL_NAMES: Record<StakesLevel, string> = {
  [StakesLevel.LOW]: 'Low',
  [StakesLevel.MEDIUM]: 'Medium',
  [StakesLevel.HIGH]: 'High',
  [StakesLevel.CRITICAL]: 'Critical',
};

export enum VulnerabilityType {
  IDENTITY = 'identity',
  RESOURCES = 'resources',
  SAFETY = 'safety',
  RELATIONSHIP = 'relationship',
  REPUTATION = 'reputation',
  EMOTIONAL = 'emotional',
}

/**
 * What the trustor puts at risk, and how much
 */
export interface Vulnerability {
  type: VulnerabilityType;
  stakes: StakesLevel;
}

export const DEFAULT_VULNERABILITY: Vulnerability = {
  type: VulnerabilityType.RESOURCES,
  stakes: StakesLevel.LOW,
};

/**
 * Addressable trustworthiness factors.
 * SUPPORT_WILLINGNESS is computed per decision and has no stored value.
 */
export enum TrustPath {
  COMPETENCE = 'competence',
  BENEVOLENCE = 'benevolence',
  INTEGRITY = 'integrity',
  SUPPORT_WILLINGNESS = 'support_willingness',
}

// Trustworthiness constants

export const COMPETENCE_HALF_LIFE_MS = days(30);
export const BENEVOLENCE_HALF_LIFE_MS = days(14);
export const INTEGRITY_HALF_LIFE_MS = days(60);

/** Starting base for every trustworthiness factor */
export const DEFAULT_TRUSTWORTHINESS_BASE = 0.3;

// Antecedent replay constants

/** EMA smoothing factor; higher values let recent antecedents dominate */
export const ANTECEDENT_SMOOTHING_ALPHA = 0.4;

/** Negative antecedents weigh this much more than positive ones */
export const NEGATIVE_ANTECEDENT_WEIGHT = 2.5;

/** Weight of positive antecedents inside the rebuilding window */
export const REBUILDING_POSITIVE_WEIGHT = 0.7;

/** Window after a negative antecedent during which positives are discounted */
export const REBUILDING_WINDOW_MS = days(180);

/** Half-life of an antecedent's influence, relative to the newest one */
export const ANTECEDENT_DECAY_HALF_LIFE_DAYS = 180;

// Perceived risk constants

export const PERCEIVED_RISK_HALF_LIFE_MS = days(7);
export const DEFAULT_PERCEIVED_RISK_BASE = 0.3;

/** Added to every risk query once a betrayal has been recorded */
export const BETRAYAL_RISK_INCREASE = 0.3;

/** Scale of the trustor sensitivity term: (sensitivity - 0.5) * factor */
export const SENSITIVITY_RISK_FACTOR = 0.4;

/**
 * Serializable trust antecedent
 */
export interface TrustAntecedentData {
  /** When the antecedent occurred (ISO 8601) */
  timestamp: string;
  antecedentType: AntecedentType;
  direction: AntecedentDirection;
  magnitude: number;
  context: string;
  lifeDomain: LifeDomain | null;
}

/**
 * Serializable trustworthiness factors
 */
export interface TrustworthinessData {
  competence: Record<LifeDomain, DecayingValueData>;
  benevolence: DecayingValueData;
  integrity: DecayingValueData;
}

/**
 * Serializable perceived risk
 */
export interface PerceivedRiskData {
  risk: DecayingValueData;
  betrayalHistory: boolean;
}
