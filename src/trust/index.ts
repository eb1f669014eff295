/**
 * Trust Module
 *
 * Mayer-model trust: trustworthiness factors rebuilt from antecedents,
 * perceived risk, and the decisions they combine into.
 */

// Types
export {
  LifeDomain,
  LIFE_DOMAINS,
  AntecedentType,
  AntecedentDirection,
  TrustDomain,
  ANTECEDENT_TRUST_DOMAINS,
  StakesLevel,
  STAKES_LEVELS,
  STAKES_RISK_CONTRIBUTION,
  STAKES_LEVEL_NAMES,
  VulnerabilityType,
  DEFAULT_VULNERABILITY,
  TrustPath,
  COMPETENCE_HALF_LIFE_MS,
  BENEVOLENCE_HALF_LIFE_MS,
  INTEGRITY_HALF_LIFE_MS,
  DEFAULT_TRUSTWORTHINESS_BASE,
  ANTECEDENT_SMOOTHING_ALPHA,
  NEGATIVE_ANTECEDENT_WEIGHT,
  REBUILDING_POSITIVE_WEIGHT,
  REBUILDING_WINDOW_MS,
  ANTECEDENT_DECAY_HALF_LIFE_DAYS,
  PERCEIVED_RISK_HALF_LIFE_MS,
  DEFAULT_PERCEIVED_RISK_BASE,
  BETRAYAL_RISK_INCREASE,
  SENSITIVITY_RISK_FACTOR,
  type Vulnerability,
  type TrustAntecedentData,
  type TrustworthinessData,
  type PerceivedRiskData,
} from './types';

// Antecedents
export { TrustAntecedent, type TrustAntecedentInit } from './antecedent';

// Trustworthiness
export { TrustworthinessFactors } from './trustworthiness';

// Risk
export { PerceivedRisk } from './perceived-risk';

// Decisions
export {
  TrustDecision,
  computeTrustDecision,
  RISK_WEIGHT,
  CERTAINTY_HISTORY_WEIGHT,
  CERTAINTY_STAGE_WEIGHT,
  CONFIDENCE_HISTORY_WEIGHT,
  CONFIDENCE_STAGE_WEIGHT,
  MAX_CONTEXT_MULTIPLIER,
  type TrustDecisionData,
  type TrustDecisionInputs,
} from './trust-decision';

// Context
export {
  TrustContext,
  MIN_CONTEXT_MULTIPLIER,
  MAX_SITUATIONAL_MULTIPLIER,
  type TrustContextData,
} from './trust-context';

// Standalone evaluation
export { TrustEvaluation, TrustWeights, type TrustEvaluationInit } from './trust-evaluation';
