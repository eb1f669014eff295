/**
 * Relationship Module
 *
 * Pairwise relationship state, the stage machine, structured paths and
 * behavioral predictions.
 */

// Types
export {
  Direction,
  DIRECTIONS,
  DIRECTION_NAMES,
  oppositeDirection,
  RelationshipStage,
  RELATIONSHIP_STAGES,
  BondType,
  RelationshipSchema,
  SharedPath,
  SHARED_PATHS,
  DirectionalDimension,
  DIRECTIONAL_DIMENSIONS,
  type StageChangeEvent,
  type StageChangeListener,
  type SharedDimensionsData,
  type DirectionalDimensionsData,
  type InteractionPatternData,
  type AntecedentLogData,
  type DirectionalStateData,
  type RelationshipData,
} from './types';

// Stage
export {
  STAGE_WEIGHTS,
  STAGE_NAMES,
  STAGE_DESCRIPTIONS,
  DEFAULT_STAGE,
  isPositiveStage,
  isDevelopedStage,
  checkStageTransition,
  StageTransitionError,
  type StageWeights,
} from './stage';

// Dimensions
export { SharedDimensions, SHARED_DEFAULTS } from './shared-dimensions';
export { DirectionalDimensions, DIRECTIONAL_DEFAULTS } from './directional-dimensions';
export { InteractionPattern } from './interaction-pattern';

// Antecedent log
export { AntecedentLog, MAX_ANTECEDENT_HISTORY } from './antecedent-log';

// Paths
export {
  parseRelPath,
  formatRelPath,
  describeRelPath,
  sharedPath,
  directionalPath,
  trustPath,
  isTrustFactorPath,
  STAGE_PATH,
  PERCEIVED_RISK_PATH,
  RelPathError,
  type RelPath,
  type DirectionalPath,
  type TrustFactorPath,
} from './paths';

// Relationship
export {
  Relationship,
  RelationshipError,
  InvalidEntityIdError,
  type RelationshipErrorCode,
} from './relationship';

// Predictions
export {
  riskToStakes,
  wouldConfide,
  wouldHelp,
  CONFIDE_BASE_THRESHOLD,
  HELP_BASE_THRESHOLD,
  RISK_THRESHOLD_FACTOR,
} from './predictions';
