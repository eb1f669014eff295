/**
 * Relationship Types
 */

import type { DecayingValueData } from '../state/types';
import type { PerceivedRiskData, TrustAntecedentData, TrustworthinessData } from '../trust/types';

/**
 * Which way trust flows: A_TO_B is A's trust toward B
 */
export enum Direction {
  A_TO_B = 'a_to_b',
  B_TO_A = 'b_to_a',
}

export const DIRECTIONS: readonly Direction[] = [Direction.A_TO_B, Direction.B_TO_A];

export const DIRECTION_NAMES: Record<Direction, string> = {
  [Direction.A_TO_B]: 'A to B',
  [Direction.B_TO_A]: 'B to A',
};

export function oppositeDirection(direction: Direction): Direction {
  return direction === Direction.A_TO_B ? Direction.B_TO_A : Direction.A_TO_B;
}

/**
 * Developmental stage of a relationship
 */
export enum RelationshipStage {
  STRANGER = 'stranger',
  ACQUAINTANCE = 'acquaintance',
  ESTABLISHED = 'established',
  INTIMATE = 'intimate',
  ESTRANGED = 'estranged',
}

export const RELATIONSHIP_STAGES: readonly RelationshipStage[] = [
  RelationshipStage.STRANGER,
  RelationshipStage.ACQUAINTANCE,
  RelationshipStage.ESTABLISHED,
  RelationshipStage.INTIMATE,
  RelationshipStage.ESTRANGED,
];

/**
 * Tags describing what kind of bond the pair has
 */
export enum BondType {
  PEER = 'peer',
  MENTOR = 'mentor',
  MENTEE = 'mentee',
  FAMILY = 'family',
  FRIEND = 'friend',
  COLLEAGUE = 'colleague',
  ROMANTIC = 'romantic',
  RIVAL = 'rival',
  AUTHORITY = 'authority',
  SUBORDINATE = 'subordinate',
  PARENT = 'parent',
  CHILD = 'child',
  SIBLING = 'sibling',
}

/**
 * Overall template the relationship follows
 */
export enum RelationshipSchema {
  PEER = 'peer',
  MENTOR = 'mentor',
  SUBORDINATE = 'subordinate',
  ROMANTIC = 'romantic',
  FAMILY = 'family',
  NUCLEAR = 'nuclear',
  EXTENDED = 'extended',
  RIVAL = 'rival',
}

export enum SharedPath {
  AFFINITY = 'affinity',
  RESPECT = 'respect',
  TENSION = 'tension',
  INTIMACY = 'intimacy',
  HISTORY = 'history',
}

export const SHARED_PATHS: readonly SharedPath[] = [
  SharedPath.AFFINITY,
  SharedPath.RESPECT,
  SharedPath.TENSION,
  SharedPath.INTIMACY,
  SharedPath.HISTORY,
];

export enum DirectionalDimension {
  WARMTH = 'warmth',
  RESENTMENT = 'resentment',
  DEPENDENCE = 'dependence',
  ATTRACTION = 'attraction',
  ATTACHMENT = 'attachment',
  JEALOUSY = 'jealousy',
  FEAR = 'fear',
  OBLIGATION = 'obligation',
}

export const DIRECTIONAL_DIMENSIONS: readonly DirectionalDimension[] = [
  DirectionalDimension.WARMTH,
  DirectionalDimension.RESENTMENT,
  DirectionalDimension.DEPENDENCE,
  DirectionalDimension.ATTRACTION,
  DirectionalDimension.ATTACHMENT,
  DirectionalDimension.JEALOUSY,
  DirectionalDimension.FEAR,
  DirectionalDimension.OBLIGATION,
];

/**
 * Emitted whenever a relationship's stage changes
 */
export interface StageChangeEvent {
  relationshipId: string;
  fromStage: RelationshipStage;
  toStage: RelationshipStage;
  timestamp: Date;
}

export type StageChangeListener = (event: StageChangeEvent) => void;

export type SharedDimensionsData = Record<SharedPath, DecayingValueData>;

export type DirectionalDimensionsData = Record<DirectionalDimension, DecayingValueData>;

export interface InteractionPatternData {
  frequency: number;
  consistency: number;
  /** ISO 8601, or null if the pair never interacted */
  lastInteraction: string | null;
}

export interface AntecedentLogData {
  entries: TrustAntecedentData[];
  /** ISO 8601 timestamp of the latest negative antecedent */
  lastNegative: string | null;
}

/**
 * Per-direction state: A's view of B, or B's view of A
 */
export interface DirectionalStateData {
  antecedents: AntecedentLogData;
  trustworthiness: TrustworthinessData;
  perceivedRisk: PerceivedRiskData;
  dimensions: DirectionalDimensionsData;
}

/**
 * Serialized relationship
 */
export interface RelationshipData {
  id: string;
  entityA: string;
  entityB: string;
  stage: RelationshipStage;
  schema: RelationshipSchema;
  bonds: BondType[];
  shared: SharedDimensionsData;
  pattern: InteractionPatternData;
  aToB: DirectionalStateData;
  bToA: DirectionalStateData;
}
