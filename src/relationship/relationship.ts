/**
 * Relationship
 *
 * Pairwise state between entities A and B. Shared dimensions and the
 * interaction pattern are common to both; trust, risk, feelings and the
 * antecedent log exist once per direction.
 */

import { DecayingValue } from '../state/decaying-value';
import { TrustAntecedent } from '../trust/antecedent';
import { PerceivedRisk } from '../trust/perceived-risk';
import { computeTrustDecision, TrustDecision } from '../trust/trust-decision';
import { TrustworthinessFactors } from '../trust/trustworthiness';
import { StakesLevel } from '../trust/types';
import { AntecedentLog } from './antecedent-log';
import { DirectionalDimensions } from './directional-dimensions';
import { InteractionPattern } from './interaction-pattern';
import { isTrustFactorPath, PERCEIVED_RISK_PATH, RelPath } from './paths';
import { wouldConfide, wouldHelp } from './predictions';
import { SharedDimensions } from './shared-dimensions';
import { checkStageTransition, DEFAULT_STAGE, STAGE_WEIGHTS } from './stage';
import {
  BondType,
  Direction,
  DirectionalStateData,
  RelationshipData,
  RelationshipSchema,
  RelationshipStage,
  SharedPath,
  StageChangeEvent,
  StageChangeListener,
} from './types';

export type RelationshipErrorCode = 'self_relationship';

/**
 * Relationship construction failure
 */
export class RelationshipError extends Error {
  readonly code: RelationshipErrorCode;
  readonly entityId: string;

  constructor(code: RelationshipErrorCode, entityId: string) {
    super(`Cannot create a relationship between "${entityId}" and itself`);
    this.name = 'RelationshipError';
    this.code = code;
    this.entityId = entityId;
  }
}

export class InvalidEntityIdError extends Error {
  readonly entityId: string;

  constructor(entityId: string) {
    super(`Invalid entity ID: "${entityId}"`);
    this.name = 'InvalidEntityIdError';
    this.entityId = entityId;
  }
}

/**
 * One direction's view of the other entity
 */
interface DirectionalState {
  antecedents: AntecedentLog;
  trustworthiness: TrustworthinessFactors;
  perceivedRisk: PerceivedRisk;
  dimensions: DirectionalDimensions;
}

function createDirectionalState(): DirectionalState {
  return {
    antecedents: new AntecedentLog(),
    trustworthiness: new TrustworthinessFactors(),
    perceivedRisk: new PerceivedRisk(),
    dimensions: new DirectionalDimensions(),
  };
}

function directionalStateFromJSON(data: DirectionalStateData): DirectionalState {
  return {
    antecedents: AntecedentLog.fromJSON(data.antecedents),
    trustworthiness: TrustworthinessFactors.fromJSON(data.trustworthiness),
    perceivedRisk: PerceivedRisk.fromJSON(data.perceivedRisk),
    dimensions: DirectionalDimensions.fromJSON(data.dimensions),
  };
}

function directionalStateToJSON(state: DirectionalState): DirectionalStateData {
  return {
    antecedents: state.antecedents.toJSON(),
    trustworthiness: state.trustworthiness.toJSON(),
    perceivedRisk: state.perceivedRisk.toJSON(),
    dimensions: state.dimensions.toJSON(),
  };
}

function validateEntityId(entityId: string): void {
  if (entityId.trim() === '') {
    throw new InvalidEntityIdError(entityId);
  }
}

export class Relationship {
  private readonly entityAId: string;
  private readonly entityBId: string;
  private currentStage: RelationshipStage = DEFAULT_STAGE;
  private currentSchema: RelationshipSchema = RelationshipSchema.PEER;
  private bondTags: BondType[] = [];
  private sharedDimensions = new SharedDimensions();
  private interactionPattern = new InteractionPattern();
  private aToB: DirectionalState = createDirectionalState();
  private bToA: DirectionalState = createDirectionalState();
  private stageListeners: StageChangeListener[] = [];

  private constructor(entityA: string, entityB: string) {
    this.entityAId = entityA;
    this.entityBId = entityB;
  }

  /**
   * Create a relationship; the first entity becomes A
   */
  static between(entityA: string, entityB: string): Relationship {
    validateEntityId(entityA);
    validateEntityId(entityB);
    if (entityA === entityB) {
      throw new RelationshipError('self_relationship', entityA);
    }
    return new Relationship(entityA, entityB);
  }

  /**
   * Key identifying the pair regardless of order. JSON-encoded so ids
   * containing any delimiter cannot collide.
   */
  static pairKey(entityA: string, entityB: string): string {
    const pair = entityA < entityB ? [entityA, entityB] : [entityB, entityA];
    return JSON.stringify(pair);
  }

  static fromJSON(data: RelationshipData): Relationship {
    const relationship = Relationship.between(data.entityA, data.entityB);
    relationship.currentStage = data.stage;
    relationship.currentSchema = data.schema;
    relationship.bondTags = [...data.bonds];
    relationship.sharedDimensions = SharedDimensions.fromJSON(data.shared);
    relationship.interactionPattern = InteractionPattern.fromJSON(data.pattern);
    relationship.aToB = directionalStateFromJSON(data.aToB);
    relationship.bToA = directionalStateFromJSON(data.bToA);
    return relationship;
  }

  // Builders

  withBond(bond: BondType): this {
    this.addBond(bond);
    return this;
  }

  withBonds(bonds: BondType[]): this {
    for (const bond of bonds) {
      this.addBond(bond);
    }
    return this;
  }

  withSchema(schema: RelationshipSchema): this {
    this.currentSchema = schema;
    return this;
  }

  withStage(stage: RelationshipStage): this {
    this.setStage(stage);
    return this;
  }

  // Identity

  get id(): string {
    return `rel_${this.entityAId}_${this.entityBId}`;
  }

  get entityA(): string {
    return this.entityAId;
  }

  get entityB(): string {
    return this.entityBId;
  }

  get pairKey(): string {
    return Relationship.pairKey(this.entityAId, this.entityBId);
  }

  involves(entityId: string): boolean {
    return entityId === this.entityAId || entityId === this.entityBId;
  }

  /**
   * The other entity of the pair, or null if entityId is not part of it
   */
  otherEntity(entityId: string): string | null {
    if (entityId === this.entityAId) {
      return this.entityBId;
    }
    if (entityId === this.entityBId) {
      return this.entityAId;
    }
    return null;
  }

  /**
   * Direction in which `trustor` trusts `trustee`, or null if they are not
   * this pair
   */
  directionFor(trustor: string, trustee: string): Direction | null {
    if (trustor === this.entityAId && trustee === this.entityBId) {
      return Direction.A_TO_B;
    }
    if (trustor === this.entityBId && trustee === this.entityAId) {
      return Direction.B_TO_A;
    }
    return null;
  }

  // Bonds and schema

  get bonds(): BondType[] {
    return [...this.bondTags];
  }

  addBond(bond: BondType): void {
    if (!this.bondTags.includes(bond)) {
      this.bondTags.push(bond);
    }
  }

  removeBond(bond: BondType): boolean {
    const index = this.bondTags.indexOf(bond);
    if (index === -1) {
      return false;
    }
    this.bondTags.splice(index, 1);
    return true;
  }

  hasBond(bond: BondType): boolean {
    return this.bondTags.includes(bond);
  }

  get schema(): RelationshipSchema {
    return this.currentSchema;
  }

  setSchema(schema: RelationshipSchema): void {
    this.currentSchema = schema;
  }

  // Stage

  get stage(): RelationshipStage {
    return this.currentStage;
  }

  /**
   * Move to a new stage. Listeners hear about actual changes only.
   */
  setStage(stage: RelationshipStage): void {
    const error = checkStageTransition(this.currentStage, stage);
    if (error) {
      throw error;
    }

    const fromStage = this.currentStage;
    this.currentStage = stage;

    if (fromStage !== stage) {
      this.notifyStageChange(fromStage, stage);
    }
  }

  /**
   * Subscribe to stage changes; returns an unsubscribe function
   */
  onStageChange(listener: StageChangeListener): () => void {
    this.stageListeners.push(listener);
    return () => {
      const index = this.stageListeners.indexOf(listener);
      if (index !== -1) {
        this.stageListeners.splice(index, 1);
      }
    };
  }

  private notifyStageChange(fromStage: RelationshipStage, toStage: RelationshipStage): void {
    const event: StageChangeEvent = {
      relationshipId: this.id,
      fromStage,
      toStage,
      timestamp: new Date(),
    };
    for (const listener of [...this.stageListeners]) {
      try {
        listener(event);
      } catch (e) {
        console.error('Stage change callback error:', e);
      }
    }
  }

  // Component access

  get shared(): SharedDimensions {
    return this.sharedDimensions;
  }

  get pattern(): InteractionPattern {
    return this.interactionPattern;
  }

  private state(direction: Direction): DirectionalState {
    return direction === Direction.A_TO_B ? this.aToB : this.bToA;
  }

  trustworthiness(direction: Direction): TrustworthinessFactors {
    return this.state(direction).trustworthiness;
  }

  perceivedRisk(direction: Direction): PerceivedRisk {
    return this.state(direction).perceivedRisk;
  }

  directional(direction: Direction): DirectionalDimensions {
    return this.state(direction).dimensions;
  }

  // Antecedents

  appendAntecedent(direction: Direction, antecedent: TrustAntecedent): void {
    this.state(direction).antecedents.append(antecedent);
  }

  antecedentHistory(direction: Direction): TrustAntecedent[] {
    return this.state(direction).antecedents.history;
  }

  lastNegativeAntecedent(direction: Direction): Date | null {
    return this.state(direction).antecedents.lastNegativeAt;
  }

  /**
   * Rebuild one direction's trustworthiness deltas from its antecedent log
   */
  recomputeTrustworthiness(direction: Direction): void {
    const state = this.state(direction);
    state.trustworthiness.recomputeFromAntecedents(state.antecedents.history);
  }

  // Path access

  /**
   * Live value behind a path; undefined for the stage and computed factors
   */
  get(path: RelPath): DecayingValue | undefined {
    switch (path.kind) {
      case 'stage':
        return undefined;
      case 'shared':
        return this.sharedDimensions.get(path.path);
      case 'directional': {
        const state = this.state(path.direction);
        if (isTrustFactorPath(path.path)) {
          return state.trustworthiness.get(path.path.trust);
        }
        if (path.path === PERCEIVED_RISK_PATH) {
          return state.perceivedRisk.value;
        }
        return state.dimensions.get(path.path);
      }
    }
  }

  getEffective(path: RelPath): number | undefined {
    return this.get(path)?.effective();
  }

  /**
   * Add to the delta behind a path; shared history never shrinks.
   * Returns false when the path has no stored value.
   */
  addDelta(path: RelPath, amount: number): boolean {
    if (path.kind === 'shared' && path.path === SharedPath.HISTORY) {
      this.sharedDimensions.addHistoryDelta(amount);
      return true;
    }
    const value = this.get(path);
    if (!value) {
      return false;
    }
    value.addDelta(amount);
    return true;
  }

  setBase(path: RelPath, base: number): boolean {
    const value = this.get(path);
    if (!value) {
      return false;
    }
    value.setBase(base);
    return true;
  }

  // Decisions

  computeTrustDecision(direction: Direction, propensity: number, stakes: StakesLevel): TrustDecision {
    return this.computeTrustDecisionWithContext(direction, propensity, stakes, 1);
  }

  /**
   * Trust decision with a situational multiplier on the weighted terms
   */
  computeTrustDecisionWithContext(
    direction: Direction,
    propensity: number,
    stakes: StakesLevel,
    contextMultiplier: number = 1
  ): TrustDecision {
    const state = this.state(direction);
    const weights = STAGE_WEIGHTS[this.currentStage];

    return computeTrustDecision({
      propensity,
      competence: state.trustworthiness.competenceEffective(),
      benevolence: state.trustworthiness.benevolenceEffective(),
      integrity: state.trustworthiness.integrityEffective(),
      perceivedRisk: state.perceivedRisk.computeWithStageModifier(stakes, weights.riskModifier),
      propensityWeight: weights.propensityWeight,
      trustworthinessWeight: weights.trustworthinessWeight,
      contextMultiplier,
      historyStrength: this.sharedDimensions.historyStrength(),
      stageCertainty: weights.decisionCertainty,
      stageConfidence: weights.trusteeConfidence,
    });
  }

  wouldAConfideInB(propensity: number, riskLevel: number): boolean {
    return wouldConfide(this, Direction.A_TO_B, propensity, riskLevel);
  }

  wouldBConfideInA(propensity: number, riskLevel: number): boolean {
    return wouldConfide(this, Direction.B_TO_A, propensity, riskLevel);
  }

  wouldAHelpB(propensity: number, riskLevel: number): boolean {
    return wouldHelp(this, Direction.A_TO_B, propensity, riskLevel);
  }

  wouldBHelpA(propensity: number, riskLevel: number): boolean {
    return wouldHelp(this, Direction.B_TO_A, propensity, riskLevel);
  }

  // Decay

  /**
   * Decay every dimension; call with increasing time
   */
  applyDecay(elapsedMs: number): void {
    this.sharedDimensions.applyDecay(elapsedMs);
    for (const state of [this.aToB, this.bToA]) {
      state.trustworthiness.applyDecay(elapsedMs);
      state.perceivedRisk.applyDecay(elapsedMs);
      state.dimensions.applyDecay(elapsedMs);
    }
  }

  toJSON(): RelationshipData {
    return {
      id: this.id,
      entityA: this.entityAId,
      entityB: this.entityBId,
      stage: this.currentStage,
      schema: this.currentSchema,
      bonds: [...this.bondTags],
      shared: this.sharedDimensions.toJSON(),
      pattern: this.interactionPattern.toJSON(),
      aToB: directionalStateToJSON(this.aToB),
      bToA: directionalStateToJSON(this.bToA),
    };
  }
}
