/**
 * Snapshot Validation
 *
 * Type guards for relationship snapshots read back from disk. A snapshot
 * passing `isRelationshipData` can be handed to `Relationship.fromJSON`.
 */

import type { DecayingValueData } from '../state/types';
import {
  BondType,
  DIRECTIONAL_DIMENSIONS,
  RELATIONSHIP_STAGES,
  RelationshipSchema,
  SHARED_PATHS,
} from '../relationship/types';
import type { AntecedentLogData, DirectionalStateData, RelationshipData } from '../relationship/types';
import { AntecedentDirection, AntecedentType, LIFE_DOMAINS } from '../trust/types';
import type { TrustAntecedentData } from '../trust/types';

const BOND_TYPES: readonly string[] = Object.values(BondType);
const SCHEMAS: readonly string[] = Object.values(RelationshipSchema);
const ANTECEDENT_TYPES: readonly string[] = Object.values(AntecedentType);
const ANTECEDENT_DIRECTIONS: readonly string[] = Object.values(AntecedentDirection);
const STAGES: readonly string[] = RELATIONSHIP_STAGES;
const DOMAINS: readonly string[] = LIFE_DOMAINS;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isTimestamp(value: unknown): value is string {
  return typeof value === 'string' && !Number.isNaN(Date.parse(value));
}

function isEntityId(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function isMember(members: readonly string[], value: unknown): boolean {
  return typeof value === 'string' && members.includes(value);
}

export function isDecayingValueData(value: unknown): value is DecayingValueData {
  return (
    isRecord(value) &&
    isFiniteNumber(value.base) &&
    isFiniteNumber(value.delta) &&
    isFiniteNumber(value.chronicDelta) &&
    isFiniteNumber(value.lowerBound) &&
    isFiniteNumber(value.upperBound) &&
    (value.halfLifeMs === null || isFiniteNumber(value.halfLifeMs))
  );
}

/**
 * A table of decaying values; missing keys fall back to defaults on restore
 */
function isValueTable(value: unknown, keys: readonly string[]): boolean {
  if (!isRecord(value)) {
    return false;
  }
  return keys.every((key) => value[key] === undefined || isDecayingValueData(value[key]));
}

function isAntecedentData(value: unknown): value is TrustAntecedentData {
  if (!isRecord(value)) {
    return false;
  }
  const lifeDomain = value.lifeDomain;
  return (
    isTimestamp(value.timestamp) &&
    isMember(ANTECEDENT_TYPES, value.antecedentType) &&
    isMember(ANTECEDENT_DIRECTIONS, value.direction) &&
    isFiniteNumber(value.magnitude) &&
    typeof value.context === 'string' &&
    (lifeDomain === null || lifeDomain === undefined || isMember(DOMAINS, lifeDomain))
  );
}

function isAntecedentLogData(value: unknown): value is AntecedentLogData {
  return (
    isRecord(value) &&
    Array.isArray(value.entries) &&
    value.entries.every(isAntecedentData) &&
    (value.lastNegative === null || isTimestamp(value.lastNegative))
  );
}

function isDirectionalStateData(value: unknown): value is DirectionalStateData {
  if (!isRecord(value)) {
    return false;
  }
  const trustworthiness = value.trustworthiness;
  const perceivedRisk = value.perceivedRisk;
  return (
    isAntecedentLogData(value.antecedents) &&
    isRecord(trustworthiness) &&
    isValueTable(trustworthiness.competence, DOMAINS) &&
    isDecayingValueData(trustworthiness.benevolence) &&
    isDecayingValueData(trustworthiness.integrity) &&
    isRecord(perceivedRisk) &&
    isDecayingValueData(perceivedRisk.risk) &&
    typeof perceivedRisk.betrayalHistory === 'boolean' &&
    isValueTable(value.dimensions, DIRECTIONAL_DIMENSIONS)
  );
}

/**
 * Full shape check of one relationship snapshot
 */
export function isRelationshipData(value: unknown): value is RelationshipData {
  if (!isRecord(value)) {
    return false;
  }
  const pattern = value.pattern;
  return (
    typeof value.id === 'string' &&
    isEntityId(value.entityA) &&
    isEntityId(value.entityB) &&
    value.entityA !== value.entityB &&
    isMember(STAGES, value.stage) &&
    isMember(SCHEMAS, value.schema) &&
    Array.isArray(value.bonds) &&
    value.bonds.every((bond: unknown) => isMember(BOND_TYPES, bond)) &&
    isValueTable(value.shared, SHARED_PATHS) &&
    isRecord(pattern) &&
    isFiniteNumber(pattern.frequency) &&
    isFiniteNumber(pattern.consistency) &&
    (pattern.lastInteraction === null || isTimestamp(pattern.lastInteraction)) &&
    isDirectionalStateData(value.aToB) &&
    isDirectionalStateData(value.bToA)
  );
}
