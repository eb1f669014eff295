/**
 * Store Types
 */

import type { MappingTable } from '../events/mapping-loader';
import type { RelationshipData, RelationshipStage } from '../relationship/types';
import type { Direction } from '../relationship/types';
import type { TrustAntecedent } from '../trust/antecedent';

/**
 * On-disk relationship store
 */
export interface RelationshipStoreData {
  version: number;
  /** ISO 8601 */
  lastUpdated: string;
  /** Relationship snapshots by pair key */
  relationships: Record<string, RelationshipData>;
}

/**
 * Configuration options for RelationshipRegistry
 */
export interface RelationshipRegistryOptions {
  /** Path to the store file */
  storePath?: string;
  /** Save after modifications */
  autoSave?: boolean;
  /** Event -> antecedent table; the shipped table when omitted */
  mappingTable?: MappingTable;
}

/**
 * Emitted for every antecedent an event adds to a relationship
 */
export interface AntecedentRecordedEvent {
  relationshipId: string;
  direction: Direction;
  eventType: string;
  antecedent: TrustAntecedent;
}

export type AntecedentRecordedListener = (event: AntecedentRecordedEvent) => void;

/**
 * Statistics about the relationship registry
 */
export interface RelationshipRegistryStats {
  /** Total number of relationships */
  totalRelationships: number;
  /** Count of relationships in each stage */
  stageCounts: Record<RelationshipStage, number>;
  /** Antecedents across both directions of every relationship */
  totalAntecedents: number;
  /** Relationships where either direction has a betrayal on record */
  withBetrayalHistory: number;
}
