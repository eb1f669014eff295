/**
 * Event Processor
 *
 * Turns events between entities into trust antecedents on the matching
 * relationship direction, then rebuilds that direction's trustworthiness.
 */

import { clamp01 } from '../state/decaying-value';
import { Relationship } from '../relationship/relationship';
import { Direction } from '../relationship/types';
import { TrustAntecedent } from '../trust/antecedent';
import { AntecedentMapping, AntecedentMappingProvider, TrustEvent } from './types';

/**
 * What an event did to one relationship
 */
export interface ProcessedEvent {
  relationshipId: string;
  direction: Direction;
  /** Antecedents appended, in mapping order */
  antecedents: TrustAntecedent[];
}

/**
 * Scale applied to mapped magnitudes: 0.5 for erratic pairs up to 1 for
 * fully consistent ones
 */
export function consistencyWeight(consistency: number): number {
  return 0.5 + 0.5 * clamp01(consistency);
}

/**
 * Apply one event to one relationship.
 *
 * Returns null when the event is skipped: no source or target, a pair
 * other than this relationship's, or no mappings.
 */
export function processEventForRelationship(
  event: TrustEvent,
  mappings: AntecedentMapping[],
  relationship: Relationship
): ProcessedEvent | null {
  if (event.source === undefined || event.target === undefined) {
    return null;
  }

  const direction = relationship.directionFor(event.target, event.source);
  if (direction === null || mappings.length === 0) {
    return null;
  }

  const severity = clamp01(event.severity);
  const weight = consistencyWeight(relationship.pattern.consistency);
  const appended: TrustAntecedent[] = [];

  for (const mapping of mappings) {
    const raw = clamp01(mapping.baseMagnitude * severity);
    const magnitude = raw * weight;
    if (magnitude <= 0) {
      continue;
    }

    const antecedent = new TrustAntecedent({
      timestamp: event.timestamp,
      antecedentType: mapping.antecedentType,
      direction: mapping.direction,
      magnitude,
      context: mapping.context,
      lifeDomain: mapping.lifeDomain,
    });
    relationship.appendAntecedent(direction, antecedent);
    appended.push(antecedent);
  }

  relationship.recomputeTrustworthiness(direction);

  return {
    relationshipId: relationship.id,
    direction,
    antecedents: appended,
  };
}

/**
 * Apply one event to every relationship it concerns
 */
export function processEventForRelationships(
  event: TrustEvent,
  provider: AntecedentMappingProvider,
  relationships: Iterable<Relationship>
): ProcessedEvent[] {
  const mappings = provider(event);
  if (mappings.length === 0) {
    return [];
  }

  const results: ProcessedEvent[] = [];
  for (const relationship of relationships) {
    const result = processEventForRelationship(event, mappings, relationship);
    if (result) {
      results.push(result);
    }
  }
  return results;
}
