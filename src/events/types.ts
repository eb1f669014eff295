/**
 * Event Types
 */

import type { AntecedentDirection, AntecedentType, LifeDomain, TrustDomain } from '../trust/types';

/**
 * Something that happened between two entities. The target is the one
 * whose trust changes (trustor); the source is the one being judged
 * (trustee).
 */
export interface TrustEvent {
  eventType: string;
  source?: string;
  target?: string;
  /** Clamped to [0, 1] when applied */
  severity: number;
  timestamp: Date;
}

/**
 * Antecedent produced by an event, before severity and consistency scaling
 */
export interface AntecedentMapping {
  antecedentType: AntecedentType;
  direction: AntecedentDirection;
  baseMagnitude: number;
  context: string;
  /** Derived from antecedentType */
  trustDomain: TrustDomain;
  lifeDomain?: LifeDomain;
}

/**
 * Maps an event to the antecedents it produces; empty when unmapped
 */
export type AntecedentMappingProvider = (event: TrustEvent) => AntecedentMapping[];

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
