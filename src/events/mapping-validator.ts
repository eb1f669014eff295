/**
 * Antecedent Mapping Validator
 *
 * Validate a parsed mapping document and collect the mappings it defines.
 */

import { ANTECEDENT_TRUST_DOMAINS, AntecedentDirection, AntecedentType, LIFE_DOMAINS, LifeDomain } from '../trust/types';
import { AntecedentMapping, ValidationError, ValidationResult } from './types';

const VALID_TYPES: readonly AntecedentType[] = [
  AntecedentType.ABILITY,
  AntecedentType.BENEVOLENCE,
  AntecedentType.INTEGRITY,
];

const VALID_DIRECTIONS: readonly AntecedentDirection[] = [
  AntecedentDirection.POSITIVE,
  AntecedentDirection.NEGATIVE,
];

export const MAPPING_DOCUMENT_VERSION = 1;

export interface MappingValidationResult extends ValidationResult {
  /** Mappings by event type; only entries that validated */
  mappings: Map<string, AntecedentMapping[]>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findMember<T extends string>(members: readonly T[], candidate: unknown): T | undefined {
  return members.find((member) => member === candidate);
}

/**
 * Build a mapping, deriving its trust domain
 */
export function createMapping(
  antecedentType: AntecedentType,
  direction: AntecedentDirection,
  baseMagnitude: number,
  context: string,
  lifeDomain?: LifeDomain
): AntecedentMapping {
  const mapping: AntecedentMapping = {
    antecedentType,
    direction,
    baseMagnitude,
    context,
    trustDomain: ANTECEDENT_TRUST_DOMAINS[antecedentType],
  };
  if (lifeDomain !== undefined) {
    mapping.lifeDomain = lifeDomain;
  }
  return mapping;
}

function validateEntry(entry: unknown, path: string, errors: ValidationError[]): AntecedentMapping | null {
  if (!isRecord(entry)) {
    errors.push({ path, message: 'Mapping must be an object' });
    return null;
  }

  const startingErrors = errors.length;

  const antecedentType = findMember(VALID_TYPES, entry.type);
  if (!antecedentType) {
    errors.push({ path: `${path}.type`, message: `Type must be one of: ${VALID_TYPES.join(', ')}` });
  }

  const direction = findMember(VALID_DIRECTIONS, entry.direction);
  if (!direction) {
    errors.push({ path: `${path}.direction`, message: `Direction must be one of: ${VALID_DIRECTIONS.join(', ')}` });
  }

  const magnitude = entry.magnitude;
  if (typeof magnitude !== 'number' || Number.isNaN(magnitude) || magnitude < 0 || magnitude > 1) {
    errors.push({ path: `${path}.magnitude`, message: 'Magnitude must be a number between 0 and 1' });
  }

  const context = entry.context;
  if (typeof context !== 'string' || context === '') {
    errors.push({ path: `${path}.context`, message: 'Context is required and must be a string' });
  }

  let lifeDomain: LifeDomain | undefined;
  if (entry.domain !== undefined && entry.domain !== null) {
    lifeDomain = findMember(LIFE_DOMAINS, entry.domain);
    if (!lifeDomain) {
      errors.push({ path: `${path}.domain`, message: `Domain must be one of: ${LIFE_DOMAINS.join(', ')}` });
    } else if (antecedentType !== AntecedentType.ABILITY) {
      errors.push({ path: `${path}.domain`, message: 'Domain is only allowed on ability mappings' });
    }
  }

  if (
    errors.length > startingErrors ||
    !antecedentType ||
    !direction ||
    typeof magnitude !== 'number' ||
    typeof context !== 'string'
  ) {
    return null;
  }

  return createMapping(antecedentType, direction, magnitude, context, lifeDomain);
}

/**
 * Validate a mapping document of the form
 * `{ version?: 1, events: { <eventType>: [ { type, direction, magnitude, context, domain? } ] } }`
 */
export function validateMappingDocument(document: unknown): MappingValidationResult {
  const errors: ValidationError[] = [];
  const mappings = new Map<string, AntecedentMapping[]>();

  if (!isRecord(document)) {
    return { valid: false, errors: [{ path: '', message: 'Mapping document must be an object' }], mappings };
  }

  if (document.version !== undefined && document.version !== MAPPING_DOCUMENT_VERSION) {
    errors.push({ path: 'version', message: `Version must be ${MAPPING_DOCUMENT_VERSION}` });
  }

  const events = document.events;
  if (!isRecord(events)) {
    errors.push({ path: 'events', message: 'Missing or invalid events section' });
    return { valid: false, errors, mappings };
  }

  for (const [eventType, entries] of Object.entries(events)) {
    const path = `events.${eventType}`;
    if (!Array.isArray(entries)) {
      errors.push({ path, message: 'Event mappings must be an array' });
      continue;
    }

    const parsed: AntecedentMapping[] = [];
    entries.forEach((entry: unknown, i: number) => {
      const mapping = validateEntry(entry, `${path}[${i}]`, errors);
      if (mapping) {
        parsed.push(mapping);
      }
    });
    mappings.set(eventType, parsed);
  }

  return { valid: errors.length === 0, errors, mappings };
}
