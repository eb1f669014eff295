/**
 * Antecedent Mapping Loader
 *
 * Load the event -> antecedent table from YAML.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { AntecedentMapping, AntecedentMappingProvider, TrustEvent, ValidationError } from './types';
import { validateMappingDocument } from './mapping-validator';

/**
 * The table shipped with the package
 */
export function getDefaultMappingsPath(): string {
  return path.join(__dirname, '..', '..', 'config', 'antecedent-mappings.yaml');
}

/**
 * Missing, unreadable or invalid mapping file
 */
export class MappingTableError extends Error {
  readonly source: string;
  readonly errors: ValidationError[];

  constructor(source: string, message: string, errors: ValidationError[] = []) {
    super(message);
    this.name = 'MappingTableError';
    this.source = source;
    this.errors = errors;
  }
}

export class MappingTable {
  private mappings: Map<string, AntecedentMapping[]>;

  constructor(mappings: Map<string, AntecedentMapping[]>) {
    this.mappings = new Map(mappings);
  }

  /**
   * Build a table from YAML text; `source` names the text in errors
   */
  static fromYaml(content: string, source: string = '<inline>'): MappingTable {
    let document: unknown;
    try {
      document = yaml.load(content);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new MappingTableError(source, `Failed to parse mapping table ${source}: ${reason}`);
    }

    const result = validateMappingDocument(document);
    if (!result.valid) {
      const errorMessages = result.errors.map(e => `  ${e.path}: ${e.message}`).join('\n');
      throw new MappingTableError(source, `Invalid mapping table ${source}:\n${errorMessages}`, result.errors);
    }

    return new MappingTable(result.mappings);
  }

  /**
   * Antecedents produced by an event; empty for unmapped event types
   */
  forEvent(event: TrustEvent): AntecedentMapping[] {
    return this.forEventType(event.eventType);
  }

  forEventType(eventType: string): AntecedentMapping[] {
    const mappings = this.mappings.get(eventType);
    return mappings ? mappings.map((mapping) => ({ ...mapping })) : [];
  }

  has(eventType: string): boolean {
    return this.mappings.has(eventType);
  }

  eventTypes(): string[] {
    return [...this.mappings.keys()];
  }

  asProvider(): AntecedentMappingProvider {
    return (event) => this.forEvent(event);
  }
}

/**
 * Load a mapping table from a YAML file (the shipped table by default)
 */
export function loadMappingTable(filePath: string = getDefaultMappingsPath()): MappingTable {
  if (!fs.existsSync(filePath)) {
    throw new MappingTableError(filePath, `Mapping table not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  return MappingTable.fromYaml(content, filePath);
}
