/**
 * Events Module
 *
 * Event -> antecedent mapping table and the processor that applies events
 * to relationships.
 */

export {
  type TrustEvent,
  type AntecedentMapping,
  type AntecedentMappingProvider,
  type ValidationError,
  type ValidationResult,
} from './types';

export {
  validateMappingDocument,
  createMapping,
  MAPPING_DOCUMENT_VERSION,
  type MappingValidationResult,
} from './mapping-validator';

export { MappingTable, MappingTableError, loadMappingTable, getDefaultMappingsPath } from './mapping-loader';

export {
  processEventForRelationship,
  processEventForRelationships,
  consistencyWeight,
  type ProcessedEvent,
} from './event-processor';
