/**
 * Store Module
 *
 * Relationship registry with JSON persistence.
 */

// Types
export type {
  RelationshipStoreData,
  RelationshipRegistryOptions,
  AntecedentRecordedEvent,
  AntecedentRecordedListener,
  RelationshipRegistryStats,
} from './types';

// Persistence
export {
  SCHEMA_VERSION,
  getDefaultStorePath,
  decodeStore,
  encodeStore,
  loadRelationshipStore,
  saveRelationshipStore,
  type DecodedStore,
} from './persistence';

// Snapshot validation
export { isRelationshipData, isDecayingValueData } from './snapshot';

// Registry
export { RelationshipRegistry } from './relationship-registry';
