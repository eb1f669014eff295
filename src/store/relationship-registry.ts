/**
 * Relationship Registry
 *
 * Central management for every pairwise relationship.
 * Handles lookups by pair, event ingestion, decay ticks and persistence.
 */

import { processEventForRelationships } from '../events/event-processor';
import { loadMappingTable, MappingTable } from '../events/mapping-loader';
import { TrustEvent } from '../events/types';
import { Relationship } from '../relationship/relationship';
import { DIRECTIONS, RelationshipStage, StageChangeListener } from '../relationship/types';
import { getDefaultStorePath, loadRelationshipStore, saveRelationshipStore } from './persistence';
import {
  AntecedentRecordedEvent,
  AntecedentRecordedListener,
  RelationshipRegistryOptions,
  RelationshipRegistryStats,
} from './types';

interface RegisteredRelationship {
  relationship: Relationship;
  unsubscribe: () => void;
}

/**
 * Central registry for managing relationships
 */
export class RelationshipRegistry {
  private storePath: string;
  private autoSave: boolean;
  private mappingTable: MappingTable | null;
  private relationships: Map<string, RegisteredRelationship>;
  private stageListeners: StageChangeListener[];
  private antecedentListeners: AntecedentRecordedListener[];

  constructor(options: RelationshipRegistryOptions = {}) {
    this.storePath = options.storePath ?? getDefaultStorePath();
    this.autoSave = options.autoSave ?? true;
    this.mappingTable = options.mappingTable ?? null;
    this.relationships = new Map();
    this.stageListeners = [];
    this.antecedentListeners = [];
  }

  /**
   * Load relationship store from disk
   */
  async load(): Promise<void> {
    const snapshots = await loadRelationshipStore(this.storePath);

    for (const registered of this.relationships.values()) {
      registered.unsubscribe();
    }
    this.relationships.clear();

    for (const snapshot of snapshots) {
      this.register(Relationship.fromJSON(snapshot));
    }
  }

  /**
   * Save relationship store to disk
   */
  async save(): Promise<void> {
    const snapshots = this.listRelationships().map((relationship) => relationship.toJSON());
    await saveRelationshipStore(this.storePath, snapshots);
  }

  private register(relationship: Relationship): Relationship {
    const unsubscribe = relationship.onStageChange((event) => {
      for (const listener of [...this.stageListeners]) {
        try {
          listener(event);
        } catch (e) {
          console.error('Stage change callback error:', e);
        }
      }
    });
    this.relationships.set(relationship.pairKey, { relationship, unsubscribe });
    return relationship;
  }

  private saveInBackground(): void {
    if (this.autoSave) {
      this.save().catch((e) => console.error('Failed to save relationship store:', e));
    }
  }

  /**
   * Get or create the relationship between two entities.
   * The entity passed first on creation becomes entity A.
   */
  getRelationship(entityA: string, entityB: string): Relationship {
    const existing = this.findRelationship(entityA, entityB);
    if (existing) {
      return existing;
    }

    const relationship = this.register(Relationship.between(entityA, entityB));
    this.saveInBackground();
    return relationship;
  }

  private findOrCreate(entityA: string, entityB: string): Relationship {
    return this.findRelationship(entityA, entityB) ?? this.register(Relationship.between(entityA, entityB));
  }

  /**
   * Existing relationship between two entities, in either order
   */
  findRelationship(entityA: string, entityB: string): Relationship | undefined {
    return this.relationships.get(Relationship.pairKey(entityA, entityB))?.relationship;
  }

  hasRelationship(entityA: string, entityB: string): boolean {
    return this.relationships.has(Relationship.pairKey(entityA, entityB));
  }

  /**
   * Remove the relationship between two entities
   */
  async removeRelationship(entityA: string, entityB: string): Promise<boolean> {
    const key = Relationship.pairKey(entityA, entityB);
    const registered = this.relationships.get(key);
    if (!registered) {
      return false;
    }

    registered.unsubscribe();
    this.relationships.delete(key);

    if (this.autoSave) {
      await this.save();
    }
    return true;
  }

  /**
   * Set the stage of the relationship between two entities
   */
  async setStage(entityA: string, entityB: string, stage: RelationshipStage): Promise<void> {
    const relationship = this.findOrCreate(entityA, entityB);
    relationship.setStage(stage);

    if (this.autoSave) {
      await this.save();
    }
  }

  /**
   * Apply an event to every relationship it concerns.
   * Returns the number of relationships it was applied to.
   */
  async processEvent(event: TrustEvent): Promise<number> {
    const table = this.getMappingTable();
    const results = processEventForRelationships(event, table.asProvider(), this.listRelationships());

    for (const result of results) {
      for (const antecedent of result.antecedents) {
        this.notifyAntecedentRecorded({
          relationshipId: result.relationshipId,
          direction: result.direction,
          eventType: event.eventType,
          antecedent,
        });
      }
    }

    if (results.length > 0 && this.autoSave) {
      await this.save();
    }

    return results.length;
  }

  /**
   * Decay every relationship by the elapsed time
   */
  async applyDecay(elapsedMs: number): Promise<void> {
    for (const { relationship } of this.relationships.values()) {
      relationship.applyDecay(elapsedMs);
    }

    if (this.relationships.size > 0 && this.autoSave) {
      await this.save();
    }
  }

  /**
   * The mapping table, loading the shipped one on first use
   */
  getMappingTable(): MappingTable {
    if (this.mappingTable === null) {
      this.mappingTable = loadMappingTable();
    }
    return this.mappingTable;
  }

  /**
   * List all relationships
   */
  listRelationships(): Relationship[] {
    return Array.from(this.relationships.values(), ({ relationship }) => relationship);
  }

  /**
   * Relationships an entity takes part in
   */
  relationshipsFor(entityId: string): Relationship[] {
    return this.listRelationships().filter(relationship => relationship.involves(entityId));
  }

  /**
   * Relationships in a given stage
   */
  getByStage(stage: RelationshipStage): Relationship[] {
    return this.listRelationships().filter(relationship => relationship.stage === stage);
  }

  /**
   * Subscribe to stage changes of any relationship
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

  /**
   * Subscribe to antecedents recorded from processed events
   */
  onAntecedentRecorded(listener: AntecedentRecordedListener): () => void {
    this.antecedentListeners.push(listener);
    return () => {
      const index = this.antecedentListeners.indexOf(listener);
      if (index !== -1) {
        this.antecedentListeners.splice(index, 1);
      }
    };
  }

  private notifyAntecedentRecorded(event: AntecedentRecordedEvent): void {
    for (const listener of [...this.antecedentListeners]) {
      try {
        listener(event);
      } catch (e) {
        console.error('Antecedent callback error:', e);
      }
    }
  }

  /**
   * Get statistics about the relationship registry
   */
  getStats(): RelationshipRegistryStats {
    const relationships = this.listRelationships();
    const stageCounts: Record<RelationshipStage, number> = {
      [RelationshipStage.STRANGER]: 0,
      [RelationshipStage.ACQUAINTANCE]: 0,
      [RelationshipStage.ESTABLISHED]: 0,
      [RelationshipStage.INTIMATE]: 0,
      [RelationshipStage.ESTRANGED]: 0,
    };

    let totalAntecedents = 0;
    let withBetrayalHistory = 0;

    for (const relationship of relationships) {
      stageCounts[relationship.stage]++;
      let betrayed = false;
      for (const direction of DIRECTIONS) {
        totalAntecedents += relationship.antecedentHistory(direction).length;
        if (relationship.perceivedRisk(direction).hasBetrayalHistory) {
          betrayed = true;
        }
      }
      if (betrayed) {
        withBetrayalHistory++;
      }
    }

    return {
      totalRelationships: relationships.length,
      stageCounts,
      totalAntecedents,
      withBetrayalHistory,
    };
  }
}
