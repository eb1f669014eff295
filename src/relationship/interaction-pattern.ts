/**
 * Interaction Pattern
 *
 * How often and how consistently the pair interacts. Consistency scales
 * the magnitude of antecedents produced from events.
 */

import { clamp01 } from '../state/decaying-value';
import { InteractionPatternData } from './types';

export class InteractionPattern {
  private data: { frequency: number; consistency: number; lastInteraction: Date | null };

  constructor(frequency: number = 0, consistency: number = 0) {
    this.data = {
      frequency: clamp01(frequency),
      consistency: clamp01(consistency),
      lastInteraction: null,
    };
  }

  static fromJSON(data: InteractionPatternData): InteractionPattern {
    const pattern = new InteractionPattern(data.frequency, data.consistency);
    pattern.data.lastInteraction = data.lastInteraction === null ? null : new Date(data.lastInteraction);
    return pattern;
  }

  get frequency(): number {
    return this.data.frequency;
  }

  get consistency(): number {
    return this.data.consistency;
  }

  get lastInteraction(): Date | null {
    return this.data.lastInteraction;
  }

  setFrequency(frequency: number): void {
    this.data.frequency = clamp01(frequency);
  }

  setConsistency(consistency: number): void {
    this.data.consistency = clamp01(consistency);
  }

  setLastInteraction(timestamp: Date | null): void {
    this.data.lastInteraction = timestamp;
  }

  toJSON(): InteractionPatternData {
    return {
      frequency: this.data.frequency,
      consistency: this.data.consistency,
      lastInteraction: this.data.lastInteraction === null ? null : this.data.lastInteraction.toISOString(),
    };
  }
}
