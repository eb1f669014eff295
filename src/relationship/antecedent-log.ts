/**
 * Antecedent Log
 *
 * Bounded history of trust antecedents for one direction of a
 * relationship. The oldest entries are evicted past the cap.
 */

import { TrustAntecedent } from '../trust/antecedent';
import { AntecedentLogData } from './types';

/** Maximum antecedents kept per direction */
export const MAX_ANTECEDENT_HISTORY = 100;

export class AntecedentLog {
  private entries: TrustAntecedent[] = [];
  private lastNegative: number | null = null;

  static fromJSON(data: AntecedentLogData): AntecedentLog {
    const log = new AntecedentLog();
    log.entries = data.entries.map((entry) => TrustAntecedent.fromJSON(entry));
    log.lastNegative = data.lastNegative === null ? null : Date.parse(data.lastNegative);
    return log;
  }

  /**
   * Append an antecedent, evicting the oldest entries past the cap
   */
  append(antecedent: TrustAntecedent): void {
    this.entries.push(antecedent);

    if (antecedent.isNegative) {
      this.lastNegative = antecedent.time;
    }

    if (this.entries.length > MAX_ANTECEDENT_HISTORY) {
      this.entries.sort((a, b) => a.time - b.time);
      this.entries.splice(0, this.entries.length - MAX_ANTECEDENT_HISTORY);
    }
  }

  /**
   * Entries in insertion order (sorted by time once the cap was hit)
   */
  get history(): TrustAntecedent[] {
    return [...this.entries];
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Timestamp of the most recently appended negative antecedent
   */
  get lastNegativeAt(): Date | null {
    return this.lastNegative === null ? null : new Date(this.lastNegative);
  }

  clear(): void {
    this.entries = [];
    this.lastNegative = null;
  }

  toJSON(): AntecedentLogData {
    return {
      entries: this.entries.map((entry) => entry.toJSON()),
      lastNegative: this.lastNegative === null ? null : new Date(this.lastNegative).toISOString(),
    };
  }
}
