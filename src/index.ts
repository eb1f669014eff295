/**
 * dyad-trust
 *
 * Pairwise interpersonal trust for simulated entities. Each relationship
 * tracks, in both directions, the trustee's perceived ability, benevolence
 * and integrity, the trustor's perceived risk, and the antecedents that
 * shaped them, after Mayer, Davis & Schoorman's integrative model.
 *
 * @license Apache-2.0
 */

// Durations
export * from './time';

// Decaying values
export * from './state';

// Trustworthiness, risk and decisions
export * from './trust';

// Relationships between two entities
export * from './relationship';

// Event -> antecedent mapping
export * from './events';

// Registry and persistence
export * from './store';
