/**
 * Prediction Tests
 */

import { describe, it, expect } from 'vitest';
import { riskToStakes, wouldConfide, wouldHelp } from '../predictions';
import { Relationship } from '../relationship';
import { Direction, RelationshipStage } from '../types';
import { StakesLevel } from '../../trust/types';

describe('riskToStakes', () => {
  it('buckets risk at 0.25, 0.5 and 0.75', () => {
    expect(riskToStakes(0)).toBe(StakesLevel.LOW);
    expect(riskToStakes(0.249)).toBe(StakesLevel.LOW);
    expect(riskToStakes(0.25)).toBe(StakesLevel.MEDIUM);
    expect(riskToStakes(0.5)).toBe(StakesLevel.HIGH);
    expect(riskToStakes(0.75)).toBe(StakesLevel.CRITICAL);
    expect(riskToStakes(1)).toBe(StakesLevel.CRITICAL);
  });
});

describe('wouldConfide', () => {
  it('strangers do not confide even with a trusting disposition', () => {
    const rel = Relationship.between('alice', 'bob');
    expect(wouldConfide(rel, Direction.A_TO_B, 0.5, 0.5)).toBe(false);
    expect(wouldConfide(rel, Direction.A_TO_B, 1, 0)).toBe(false);
    expect(rel.wouldAConfideInB(0.5, 0.5)).toBe(false);
  });

  it('a trusting stranger confides only once integrity is high and the matter is safe', () => {
    const rel = Relationship.between('alice', 'bob');
    // risk 1: stakes critical, perceived risk clamps to 1; disclosure 0.54 + 0.12 - 0.5 = 0.16 vs 0.9
    expect(wouldConfide(rel, Direction.A_TO_B, 0.9, 1)).toBe(false);

    rel.trustworthiness(Direction.A_TO_B).addIntegrityDelta(1);
    // risk 0: perceived risk 0.3 + 0.3; disclosure 0.54 + 0.4 - 0.3 = 0.64 vs 0.6
    expect(wouldConfide(rel, Direction.A_TO_B, 0.9, 0)).toBe(true);
    expect(wouldConfide(rel, Direction.A_TO_B, 0.9, 1)).toBe(false);
  });

  it('intimates with high integrity confide about low-risk matters', () => {
    const rel = Relationship.between('alice', 'bob').withStage(RelationshipStage.INTIMATE);
    rel.trustworthiness(Direction.B_TO_A).integrityValue.setBase(0.95);
    // risk = 0.3 - 0.1 = 0.2; disclosure = 0.1 * 0.8 + 0.9 * 0.95 - 0.1 = 0.835 > 0.63
    expect(rel.wouldBConfideInA(0.8, 0.1)).toBe(true);
    expect(rel.wouldAConfideInB(0.8, 0.1)).toBe(false);
  });
});

describe('wouldHelp', () => {
  it('needs benevolence above the risk-adjusted threshold', () => {
    const rel = Relationship.between('alice', 'bob').withStage(RelationshipStage.INTIMATE);
    rel.trustworthiness(Direction.A_TO_B).benevolenceValue.setBase(0.9);
    // risk = 0.2; support = 0.08 + 0.81 - 0.1 = 0.79 > 0.43
    expect(wouldHelp(rel, Direction.A_TO_B, 0.8, 0.1)).toBe(true);
    expect(rel.wouldAHelpB(0.8, 0.1)).toBe(true);
    // default benevolence: 0.08 + 0.27 - 0.1 = 0.25
    expect(rel.wouldBHelpA(0.8, 0.1)).toBe(false);
  });

  it('declines when stakes push risk up', () => {
    const rel = Relationship.between('alice', 'bob').withStage(RelationshipStage.ESTABLISHED);
    rel.trustworthiness(Direction.A_TO_B).benevolenceValue.setBase(0.7);
    // low: risk 0.3, support = 0.1 + 0.56 - 0.15 = 0.51 > 0.43
    expect(rel.wouldAHelpB(0.5, 0.1)).toBe(true);
    // critical: risk 0.9, support = 0.66 - 0.45 = 0.21 < 0.64
    expect(rel.wouldAHelpB(0.5, 0.8)).toBe(false);
  });
});
