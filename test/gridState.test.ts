import { describe, expect, it } from 'vitest';
import { applySides, classifyLevels, nextLevelSide, triggerDirection } from '../src/grid/gridState';
import { level } from './helpers/gridFixtures';

describe('grid level state', () => {
  it('sells above the reference and buys below it', () => {
    expect(nextLevelSide(110, 100, false)).toBe('sell');
    expect(nextLevelSide(90, 100, false)).toBe('buy');
  });

  it('blocks the last-traded level and a level on the reference price', () => {
    expect(nextLevelSide(110, 100, true)).toBe('blocked');
    expect(nextLevelSide(100, 100, false)).toBe('blocked');
    expect(nextLevelSide(100 * (1 + 1e-12), 100, false)).toBe('blocked');
  });

  it('classifies and applies sides for a whole grid', () => {
    const levels = [level(0, 90, 'buy'), level(1, 100, 'buy'), level(2, 110, 'sell')];
    const sides = classifyLevels(levels, 95, 2);
    expect(sides).toEqual(['buy', 'sell', 'blocked']);

    applySides(levels, sides);
    expect(levels.map((l) => l.side)).toEqual(['buy', 'sell', 'blocked']);
  });

  it('maps sides to the direction that triggers them', () => {
    expect(triggerDirection('sell')).toBe('up');
    expect(triggerDirection('buy')).toBe('down');
    expect(triggerDirection('blocked')).toBeNull();
  });
});
