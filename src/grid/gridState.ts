import { isSamePrice } from '../config/gridConstants';
import type { GridLevel, LevelSide } from './types';

/**
 * Side of one level for the next candle. The last-traded level stays blocked
 * until another level trades; a level sitting on the reference price cannot
 * be crossed from it, so it is blocked for that candle as well.
 */
export function nextLevelSide(levelPrice: number, referencePrice: number, isLastTraded: boolean): LevelSide {
  if (isLastTraded) return 'blocked';
  if (isSamePrice(levelPrice, referencePrice)) return 'blocked';
  return levelPrice > referencePrice ? 'sell' : 'buy';
}

export function classifyLevels(
  levels: readonly GridLevel[],
  referencePrice: number,
  lastTradedIndex: number | null
): LevelSide[] {
  return levels.map((level) => nextLevelSide(level.price, referencePrice, level.index === lastTradedIndex));
}

export function applySides(levels: GridLevel[], sides: readonly LevelSide[]) {
  levels.forEach((level, idx) => {
    level.side = sides[idx];
  });
}

/** Direction a path must move through a level for that level to fire. */
export function triggerDirection(side: LevelSide): 'up' | 'down' | null {
  if (side === 'sell') return 'up';
  if (side === 'buy') return 'down';
  return null;
}
