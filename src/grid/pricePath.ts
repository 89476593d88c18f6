import { isSamePrice } from '../config/gridConstants';
import { triggerDirection } from './gridState';
import type { GridLevel } from './types';

/**
 * Linear samples from one close to the next, both ends included. Only closes
 * are trusted per bar, so this approximates the intrabar path and misses
 * round trips inside a single candle.
 */
export function interpolatePath(from: number, to: number, steps: number): number[] {
  const points: number[] = [from];
  const span = to - from;
  for (let i = 1; i < steps - 1; i++) {
    points.push(from + (span * i) / (steps - 1));
  }
  points.push(to);
  return points;
}

export interface Crossing {
  level: GridLevel;
  triggerPrice: number;
}

/**
 * Levels crossed on the segment a -> b in the direction their side trades,
 * in path order. A level on the candle's close is not crossed.
 */
export function findCrossings(
  levels: readonly GridLevel[],
  a: number,
  b: number,
  close: number,
  fired: ReadonlySet<number>
): Crossing[] {
  if (a === b) return [];
  const rising = b > a;
  const hits: Crossing[] = [];
  for (const level of levels) {
    if (fired.has(level.index)) continue;
    const direction = triggerDirection(level.side);
    if (!direction) continue;
    if (isSamePrice(level.price, close)) continue;
    if (rising && direction === 'up' && a < level.price && level.price <= b) {
      hits.push({ level, triggerPrice: b });
    } else if (!rising && direction === 'down' && a > level.price && level.price >= b) {
      hits.push({ level, triggerPrice: b });
    }
  }
  hits.sort((x, y) => (rising ? x.level.price - y.level.price : y.level.price - x.level.price));
  return hits;
}
