import { GRID_CONSTANTS, roundTo } from '../config/gridConstants';
import { ValidationError } from './errors';
import type { GridMode } from './types';
import { validateGridBounds, validateGridCount, validateGridMode } from './validation';

/**
 * Ordered price levels from lowerPrice to upperPrice, numGrids + 1 entries.
 * Arithmetic keeps a constant absolute step, geometric a constant ratio.
 * Both bounds are emitted exactly.
 */
export function calculateGridLines(
  lowerPrice: number,
  upperPrice: number,
  numGrids: number,
  gridMode: GridMode
): number[] {
  validateGridBounds(lowerPrice, upperPrice);
  validateGridCount(numGrids);
  validateGridMode(gridMode);

  const lines: number[] = [lowerPrice];
  if (gridMode === 'arithmetic') {
    const step = (upperPrice - lowerPrice) / numGrids;
    for (let i = 1; i < numGrids; i++) lines.push(lowerPrice + i * step);
  } else {
    const ratio = (upperPrice / lowerPrice) ** (1 / numGrids);
    for (let i = 1; i < numGrids; i++) lines.push(lowerPrice * ratio ** i);
  }
  lines.push(upperPrice);
  return lines;
}

export interface SuggestedBounds {
  lowerPrice: number;
  upperPrice: number;
}

export function suggestGridBounds(startPrice: number, bandPct: number = GRID_CONSTANTS.BAND.DEFAULT_PCT): SuggestedBounds {
  if (!Number.isFinite(startPrice) || startPrice <= 0) {
    throw new ValidationError('start_price_invalid', `startPrice must be > 0, got ${startPrice}`);
  }
  if (!Number.isFinite(bandPct) || bandPct <= 0 || bandPct >= 1) {
    throw new ValidationError('band_pct_invalid', `bandPct must be within (0, 1), got ${bandPct}`);
  }
  const decimals = GRID_CONSTANTS.PRECISION.DISPLAY_DECIMALS;
  return {
    lowerPrice: roundTo(startPrice * (1 - bandPct), decimals),
    upperPrice: roundTo(startPrice * (1 + bandPct), decimals),
  };
}
