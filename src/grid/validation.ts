import { GRID_CONSTANTS } from '../config/gridConstants';
import { ValidationError } from './errors';
import type { Candle, GridBotParams, GridMode } from './types';

const GRID_MODES: readonly GridMode[] = ['arithmetic', 'geometric'];

function requireFinite(name: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('param_not_numeric', `${name} must be a finite number, got ${String(value)}`);
  }
  return value;
}

export function isGridMode(value: unknown): value is GridMode {
  return typeof value === 'string' && GRID_MODES.some((mode) => mode === value);
}

export function validateGridBounds(lowerPrice: number, upperPrice: number) {
  requireFinite('lowerPrice', lowerPrice);
  requireFinite('upperPrice', upperPrice);
  if (lowerPrice <= 0) {
    throw new ValidationError('grid_lower_not_positive', `lowerPrice must be > 0, got ${lowerPrice}`);
  }
  if (lowerPrice >= upperPrice) {
    throw new ValidationError(
      'grid_bounds_inverted',
      `upperPrice must be > lowerPrice (lower=${lowerPrice}, upper=${upperPrice})`
    );
  }
}

export function validateGridCount(numGrids: number) {
  requireFinite('numGrids', numGrids);
  if (!Number.isInteger(numGrids) || numGrids < GRID_CONSTANTS.LIMITS.MIN_GRIDS) {
    throw new ValidationError(
      'grid_count_invalid',
      `numGrids must be an integer >= ${GRID_CONSTANTS.LIMITS.MIN_GRIDS}, got ${numGrids}`
    );
  }
}

export function validateGridMode(gridMode: unknown): asserts gridMode is GridMode {
  if (!isGridMode(gridMode)) {
    throw new ValidationError('grid_mode_invalid', `gridMode must be one of ${GRID_MODES.join(', ')}`);
  }
}

export function validateGridParams(params: GridBotParams) {
  const investment = requireFinite('totalInvestment', params.totalInvestment);
  if (investment <= 0) {
    throw new ValidationError('investment_not_positive', `totalInvestment must be > 0, got ${investment}`);
  }
  validateGridBounds(params.lowerPrice, params.upperPrice);
  validateGridCount(params.numGrids);
  validateGridMode(params.gridMode);
  const feeRate = requireFinite('feeRate', params.feeRate);
  const { MIN_FEE_RATE, MAX_FEE_RATE } = GRID_CONSTANTS.LIMITS;
  if (feeRate < MIN_FEE_RATE || feeRate >= MAX_FEE_RATE) {
    throw new ValidationError(
      'fee_rate_out_of_range',
      `feeRate must be within [${MIN_FEE_RATE}, ${MAX_FEE_RATE}), got ${feeRate}`
    );
  }
}

export function validateInterpolationSteps(steps: number) {
  requireFinite('interpolationSteps', steps);
  if (!Number.isInteger(steps) || steps < GRID_CONSTANTS.LIMITS.MIN_INTERPOLATION_STEPS) {
    throw new ValidationError(
      'interpolation_steps_invalid',
      `interpolationSteps must be an integer >= ${GRID_CONSTANTS.LIMITS.MIN_INTERPOLATION_STEPS}, got ${steps}`
    );
  }
}

/** Ordering is the caller's contract; only emptiness and usable closes are checked. */
export function validateCandles(candles: readonly Candle[]) {
  if (!candles.length) {
    throw new ValidationError('candles_empty', 'At least one candle is required');
  }
  candles.forEach((candle, idx) => {
    if (!Number.isFinite(candle.close) || candle.close <= 0) {
      throw new ValidationError('candle_close_invalid', `Candle ${idx} has an unusable close: ${String(candle.close)}`);
    }
  });
}
