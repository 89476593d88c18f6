// src/backtest/runner.ts
// Shared glue for the CLI entry points: config -> params, result -> log summary.
import type { AppConfig } from '../config';
import { ValidationError } from '../grid/errors';
import { suggestGridBounds } from '../grid/gridLines';
import { validateGridMode } from '../grid/validation';
import type { GridBotParams, SimulationResult } from '../grid/types';

/**
 * Bounds from config when both are set, a band around the first close when
 * neither is. Setting only one bound is rejected.
 */
export function resolveGridParams(backtest: AppConfig['BACKTEST'], firstClose: number): GridBotParams {
  const { LOWER_PRICE, UPPER_PRICE, GRID_MODE } = backtest;
  validateGridMode(GRID_MODE);
  if ((LOWER_PRICE === null) !== (UPPER_PRICE === null)) {
    throw new ValidationError(
      'grid_bounds_incomplete',
      'LOWER_PRICE and UPPER_PRICE must be set together or both left unset'
    );
  }
  const bounds =
    LOWER_PRICE !== null && UPPER_PRICE !== null
      ? { lowerPrice: LOWER_PRICE, upperPrice: UPPER_PRICE }
      : suggestGridBounds(firstClose, backtest.BAND_PCT);
  return {
    totalInvestment: backtest.TOTAL_INVESTMENT,
    numGrids: backtest.NUM_GRIDS,
    gridMode: GRID_MODE,
    feeRate: backtest.FEE_RATE,
    ...bounds,
  };
}

export function summarizeResult(result: SimulationResult) {
  const round = (value: number) => Number(value.toFixed(4));
  return {
    candles: result.candleCount,
    gridLines: result.gridLines.length,
    trades: result.numTrades,
    buys: result.buyCount,
    sells: result.sellCount,
    skipped: result.skippedTrades,
    initialInvestment: result.initialInvestment,
    finalValue: round(result.finalValue),
    profitUsdt: round(result.profitUsdt),
    profitPct: round(result.profitPct),
    realizedProfit: round(result.realizedProfit),
    floatingProfit: round(result.floatingProfit),
    totalFees: round(result.totalFees),
    priceChangePct: round(result.priceChangePct),
    maxDrawdownPct: round(result.maxDrawdownPct),
  };
}
