// src/backtest/param_sweep.ts
// Runs one independent grid simulation per parameter combination over the same candles.
import { ValidationError } from '../grid/errors';
import type { Candle, GridBotParams, GridMode } from '../grid/types';
import { logger } from '../utils/logger';
import { GridSimulator, type GridSimulatorOptions } from './grid_sim';

export interface SweepGrid {
  numGrids?: number[];
  gridMode?: GridMode[];
  lowerPrice?: number[];
  upperPrice?: number[];
  feeRate?: number[];
}

export interface SweepRow {
  params: GridBotParams;
  numTrades: number | null;
  finalValue: number | null;
  profitPct: number | null;
  realizedProfit: number | null;
  floatingProfit: number | null;
  maxDrawdownPct: number | null;
  error?: string;
}

function axis<T>(values: T[] | undefined, fallback: T): T[] {
  return values && values.length ? values : [fallback];
}

export function expandSweepGrid(base: GridBotParams, grid: SweepGrid): GridBotParams[] {
  const combos: GridBotParams[] = [];
  for (const numGrids of axis(grid.numGrids, base.numGrids)) {
    for (const gridMode of axis(grid.gridMode, base.gridMode)) {
      for (const lowerPrice of axis(grid.lowerPrice, base.lowerPrice)) {
        for (const upperPrice of axis(grid.upperPrice, base.upperPrice)) {
          for (const feeRate of axis(grid.feeRate, base.feeRate)) {
            combos.push({ ...base, numGrids, gridMode, lowerPrice, upperPrice, feeRate });
          }
        }
      }
    }
  }
  return combos;
}

export function runParameterSweep(
  candles: readonly Candle[],
  base: GridBotParams,
  grid: SweepGrid,
  options: Pick<GridSimulatorOptions, 'interpolationSteps'> = {}
): SweepRow[] {
  const combos = expandSweepGrid(base, grid);
  const rows: SweepRow[] = [];
  for (const params of combos) {
    try {
      const result = new GridSimulator(params, options).run(candles);
      rows.push({
        params,
        numTrades: result.numTrades,
        finalValue: result.finalValue,
        profitPct: result.profitPct,
        realizedProfit: result.realizedProfit,
        floatingProfit: result.floatingProfit,
        maxDrawdownPct: result.maxDrawdownPct,
      });
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      logger.warn('sweep_combination_invalid', {
        event: 'sweep_combination_invalid',
        params,
        code: error.code,
        error: error.message,
      });
      rows.push({
        params,
        numTrades: null,
        finalValue: null,
        profitPct: null,
        realizedProfit: null,
        floatingProfit: null,
        maxDrawdownPct: null,
        error: error.code,
      });
    }
  }
  logger.info('sweep_finished', { event: 'sweep_finished', combinations: combos.length });
  return rows;
}

export function bestSweepRow(rows: readonly SweepRow[]): SweepRow | null {
  let best: SweepRow | null = null;
  for (const row of rows) {
    if (row.error || row.profitPct === null) continue;
    if (!best || best.profitPct === null || row.profitPct > best.profitPct) best = row;
  }
  return best;
}
