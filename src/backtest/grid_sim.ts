// src/backtest/grid_sim.ts
// Replays a grid over an ordered candle series and returns the full trade ledger.
import { aggregateResult } from '../analytics/gridPerformance';
import { GRID_CONSTANTS } from '../config/gridConstants';
import { allocateCapital } from '../grid/capitalAllocator';
import { calculateGridLines } from '../grid/gridLines';
import { applySides, classifyLevels } from '../grid/gridState';
import { findCrossings, interpolatePath } from '../grid/pricePath';
import { executeGridTrade } from '../grid/tradeExecutor';
import type {
  Candle,
  GridBotParams,
  GridSimulationOptions,
  Position,
  SimulationResult,
  SkippedTradeCounts,
  TradeLogEntry,
} from '../grid/types';
import { validateCandles, validateGridParams, validateInterpolationSteps } from '../grid/validation';
import { logger } from '../utils/logger';

export interface TradeObserverState {
  position: Position;
  inventoryAmount: number;
  inventoryDepth: number;
}

export interface GridSimulatorOptions extends GridSimulationOptions {
  /** Called after every executed trade with the post-trade state. */
  onTrade?: (entry: TradeLogEntry, state: TradeObserverState) => void;
}

export class GridSimulator {
  private readonly params: GridBotParams;
  private readonly interpolationSteps: number;
  private readonly gridLines: number[];
  private readonly onTrade?: GridSimulatorOptions['onTrade'];

  constructor(params: GridBotParams, options: GridSimulatorOptions = {}) {
    validateGridParams(params);
    const steps = options.interpolationSteps ?? GRID_CONSTANTS.PATH.DEFAULT_INTERPOLATION_STEPS;
    validateInterpolationSteps(steps);

    this.params = { ...params };
    this.interpolationSteps = steps;
    this.gridLines = calculateGridLines(params.lowerPrice, params.upperPrice, params.numGrids, params.gridMode);
    this.onTrade = options.onTrade;
  }

  getGridLines(): number[] {
    return [...this.gridLines];
  }

  run(candles: readonly Candle[]): SimulationResult {
    validateCandles(candles);

    const first = candles[0];
    const { levels, position, ledger, seedCoin, seedFee, notionalPerGrid } = allocateCapital({
      totalInvestment: this.params.totalInvestment,
      gridLines: this.gridLines,
      feeRate: this.params.feeRate,
      initialPrice: first.close,
      timestamp: first.timestamp,
    });
    const initialPosition: Position = { ...position };
    const ctx = { position, ledger, feeRate: this.params.feeRate };

    logger.debug('grid_backtest_started', {
      event: 'grid_backtest_started',
      candles: candles.length,
      gridMode: this.params.gridMode,
      numGrids: this.params.numGrids,
      tradableLevels: levels.length,
      initialPrice: first.close,
    });

    const tradeLog: TradeLogEntry[] = [];
    const skippedTrades: SkippedTradeCounts = { insufficient_coin: 0, insufficient_usdt: 0 };
    const equityCurve: number[] = [position.usdt + position.coin * first.close];
    let reference = first.close;
    let lastTradedIndex: number | null = null;

    for (let i = 1; i < candles.length; i++) {
      const candle = candles[i];
      applySides(levels, classifyLevels(levels, reference, lastTradedIndex));

      const path = interpolatePath(reference, candle.close, this.interpolationSteps);
      const fired = new Set<number>();
      for (let k = 1; k < path.length; k++) {
        for (const { level, triggerPrice } of findCrossings(levels, path[k - 1], path[k], candle.close, fired)) {
          fired.add(level.index);
          const outcome = executeGridTrade(ctx, level, triggerPrice, candle.timestamp);
          if (!outcome) continue;
          if (outcome.status === 'skipped') {
            skippedTrades[outcome.reason] += 1;
            logger.debug('grid_trade_skipped', {
              event: 'grid_trade_skipped',
              reason: outcome.reason,
              gridPrice: level.price,
              required: outcome.required,
              available: outcome.available,
              timestamp: candle.timestamp,
            });
            continue;
          }

          tradeLog.push(outcome.entry);
          level.side = 'blocked';
          lastTradedIndex = level.index;
          this.onTrade?.(outcome.entry, {
            position: { ...position },
            inventoryAmount: ledger.totalAmount(),
            inventoryDepth: ledger.depth(),
          });
        }
      }

      equityCurve.push(position.usdt + position.coin * candle.close);
      reference = candle.close;
    }

    const last = candles[candles.length - 1];
    const result = aggregateResult({
      params: this.params,
      interpolationSteps: this.interpolationSteps,
      gridLines: this.gridLines,
      tradeLog,
      skippedTrades,
      initialPosition,
      finalPosition: { ...position },
      ledger,
      seedCoin,
      seedFee,
      notionalPerGrid,
      initialPrice: first.close,
      finalPrice: last.close,
      equityCurve,
      candleCount: candles.length,
    });

    logger.info('grid_backtest_completed', {
      event: 'grid_backtest_completed',
      candles: candles.length,
      trades: result.numTrades,
      skipped: skippedTrades,
      finalValue: Number(result.finalValue.toFixed(2)),
      profitPct: Number(result.profitPct.toFixed(4)),
    });

    return result;
  }
}

export function simulateGridBot(
  candles: readonly Candle[],
  params: GridBotParams,
  options: GridSimulatorOptions = {}
): SimulationResult {
  return new GridSimulator(params, options).run(candles);
}
