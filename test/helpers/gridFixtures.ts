import type { Candle, GridBotParams, GridLevel, LevelSide } from '../../src/grid/types';

export const HOUR_MS = 60 * 60 * 1000;

export function candlesFromCloses(closes: number[], startTimestamp = Date.UTC(2024, 0, 1)): Candle[] {
  return closes.map((close, i) => {
    const open = i === 0 ? close : closes[i - 1];
    return {
      timestamp: startTimestamp + i * HOUR_MS,
      open,
      high: Math.max(open, close),
      low: Math.min(open, close),
      close,
      volume: 1,
    };
  });
}

export function gridParams(overrides: Partial<GridBotParams> = {}): GridBotParams {
  return {
    totalInvestment: 10_000,
    lowerPrice: 90,
    upperPrice: 110,
    numGrids: 2,
    gridMode: 'arithmetic',
    feeRate: 0.001,
    ...overrides,
  };
}

export function level(index: number, price: number, side: LevelSide, tradeAmount = 1): GridLevel {
  return { index, price, side, tradeAmount };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}
