import { GRID_CONSTANTS } from '../config/gridConstants';
import { ValidationError } from '../grid/errors';
import type { Candle } from '../grid/types';

export type SyntheticPattern = 'flat' | 'linear_up' | 'linear_down' | 'sine' | 'range_bound' | 'breakout';

export interface SyntheticCandleOptions {
  pattern: SyntheticPattern;
  bars?: number;
  initialPrice?: number;
  volatility?: number;
  startTimestamp?: number;
  intervalMs?: number;
}

function closeAt(pattern: SyntheticPattern, i: number, bars: number, p0: number, vol: number): number {
  switch (pattern) {
    case 'flat':
      return p0;
    case 'linear_up':
      return p0 + i * (vol / 10);
    case 'linear_down':
      // keep the series strictly positive
      return Math.max(p0 * 0.01, p0 - i * (vol / 10));
    case 'sine':
      return p0 + vol * Math.sin(i / 5);
    case 'range_bound':
      return p0 + vol * (0.5 - (i % 20) / 20);
    case 'breakout': {
      const half = Math.max(1, Math.floor(bars / 2));
      if (i < half) return p0 + vol * 0.2 * (i / half);
      return p0 + vol * 0.2 + vol * 0.8 * ((i - half) / Math.max(1, bars - half));
    }
  }
}

/**
 * Deterministic price series for exercising grid mechanics without market
 * data. Each bar opens at the previous close.
 */
export function generateSyntheticCandles(options: SyntheticCandleOptions): Candle[] {
  const bars = options.bars ?? GRID_CONSTANTS.SYNTHETIC.DEFAULT_BARS;
  const initialPrice = options.initialPrice ?? 100_000;
  const volatility = options.volatility ?? 5_000;
  const startTimestamp = options.startTimestamp ?? Date.UTC(2024, 0, 1);
  const intervalMs = options.intervalMs ?? GRID_CONSTANTS.SYNTHETIC.DEFAULT_INTERVAL_MS;

  if (!Number.isInteger(bars) || bars < 1) {
    throw new ValidationError('synthetic_bars_invalid', `bars must be a positive integer, got ${bars}`);
  }
  if (!(initialPrice > 0)) {
    throw new ValidationError('synthetic_price_invalid', `initialPrice must be > 0, got ${initialPrice}`);
  }

  const candles: Candle[] = [];
  let prevClose = closeAt(options.pattern, 0, bars, initialPrice, volatility);
  for (let i = 0; i < bars; i++) {
    const close = closeAt(options.pattern, i, bars, initialPrice, volatility);
    const open = i === 0 ? close : prevClose;
    candles.push({
      timestamp: startTimestamp + i * intervalMs,
      open,
      high: Math.max(open, close),
      low: Math.min(open, close),
      close,
      volume: GRID_CONSTANTS.SYNTHETIC.DEFAULT_VOLUME,
    });
    prevClose = close;
  }
  return candles;
}

/** Evenly spaced closes from `from` to `to`, both included. */
export function linearCandles(from: number, to: number, bars: number, startTimestamp = Date.UTC(2023, 0, 1)): Candle[] {
  if (!Number.isInteger(bars) || bars < 2) {
    throw new ValidationError('synthetic_bars_invalid', `bars must be an integer >= 2, got ${bars}`);
  }
  const step = (to - from) / (bars - 1);
  const candles: Candle[] = [];
  for (let i = 0; i < bars; i++) {
    const close = i === bars - 1 ? to : from + i * step;
    const open = i === 0 ? close : candles[i - 1].close;
    candles.push({
      timestamp: startTimestamp + i * GRID_CONSTANTS.SYNTHETIC.DEFAULT_INTERVAL_MS,
      open,
      high: Math.max(open, close),
      low: Math.min(open, close),
      close,
      volume: GRID_CONSTANTS.SYNTHETIC.DEFAULT_VOLUME,
    });
  }
  return candles;
}
