import dotenv from 'dotenv';
import { GRID_CONSTANTS } from './config/gridConstants';
dotenv.config();

function envNum(name: string, fallback: number) {
  const v = process.env[name];
  return v !== undefined && v.trim() !== '' ? Number(v) : fallback;
}

function envOptionalNum(name: string): number | null {
  const v = process.env[name];
  if (v === undefined || v.trim() === '') return null;
  return Number(v);
}

// passed through as written; resolveGridParams rejects unknown modes
function envLower(name: string, fallback: string) {
  const v = (process.env[name] || '').trim().toLowerCase();
  return v || fallback;
}

export const CONFIG = {
  ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  LOG_INGEST_WEBHOOK: process.env.LOG_INGEST_WEBHOOK || null,
  BACKTEST: {
    SYMBOL: process.env.SYMBOL || 'BTC/USDT',
    TOTAL_INVESTMENT: envNum('TOTAL_INVESTMENT', 10000),
    NUM_GRIDS: envNum('NUM_GRIDS', 20),
    GRID_MODE: envLower('GRID_MODE', 'geometric'),
    FEE_RATE: envNum('FEE_RATE', 0.001),
    // unset -> band suggested from the first close
    LOWER_PRICE: envOptionalNum('LOWER_PRICE'),
    UPPER_PRICE: envOptionalNum('UPPER_PRICE'),
    BAND_PCT: envNum('BAND_PCT', GRID_CONSTANTS.BAND.DEFAULT_PCT),
    INTERPOLATION_STEPS: envNum('INTERPOLATION_STEPS', GRID_CONSTANTS.PATH.DEFAULT_INTERPOLATION_STEPS),
  },
  FILES: {
    OHLCV_PATH: process.env.OHLCV_PATH || 'ohlcv.json',
    TRADE_LOG_CSV: process.env.TRADE_LOG_CSV || null,
    SWEEP_CSV: process.env.SWEEP_CSV || 'sweep_results.csv',
  },
};

export type AppConfig = typeof CONFIG;
