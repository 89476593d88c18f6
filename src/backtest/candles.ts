import fs from 'fs';
import path from 'path';
import { CandleDataError } from '../grid/errors';
import type { Candle } from '../grid/types';
import { errorMessage } from '../utils/formatError';
import { logger } from '../utils/logger';

const TIMESTAMP_KEYS = ['timestamp', 'ts', 'time'];

/**
 * With both separators present the later one is the decimal mark and the other
 * groups thousands ("1.234,5" and "1,234.5" are both 1234.5). A lone comma is a
 * decimal mark; several commas and no dot are ambiguous and rejected.
 */
function normalizeDecimal(text: string): string | null {
  const lastComma = text.lastIndexOf(',');
  if (lastComma === -1) return text;
  const lastDot = text.lastIndexOf('.');
  if (lastDot === -1) {
    return text.indexOf(',') === lastComma ? text.replace(',', '.') : null;
  }
  return lastComma > lastDot ? text.replace(/\./g, '').replace(',', '.') : text.replace(/,/g, '');
}

function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const normalized = normalizeDecimal(trimmed);
    if (normalized === null) return null;
    const num = Number(normalized);
    return Number.isFinite(num) ? num : null;
  }
  return null;
}

function parseTimestamp(value: unknown): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms : null;
  }
  const numeric = parseNumber(value);
  if (numeric !== null) return numeric;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toRecord(row: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(row));
}

function normalizeRow(row: unknown): Candle | null {
  let fields: unknown[];
  if (Array.isArray(row)) {
    fields = row.slice(0, 6);
  } else if (typeof row === 'object' && row !== null) {
    const record = toRecord(row);
    const tsKey = TIMESTAMP_KEYS.find((key) => record[key] !== undefined);
    fields = [
      tsKey ? record[tsKey] : undefined,
      record.open,
      record.high,
      record.low,
      record.close,
      record.volume ?? record.vol,
    ];
  } else {
    return null;
  }

  const timestamp = parseTimestamp(fields[0]);
  const open = parseNumber(fields[1]);
  const high = parseNumber(fields[2]);
  const low = parseNumber(fields[3]);
  const close = parseNumber(fields[4]);
  if (timestamp === null || open === null || high === null || low === null || close === null) {
    return null;
  }
  return { timestamp, open, high, low, close, volume: parseNumber(fields[5]) ?? 0 };
}

/**
 * Accepts OHLCV tuples or objects (numeric strings and comma decimals allowed),
 * drops rows missing a usable timestamp or price, and sorts ascending.
 */
export function normalizeCandles(rows: readonly unknown[]): Candle[] {
  const candles: Candle[] = [];
  let dropped = 0;
  for (const row of rows) {
    const candle = normalizeRow(row);
    if (candle) {
      candles.push(candle);
    } else {
      dropped += 1;
    }
  }
  if (dropped > 0) {
    logger.warn('candles_dropped', { event: 'candles_dropped', dropped, kept: candles.length });
  }
  return candles.sort((a, b) => a.timestamp - b.timestamp);
}

export function loadCandlesFromFile(filePath: string): Candle[] {
  const resolved = path.resolve(process.cwd(), filePath);
  if (!fs.existsSync(resolved)) {
    throw new CandleDataError('candle_file_missing', `Candle file not found: ${resolved}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (error) {
    throw new CandleDataError('candle_file_invalid', `Candle file is not valid JSON: ${errorMessage(error)}`);
  }
  if (!Array.isArray(parsed)) {
    throw new CandleDataError('candle_file_invalid', 'Candle file must contain a JSON array');
  }

  const candles = normalizeCandles(parsed);
  if (!candles.length) {
    throw new CandleDataError('candle_file_empty', `No usable candles in ${resolved}`);
  }
  logger.info('candles_loaded', { event: 'candles_loaded', path: resolved, count: candles.length });
  return candles;
}
