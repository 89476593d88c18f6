#!/usr/bin/env ts-node
import { writeFileSync } from 'fs';
import path from 'path';
import { CONFIG } from '../src/config';
import { loadCandlesFromFile } from '../src/backtest/candles';
import { bestSweepRow, runParameterSweep, type SweepGrid } from '../src/backtest/param_sweep';
import { sweepRowsToCsv } from '../src/backtest/reporting';
import { isGridMode } from '../src/grid/validation';
import type { GridMode } from '../src/grid/types';
import { resolveGridParams } from '../src/backtest/runner';
import { formatError } from '../src/utils/formatError';
import { logger, setLogContext, setLogIngestionWebhook, setLogLevel } from '../src/utils/logger';

function envList(name: string): string[] | undefined {
  const raw = process.env[name];
  if (!raw || !raw.trim()) return undefined;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function envNumList(name: string): number[] | undefined {
  return envList(name)?.map(Number);
}

function envModeList(name: string): GridMode[] | undefined {
  const values = envList(name);
  if (!values) return undefined;
  const modes = values.map((v) => v.toLowerCase()).filter(isGridMode);
  if (modes.length !== values.length) {
    throw new Error(`${name} accepts only arithmetic,geometric (got ${values.join(',')})`);
  }
  return modes;
}

function main() {
  setLogLevel(CONFIG.LOG_LEVEL);
  setLogContext({ run: 'sweep', symbol: CONFIG.BACKTEST.SYMBOL });
  if (CONFIG.LOG_INGEST_WEBHOOK) setLogIngestionWebhook(CONFIG.LOG_INGEST_WEBHOOK);

  const candles = loadCandlesFromFile(CONFIG.FILES.OHLCV_PATH);
  const base = resolveGridParams(CONFIG.BACKTEST, candles[0].close);
  const grid: SweepGrid = {
    numGrids: envNumList('SWEEP_NUM_GRIDS') ?? [10, 20, 40],
    gridMode: envModeList('SWEEP_GRID_MODES') ?? ['arithmetic', 'geometric'],
    lowerPrice: envNumList('SWEEP_LOWER'),
    upperPrice: envNumList('SWEEP_UPPER'),
    feeRate: envNumList('SWEEP_FEE_RATES'),
  };

  const rows = runParameterSweep(candles, base, grid, {
    interpolationSteps: CONFIG.BACKTEST.INTERPOLATION_STEPS,
  });
  const out = path.resolve(process.cwd(), CONFIG.FILES.SWEEP_CSV);
  writeFileSync(out, sweepRowsToCsv(rows), 'utf8');
  logger.info('sweep_written', { event: 'sweep_written', path: out, rows: rows.length });

  const best = bestSweepRow(rows);
  if (best) {
    logger.info('sweep_best', { event: 'sweep_best', ...best });
  } else {
    logger.warn('sweep_no_valid_rows', { event: 'sweep_no_valid_rows' });
  }
}

try {
  main();
} catch (err) {
  logger.error('sweep_failed', { event: 'sweep_failed', error: formatError(err) });
  process.exitCode = 1;
}
