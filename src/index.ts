// src/index.ts (env-driven single backtest run; also the package entry point)
import fs from 'fs';
import path from 'path';
import { CONFIG } from './config';
import { loadCandlesFromFile } from './backtest/candles';
import { simulateGridBot } from './backtest/grid_sim';
import { tradeLogToCsv } from './backtest/reporting';
import { resolveGridParams, summarizeResult } from './backtest/runner';
import { formatError } from './utils/formatError';
import { logger, setLogContext, setLogIngestionWebhook, setLogLevel } from './utils/logger';

export { GridSimulator, simulateGridBot } from './backtest/grid_sim';
export type { GridSimulatorOptions, TradeObserverState } from './backtest/grid_sim';
export { loadCandlesFromFile, normalizeCandles } from './backtest/candles';
export { generateSyntheticCandles, linearCandles } from './backtest/syntheticCandles';
export { runParameterSweep, expandSweepGrid, bestSweepRow } from './backtest/param_sweep';
export type { SweepGrid, SweepRow } from './backtest/param_sweep';
export { tradeLogToCsv, sweepRowsToCsv } from './backtest/reporting';
export { resolveGridParams, summarizeResult } from './backtest/runner';
export { calculateGridLines, suggestGridBounds } from './grid/gridLines';
export { InventoryLedger } from './grid/inventoryLedger';
export { ValidationError, CandleDataError } from './grid/errors';
export * from './grid/types';

async function main() {
  setLogLevel(CONFIG.LOG_LEVEL);
  setLogContext({ run: 'backtest', symbol: CONFIG.BACKTEST.SYMBOL });
  if (CONFIG.LOG_INGEST_WEBHOOK) {
    setLogIngestionWebhook(CONFIG.LOG_INGEST_WEBHOOK);
  }

  const candles = loadCandlesFromFile(CONFIG.FILES.OHLCV_PATH);
  const params = resolveGridParams(CONFIG.BACKTEST, candles[0].close);
  logger.info('grid_backtest_params', { event: 'grid_backtest_params', symbol: CONFIG.BACKTEST.SYMBOL, params });

  const result = simulateGridBot(candles, params, {
    interpolationSteps: CONFIG.BACKTEST.INTERPOLATION_STEPS,
  });
  logger.info('grid_backtest_summary', { event: 'grid_backtest_summary', ...summarizeResult(result) });

  if (CONFIG.FILES.TRADE_LOG_CSV) {
    const out = path.resolve(process.cwd(), CONFIG.FILES.TRADE_LOG_CSV);
    await fs.promises.writeFile(out, tradeLogToCsv(result.tradeLog), 'utf8');
    logger.info('trade_log_written', { event: 'trade_log_written', path: out, rows: result.tradeLog.length });
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error('grid_backtest_failed', { event: 'grid_backtest_failed', error: formatError(err) });
    process.exitCode = 1;
  });
}
