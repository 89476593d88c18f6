// src/backtest/reporting.ts
// CSV views of a finished backtest for spreadsheets and ad-hoc comparison.
import type { TradeLogEntry } from '../grid/types';
import type { SweepRow } from './param_sweep';

const TRADE_LOG_HEADER = [
  'timestamp',
  'type',
  'trigger_price',
  'grid_price',
  'amount',
  'fee',
  'realized_profit',
  'inventory_depth',
];

const SWEEP_HEADER = [
  'num_grids',
  'grid_mode',
  'lower_price',
  'upper_price',
  'fee_rate',
  'num_trades',
  'final_value',
  'profit_pct',
  'realized_profit',
  'floating_profit',
  'max_drawdown_pct',
  'error',
];

function cell(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function toCsv(header: string[], rows: Array<Array<string | number | null | undefined>>): string {
  return [header.join(','), ...rows.map((row) => row.map(cell).join(','))].join('\n') + '\n';
}

export function tradeLogToCsv(entries: readonly TradeLogEntry[]): string {
  return toCsv(
    TRADE_LOG_HEADER,
    entries.map((e) => [
      new Date(e.timestamp).toISOString(),
      e.type,
      e.triggerPrice,
      e.gridPrice,
      e.amount,
      e.fee,
      e.realizedProfit,
      e.inventoryDepth,
    ])
  );
}

export function sweepRowsToCsv(rows: readonly SweepRow[]): string {
  return toCsv(
    SWEEP_HEADER,
    rows.map((r) => [
      r.params.numGrids,
      r.params.gridMode,
      r.params.lowerPrice,
      r.params.upperPrice,
      r.params.feeRate,
      r.numTrades,
      r.finalValue,
      r.profitPct,
      r.realizedProfit,
      r.floatingProfit,
      r.maxDrawdownPct,
      r.error,
    ])
  );
}
