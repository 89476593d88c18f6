import type { InventoryLedger } from '../grid/inventoryLedger';
import type {
  GridBotParams,
  Position,
  SimulationResult,
  SkippedTradeCounts,
  TradeLogEntry,
} from '../grid/types';

export interface AggregationInput {
  params: GridBotParams;
  interpolationSteps: number;
  gridLines: number[];
  tradeLog: TradeLogEntry[];
  skippedTrades: SkippedTradeCounts;
  initialPosition: Position;
  finalPosition: Position;
  ledger: InventoryLedger;
  seedCoin: number;
  seedFee: number;
  notionalPerGrid: number;
  initialPrice: number;
  finalPrice: number;
  equityCurve: number[];
  candleCount: number;
}

/** Largest peak-to-trough decline of the equity curve, in percent of the peak. */
export function computeMaxDrawdownPct(equityCurve: readonly number[]): number {
  if (!equityCurve.length) return 0;
  let peak = equityCurve[0];
  let maxDrawdown = 0;
  for (const equity of equityCurve) {
    if (equity > peak) peak = equity;
    if (peak <= 0) continue;
    const drawdown = (peak - equity) / peak;
    if (drawdown > maxDrawdown) maxDrawdown = drawdown;
  }
  return maxDrawdown * 100;
}

export function aggregateResult(input: AggregationInput): SimulationResult {
  const { params, tradeLog, finalPosition, finalPrice, initialPrice, ledger } = input;
  const totalInvestment = params.totalInvestment;

  const finalValue = finalPosition.usdt + finalPosition.coin * finalPrice;
  const profitUsdt = finalValue - totalInvestment;

  let feesPaid = 0;
  let realizedProfit = 0;
  let buyCount = 0;
  let sellCount = 0;
  for (const entry of tradeLog) {
    feesPaid += entry.fee;
    if (entry.type === 'SELL') {
      sellCount += 1;
      realizedProfit += entry.realizedProfit;
    } else {
      buyCount += 1;
    }
  }

  const floatingProfit = ledger.unrealizedProfit(finalPrice);

  return {
    params: { ...params },
    interpolationSteps: input.interpolationSteps,
    initialInvestment: totalInvestment,
    finalValue,
    profitUsdt,
    profitPct: (profitUsdt / totalInvestment) * 100,
    realizedProfit,
    floatingProfit,
    feesPaid,
    seedFee: input.seedFee,
    totalFees: feesPaid + input.seedFee,
    numTrades: tradeLog.length,
    buyCount,
    sellCount,
    skippedTrades: { ...input.skippedTrades },
    tradeLog,
    gridLines: [...input.gridLines],
    seedCoin: input.seedCoin,
    notionalPerGrid: input.notionalPerGrid,
    initialPosition: { ...input.initialPosition },
    finalPosition: { ...finalPosition },
    openLots: ledger.snapshot(),
    initialPrice,
    finalPrice,
    priceChangePct: ((finalPrice - initialPrice) / initialPrice) * 100,
    maxDrawdownPct: computeMaxDrawdownPct(input.equityCurve),
    candleCount: input.candleCount,
  };
}
