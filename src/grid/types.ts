export type GridMode = 'arithmetic' | 'geometric';

export type LevelSide = 'buy' | 'sell' | 'blocked';

export type TradeType = 'BUY' | 'SELL';

export type SkipReason = 'insufficient_coin' | 'insufficient_usdt';

export interface Candle {
  timestamp: number; // epoch ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface GridBotParams {
  totalInvestment: number;
  lowerPrice: number;
  upperPrice: number;
  numGrids: number;
  gridMode: GridMode;
  feeRate: number;
}

export interface GridSimulationOptions {
  /** Samples on the linear path between two closes, endpoints included. */
  interpolationSteps?: number;
}

export interface GridLevel {
  index: number;
  readonly price: number;
  side: LevelSide;
  readonly tradeAmount: number;
}

export interface Lot {
  amount: number;
  price: number;
  timestamp: number;
}

export interface Position {
  usdt: number;
  coin: number;
}

export interface TradeLogEntry {
  timestamp: number;
  type: TradeType;
  triggerPrice: number;
  gridPrice: number;
  amount: number;
  fee: number;
  realizedProfit: number;
  inventoryDepth: number;
}

export interface SkippedTradeCounts {
  insufficient_coin: number;
  insufficient_usdt: number;
}

export interface SimulationResult {
  params: GridBotParams;
  interpolationSteps: number;
  initialInvestment: number;
  finalValue: number;
  profitUsdt: number;
  profitPct: number;
  realizedProfit: number;
  floatingProfit: number;
  feesPaid: number;
  seedFee: number;
  totalFees: number;
  numTrades: number;
  buyCount: number;
  sellCount: number;
  skippedTrades: SkippedTradeCounts;
  tradeLog: TradeLogEntry[];
  gridLines: number[];
  seedCoin: number;
  notionalPerGrid: number;
  initialPosition: Position;
  finalPosition: Position;
  openLots: Lot[];
  initialPrice: number;
  finalPrice: number;
  priceChangePct: number;
  maxDrawdownPct: number;
  candleCount: number;
}
