import type { InventoryLedger } from './inventoryLedger';
import type { GridLevel, Position, SkipReason, TradeLogEntry } from './types';

export interface ExecutionContext {
  position: Position;
  ledger: InventoryLedger;
  feeRate: number;
}

export type TradeOutcome =
  | { status: 'executed'; entry: TradeLogEntry }
  | { status: 'skipped'; reason: SkipReason; required: number; available: number };

function executeSell(
  ctx: ExecutionContext,
  level: GridLevel,
  triggerPrice: number,
  timestamp: number
): TradeOutcome {
  const amount = level.tradeAmount;
  if (ctx.position.coin < amount) {
    return { status: 'skipped', reason: 'insufficient_coin', required: amount, available: ctx.position.coin };
  }
  const consumed = ctx.ledger.consume(amount, level.price);
  if (!consumed.consumed) {
    return { status: 'skipped', reason: 'insufficient_coin', required: amount, available: consumed.available };
  }

  const gross = amount * level.price;
  const fee = gross * ctx.feeRate;
  ctx.position.usdt += gross - fee;
  ctx.position.coin -= amount;

  return {
    status: 'executed',
    entry: {
      timestamp,
      type: 'SELL',
      triggerPrice,
      gridPrice: level.price,
      amount,
      fee,
      realizedProfit: consumed.profit - fee,
      inventoryDepth: ctx.ledger.depth(),
    },
  };
}

function executeBuy(
  ctx: ExecutionContext,
  level: GridLevel,
  triggerPrice: number,
  timestamp: number
): TradeOutcome {
  const amount = level.tradeAmount;
  const gross = amount * level.price;
  const required = gross * (1 + ctx.feeRate);
  if (ctx.position.usdt < required) {
    return { status: 'skipped', reason: 'insufficient_usdt', required, available: ctx.position.usdt };
  }

  const fee = gross * ctx.feeRate;
  ctx.position.usdt -= required;
  ctx.position.coin += amount;
  ctx.ledger.append(amount, level.price, timestamp);

  return {
    status: 'executed',
    entry: {
      timestamp,
      type: 'BUY',
      triggerPrice,
      gridPrice: level.price,
      amount,
      fee,
      realizedProfit: 0,
      inventoryDepth: ctx.ledger.depth(),
    },
  };
}

/**
 * Applies one grid trade at the level's own price. Shortfalls come back as a
 * skipped outcome; the caller owns blocking and last-traded bookkeeping.
 */
export function executeGridTrade(
  ctx: ExecutionContext,
  level: GridLevel,
  triggerPrice: number,
  timestamp: number
): TradeOutcome | null {
  if (level.side === 'sell') return executeSell(ctx, level, triggerPrice, timestamp);
  if (level.side === 'buy') return executeBuy(ctx, level, triggerPrice, timestamp);
  return null;
}
