import { GRID_CONSTANTS, isSamePrice } from '../config/gridConstants';
import { InventoryLedger } from './inventoryLedger';
import type { GridLevel, Position } from './types';

export interface CapitalAllocationInput {
  totalInvestment: number;
  gridLines: readonly number[];
  feeRate: number;
  initialPrice: number;
  timestamp: number;
}

export interface CapitalAllocation {
  levels: GridLevel[];
  position: Position;
  ledger: InventoryLedger;
  seedCoin: number;
  seedFee: number;
  notionalPerGrid: number;
}

/**
 * One-time setup. Half the capital is converted to coin at the first close so
 * that sell levels above it have inventory; every other level gets a fixed
 * coin amount worth an equal USDT notional. A line on the initial price
 * (within float tolerance) is left out of the tradable levels.
 */
export function allocateCapital(input: CapitalAllocationInput): CapitalAllocation {
  const { totalInvestment, gridLines, feeRate, initialPrice, timestamp } = input;
  const numGrids = gridLines.length - 1;

  const seedBudget = totalInvestment * GRID_CONSTANTS.ALLOCATION.SEED_FRACTION;
  const seedCoin = seedBudget / (initialPrice * (1 + feeRate));
  const seedFee = seedCoin * initialPrice * feeRate;

  const ledger = new InventoryLedger();
  ledger.append(seedCoin, initialPrice, timestamp);

  const position: Position = {
    usdt: totalInvestment - (seedCoin * initialPrice + seedFee),
    coin: seedCoin,
  };

  const notionalPerGrid = (totalInvestment * GRID_CONSTANTS.ALLOCATION.DEPLOYABLE_FRACTION) / numGrids;

  const levels: GridLevel[] = [];
  for (const price of gridLines) {
    if (isSamePrice(price, initialPrice)) continue;
    levels.push({
      index: levels.length,
      price,
      side: price > initialPrice ? 'sell' : 'buy',
      tradeAmount: notionalPerGrid / (price * (1 + feeRate)),
    });
  }

  return { levels, position, ledger, seedCoin, seedFee, notionalPerGrid };
}
