import { GRID_CONSTANTS } from '../config/gridConstants';
import type { Lot } from './types';

export type ConsumeResult = { consumed: true; profit: number } | { consumed: false; available: number };

/**
 * Open purchase lots, oldest first. Sells draw from the head and split it when
 * the head is larger than what is left to fill.
 */
export class InventoryLedger {
  private lots: Lot[] = [];

  append(amount: number, price: number, timestamp: number) {
    if (!(amount > 0)) return;
    this.lots.push({ amount, price, timestamp });
  }

  /** All or nothing: a shortfall leaves every lot as it was. */
  consume(amount: number, sellPrice: number): ConsumeResult {
    const available = this.totalAmount();
    if (available < amount) {
      return { consumed: false, available };
    }

    let remaining = amount;
    let profit = 0;
    while (remaining > 0 && this.lots.length) {
      const head = this.lots[0];
      const slice = Math.min(head.amount, remaining);
      profit += (sellPrice - head.price) * slice;
      head.amount -= slice;
      remaining -= slice;
      if (head.amount <= GRID_CONSTANTS.PRECISION.LOT_DUST) {
        this.lots.shift();
      }
    }
    return { consumed: true, profit };
  }

  totalAmount(): number {
    return this.lots.reduce((sum, lot) => sum + lot.amount, 0);
  }

  depth(): number {
    return this.lots.length;
  }

  unrealizedProfit(markPrice: number): number {
    return this.lots.reduce((sum, lot) => sum + (markPrice - lot.price) * lot.amount, 0);
  }

  snapshot(): Lot[] {
    return this.lots.map((lot) => ({ ...lot }));
  }
}
