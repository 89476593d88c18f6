import { describe, expect, it } from 'vitest';
import { InventoryLedger } from '../src/grid/inventoryLedger';

describe('InventoryLedger', () => {
  it('consumes oldest lots first and splits the head', () => {
    const ledger = new InventoryLedger();
    ledger.append(1, 100, 1);
    ledger.append(2, 110, 2);

    const result = ledger.consume(1.5, 120);
    expect(result).toEqual({ consumed: true, profit: 25 });
    expect(ledger.snapshot()).toEqual([{ amount: 1.5, price: 110, timestamp: 2 }]);
    expect(ledger.totalAmount()).toBe(1.5);
    expect(ledger.depth()).toBe(1);
  });

  it('leaves lots untouched when inventory is short', () => {
    const ledger = new InventoryLedger();
    ledger.append(1, 100, 1);
    ledger.append(0.5, 90, 2);

    expect(ledger.consume(2, 120)).toEqual({ consumed: false, available: 1.5 });
    expect(ledger.snapshot()).toEqual([
      { amount: 1, price: 100, timestamp: 1 },
      { amount: 0.5, price: 90, timestamp: 2 },
    ]);
  });

  it('drops a lot that is fully consumed', () => {
    const ledger = new InventoryLedger();
    ledger.append(2, 50, 1);
    const result = ledger.consume(2, 40);
    expect(result).toEqual({ consumed: true, profit: -20 });
    expect(ledger.depth()).toBe(0);
    expect(ledger.totalAmount()).toBe(0);
  });

  it('ignores non-positive appends', () => {
    const ledger = new InventoryLedger();
    ledger.append(0, 100, 1);
    ledger.append(-1, 100, 2);
    expect(ledger.depth()).toBe(0);
  });

  it('marks open lots to a price', () => {
    const ledger = new InventoryLedger();
    ledger.append(1.5, 110, 1);
    ledger.append(1, 80, 2);
    expect(ledger.unrealizedProfit(100)).toBe(5);
  });

  it('returns snapshots that do not alias internal lots', () => {
    const ledger = new InventoryLedger();
    ledger.append(1, 100, 1);
    const snap = ledger.snapshot();
    snap[0].amount = 42;
    expect(ledger.totalAmount()).toBe(1);
  });
});
