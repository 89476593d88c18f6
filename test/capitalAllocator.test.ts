import { describe, expect, it } from 'vitest';
import { allocateCapital } from '../src/grid/capitalAllocator';
import { calculateGridLines } from '../src/grid/gridLines';

describe('allocateCapital', () => {
  const base = {
    totalInvestment: 10_000,
    gridLines: [80, 90, 100, 110, 120],
    feeRate: 0.001,
    timestamp: 5,
  };

  it('buys half the capital as seed coin at the first close', () => {
    const alloc = allocateCapital({ ...base, initialPrice: 100 });
    const seedCoin = 5000 / (100 * 1.001);

    expect(alloc.seedCoin).toBeCloseTo(seedCoin, 12);
    expect(alloc.seedFee).toBeCloseTo(seedCoin * 100 * 0.001, 12);
    expect(alloc.position.coin).toBe(alloc.seedCoin);
    expect(alloc.position.usdt).toBeCloseTo(5000, 9);
    expect(alloc.ledger.snapshot()).toEqual([{ amount: alloc.seedCoin, price: 100, timestamp: 5 }]);
  });

  it('sizes every level to the same notional and drops the line on the initial price', () => {
    const alloc = allocateCapital({ ...base, initialPrice: 100 });

    expect(alloc.notionalPerGrid).toBe(2475);
    expect(alloc.levels.map((l) => l.price)).toEqual([80, 90, 110, 120]);
    expect(alloc.levels.map((l) => l.index)).toEqual([0, 1, 2, 3]);
    expect(alloc.levels.map((l) => l.side)).toEqual(['buy', 'buy', 'sell', 'sell']);
    for (const lvl of alloc.levels) {
      expect(lvl.tradeAmount).toBeCloseTo(2475 / (lvl.price * 1.001), 12);
      expect(lvl.tradeAmount * lvl.price * 1.001).toBeCloseTo(2475, 9);
    }
  });

  it('keeps every line when the initial price sits between levels', () => {
    const alloc = allocateCapital({ ...base, initialPrice: 95 });
    expect(alloc.levels).toHaveLength(5);
    expect(alloc.levels.map((l) => l.side)).toEqual(['buy', 'buy', 'sell', 'sell', 'sell']);
  });

  it('drops a geometric line that only misses the initial price by float error', () => {
    const gridLines = calculateGridLines(1, 8, 6, 'geometric');
    expect(gridLines[2]).not.toBe(2);
    expect(gridLines[2]).toBeCloseTo(2, 12);

    const alloc = allocateCapital({ ...base, gridLines, initialPrice: 2 });
    expect(alloc.levels).toHaveLength(6);
    expect(alloc.levels.map((l) => l.price)).not.toContain(gridLines[2]);
    expect(alloc.levels.map((l) => l.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });
});
