import { afterEach, describe, expect, it, vi } from 'vitest';

const KEYS = ['NUM_GRIDS', 'GRID_MODE', 'LOWER_PRICE', 'UPPER_PRICE', 'FEE_RATE', 'LOG_LEVEL'] as const;

describe('CONFIG', () => {
  const saved = Object.fromEntries(KEYS.map((key) => [key, process.env[key]]));

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    vi.resetModules();
  });

  it('reads grid settings from the environment', async () => {
    process.env.NUM_GRIDS = '12';
    process.env.GRID_MODE = 'Arithmetic';
    process.env.LOWER_PRICE = '25000';
    process.env.UPPER_PRICE = '';
    process.env.FEE_RATE = '0.00075';
    process.env.LOG_LEVEL = 'DEBUG';
    vi.resetModules();

    const { CONFIG } = await import('../src/config');
    expect(CONFIG.BACKTEST.NUM_GRIDS).toBe(12);
    expect(CONFIG.BACKTEST.GRID_MODE).toBe('arithmetic');
    expect(CONFIG.BACKTEST.LOWER_PRICE).toBe(25000);
    expect(CONFIG.BACKTEST.UPPER_PRICE).toBeNull();
    expect(CONFIG.BACKTEST.FEE_RATE).toBe(0.00075);
    expect(CONFIG.LOG_LEVEL).toBe('debug');
  });

  it('keeps an unrecognised grid mode as written for validation downstream', async () => {
    process.env.GRID_MODE = 'Fibonacci';
    vi.resetModules();

    const { CONFIG } = await import('../src/config');
    expect(CONFIG.BACKTEST.GRID_MODE).toBe('fibonacci');
  });

  it('defaults to geometric mode when unset', async () => {
    delete process.env.GRID_MODE;
    vi.resetModules();

    const { CONFIG } = await import('../src/config');
    expect(CONFIG.BACKTEST.GRID_MODE).toBe('geometric');
  });
});
