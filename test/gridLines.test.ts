import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/grid/errors';
import { calculateGridLines, suggestGridBounds } from '../src/grid/gridLines';
import { validateGridMode } from '../src/grid/validation';
import { captureError } from './helpers/gridFixtures';

function expectValidationCode(fn: () => unknown, code: string) {
  const error = captureError(fn);
  expect(error).toBeInstanceOf(ValidationError);
  if (error instanceof ValidationError) expect(error.code).toBe(code);
}

describe('calculateGridLines', () => {
  it('spaces arithmetic levels by a constant step', () => {
    expect(calculateGridLines(100, 200, 4, 'arithmetic')).toEqual([100, 125, 150, 175, 200]);

    const lines = calculateGridLines(0.3, 0.7, 7, 'arithmetic');
    for (let i = 1; i < lines.length; i++) {
      expect(lines[i] - lines[i - 1]).toBeCloseTo(0.4 / 7, 12);
    }
  });

  it('spaces geometric levels by a constant ratio', () => {
    expect(calculateGridLines(100, 400, 2, 'geometric')).toEqual([100, 200, 400]);

    const lines = calculateGridLines(1000, 2000, 10, 'geometric');
    const ratio = 2 ** (1 / 10);
    for (let i = 1; i < lines.length; i++) {
      expect(lines[i] / lines[i - 1]).toBeCloseTo(ratio, 12);
    }
  });

  it('returns numGrids + 1 ascending levels with exact bounds', () => {
    for (const mode of ['arithmetic', 'geometric'] as const) {
      const lines = calculateGridLines(0.3, 0.7, 7, mode);
      expect(lines).toHaveLength(8);
      expect(lines[0]).toBe(0.3);
      expect(lines[7]).toBe(0.7);
      for (let i = 1; i < lines.length; i++) expect(lines[i]).toBeGreaterThan(lines[i - 1]);
    }
  });

  it('rejects invalid bounds and counts', () => {
    expectValidationCode(() => calculateGridLines(200, 100, 4, 'arithmetic'), 'grid_bounds_inverted');
    expectValidationCode(() => calculateGridLines(100, 100, 4, 'arithmetic'), 'grid_bounds_inverted');
    expectValidationCode(() => calculateGridLines(0, 100, 4, 'geometric'), 'grid_lower_not_positive');
    expectValidationCode(() => calculateGridLines(10, 100, 1, 'arithmetic'), 'grid_count_invalid');
    expectValidationCode(() => calculateGridLines(10, 100, 2.5, 'arithmetic'), 'grid_count_invalid');
    expectValidationCode(() => calculateGridLines(Number.NaN, 100, 4, 'arithmetic'), 'param_not_numeric');
  });

  it('rejects unknown grid modes', () => {
    expectValidationCode(() => validateGridMode('logarithmic'), 'grid_mode_invalid');
    expect(() => validateGridMode('geometric')).not.toThrow();
  });
});

describe('suggestGridBounds', () => {
  it('defaults to a 30% band around the start price', () => {
    expect(suggestGridBounds(50_000)).toEqual({ lowerPrice: 35_000, upperPrice: 65_000 });
  });

  it('rounds bounds to four decimals', () => {
    expect(suggestGridBounds(1.23456, 0.1)).toEqual({ lowerPrice: 1.1111, upperPrice: 1.358 });
  });

  it('rejects unusable inputs', () => {
    expectValidationCode(() => suggestGridBounds(0), 'start_price_invalid');
    expectValidationCode(() => suggestGridBounds(100, 1), 'band_pct_invalid');
  });
});
