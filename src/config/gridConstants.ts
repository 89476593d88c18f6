/**
 * Grid Constants - thresholds and allocation ratios shared by the backtest engine
 */

export const GRID_CONSTANTS = {
  // Initial capital split
  ALLOCATION: {
    SEED_FRACTION: 0.5,         // half of the investment bought as coin up front
    DEPLOYABLE_FRACTION: 0.99,  // 1% held back as buffer
  },

  // Parameter domain
  LIMITS: {
    MIN_GRIDS: 2,
    MIN_FEE_RATE: 0,
    MAX_FEE_RATE: 0.1,          // exclusive
    MIN_INTERPOLATION_STEPS: 2,
  },

  // Intrabar path approximation
  PATH: {
    DEFAULT_INTERPOLATION_STEPS: 20,
  },

  // Numeric tolerances
  PRECISION: {
    LOT_DUST: 1e-12,            // lots at or below this are dropped
    INVENTORY_TOLERANCE: 1e-8,  // Σ lots vs coin balance
    PRICE_TOLERANCE_RATIO: 1e-9,
    DISPLAY_DECIMALS: 4,
  },

  // Default band around the start price
  BAND: {
    DEFAULT_PCT: 0.3,
  },

  // Synthetic data defaults
  SYNTHETIC: {
    DEFAULT_BARS: 7 * 24,
    DEFAULT_INTERVAL_MS: 60 * 60 * 1000,
    DEFAULT_VOLUME: 100,
  },
} as const;


export const isSamePrice = (a: number, b: number): boolean => {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return Math.abs(a - b) <= scale * GRID_CONSTANTS.PRECISION.PRICE_TOLERANCE_RATIO;
};

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};
