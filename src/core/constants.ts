/**
 * Constants for the Black-Scholes-Merton Terminal
 */

import type { DisplayOptions, SolverSettings } from './types.js';

// ============================================================================
// OPTIONS PRICING CONSTANTS
// ============================================================================

export const PRICING = {
  // Calendar convention for the terminal's "days to expiry" input
  DAYS_IN_YEAR: 365,

  // Default dividend yield when none is entered
  DEFAULT_DIVIDEND_YIELD: 0,

  // Beyond this |x| the normal CDF is 0 or 1 in double precision
  NORM_CDF_CUTOFF: 37,
} as const;

// ============================================================================
// IMPLIED VOLATILITY SOLVER
// ============================================================================

export const IV_SOLVER: Readonly<SolverSettings> = {
  lowerBound: 1e-6,     // Just above zero
  upperBound: 5.0,      // 500% annualized
  tolerance: 1e-10,     // Absolute, on sigma
  maxIterations: 200,
};

// ============================================================================
// DISPLAY CONSTANTS
// ============================================================================

export const DISPLAY: Readonly<DisplayOptions> = {
  color: true,
  width: 72,
  priceDecimals: 2,
  greekDecimals: 4,
  gammaDecimals: 6,
  currencySymbol: '$',
  thetaPerDay: false,
};

export const REPORT_TITLES = {
  HEADER: ' BLACK–SCHOLES OPTION PRICING MODEL ',
  RESULTS: ' RESULTS ',
  GREEKS: ' GREEKS ',
  IMPLIED_VOL: ' IMPLIED VOLATILITY ',
} as const;

// ============================================================================
// LOGGING CONSTANTS
// ============================================================================

export const LOGGING = {
  DEFAULT_LEVEL: 'warn',
  FILE_MAX_SIZE: '10485760',
  FILE_MAX_FILES: 5,
  LOG_DIR: './logs/',
} as const;
