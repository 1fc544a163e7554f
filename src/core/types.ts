/**
 * Core Type Definitions for the Black-Scholes-Merton Terminal
 *
 * Every value here is immutable and created per calculation.
 */

import type { PreconditionViolationError } from './errors.js';

// ============================================================================
// MARKET INPUTS
// ============================================================================

export type OptionType = 'CALL' | 'PUT';

/**
 * Inputs to the closed-form model
 */
export interface MarketParameters {
  readonly spot: number;
  readonly strike: number;
  readonly timeToExpiry: number;    // In years
  readonly riskFreeRate: number;    // Continuously compounded, e.g. 0.05 for 5%
  readonly dividendYield: number;   // Continuous yield, e.g. 0.03 for 3%
  readonly volatility: number;      // Annualized, e.g. 0.20 for 20%
}

/**
 * Market inputs without volatility (what the IV solver is given)
 */
export type MarketParametersWithoutVol = Omit<MarketParameters, 'volatility'>;

/**
 * Raw figures as the terminal collects them (time in days)
 */
export interface TerminalInputs {
  spot: number;
  strike: number;
  days: number;
  rate: number;
  volatility: number;
  dividendYield?: number;
  marketPrice?: number;
}

// ============================================================================
// PRICING OUTPUTS
// ============================================================================

export interface D1D2 {
  d1: number;
  d2: number;
  sqrtT: number;
}

export interface DiscountFactors {
  discR: number;   // exp(-rT), strike leg
  discQ: number;   // exp(-qT), spot leg
}

/**
 * Price and Greeks for a single option type
 */
export interface PricingResult {
  optionType: OptionType;
  price: number;
  delta: number;
  gamma: number;
  vega: number;     // Per 1.00 change in volatility
  theta: number;    // Per year
  rho: number;      // Per 1.00 change in rate
  d1: number;
  d2: number;
}

/**
 * Prices and Greeks for both sides at once
 */
export interface GreeksResult {
  call: number;
  put: number;
  deltaCall: number;
  deltaPut: number;
  gamma: number;
  vega: number;
  thetaCall: number;
  thetaPut: number;
  rhoCall: number;
  rhoPut: number;
  d1: number;
  d2: number;
}

// ============================================================================
// IMPLIED VOLATILITY
// ============================================================================

export interface ImpliedVolatilityQuery {
  marketPrice: number;
  params: MarketParametersWithoutVol & { volatility?: number };
  optionType: OptionType;
}

export type NonConvergenceReason = 'NO_BRACKET' | 'MAX_ITERATIONS';

export interface IVConverged {
  status: 'CONVERGED';
  volatility: number;
  iterations: number;
}

export interface IVBelowIntrinsic {
  status: 'BELOW_INTRINSIC';
  intrinsicValue: number;
  marketPrice: number;
}

export interface IVNotConverged {
  status: 'NOT_CONVERGED';
  reason: NonConvergenceReason;
  iterations: number;
}

export type ImpliedVolatilityResult = IVConverged | IVBelowIntrinsic | IVNotConverged;

export interface IVInvalidInput {
  status: 'INVALID_INPUT';
  message: string;
}

export type BatchIVResult = ImpliedVolatilityResult | IVInvalidInput;

export interface ImpliedVolatilityPair {
  call: ImpliedVolatilityResult;
  put: ImpliedVolatilityResult;
}

export interface SolverSettings {
  lowerBound: number;
  upperBound: number;
  tolerance: number;
  maxIterations: number;
}

// ============================================================================
// ROOT FINDING
// ============================================================================

export type RootFindingResult =
  | { converged: true; root: number; iterations: number }
  | { converged: false; reason: NonConvergenceReason; iterations: number };

export interface RootFindingOptions {
  tolerance: number;
  maxIterations: number;
}

// ============================================================================
// VALIDATION
// ============================================================================

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: PreconditionViolationError };

// ============================================================================
// DISPLAY & CONFIGURATION
// ============================================================================

export interface DisplayOptions {
  color: boolean;
  width: number;
  priceDecimals: number;
  greekDecimals: number;
  gammaDecimals: number;
  currencySymbol: string;
  thetaPerDay: boolean;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
}

export interface SystemConfig {
  solver: SolverSettings;
  display: DisplayOptions;
  logging: LoggingConfig;
}

/**
 * Everything the renderer needs for one run
 */
export interface PricingReport {
  inputs: MarketParameters;
  greeks: GreeksResult;
  marketPrice?: number;
  impliedVolatility?: ImpliedVolatilityPair;
}
