/**
 * Black-Scholes-Merton Terminal - Library Entry Point
 *
 * Closed-form European option prices and Greeks with continuous dividend
 * yield, plus a bracketed implied-volatility solver.
 */

export * from './pricing/index.js';
export { buildPricingReport } from './cli/report.js';
export { renderPricingReport, renderHeader, describeIVResult } from './cli/render.js';
export { loadConfig, getConfig } from './config/index.js';
export {
  PricingSystemError,
  PreconditionViolationError,
  InputParseError,
  ConfigurationError,
  isPricingSystemError,
  wrapError,
} from './core/errors.js';
export { PRICING, IV_SOLVER, DISPLAY } from './core/constants.js';
export type * from './core/types.js';
