/**
 * Options Pricing Module Exports
 */

// Black-Scholes-Merton
export {
  normCDF,
  normPDF,
  calculateD1D2,
  calculateDiscountFactors,
  calculateOptionPrice,
  calculateCallPrice,
  calculatePutPrice,
  calculateGreeks,
  calculatePricingResult,
  calculateParityGap,
  calculateDiscountedIntrinsicValue,
} from './black-scholes.js';

// IV Calculator
export {
  calculateIV,
  calculateIVPair,
  calculateIVBatch,
  isConverged,
} from './iv-calculator.js';

// Root finding
export { brentRoot } from './root-finding.js';

// Validation
export {
  marketParametersSchema,
  ivParametersSchema,
  validateMarketParameters,
  assertMarketParameters,
  assertIVParameters,
  assertMarketPrice,
  fromTerminalInputs,
} from './validation.js';
