/**
 * Report assembly: terminal figures in, engine and solver results out
 */

import { calculateGreeks } from '../pricing/black-scholes.js';
import { calculateIVPair } from '../pricing/iv-calculator.js';
import { fromTerminalInputs } from '../pricing/validation.js';
import type { PricingReport, SolverSettings, TerminalInputs, ValidationOutcome } from '../core/types.js';

/**
 * Price both sides and, when a market price was given, solve call and put IV.
 * Out-of-domain inputs are returned as a failed outcome before any pricing.
 */
export function buildPricingReport(
  inputs: TerminalInputs,
  solver: SolverSettings
): ValidationOutcome<PricingReport> {
  const converted = fromTerminalInputs(inputs);
  if (!converted.ok) {
    return converted;
  }

  const { params, marketPrice } = converted.value;
  const greeks = calculateGreeks(params);

  if (marketPrice === undefined) {
    return { ok: true, value: { inputs: params, greeks } };
  }

  return {
    ok: true,
    value: {
      inputs: params,
      greeks,
      marketPrice,
      impliedVolatility: calculateIVPair(marketPrice, params, solver),
    },
  };
}
