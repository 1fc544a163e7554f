/**
 * Input Validation for the Pricing Engine and IV Solver
 *
 * Zod schemas mirror the model's domain: spot, strike, time and volatility
 * strictly positive, every figure finite. Rates and yields may be negative.
 */

import { z } from 'zod';
import { PRICING } from '../core/constants.js';
import { PreconditionViolationError } from '../core/errors.js';
import type {
  MarketParameters,
  MarketParametersWithoutVol,
  TerminalInputs,
  ValidationOutcome,
} from '../core/types.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const finiteNumber = () =>
  z
    .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite('must be a finite number');

const positiveNumber = () => finiteNumber().positive('must be greater than zero');

export const marketParametersSchema = z.object({
  spot: positiveNumber(),
  strike: positiveNumber(),
  timeToExpiry: positiveNumber(),
  riskFreeRate: finiteNumber(),
  dividendYield: finiteNumber(),
  volatility: positiveNumber(),
});

export const ivParametersSchema = marketParametersSchema.omit({ volatility: true });

export const marketPriceSchema = positiveNumber();

const terminalInputsSchema = z.object({
  spot: positiveNumber(),
  strike: positiveNumber(),
  days: positiveNumber(),
  rate: finiteNumber(),
  volatility: positiveNumber(),
  dividendYield: finiteNumber().default(PRICING.DEFAULT_DIVIDEND_YIELD),
  marketPrice: positiveNumber().optional(),
});

// ============================================================================
// VALIDATION
// ============================================================================

function toViolation(input: unknown, error: z.ZodError, fallbackField: string): PreconditionViolationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : fallbackField;
  return new PreconditionViolationError(field, readField(input, field), issue?.message ?? 'invalid value');
}

function readField(input: unknown, field: string): unknown {
  if (typeof input !== 'object' || input === null) {
    return input;
  }
  const entry = Object.entries(input).find(([key]) => key === field);
  return entry?.[1];
}

/**
 * Check full model inputs without throwing
 */
export function validateMarketParameters(input: unknown): ValidationOutcome<MarketParameters> {
  const result = marketParametersSchema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: toViolation(input, result.error, 'parameters') };
}

/**
 * Throw PreconditionViolationError unless the inputs are inside the model's domain
 */
export function assertMarketParameters(input: unknown): MarketParameters {
  const outcome = validateMarketParameters(input);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}

/**
 * Same as assertMarketParameters, minus volatility (which the solver searches for)
 */
export function assertIVParameters(input: unknown): MarketParametersWithoutVol {
  const result = ivParametersSchema.safeParse(input);
  if (!result.success) {
    throw toViolation(input, result.error, 'parameters');
  }
  return result.data;
}

export function assertMarketPrice(marketPrice: number): number {
  const result = marketPriceSchema.safeParse(marketPrice);
  if (!result.success) {
    throw toViolation({ marketPrice }, result.error, 'marketPrice');
  }
  return result.data;
}

// ============================================================================
// TERMINAL CONVERSION
// ============================================================================

/**
 * Convert terminal figures (time in days, optional dividend yield) into model inputs
 */
export function fromTerminalInputs(
  inputs: TerminalInputs
): ValidationOutcome<{ params: MarketParameters; marketPrice?: number }> {
  const result = terminalInputsSchema.safeParse(inputs);
  if (!result.success) {
    return { ok: false, error: toViolation(inputs, result.error, 'inputs') };
  }

  const { spot, strike, days, rate, volatility, dividendYield, marketPrice } = result.data;
  const params: MarketParameters = {
    spot,
    strike,
    timeToExpiry: days / PRICING.DAYS_IN_YEAR,
    riskFreeRate: rate,
    dividendYield,
    volatility,
  };

  return {
    ok: true,
    value: marketPrice === undefined ? { params } : { params, marketPrice },
  };
}
