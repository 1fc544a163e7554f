/**
 * Implied Volatility Calculator
 *
 * Inverts the Black-Scholes-Merton price over volatility with Brent's
 * method. Prices under the discounted intrinsic value are rejected before
 * any search, and every failure comes back as a distinct result rather than
 * a sentinel volatility.
 */

import { IV_SOLVER } from '../core/constants.js';
import { PreconditionViolationError } from '../core/errors.js';
import { pricingLogger } from '../utils/logger.js';
import { calculateDiscountedIntrinsicValue, calculateOptionPrice } from './black-scholes.js';
import { brentRoot } from './root-finding.js';
import { assertIVParameters, assertMarketPrice } from './validation.js';
import type {
  BatchIVResult,
  ImpliedVolatilityPair,
  ImpliedVolatilityQuery,
  ImpliedVolatilityResult,
  IVConverged,
  MarketParametersWithoutVol,
  SolverSettings,
} from '../core/types.js';

// ============================================================================
// SETTINGS
// ============================================================================

function assertSolverSettings(settings: SolverSettings): void {
  const { lowerBound, upperBound, tolerance, maxIterations } = settings;

  if (!(lowerBound > 0) || !Number.isFinite(lowerBound)) {
    throw new PreconditionViolationError('solver.lowerBound', lowerBound, 'must be greater than zero');
  }
  if (!(upperBound > lowerBound) || !Number.isFinite(upperBound)) {
    throw new PreconditionViolationError('solver.upperBound', upperBound, 'must exceed the lower bound');
  }
  if (!(tolerance > 0)) {
    throw new PreconditionViolationError('solver.tolerance', tolerance, 'must be greater than zero');
  }
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new PreconditionViolationError('solver.maxIterations', maxIterations, 'must be a positive integer');
  }
}

// ============================================================================
// IV CALCULATION
// ============================================================================

/**
 * Solve for the volatility that reproduces `query.marketPrice`.
 *
 * Throws PreconditionViolationError for inputs outside the model's domain
 * (non-positive market price, spot, strike or time).
 */
export function calculateIV(
  query: ImpliedVolatilityQuery,
  settings: SolverSettings = IV_SOLVER
): ImpliedVolatilityResult {
  assertSolverSettings(settings);
  const marketPrice = assertMarketPrice(query.marketPrice);
  const base = assertIVParameters(query.params);
  const { optionType } = query;

  // No volatility can price an option under its no-arbitrage floor
  const intrinsicValue = calculateDiscountedIntrinsicValue(base, optionType);
  if (marketPrice < intrinsicValue) {
    pricingLogger.debug('Market price below discounted intrinsic value', {
      optionType,
      marketPrice,
      intrinsicValue,
    });
    return { status: 'BELOW_INTRINSIC', intrinsicValue, marketPrice };
  }

  const objective = (volatility: number): number =>
    calculateOptionPrice({ ...base, volatility }, optionType) - marketPrice;

  const { lowerBound, upperBound } = settings;
  const result = brentRoot(objective, lowerBound, upperBound, {
    tolerance: settings.tolerance,
    maxIterations: settings.maxIterations,
  });

  if (!result.converged) {
    pricingLogger.debug('IV solver did not converge', {
      optionType,
      marketPrice,
      reason: result.reason,
      iterations: result.iterations,
    });
    return { status: 'NOT_CONVERGED', reason: result.reason, iterations: result.iterations };
  }

  // A root on the bracket edge means the true root lies outside it
  if (result.root <= lowerBound || result.root >= upperBound) {
    pricingLogger.debug('IV solver hit the search boundary', {
      optionType,
      marketPrice,
      root: result.root,
    });
    return { status: 'NOT_CONVERGED', reason: 'NO_BRACKET', iterations: result.iterations };
  }

  return { status: 'CONVERGED', volatility: result.root, iterations: result.iterations };
}

/**
 * Call-side and put-side IV for the same quoted price, solved independently
 */
export function calculateIVPair(
  marketPrice: number,
  params: MarketParametersWithoutVol,
  settings: SolverSettings = IV_SOLVER
): ImpliedVolatilityPair {
  return {
    call: calculateIV({ marketPrice, params, optionType: 'CALL' }, settings),
    put: calculateIV({ marketPrice, params, optionType: 'PUT' }, settings),
  };
}

/**
 * Solve many queries. Each entry stands alone: invalid inputs in one query
 * become that entry's INVALID_INPUT result.
 */
export function calculateIVBatch(
  queries: readonly ImpliedVolatilityQuery[],
  settings: SolverSettings = IV_SOLVER
): BatchIVResult[] {
  return queries.map((query): BatchIVResult => {
    try {
      return calculateIV(query, settings);
    } catch (error) {
      if (error instanceof PreconditionViolationError) {
        return { status: 'INVALID_INPUT', message: error.message };
      }
      throw error;
    }
  });
}

/**
 * Narrow a result to the converged case
 */
export function isConverged(result: BatchIVResult): result is IVConverged {
  return result.status === 'CONVERGED';
}
