/**
 * Black-Scholes-Merton Pricing with Continuous Dividend Yield
 *
 * Closed-form European call/put prices and Greeks. Every entry point checks
 * its inputs first and throws PreconditionViolationError outside the model's
 * domain. Finite inputs whose discount factors or prices overflow double
 * precision are rejected the same way, so a returned price is always finite.
 */

import { PRICING } from '../core/constants.js';
import { PreconditionViolationError } from '../core/errors.js';
import { assertMarketParameters, assertIVParameters } from './validation.js';
import type {
  D1D2,
  DiscountFactors,
  GreeksResult,
  MarketParameters,
  MarketParametersWithoutVol,
  OptionType,
  PricingResult,
} from '../core/types.js';

// ============================================================================
// STANDARD NORMAL DISTRIBUTION
// ============================================================================

const SQRT_2PI = Math.sqrt(2 * Math.PI);

/**
 * Standard normal cumulative distribution function (CDF)
 *
 * Hart's double-precision rational approximation (as given by West, 2005),
 * absolute error around 1e-15. Computed on |x| and reflected, so
 * normCDF(x) + normCDF(-x) = 1.
 */
export function normCDF(x: number): number {
  if (Number.isNaN(x)) return NaN;

  const absX = Math.abs(x);
  let tail: number;

  if (absX > PRICING.NORM_CDF_CUTOFF) {
    tail = 0;
  } else {
    const exponential = Math.exp(-(absX * absX) / 2);

    if (absX < 7.07106781186547) {
      let numerator = 3.52624965998911e-2 * absX + 0.700383064443688;
      numerator = numerator * absX + 6.37396220353165;
      numerator = numerator * absX + 33.912866078383;
      numerator = numerator * absX + 112.079291497871;
      numerator = numerator * absX + 221.213596169931;
      numerator = numerator * absX + 220.206867912376;

      let denominator = 8.83883476483184e-2 * absX + 1.75566716318264;
      denominator = denominator * absX + 16.064177579207;
      denominator = denominator * absX + 86.7807322029461;
      denominator = denominator * absX + 296.564248779674;
      denominator = denominator * absX + 637.333633378831;
      denominator = denominator * absX + 793.826512519948;
      denominator = denominator * absX + 440.413735824752;

      tail = (exponential * numerator) / denominator;
    } else {
      // Continued fraction for the far tail
      let fraction = absX + 0.65;
      fraction = absX + 4 / fraction;
      fraction = absX + 3 / fraction;
      fraction = absX + 2 / fraction;
      fraction = absX + 1 / fraction;
      tail = exponential / fraction / SQRT_2PI;
    }
  }

  return x > 0 ? 1 - tail : tail;
}

/**
 * Standard normal probability density function (PDF)
 */
export function normPDF(x: number): number {
  return Math.exp(-(x * x) / 2) / SQRT_2PI;
}

// ============================================================================
// BLACK-SCHOLES FORMULAS
// ============================================================================

/**
 * d1 = (ln(S/K) + (r - q + σ²/2)·T) / (σ·√T),  d2 = d1 - σ·√T
 */
export function calculateD1D2(params: MarketParameters): D1D2 {
  const { spot, strike, timeToExpiry, riskFreeRate, dividendYield, volatility } =
    assertMarketParameters(params);

  const sqrtT = Math.sqrt(timeToExpiry);
  const volSqrtT = volatility * sqrtT;
  const drift = riskFreeRate - dividendYield + 0.5 * volatility * volatility;

  const d1 = (Math.log(spot / strike) + drift * timeToExpiry) / volSqrtT;
  const d2 = d1 - volSqrtT;

  return { d1, d2, sqrtT };
}

/**
 * exp(-rT) on the strike leg, exp(-qT) on the spot leg
 */
export function calculateDiscountFactors(
  params: Pick<MarketParameters, 'timeToExpiry' | 'riskFreeRate' | 'dividendYield'>
): DiscountFactors {
  const discR = Math.exp(-params.riskFreeRate * params.timeToExpiry);
  const discQ = Math.exp(-params.dividendYield * params.timeToExpiry);

  if (!Number.isFinite(discR)) {
    throw new PreconditionViolationError('riskFreeRate', params.riskFreeRate, 'discount factor overflows');
  }
  if (!Number.isFinite(discQ)) {
    throw new PreconditionViolationError('dividendYield', params.dividendYield, 'discount factor overflows');
  }

  return { discR, discQ };
}

function assertFiniteResults(params: MarketParameters, values: readonly number[]): void {
  if (values.some(value => !Number.isFinite(value))) {
    throw new PreconditionViolationError('parameters', params, 'inputs overflow double precision');
  }
}

/**
 * Option price for one side. The raw value is returned; deep out-of-the-money
 * prices may sit a rounding error below zero.
 */
export function calculateOptionPrice(params: MarketParameters, optionType: OptionType): number {
  const { d1, d2 } = calculateD1D2(params);
  const { discR, discQ } = calculateDiscountFactors(params);
  const { spot, strike } = params;

  const price =
    optionType === 'CALL'
      ? // C = S·e^(-qT)·N(d1) - K·e^(-rT)·N(d2)
        spot * discQ * normCDF(d1) - strike * discR * normCDF(d2)
      : // P = K·e^(-rT)·N(-d2) - S·e^(-qT)·N(-d1)
        strike * discR * normCDF(-d2) - spot * discQ * normCDF(-d1);

  assertFiniteResults(params, [price]);
  return price;
}

export function calculateCallPrice(params: MarketParameters): number {
  return calculateOptionPrice(params, 'CALL');
}

export function calculatePutPrice(params: MarketParameters): number {
  return calculateOptionPrice(params, 'PUT');
}

// ============================================================================
// GREEKS CALCULATION
// ============================================================================

/**
 * Prices and Greeks for call and put together.
 *
 * Theta is per year, vega per 1.00 of volatility, rho per 1.00 of rate.
 */
export function calculateGreeks(params: MarketParameters): GreeksResult {
  const { d1, d2, sqrtT } = calculateD1D2(params);
  const { discR, discQ } = calculateDiscountFactors(params);
  const { spot, strike, timeToExpiry, riskFreeRate, dividendYield, volatility } = params;

  const Nd1 = normCDF(d1);
  const Nd2 = normCDF(d2);
  const NnegD1 = normCDF(-d1);
  const NnegD2 = normCDF(-d2);
  const pdfD1 = normPDF(d1);

  const spotLeg = spot * discQ;
  const strikeLeg = strike * discR;

  // Time decay of the volatility term, shared by both sides
  const decay = -(spotLeg * pdfD1 * volatility) / (2 * sqrtT);

  const greeks: GreeksResult = {
    call: spotLeg * Nd1 - strikeLeg * Nd2,
    put: strikeLeg * NnegD2 - spotLeg * NnegD1,
    deltaCall: discQ * Nd1,
    deltaPut: discQ * (Nd1 - 1),
    gamma: (discQ * pdfD1) / (spot * volatility * sqrtT),
    vega: spotLeg * pdfD1 * sqrtT,
    thetaCall: decay - riskFreeRate * strikeLeg * Nd2 + dividendYield * spotLeg * Nd1,
    thetaPut: decay + riskFreeRate * strikeLeg * NnegD2 - dividendYield * spotLeg * NnegD1,
    rhoCall: strike * timeToExpiry * discR * Nd2,
    rhoPut: -strike * timeToExpiry * discR * NnegD2,
    d1,
    d2,
  };

  // d1 and d2 may legitimately be infinite for a vanishing volatility
  assertFiniteResults(params, [
    greeks.call,
    greeks.put,
    greeks.deltaCall,
    greeks.deltaPut,
    greeks.gamma,
    greeks.vega,
    greeks.thetaCall,
    greeks.thetaPut,
    greeks.rhoCall,
    greeks.rhoPut,
  ]);
  return greeks;
}

/**
 * Price and Greeks for a single side
 */
export function calculatePricingResult(params: MarketParameters, optionType: OptionType): PricingResult {
  const greeks = calculateGreeks(params);
  const isCall = optionType === 'CALL';

  return {
    optionType,
    price: isCall ? greeks.call : greeks.put,
    delta: isCall ? greeks.deltaCall : greeks.deltaPut,
    gamma: greeks.gamma,
    vega: greeks.vega,
    theta: isCall ? greeks.thetaCall : greeks.thetaPut,
    rho: isCall ? greeks.rhoCall : greeks.rhoPut,
    d1: greeks.d1,
    d2: greeks.d2,
  };
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

/**
 * S·e^(-qT) - K·e^(-rT): the model's call-minus-put value
 */
export function calculateParityGap(params: MarketParametersWithoutVol): number {
  const { spot, strike } = assertIVParameters(params);
  const { discR, discQ } = calculateDiscountFactors(params);
  return spot * discQ - strike * discR;
}

/**
 * Discounted intrinsic value, the no-arbitrage floor on the option price.
 * Independent of volatility.
 */
export function calculateDiscountedIntrinsicValue(
  params: MarketParametersWithoutVol,
  optionType: OptionType
): number {
  const gap = calculateParityGap(params);
  return optionType === 'CALL' ? Math.max(0, gap) : Math.max(0, -gap);
}
