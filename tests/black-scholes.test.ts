import { describe, it, expect } from 'vitest';
import {
  calculateCallPrice,
  calculatePutPrice,
  normCDF,
  normPDF,
  calculateD1D2,
  calculateOptionPrice,
  calculateGreeks,
  calculatePricingResult,
  calculateDiscountedIntrinsicValue,
  calculateParityGap,
} from '../src/pricing/black-scholes.js';
import { PreconditionViolationError } from '../src/core/errors.js';
import type { MarketParameters } from '../src/core/types.js';

const ATM: MarketParameters = {
  spot: 100,
  strike: 100,
  timeToExpiry: 1,
  riskFreeRate: 0.05,
  dividendYield: 0,
  volatility: 0.2,
};

const GRID: MarketParameters[] = [
  ATM,
  { spot: 100, strike: 100, timeToExpiry: 1, riskFreeRate: 0.05, dividendYield: 0.03, volatility: 0.2 },
  { spot: 110, strike: 100, timeToExpiry: 0.5, riskFreeRate: 0.03, dividendYield: 0.01, volatility: 0.25 },
  { spot: 90, strike: 100, timeToExpiry: 0.1, riskFreeRate: 0.04, dividendYield: 0, volatility: 0.3 },
  { spot: 50, strike: 65, timeToExpiry: 2, riskFreeRate: -0.01, dividendYield: -0.005, volatility: 0.8 },
  { spot: 4200, strike: 3900, timeToExpiry: 30 / 365, riskFreeRate: 0.045, dividendYield: 0.015, volatility: 1.5 },
];

describe('normal distribution', () => {
  it('matches reference CDF values', () => {
    expect(normCDF(0)).toBe(0.5);
    expect(normCDF(1.96)).toBeCloseTo(0.9750021048517795, 12);
    expect(normCDF(-1)).toBeCloseTo(0.15865525393145707, 12);
    expect(normCDF(-8)).toBeCloseTo(6.22096057427178e-16, 20);
  });

  it('is symmetric around zero', () => {
    for (const x of [0.1, 0.5, 1.3, 2.7, 5, 7.5, 12]) {
      expect(normCDF(x) + normCDF(-x)).toBeCloseTo(1, 15);
    }
  });

  it('saturates in the far tails', () => {
    expect(normCDF(-40)).toBe(0);
    expect(normCDF(40)).toBe(1);
  });

  it('returns NaN for NaN', () => {
    expect(normCDF(NaN)).toBeNaN();
  });

  it('computes the density', () => {
    expect(normPDF(0)).toBeCloseTo(1 / Math.sqrt(2 * Math.PI), 15);
    expect(normPDF(1)).toBeCloseTo(0.24197072451914337, 15);
  });
});

describe('calculateD1D2', () => {
  it('computes moneyness terms', () => {
    const { d1, d2, sqrtT } = calculateD1D2(ATM);
    expect(d1).toBeCloseTo(0.35, 12);
    expect(d2).toBeCloseTo(0.15, 12);
    expect(sqrtT).toBe(1);
  });

  it('includes the dividend yield in the drift', () => {
    const { d1, d2 } = calculateD1D2({ ...ATM, dividendYield: 0.03 });
    expect(d1).toBeCloseTo(0.2, 12);
    expect(d2).toBeCloseTo(0, 12);
  });
});

describe('calculateOptionPrice', () => {
  it('prices the textbook at-the-money case', () => {
    expect(calculateOptionPrice(ATM, 'CALL')).toBeCloseTo(10.4506, 4);
    expect(calculateOptionPrice(ATM, 'PUT')).toBeCloseTo(5.5735, 4);
  });

  it('lowers the call and raises the put under a dividend yield', () => {
    const withDividend = { ...ATM, dividendYield: 0.03 };
    const call = calculateOptionPrice(withDividend, 'CALL');
    const put = calculateOptionPrice(withDividend, 'PUT');

    expect(call).toBeCloseTo(8.6525, 4);
    expect(put).toBeCloseTo(6.7309, 4);
    expect(call).toBeLessThan(calculateOptionPrice(ATM, 'CALL'));
    expect(put).toBeGreaterThan(calculateOptionPrice(ATM, 'PUT'));
  });

  it('exposes single-side shorthands', () => {
    expect(calculateCallPrice(ATM)).toBe(calculateOptionPrice(ATM, 'CALL'));
    expect(calculatePutPrice(ATM)).toBe(calculateOptionPrice(ATM, 'PUT'));
  });

  it('satisfies put-call parity', () => {
    for (const params of GRID) {
      const call = calculateOptionPrice(params, 'CALL');
      const put = calculateOptionPrice(params, 'PUT');
      const forward =
        params.spot * Math.exp(-params.dividendYield * params.timeToExpiry) -
        params.strike * Math.exp(-params.riskFreeRate * params.timeToExpiry);

      const scale = Math.max(Math.abs(forward), params.spot * 1e-3);
      expect(Math.abs(call - put - forward) / scale).toBeLessThan(1e-9);
    }
  });

  it('increases strictly with volatility', () => {
    const base = { spot: 100, strike: 110, timeToExpiry: 0.5, riskFreeRate: 0.03, dividendYield: 0.01 };

    for (const optionType of ['CALL', 'PUT'] as const) {
      let previous = -Infinity;
      for (let volatility = 0.05; volatility <= 5.0 + 1e-12; volatility += 0.05) {
        const price = calculateOptionPrice({ ...base, volatility }, optionType);
        expect(price).toBeGreaterThan(previous);
        previous = price;
      }
    }
  });

  it('tends to the discounted intrinsic value as volatility goes to zero', () => {
    const itmCall = { spot: 110, strike: 100, timeToExpiry: 1, riskFreeRate: 0.05, dividendYield: 0.02 };
    const itmPut = { spot: 90, strike: 100, timeToExpiry: 1, riskFreeRate: 0.05, dividendYield: 0.02 };

    expect(calculateOptionPrice({ ...itmCall, volatility: 1e-8 }, 'CALL')).toBeCloseTo(
      calculateDiscountedIntrinsicValue(itmCall, 'CALL'),
      9
    );
    expect(calculateOptionPrice({ ...itmCall, volatility: 1e-8 }, 'PUT')).toBeCloseTo(0, 9);
    expect(calculateOptionPrice({ ...itmPut, volatility: 1e-8 }, 'PUT')).toBeCloseTo(
      calculateDiscountedIntrinsicValue(itmPut, 'PUT'),
      9
    );
    expect(calculateOptionPrice({ ...itmPut, volatility: 1e-8 }, 'CALL')).toBeCloseTo(0, 9);
  });

  it('accepts negative rates and yields', () => {
    const price = calculateOptionPrice({ ...ATM, riskFreeRate: -0.01, dividendYield: -0.02 }, 'CALL');
    expect(Number.isFinite(price)).toBe(true);
    expect(price).toBeGreaterThan(0);
  });
});

describe('calculateGreeks', () => {
  it('matches the textbook at-the-money values', () => {
    const greeks = calculateGreeks(ATM);

    expect(greeks.call).toBeCloseTo(10.4506, 4);
    expect(greeks.put).toBeCloseTo(5.5735, 4);
    expect(greeks.deltaCall).toBeCloseTo(0.6368, 4);
    expect(greeks.deltaPut).toBeCloseTo(-0.3632, 4);
    expect(greeks.gamma).toBeCloseTo(0.0188, 4);
    expect(greeks.vega).toBeCloseTo(37.524, 3);
    expect(greeks.thetaCall).toBeCloseTo(-6.4140, 4);
    expect(greeks.thetaPut).toBeCloseTo(-1.6579, 4);
    expect(greeks.rhoCall).toBeCloseTo(53.2325, 4);
    expect(greeks.rhoPut).toBeCloseTo(-41.8905, 4);
  });

  it('agrees with the single-side price function', () => {
    for (const params of GRID) {
      const greeks = calculateGreeks(params);
      expect(greeks.call).toBe(calculateOptionPrice(params, 'CALL'));
      expect(greeks.put).toBe(calculateOptionPrice(params, 'PUT'));
    }
  });

  it('keeps delta parity: deltaCall - deltaPut = exp(-qT)', () => {
    for (const params of GRID) {
      const greeks = calculateGreeks(params);
      expect(greeks.deltaCall - greeks.deltaPut).toBeCloseTo(
        Math.exp(-params.dividendYield * params.timeToExpiry),
        12
      );
    }
  });

  it('matches finite differences of the price', () => {
    const params: MarketParameters = {
      spot: 110,
      strike: 100,
      timeToExpiry: 0.5,
      riskFreeRate: 0.03,
      dividendYield: 0.01,
      volatility: 0.25,
    };
    const h = 1e-5;
    const greeks = calculateGreeks(params);
    const call = (overrides: Partial<MarketParameters>) =>
      calculateOptionPrice({ ...params, ...overrides }, 'CALL');
    const put = (overrides: Partial<MarketParameters>) =>
      calculateOptionPrice({ ...params, ...overrides }, 'PUT');

    const dS = (fn: typeof call) => (fn({ spot: params.spot + h }) - fn({ spot: params.spot - h })) / (2 * h);
    const dVol = (fn: typeof call) =>
      (fn({ volatility: params.volatility + h }) - fn({ volatility: params.volatility - h })) / (2 * h);
    const dRate = (fn: typeof call) =>
      (fn({ riskFreeRate: params.riskFreeRate + h }) - fn({ riskFreeRate: params.riskFreeRate - h })) / (2 * h);
    const dTime = (fn: typeof call) =>
      (fn({ timeToExpiry: params.timeToExpiry - h }) - fn({ timeToExpiry: params.timeToExpiry + h })) / (2 * h);

    expect(greeks.deltaCall).toBeCloseTo(dS(call), 5);
    expect(greeks.deltaPut).toBeCloseTo(dS(put), 5);
    expect(greeks.vega).toBeCloseTo(dVol(call), 4);
    expect(greeks.rhoCall).toBeCloseTo(dRate(call), 4);
    expect(greeks.rhoPut).toBeCloseTo(dRate(put), 4);
    expect(greeks.thetaCall).toBeCloseTo(dTime(call), 4);
    expect(greeks.thetaPut).toBeCloseTo(dTime(put), 4);

    const deltaUp = calculateGreeks({ ...params, spot: params.spot + h }).deltaCall;
    const deltaDown = calculateGreeks({ ...params, spot: params.spot - h }).deltaCall;
    expect(greeks.gamma).toBeCloseTo((deltaUp - deltaDown) / (2 * h), 5);
  });
});

describe('calculatePricingResult', () => {
  it('shares gamma and vega between call and put', () => {
    for (const params of GRID) {
      const call = calculatePricingResult(params, 'CALL');
      const put = calculatePricingResult(params, 'PUT');
      expect(call.gamma).toBe(put.gamma);
      expect(call.vega).toBe(put.vega);
      expect(call.d1).toBe(put.d1);
    }
  });

  it('selects the side-specific Greeks', () => {
    const greeks = calculateGreeks(ATM);
    const put = calculatePricingResult(ATM, 'PUT');

    expect(put).toEqual({
      optionType: 'PUT',
      price: greeks.put,
      delta: greeks.deltaPut,
      gamma: greeks.gamma,
      vega: greeks.vega,
      theta: greeks.thetaPut,
      rho: greeks.rhoPut,
      d1: greeks.d1,
      d2: greeks.d2,
    });
  });
});

describe('intrinsic value', () => {
  it('discounts both legs', () => {
    const params = { spot: 150, strike: 100, timeToExpiry: 1, riskFreeRate: 0.05, dividendYield: 0 };
    expect(calculateParityGap(params)).toBeCloseTo(54.877057549928594, 10);
    expect(calculateDiscountedIntrinsicValue(params, 'CALL')).toBeCloseTo(54.877057549928594, 10);
    expect(calculateDiscountedIntrinsicValue(params, 'PUT')).toBe(0);
  });
});

describe('preconditions', () => {
  const INVALID: Array<[string, MarketParameters]> = [
    ['spot', { ...ATM, spot: 0 }],
    ['strike', { ...ATM, strike: -5 }],
    ['timeToExpiry', { ...ATM, timeToExpiry: 0 }],
    ['volatility', { ...ATM, volatility: 0 }],
    ['volatility', { ...ATM, volatility: -0.2 }],
    ['riskFreeRate', { ...ATM, riskFreeRate: NaN }],
    ['spot', { ...ATM, spot: Infinity }],
  ];

  it.each(INVALID)('rejects a bad %s before computing', (field, params) => {
    expect(() => calculateOptionPrice(params, 'CALL')).toThrow(PreconditionViolationError);
    try {
      calculateGreeks(params);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PreconditionViolationError);
      if (error instanceof PreconditionViolationError) {
        expect(error.field).toBe(field);
        expect(error.code).toBe('PRECONDITION_VIOLATION');
      }
    }
  });
});

describe('overflow', () => {
  it('rejects a rate whose discount factor overflows', () => {
    const params = { ...ATM, riskFreeRate: -1000 };

    expect(() => calculateOptionPrice(params, 'CALL')).toThrow('Invalid riskFreeRate: discount factor overflows');
    expect(() => calculateGreeks(params)).toThrow(PreconditionViolationError);
    expect(() => calculateDiscountedIntrinsicValue(params, 'PUT')).toThrow(PreconditionViolationError);
  });

  it('rejects a yield whose discount factor overflows', () => {
    expect(() => calculateGreeks({ ...ATM, dividendYield: -1000 })).toThrow(
      'Invalid dividendYield: discount factor overflows'
    );
  });

  it('rejects inputs whose price overflows', () => {
    const params = { ...ATM, spot: 1e308, dividendYield: -1 };

    expect(() => calculateOptionPrice(params, 'CALL')).toThrow('Invalid parameters: inputs overflow double precision');
    expect(() => calculateGreeks(params)).toThrow('Invalid parameters: inputs overflow double precision');
  });

  it('still prices a vanishing volatility with infinite d1', () => {
    const params = { ...ATM, spot: 120, volatility: 1e-310 };
    const greeks = calculateGreeks(params);

    expect(greeks.d1).toBe(Infinity);
    expect(greeks.call).toBeCloseTo(120 - 100 * Math.exp(-0.05), 10);
    expect(greeks.put).toBe(0);
  });
});
