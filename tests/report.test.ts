import { describe, it, expect } from 'vitest';
import { buildPricingReport } from '../src/cli/report.js';
import { IV_SOLVER } from '../src/core/constants.js';

describe('buildPricingReport', () => {
  it('prices both sides without a market price', () => {
    const outcome = buildPricingReport(
      { spot: 100, strike: 100, days: 365, rate: 0.05, volatility: 0.2 },
      IV_SOLVER
    );

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.inputs.timeToExpiry).toBe(1);
      expect(outcome.value.greeks.call).toBeCloseTo(10.4506, 4);
      expect(outcome.value.greeks.put).toBeCloseTo(5.5735, 4);
      expect(outcome.value.marketPrice).toBeUndefined();
      expect(outcome.value.impliedVolatility).toBeUndefined();
    }
  });

  it('solves both sides for a market price', () => {
    const outcome = buildPricingReport(
      { spot: 100, strike: 100, days: 365, rate: 0.05, volatility: 0.2, dividendYield: 0.03, marketPrice: 8.6525 },
      IV_SOLVER
    );

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.greeks.call).toBeCloseTo(8.6525, 4);
      expect(outcome.value.greeks.put).toBeCloseTo(6.7309, 4);
      expect(outcome.value.marketPrice).toBe(8.6525);

      const call = outcome.value.impliedVolatility?.call;
      expect(call?.status).toBe('CONVERGED');
      if (call?.status === 'CONVERGED') {
        expect(call.volatility).toBeCloseTo(0.2, 4);
      }
      expect(outcome.value.impliedVolatility?.put.status).toBe('CONVERGED');
    }
  });

  it('fails before pricing on out-of-domain inputs', () => {
    const outcome = buildPricingReport(
      { spot: 100, strike: 100, days: 30, rate: 0.05, volatility: 0 },
      IV_SOLVER
    );

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('Invalid volatility: must be greater than zero');
    }
  });
});
