/**
 * Brent's Method Root Finder
 *
 * Bracketed, derivative-free. Each step takes inverse quadratic
 * interpolation or a secant step when it stays inside the bracket and
 * shrinks it fast enough, and falls back to bisection otherwise.
 */

import type { RootFindingOptions, RootFindingResult } from '../core/types.js';

const EPSILON = Number.EPSILON;

function sameSign(a: number, b: number): boolean {
  return (a > 0 && b > 0) || (a < 0 && b < 0);
}

/**
 * Find x in [lower, upper] with f(x) = 0.
 *
 * Requires f(lower) and f(upper) to differ in sign; otherwise reports
 * NO_BRACKET without searching. Converges when the bracket half-width falls
 * under `tolerance` (absolute, on x).
 */
export function brentRoot(
  f: (x: number) => number,
  lower: number,
  upper: number,
  options: RootFindingOptions
): RootFindingResult {
  const { tolerance, maxIterations } = options;

  let a = lower;
  let b = upper;
  let fa = f(a);
  let fb = f(b);

  if (!Number.isFinite(fa) || !Number.isFinite(fb)) {
    return { converged: false, reason: 'NO_BRACKET', iterations: 0 };
  }
  if (fa === 0) return { converged: true, root: a, iterations: 0 };
  if (fb === 0) return { converged: true, root: b, iterations: 0 };
  if (sameSign(fa, fb)) {
    return { converged: false, reason: 'NO_BRACKET', iterations: 0 };
  }

  let c = b;
  let fc = fb;
  let d = b - a;
  let e = d;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    // Keep the root between b and c
    if (sameSign(fb, fc)) {
      c = a;
      fc = fa;
      d = b - a;
      e = d;
    }

    // b is always the best estimate so far
    if (Math.abs(fc) < Math.abs(fb)) {
      a = b;
      b = c;
      c = a;
      fa = fb;
      fb = fc;
      fc = fa;
    }

    const tol1 = 2 * EPSILON * Math.abs(b) + 0.5 * tolerance;
    const xm = 0.5 * (c - b);

    if (Math.abs(xm) <= tol1 || fb === 0) {
      return { converged: true, root: b, iterations: iteration };
    }

    if (Math.abs(e) >= tol1 && Math.abs(fa) > Math.abs(fb)) {
      const s = fb / fa;
      let p: number;
      let q: number;

      if (a === c) {
        // Secant
        p = 2 * xm * s;
        q = 1 - s;
      } else {
        // Inverse quadratic interpolation
        const qa = fa / fc;
        const r = fb / fc;
        p = s * (2 * xm * qa * (qa - r) - (b - a) * (r - 1));
        q = (qa - 1) * (r - 1) * (s - 1);
      }

      if (p > 0) q = -q;
      p = Math.abs(p);

      const min1 = 3 * xm * q - Math.abs(tol1 * q);
      const min2 = Math.abs(e * q);

      if (2 * p < Math.min(min1, min2)) {
        e = d;
        d = p / q;
      } else {
        d = xm;
        e = d;
      }
    } else {
      d = xm;
      e = d;
    }

    a = b;
    fa = fb;
    b += Math.abs(d) > tol1 ? d : xm >= 0 ? tol1 : -tol1;
    fb = f(b);

    if (!Number.isFinite(fb)) {
      return { converged: false, reason: 'NO_BRACKET', iterations: iteration };
    }
  }

  return { converged: false, reason: 'MAX_ITERATIONS', iterations: maxIterations };
}
