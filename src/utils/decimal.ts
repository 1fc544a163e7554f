/**
 * Decimal.js Utilities for the Black-Scholes-Merton Terminal
 *
 * The model itself runs in double precision. Decimal is used at the edges:
 * reading typed figures exactly and rounding figures for display.
 */

import { Decimal } from 'decimal.js';
import { InputParseError } from '../core/errors.js';

// Configure Decimal.js for display rounding
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9,
  toExpPos: 9,
});

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse a typed figure. Blank input falls back to `defaultValue` when one is
 * given and is an error otherwise.
 */
export function parseDecimalInput(text: string, field: string, defaultValue?: number): number {
  const trimmed = text.trim();

  if (trimmed === '') {
    if (defaultValue === undefined) {
      throw new InputParseError(field, text, 'a value is required');
    }
    return defaultValue;
  }

  let parsed: Decimal;
  try {
    parsed = new Decimal(trimmed);
  } catch {
    throw new InputParseError(field, text, `"${trimmed}" is not a number`);
  }

  if (!parsed.isFinite()) {
    throw new InputParseError(field, text, 'value must be finite');
  }

  return parsed.toNumber();
}

/**
 * Parse an optional figure; blank input means "not given"
 */
export function parseOptionalDecimalInput(text: string | undefined, field: string): number | undefined {
  if (text === undefined || text.trim() === '') {
    return undefined;
  }
  return parseDecimalInput(text, field);
}

// ============================================================================
// FORMATTING
// ============================================================================

/**
 * Fixed decimal places with thousands grouping, e.g. 12345.6 -> "12,345.6000"
 */
export function formatFixed(value: number, decimals = 4): string {
  if (!Number.isFinite(value)) {
    return 'NaN';
  }

  const rounded = new Decimal(value).toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP);
  const [intPart = '0', fracPart] = rounded.abs().toFixed(decimals).split('.');
  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = rounded.isNegative() && !rounded.isZero() ? '-' : '';

  return fracPart === undefined ? `${sign}${grouped}` : `${sign}${grouped}.${fracPart}`;
}

/**
 * Currency figure, e.g. 10.4506 -> "$10.45"
 */
export function formatMoney(value: number, currencySymbol = '$', decimals = 2): string {
  const body = formatFixed(value, decimals);
  return body.startsWith('-') ? `-${currencySymbol}${body.slice(1)}` : `${currencySymbol}${body}`;
}

/**
 * Fraction shown as a percentage, e.g. 0.2 -> "20.00%"
 */
export function formatPercent(fraction: number, decimals = 2): string {
  if (!Number.isFinite(fraction)) {
    return 'NaN';
  }
  return `${formatFixed(new Decimal(fraction).times(100).toNumber(), decimals)}%`;
}

/**
 * Model prices can come out a hair below zero in floating point; show them as zero
 */
export function clampPriceForDisplay(price: number): number {
  return price < 0 ? 0 : price;
}
