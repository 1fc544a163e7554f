/**
 * Terminal rendering for pricing reports
 *
 * Pure functions of their inputs and an injected DisplayOptions. Colors come
 * from a chalk instance built per call, so nothing global is switched on or
 * off between renders.
 */

import { Chalk } from 'chalk';
import Table from 'cli-table3';
import { PRICING, REPORT_TITLES } from '../core/constants.js';
import { clampPriceForDisplay, formatFixed, formatMoney, formatPercent } from '../utils/decimal.js';
import type {
  DisplayOptions,
  GreeksResult,
  ImpliedVolatilityPair,
  ImpliedVolatilityResult,
  PricingReport,
} from '../core/types.js';

const LABEL_WIDTH = 28;
const VALUE_WIDTH = 12;
const GREEK_COL_WIDTHS = [14, 18, 18];

// ============================================================================
// PALETTE
// ============================================================================

type Paint = (text: string) => string;

export interface Palette {
  title: Paint;
  label: Paint;
  value: Paint;
  sub: Paint;
  ok: Paint;
  err: Paint;
}

export function createPalette(options: Pick<DisplayOptions, 'color'>): Palette {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });
  return {
    title: text => chalk.bold.yellow(text),
    label: text => chalk.bold.white(text),
    value: text => chalk.bold.green(text),
    sub: text => chalk.cyan(text),
    ok: text => chalk.bold.green(text),
    err: text => chalk.bold.red(text),
  };
}

// ============================================================================
// LAYOUT HELPERS
// ============================================================================

/**
 * Center text in a field; odd padding goes to the right
 */
export function center(text: string, width: number): string {
  const padding = Math.max(0, width - text.length);
  const left = Math.floor(padding / 2);
  return `${' '.repeat(left)}${text}${' '.repeat(padding - left)}`;
}

/**
 * Boxed title, three lines
 */
export function renderHeader(title: string, options: DisplayOptions): string[] {
  const palette = createPalette(options);
  const inner = options.width - 2;

  return [
    `┌${'─'.repeat(inner)}┐`,
    `│${center(title, inner)}│`,
    `└${'─'.repeat(inner)}┘`,
  ].map(palette.title);
}

function renderSection(title: string, options: DisplayOptions, palette: Palette): string[] {
  const rule = '─'.repeat(options.width);
  return [palette.sub(rule), palette.title(center(title, options.width)), palette.sub(rule)];
}

function renderLabelValue(label: string, value: string, palette: Palette): string {
  return `${palette.label(label.padEnd(LABEL_WIDTH))}${palette.value(value.padStart(VALUE_WIDTH))}`;
}

// ============================================================================
// SECTIONS
// ============================================================================

/**
 * d1, d2 and both prices
 */
export function renderResults(greeks: GreeksResult, options: DisplayOptions): string[] {
  const palette = createPalette(options);
  const money = (value: number) =>
    formatMoney(clampPriceForDisplay(value), options.currencySymbol, options.priceDecimals);

  return [
    ...renderSection(REPORT_TITLES.RESULTS, options, palette),
    renderLabelValue('Moneyness factor (d1)', formatFixed(greeks.d1, options.greekDecimals), palette),
    renderLabelValue('Risk-adjusted moneyness (d2)', formatFixed(greeks.d2, options.greekDecimals), palette),
    renderLabelValue('Call Price', money(greeks.call), palette),
    renderLabelValue('Put Price', money(greeks.put), palette),
  ];
}

/**
 * Call/put Greeks table; gamma and vega are shared and shown once
 */
export function renderGreeks(greeks: GreeksResult, options: DisplayOptions): string[] {
  const palette = createPalette(options);
  const fmt = (value: number) => palette.value(formatFixed(value, options.greekDecimals));
  const thetaScale = options.thetaPerDay ? PRICING.DAYS_IN_YEAR : 1;

  const table = new Table({
    head: ['Greek', 'Call', 'Put'].map(palette.label),
    colWidths: GREEK_COL_WIDTHS,
    colAligns: ['left', 'right', 'right'],
    style: { head: [], border: [], 'padding-left': 0, 'padding-right': 0, compact: true },
    chars: {
      top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
      bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
      left: '', 'left-mid': '', mid: '', 'mid-mid': '',
      right: '', 'right-mid': '', middle: '',
    },
  });

  table.push(
    [palette.label('Delta'), fmt(greeks.deltaCall), fmt(greeks.deltaPut)],
    [palette.label('Gamma'), palette.value(formatFixed(greeks.gamma, options.gammaDecimals)), ''],
    [palette.label('Vega'), fmt(greeks.vega), ''],
    [
      palette.label(options.thetaPerDay ? 'Theta/day' : 'Theta'),
      fmt(greeks.thetaCall / thetaScale),
      fmt(greeks.thetaPut / thetaScale),
    ],
    [palette.label('Rho'), fmt(greeks.rhoCall), fmt(greeks.rhoPut)]
  );

  const rows = table
    .toString()
    .split('\n')
    .filter(line => line.trim() !== '');

  return [...renderSection(REPORT_TITLES.GREEKS, options, palette), ...rows];
}

/**
 * Text for one IV outcome. Failures say which kind they are.
 */
export function describeIVResult(result: ImpliedVolatilityResult): string {
  switch (result.status) {
    case 'CONVERGED':
      return formatPercent(result.volatility, 2);
    case 'BELOW_INTRINSIC':
      return 'below intrinsic';
    case 'NOT_CONVERGED':
      return 'no convergence';
  }
}

export function renderImpliedVolatility(
  marketPrice: number,
  pair: Partial<ImpliedVolatilityPair>,
  options: DisplayOptions
): string[] {
  const palette = createPalette(options);
  const lines = [
    ...renderSection(REPORT_TITLES.IMPLIED_VOL, options, palette),
    renderLabelValue('Market Price', formatMoney(marketPrice, options.currencySymbol, options.priceDecimals), palette),
  ];

  if (pair.call) {
    lines.push(renderLabelValue('IV (Call)', describeIVResult(pair.call), palette));
  }
  if (pair.put) {
    lines.push(renderLabelValue('IV (Put)', describeIVResult(pair.put), palette));
  }

  for (const [side, result] of [['Call', pair.call], ['Put', pair.put]] as const) {
    if (result?.status === 'BELOW_INTRINSIC') {
      const floor = formatMoney(result.intrinsicValue, options.currencySymbol, options.priceDecimals);
      lines.push(palette.sub(`  ${side} floor (discounted intrinsic): ${floor}`));
    }
  }

  return lines;
}

/**
 * Full report: results, Greeks and (when a market price was given) IV
 */
export function renderPricingReport(report: PricingReport, options: DisplayOptions): string {
  const lines = [
    '',
    ...renderResults(report.greeks, options),
    '',
    ...renderGreeks(report.greeks, options),
  ];

  if (report.marketPrice !== undefined && report.impliedVolatility) {
    lines.push('', ...renderImpliedVolatility(report.marketPrice, report.impliedVolatility, options));
  }

  return lines.join('\n');
}
