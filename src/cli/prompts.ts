/**
 * Interactive input collection
 */

import inquirer from 'inquirer';
import { PRICING } from '../core/constants.js';
import { isPricingSystemError } from '../core/errors.js';
import { parseDecimalInput, parseOptionalDecimalInput } from '../utils/decimal.js';
import type { TerminalInputs } from '../core/types.js';

/**
 * Raw answers as typed
 */
export interface TerminalAnswers {
  spot: string;
  strike: string;
  days: string;
  rate: string;
  volatility: string;
  dividendYield: string;
  marketPrice: string;
}

/**
 * Turn typed answers into figures. Blank dividend yield means 0, blank
 * market price means "skip implied volatility".
 */
export function parseTerminalAnswers(answers: TerminalAnswers): TerminalInputs {
  const inputs: TerminalInputs = {
    spot: parseDecimalInput(answers.spot, 'underlying price'),
    strike: parseDecimalInput(answers.strike, 'strike price'),
    days: parseDecimalInput(answers.days, 'time to expiration'),
    rate: parseDecimalInput(answers.rate, 'risk-free rate'),
    volatility: parseDecimalInput(answers.volatility, 'volatility'),
    dividendYield: parseDecimalInput(answers.dividendYield, 'dividend yield', PRICING.DEFAULT_DIVIDEND_YIELD),
  };

  const marketPrice = parseOptionalDecimalInput(answers.marketPrice, 'market price');
  return marketPrice === undefined ? inputs : { ...inputs, marketPrice };
}

function numberValidator(field: string, defaultValue?: number): (input: string) => true | string {
  return (input: string) => {
    try {
      parseDecimalInput(input, field, defaultValue);
      return true;
    } catch (error) {
      if (isPricingSystemError(error)) return error.message;
      throw error;
    }
  };
}

/**
 * Ask for every input in turn
 */
export async function promptTerminalInputs(): Promise<TerminalInputs> {
  const answers = await inquirer.prompt<TerminalAnswers>([
    { type: 'input', name: 'spot', message: 'Underlying price (S):', validate: numberValidator('underlying price') },
    { type: 'input', name: 'strike', message: 'Strike price (K):', validate: numberValidator('strike price') },
    { type: 'input', name: 'days', message: 'Time to expiration (days):', validate: numberValidator('time to expiration') },
    { type: 'input', name: 'rate', message: 'Risk-free rate r (decimal):', validate: numberValidator('risk-free rate') },
    { type: 'input', name: 'volatility', message: 'Volatility σ (decimal):', validate: numberValidator('volatility') },
    {
      type: 'input',
      name: 'dividendYield',
      message: 'Dividend yield q (decimal) [default 0]:',
      validate: numberValidator('dividend yield', PRICING.DEFAULT_DIVIDEND_YIELD),
    },
    {
      type: 'input',
      name: 'marketPrice',
      message: 'Market price for IV (blank to skip):',
      validate: (input: string) => input.trim() === '' || numberValidator('market price')(input),
    },
  ]);

  return parseTerminalAnswers(answers);
}
