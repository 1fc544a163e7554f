/**
 * CLI Interface for the Black-Scholes-Merton Terminal
 */

import { Command, Option } from 'commander';
import { loadConfig } from '../config/index.js';
import { PRICING, REPORT_TITLES } from '../core/constants.js';
import { InputParseError, PreconditionViolationError, wrapError } from '../core/errors.js';
import { calculateIV } from '../pricing/iv-calculator.js';
import { assertIVParameters } from '../pricing/validation.js';
import { parseDecimalInput, parseOptionalDecimalInput } from '../utils/decimal.js';
import { cliLogger, createTimer, logError, setLogLevel } from '../utils/logger.js';
import { promptTerminalInputs } from './prompts.js';
import { createPalette, renderHeader, renderImpliedVolatility, renderPricingReport } from './render.js';
import { buildPricingReport } from './report.js';
import type { ImpliedVolatilityPair, SystemConfig, TerminalInputs } from '../core/types.js';

interface PriceCommandOptions {
  spot: string;
  strike: string;
  days: string;
  rate: string;
  vol: string;
  dividend: string;
  marketPrice?: string;
  json?: boolean;
}

interface IVCommandOptions {
  marketPrice: string;
  spot: string;
  strike: string;
  days: string;
  rate: string;
  dividend: string;
  type: 'call' | 'put' | 'both';
  json?: boolean;
}

/**
 * Build the command tree. Each call returns a fresh program, so option values
 * never carry over between runs.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('bsm-terminal')
    .description('Black–Scholes–Merton option pricing, Greeks and implied volatility')
    .version('1.0.0');

  program
    .command('interactive', { isDefault: true })
    .description('Prompt for inputs, then print prices, Greeks and implied volatility')
    .action(async () => {
      await runCommand('interactive', async config => {
        console.log(renderHeader(REPORT_TITLES.HEADER, config.display).join('\n'));
        const inputs = await promptTerminalInputs();
        printReport(inputs, config, false);
      });
    });

  program
    .command('price')
    .description('Price a call and a put from command-line figures')
    .requiredOption('-s, --spot <number>', 'Underlying price')
    .requiredOption('-k, --strike <number>', 'Strike price')
    .requiredOption('-d, --days <number>', 'Time to expiration in days')
    .requiredOption('-r, --rate <number>', 'Risk-free rate as a decimal')
    .requiredOption('-v, --vol <number>', 'Volatility as a decimal')
    .option('-q, --dividend <number>', 'Dividend yield as a decimal', String(PRICING.DEFAULT_DIVIDEND_YIELD))
    .option('-m, --market-price <number>', 'Market price to solve implied volatility for')
    .option('--json', 'Print raw figures as JSON')
    .action(async (options: PriceCommandOptions) => {
      await runCommand('price', async config => {
        const marketPrice = parseOptionalDecimalInput(options.marketPrice, 'market price');
        const inputs: TerminalInputs = {
          spot: parseDecimalInput(options.spot, 'spot'),
          strike: parseDecimalInput(options.strike, 'strike'),
          days: parseDecimalInput(options.days, 'days'),
          rate: parseDecimalInput(options.rate, 'rate'),
          volatility: parseDecimalInput(options.vol, 'volatility'),
          dividendYield: parseDecimalInput(options.dividend, 'dividend yield', PRICING.DEFAULT_DIVIDEND_YIELD),
        };

        if (!options.json) {
          console.log(renderHeader(REPORT_TITLES.HEADER, config.display).join('\n'));
        }
        printReport(marketPrice === undefined ? inputs : { ...inputs, marketPrice }, config, options.json ?? false);
      });
    });

  program
    .command('iv')
    .description('Solve implied volatility for a quoted option price')
    .requiredOption('-m, --market-price <number>', 'Quoted option price')
    .requiredOption('-s, --spot <number>', 'Underlying price')
    .requiredOption('-k, --strike <number>', 'Strike price')
    .requiredOption('-d, --days <number>', 'Time to expiration in days')
    .requiredOption('-r, --rate <number>', 'Risk-free rate as a decimal')
    .option('-q, --dividend <number>', 'Dividend yield as a decimal', String(PRICING.DEFAULT_DIVIDEND_YIELD))
    .addOption(new Option('-t, --type <type>', 'Which side to solve').choices(['call', 'put', 'both']).default('both'))
    .option('--json', 'Print raw figures as JSON')
    .action(async (options: IVCommandOptions) => {
      await runCommand('iv', async config => {
        const marketPrice = parseDecimalInput(options.marketPrice, 'market price');
        const params = assertIVParameters({
          spot: parseDecimalInput(options.spot, 'spot'),
          strike: parseDecimalInput(options.strike, 'strike'),
          timeToExpiry: parseDecimalInput(options.days, 'days') / PRICING.DAYS_IN_YEAR,
          riskFreeRate: parseDecimalInput(options.rate, 'rate'),
          dividendYield: parseDecimalInput(options.dividend, 'dividend yield', PRICING.DEFAULT_DIVIDEND_YIELD),
        });

        const pair: Partial<ImpliedVolatilityPair> = {};
        if (options.type !== 'put') {
          pair.call = calculateIV({ marketPrice, params, optionType: 'CALL' }, config.solver);
        }
        if (options.type !== 'call') {
          pair.put = calculateIV({ marketPrice, params, optionType: 'PUT' }, config.solver);
        }

        if (options.json) {
          console.log(JSON.stringify({ marketPrice, params, impliedVolatility: pair }, null, 2));
          return;
        }
        console.log(renderImpliedVolatility(marketPrice, pair, config.display).join('\n'));
        console.log();
        console.log(createPalette(config.display).ok('Done.'));
      });
    });

  return program;
}

// ============================================================================
// COMMAND HELPERS
// ============================================================================

function printReport(inputs: TerminalInputs, config: SystemConfig, asJson: boolean): void {
  const palette = createPalette(config.display);
  const outcome = buildPricingReport(inputs, config.solver);

  if (!outcome.ok) {
    throw outcome.error;
  }

  if (asJson) {
    console.log(JSON.stringify(outcome.value, null, 2));
    return;
  }

  console.log(renderPricingReport(outcome.value, config.display));
  console.log();
  console.log(palette.ok('Done.'));
}

/**
 * Load config, run the command and turn failures into a message and exit code 1
 */
async function runCommand(name: string, body: (config: SystemConfig) => Promise<void>): Promise<void> {
  const done = createTimer(`${name} command`);
  let config: SystemConfig | null = null;

  try {
    config = loadConfig();
    setLogLevel(config.logging.level);
    cliLogger.debug(`Running ${name}`);
    await body(config);
  } catch (error) {
    const wrapped = wrapError(error);
    const palette = createPalette({ color: config?.display.color ?? false });

    if (wrapped instanceof InputParseError || wrapped instanceof PreconditionViolationError) {
      console.error(palette.err(`Input error: ${wrapped.message}`));
    } else {
      logError(wrapped);
      console.error(palette.err(`Error: ${wrapped.message}`));
    }
    process.exitCode = 1;
  } finally {
    done();
  }
}

export async function runCLI(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
