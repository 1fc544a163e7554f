/**
 * Configuration Management for the Black-Scholes-Merton Terminal
 *
 * Loads configuration from an optional JSON file and environment variables
 * (environment wins). Validates configuration using Zod schemas.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { readFileSync, existsSync } from 'fs';
import { IV_SOLVER, DISPLAY, LOGGING } from '../core/constants.js';
import { ConfigurationError } from '../core/errors.js';
import { logger } from '../utils/logger.js';
import type { SystemConfig } from '../core/types.js';

// Load environment variables
dotenv.config();

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const solverConfigSchema = z
  .object({
    lowerBound: z.number().positive().default(IV_SOLVER.lowerBound),
    upperBound: z.number().positive().max(100).default(IV_SOLVER.upperBound),
    tolerance: z.number().positive().max(0.01).default(IV_SOLVER.tolerance),
    maxIterations: z.number().int().min(1).max(10000).default(IV_SOLVER.maxIterations),
  })
  .refine(solver => solver.lowerBound < solver.upperBound, {
    message: 'lowerBound must be below upperBound',
    path: ['upperBound'],
  });

const displayConfigSchema = z.object({
  color: z.boolean().default(DISPLAY.color),
  width: z.number().int().min(40).max(200).default(DISPLAY.width),
  priceDecimals: z.number().int().min(0).max(10).default(DISPLAY.priceDecimals),
  greekDecimals: z.number().int().min(0).max(10).default(DISPLAY.greekDecimals),
  gammaDecimals: z.number().int().min(0).max(12).default(DISPLAY.gammaDecimals),
  currencySymbol: z.string().max(3).default(DISPLAY.currencySymbol),
  thetaPerDay: z.boolean().default(DISPLAY.thetaPerDay),
});

const loggingConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default(LOGGING.DEFAULT_LEVEL),
});

const systemConfigSchema = z.object({
  solver: solverConfigSchema,
  display: displayConfigSchema,
  logging: loggingConfigSchema,
});

// ============================================================================
// CONFIGURATION LOADING
// ============================================================================

export interface LoadConfigOptions {
  forceReload?: boolean;
  env?: NodeJS.ProcessEnv;
  configPath?: string;
}

let cachedConfig: SystemConfig | null = null;

/**
 * Load configuration from environment and config file
 */
export function loadConfig(options: LoadConfigOptions = {}): SystemConfig {
  const { forceReload = false, env = process.env } = options;

  if (cachedConfig && !forceReload) {
    return cachedConfig;
  }

  logger.debug('Loading configuration...');

  const noColor = env['NO_COLOR'] !== undefined && env['NO_COLOR'] !== '';

  // Unset variables stay undefined so schema defaults apply
  let rawConfig: Record<string, unknown> = {
    solver: {
      lowerBound: parseEnvNumber(env['IV_LOWER_BOUND']),
      upperBound: parseEnvNumber(env['IV_UPPER_BOUND']),
      tolerance: parseEnvNumber(env['IV_TOLERANCE']),
      maxIterations: parseEnvNumber(env['IV_MAX_ITERATIONS']),
    },
    display: {
      color: noColor ? false : parseEnvBoolean(env['DISPLAY_COLOR']),
      width: parseEnvNumber(env['DISPLAY_WIDTH']),
      priceDecimals: parseEnvNumber(env['DISPLAY_PRICE_DECIMALS']),
      greekDecimals: parseEnvNumber(env['DISPLAY_GREEK_DECIMALS']),
      gammaDecimals: parseEnvNumber(env['DISPLAY_GAMMA_DECIMALS']),
      currencySymbol: env['DISPLAY_CURRENCY_SYMBOL'],
      thetaPerDay: parseEnvBoolean(env['DISPLAY_THETA_PER_DAY']),
    },
    logging: {
      level: env['LOG_LEVEL'],
    },
  };

  // Load config file if exists
  const configPath = options.configPath ?? env['BSM_CONFIG_PATH'] ?? './config/default.json';
  if (existsSync(configPath)) {
    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isRecord(fileConfig)) {
        rawConfig = deepMerge(fileConfig, rawConfig);
        logger.debug(`Loaded config file: ${configPath}`);
      } else {
        logger.warn(`Ignoring config file without a top-level object: ${configPath}`);
      }
    } catch (error) {
      logger.warn(`Failed to load config file: ${configPath}`, { error: String(error) });
    }
  }

  // Validate
  const result = systemConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n${errors.join('\n')}`, { issues: errors });
  }

  cachedConfig = result.data;

  logger.debug('Configuration loaded', {
    solver: cachedConfig.solver,
    color: cachedConfig.display.color,
  });

  return cachedConfig;
}

/**
 * Get current config (throws if not loaded)
 */
export function getConfig(): SystemConfig {
  if (!cachedConfig) {
    throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

// Malformed numbers come through as NaN so the schema reports them
function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseEnvBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;
    const targetValue = target[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result;
}
