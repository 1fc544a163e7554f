/**
 * Custom Error Classes for the Black-Scholes-Merton Terminal
 *
 * Only genuine faults are thrown. A market price below intrinsic value or a
 * solver that fails to converge is an ordinary result (see core/types.ts).
 */

/**
 * Base class for all system errors
 */
export class PricingSystemError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PricingSystemError';
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// PRICING ERRORS
// ============================================================================

/**
 * A model input outside its domain (non-positive spot, strike, time or
 * volatility, or a non-finite number anywhere)
 */
export class PreconditionViolationError extends PricingSystemError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid ${field}: ${reason}`, 'PRECONDITION_VIOLATION', { field, value, reason });
    this.name = 'PreconditionViolationError';
    this.field = field;
    this.value = value;
  }
}

// ============================================================================
// INPUT ERRORS
// ============================================================================

export class InputParseError extends PricingSystemError {
  public readonly field: string;

  constructor(field: string, raw: string, reason: string) {
    super(`Could not read ${field}: ${reason}`, 'INPUT_PARSE_ERROR', { field, raw, reason });
    this.name = 'InputParseError';
    this.field = field;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends PricingSystemError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// ERROR UTILITY FUNCTIONS
// ============================================================================

/**
 * Check if an error is one of ours
 */
export function isPricingSystemError(error: unknown): error is PricingSystemError {
  return error instanceof PricingSystemError;
}

/**
 * Wrap unknown errors in PricingSystemError
 */
export function wrapError(error: unknown, defaultMessage = 'Unknown error'): PricingSystemError {
  if (isPricingSystemError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PricingSystemError(error.message, 'WRAPPED_ERROR', {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new PricingSystemError(defaultMessage, 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
}
