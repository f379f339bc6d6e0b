/**
 * Environment Variable Validation
 * Collects every missing or malformed variable before startup
 */

import { parseCloseMode, readNumber } from '../config';

interface EnvValidationError {
  variable: string;
  issue: string;
}

type Env = Record<string, string | undefined>;

const NUMERIC_VARIABLES = [
  'PORT',
  'OHLC_INTERVAL_MINUTES',
  'EXCHANGE_MIN_REQUEST_INTERVAL_MS',
  'EXCHANGE_TIMEOUT_MS',
  'TRAILING_STOP_PCT',
  'MAX_POSITION_SIZE_PCT',
  'MAX_DAILY_LOSS_PCT',
  'MAX_SIGNALS_PER_CYCLE',
  'MIN_ORDER_USD',
  'SCHEDULER_TICK_MS',
];

/**
 * Throws one error listing every problem found
 */
export function validateEnvironment(env: Env = process.env): void {
  const errors: EnvValidationError[] = [];

  validateRequired(env, 'DATABASE_URL', errors);
  validateRequired(env, 'REDIS_URL', errors);

  const hasApiKey = Boolean(env.KRAKEN_API_KEY?.trim());
  const hasPrivateKey = Boolean(env.KRAKEN_PRIVATE_KEY?.trim());
  if (hasApiKey !== hasPrivateKey) {
    errors.push({
      variable: hasApiKey ? 'KRAKEN_PRIVATE_KEY' : 'KRAKEN_API_KEY',
      issue: 'KRAKEN_API_KEY and KRAKEN_PRIVATE_KEY must be set together',
    });
  } else if (!hasApiKey && env.NODE_ENV === 'production') {
    errors.push({ variable: 'KRAKEN_API_KEY', issue: 'Required in production' });
  }

  for (const name of NUMERIC_VARIABLES) {
    try {
      const value = readNumber(env, name, 0);
      if (value < 0) {
        errors.push({ variable: name, issue: 'Must not be negative' });
      }
    } catch (error) {
      errors.push({ variable: name, issue: 'Must be a number' });
    }
  }

  try {
    parseCloseMode(env.CLOSE_MODE);
  } catch (error) {
    errors.push({ variable: 'CLOSE_MODE', issue: 'Must be CONFIRM or OPTIMISTIC' });
  }

  if (errors.length > 0) {
    const errorMessages = errors.map((err) => `  - ${err.variable}: ${err.issue}`).join('\n');

    throw new Error(
      `Environment validation failed. Fix the following issues:\n\n${errorMessages}\n\n` +
        `See .env.example for required variables.`
    );
  }
}

function validateRequired(env: Env, name: string, errors: EnvValidationError[]): void {
  const value = env[name];

  if (!value || value.trim() === '') {
    errors.push({
      variable: name,
      issue: 'Required but not set',
    });
  }
}
