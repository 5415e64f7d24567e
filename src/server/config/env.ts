/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables.
 * Values are parsed by hand and every problem is reported at once.
 */

// Load dotenv early to ensure environment variables are available before validation
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';
import { isLogLevel } from './logging.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return (NODE_ENVS as readonly string[]).includes(value);
}

/**
 * Environment configuration type
 */
export interface Env {
  // Server Configuration
  NODE_ENV: NodeEnv;
  PORT: number;

  // Simplification limit (HTTP API)
  SIMPLIFY_MAX_TEXT_LENGTH: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate environment variables and cache the result
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  // Validate NODE_ENV
  const nodeEnv = source.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  // Validate PORT
  const port = parseNumericEnv(source.PORT, 4000);
  if (port < 1 || port > 65535) {
    errors.push(`PORT: Invalid value "${source.PORT}". Must be between 1 and 65535.`);
  }

  // Validate LOG_LEVEL (the logger reads it through getLoggingConfig)
  if (source.LOG_LEVEL && !isLogLevel(source.LOG_LEVEL)) {
    errors.push(`LOG_LEVEL: Invalid value "${source.LOG_LEVEL}". Must be one of fatal, error, warn, info, debug, trace, silent.`);
  }

  const maxTextLength = parseNumericEnv(source.SIMPLIFY_MAX_TEXT_LENGTH, 100_000);
  if (maxTextLength < 1) {
    errors.push(`SIMPLIFY_MAX_TEXT_LENGTH: Invalid value "${source.SIMPLIFY_MAX_TEXT_LENGTH}". Must be at least 1.`);
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new ConfigurationError(errors);
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,
    PORT: port,
    SIMPLIFY_MAX_TEXT_LENGTH: maxTextLength,
  };

  return validatedEnv;
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}

