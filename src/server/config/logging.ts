/**
 * Logging Configuration
 *
 * Centralized configuration for structured logging with Pino.
 * Read straight from process.env so the logger can be created before env validation runs.
 */

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggingConfig {
  level: LogLevel;
  environment: string;
  enablePrettyPrint: boolean;
  enableRequestLogging: boolean;
  redactPaths: string[];
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Get logging configuration from environment variables
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const environment = env.NODE_ENV || 'development';
  const isDevelopment = environment === 'development';
  // Tests stay quiet unless a level is asked for
  const defaultLevel: LogLevel = isDevelopment ? 'debug' : (environment === 'test' ? 'silent' : 'info');
  const requestedLevel = env.LOG_LEVEL || defaultLevel;

  return {
    level: isLogLevel(requestedLevel) ? requestedLevel : defaultLevel,
    environment,
    enablePrettyPrint: env.LOG_PRETTY ? env.LOG_PRETTY === 'true' : isDevelopment,
    enableRequestLogging: env.LOG_REQUESTS !== 'false',
    // Request bodies carry user text
    redactPaths: ['body.text', 'req.headers.authorization'],
  };
}
