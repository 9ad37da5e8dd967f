import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

/**
 * Structured logger using pino
 *
 * Configuration:
 * - LOG_LEVEL environment variable controls verbosity (trace, debug, info, warn, error, fatal, silent)
 * - ISO timestamps for consistent time formatting
 * - JSON format for structured logging
 * - Secret-like fields are redacted if they accidentally get logged
 */
export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      '*.password',
      '*.token',
      '*.secret',
      '*.apiKey',
      '*.api_key',
      '*.privateKey',
      '*.private_key',
      '*.mnemonic',
    ],
    censor: '[REDACTED]',
  },
});

/**
 * Create a child logger with additional context
 *
 * @param bindings - Additional context to include in all log entries
 * @returns Child logger instance
 */
export function createChildLogger(bindings: Record<string, unknown>) {
  return logger.child(bindings);
}
