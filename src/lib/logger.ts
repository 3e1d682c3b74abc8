// Path: src/lib/logger.ts
// Centralized Pino logger for homelab-provision

import pino from 'pino';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

/**
 * Pretty transport for interactive terminals, writing to stderr
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (isTest || !process.stderr.isTTY) {
    return undefined;
  }

  if (pinoPrettyAvailable === null) {
    try {
      require.resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }

  if (!pinoPrettyAvailable) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      destination: 2,
      translateTime: 'SYS:HH:MM:ss',
      ignore: 'pid,hostname,service',
    },
  };
}

const transport = createTransport();

/**
 * Base logger instance
 *
 * Logs go to stderr so that command output on stdout stays machine-readable.
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent (default: info)
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? 'info',
    transport,
    base: {
      service: 'homelab-provision',
    },
    // Secret values must never reach the log
    redact: {
      paths: ['value', 'raw', 'secret.value', 'secret.raw', 'bindings', 'env', 'content'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport ? undefined : pino.destination({ dest: 2, sync: true })
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'output' });
 * log.info({ path: 'ignition/config.ign' }, 'Artifact written');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

// Pre-configured module loggers
export const secretsLogger = createLogger({ module: 'secrets' });
export const templateLogger = createLogger({ module: 'template' });
export const ignitionLogger = createLogger({ module: 'ignition' });
export const outputLogger = createLogger({ module: 'output' });
export const buildLogger = createLogger({ module: 'build' });
export const configLogger = createLogger({ module: 'config' });

/**
 * Flush pending log lines before the process exits
 */
export function flushLogs(): void {
  logger.flush();
}
