import pino, { type Logger } from 'pino';
import pretty from 'pino-pretty';

// Configure logger based on environment
const isTest = process.env['NODE_ENV'] === 'test';

function createLogger(): Logger {
  if (isTest) {
    return pino({
      name: 'grpc-healthcheck',
      level: 'silent', // Disable logging in tests
    });
  }

  // stdout carries the probe verdict, so diagnostics go to stderr.
  // A synchronous stream keeps the last lines when the process ends.
  return pino(
    {
      name: 'grpc-healthcheck',
      level: process.env['LOG_LEVEL'] || 'warn',
    },
    pretty({
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'HH:MM:ss.l',
      destination: 2,
      sync: true,
    })
  );
}

export const logger = createLogger();

/**
 * Raise the shared logger to debug for --verbose runs.
 * Never lowers a level set through LOG_LEVEL.
 */
export function enableVerboseLogging(): void {
  if (isTest) {
    return;
  }
  if (!logger.isLevelEnabled('debug')) {
    logger.level = 'debug';
  }
}
