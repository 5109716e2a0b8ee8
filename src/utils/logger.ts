import pino from 'pino';
import type { Logger } from 'pino';
import { getLoggingConfig, type LoggingConfig } from '../config/logging.js';
import { createGithubActionsStream } from './githubActionsLogStream.js';

export type { Logger };

/**
 * Create logger instance based on environment
 *
 * Logs go to stderr so stdout stays free for command output.
 */
export function createLogger(config: LoggingConfig = getLoggingConfig()): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: 'wikibase-rdf-patch',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.githubActions) {
    return pino(options, createGithubActionsStream());
  }

  if (config.enablePrettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
