/**
 * Logging Configuration
 *
 * Centralized configuration for structured logging with Pino.
 * Read straight from process.env so the logger can be created before
 * the rest of the environment is validated.
 */

export interface LoggingConfig {
  level: string;
  isDevelopment: boolean;
  enablePrettyPrint: boolean;
  githubActions: boolean;
}

/**
 * Get logging configuration from environment variables
 */
export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  const githubActions = env.GITHUB_ACTIONS === 'true';

  let level = env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');
  if (!env.LOG_LEVEL && nodeEnv === 'test') {
    level = 'silent';
  }
  if (githubActions && env.RUNNER_DEBUG === '1') {
    level = 'debug';
  }

  return {
    level,
    isDevelopment,
    // Actions annotations and pretty output are mutually exclusive
    enablePrettyPrint: isDevelopment && !githubActions && env.LOG_PRETTY !== 'false',
    githubActions,
  };
}
