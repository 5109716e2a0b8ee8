/**
 * Environment Variable Validation
 *
 * Centralized parsing of all environment variables with defaults.
 * Values are validated once and cached; call resetEnv() after changing process.env.
 */

// Load dotenv early so variables from .env are visible to the first validateEnv() call
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';

export const DEFAULT_API_URL = 'https://www.wikidata.org/w/api.php';
export const DEFAULT_USER_AGENT =
  'wikibase-rdf-patch/1.0 (https://www.wikidata.org/wiki/User:WikibaseRdfPatch)';

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

function isNodeEnv(value: string): value is NodeEnv {
  return NODE_ENVS.some((env) => env === value);
}

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

function parseFloatEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseFloat(value);
  return isNaN(num) ? defaultValue : num;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value === 'true';
}

/**
 * Environment configuration type
 */
export interface Env {
  NODE_ENV: NodeEnv;

  // Wikibase account and blocklist
  WIKIDATA_USERNAME: string;
  WIKIDATA_PASSWORD: string;
  WIKIDATA_BLOCKLIST_URL: string;

  // MediaWiki Action API
  WIKIBASE_API_URL: string;
  WIKIBASE_USER_AGENT: string;
  WIKIBASE_MAXLAG: number;
  WIKIBASE_EDIT_RETRIES: number;
  WIKIBASE_MAXLAG_DELAY_MS: number;
  WIKIBASE_EDITS_PER_SECOND: number;
  WIKIBASE_REQUEST_TIMEOUT_MS: number;

  // Logging Configuration
  LOG_LEVEL?: string;
  LOG_PRETTY: boolean;
  GITHUB_ACTIONS: boolean;
  RUNNER_DEBUG: boolean;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {ConfigurationError} If any value is out of range
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const apiUrl = process.env.WIKIBASE_API_URL || DEFAULT_API_URL;
  if (!/^https?:\/\//.test(apiUrl)) {
    errors.push(`WIKIBASE_API_URL: Invalid value "${apiUrl}". Must be an http(s) URL.`);
  }

  const maxlag = parseNumericEnv(process.env.WIKIBASE_MAXLAG, 5);
  if (maxlag < 0) {
    errors.push(`WIKIBASE_MAXLAG: Invalid value "${process.env.WIKIBASE_MAXLAG}". Must be >= 0.`);
  }

  const editRetries = parseNumericEnv(process.env.WIKIBASE_EDIT_RETRIES, 5);
  if (editRetries < 1) {
    errors.push(`WIKIBASE_EDIT_RETRIES: Invalid value "${process.env.WIKIBASE_EDIT_RETRIES}". Must be >= 1.`);
  }

  const editsPerSecond = parseFloatEnv(process.env.WIKIBASE_EDITS_PER_SECOND, 1);
  if (editsPerSecond <= 0) {
    errors.push(
      `WIKIBASE_EDITS_PER_SECOND: Invalid value "${process.env.WIKIBASE_EDITS_PER_SECOND}". Must be > 0.`
    );
  }

  if (errors.length > 0 || !isNodeEnv(nodeEnv)) {
    throw new ConfigurationError(`Environment validation failed:\n${errors.join('\n')}`, { errors });
  }

  validatedEnv = {
    NODE_ENV: nodeEnv,

    WIKIDATA_USERNAME: process.env.WIKIDATA_USERNAME || '',
    WIKIDATA_PASSWORD: process.env.WIKIDATA_PASSWORD || '',
    WIKIDATA_BLOCKLIST_URL: process.env.WIKIDATA_BLOCKLIST_URL || '',

    WIKIBASE_API_URL: apiUrl,
    WIKIBASE_USER_AGENT: process.env.WIKIBASE_USER_AGENT || DEFAULT_USER_AGENT,
    WIKIBASE_MAXLAG: maxlag,
    WIKIBASE_EDIT_RETRIES: editRetries,
    WIKIBASE_MAXLAG_DELAY_MS: parseNumericEnv(process.env.WIKIBASE_MAXLAG_DELAY_MS, 5000),
    WIKIBASE_EDITS_PER_SECOND: editsPerSecond,
    WIKIBASE_REQUEST_TIMEOUT_MS: parseNumericEnv(process.env.WIKIBASE_REQUEST_TIMEOUT_MS, 30000),

    LOG_LEVEL: process.env.LOG_LEVEL,
    LOG_PRETTY: parseBooleanEnv(process.env.LOG_PRETTY, true),
    GITHUB_ACTIONS: parseBooleanEnv(process.env.GITHUB_ACTIONS, false),
    RUNNER_DEBUG: process.env.RUNNER_DEBUG === '1',
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
