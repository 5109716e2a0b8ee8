/**
 * Centralized error type definitions for wikibase-rdf-patch
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isFatal: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    isFatal: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isFatal = isFatal;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A graph term could not be turned into a data value
 * (unsupported literal datatype, malformed WKT, missing structured field, ...)
 */
export class ResolutionError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'RESOLUTION_ERROR', true, context);
  }
}

/**
 * Resolved value type does not match the property's declared datatype
 */
export class DatatypeMismatchError extends AppError {
  constructor(
    public readonly propertyId: string,
    public readonly datatype: string,
    public readonly valueType: string
  ) {
    super(
      `Value type '${valueType}' does not match datatype '${datatype}' of ${propertyId}`,
      'DATATYPE_MISMATCH',
      true,
      { propertyId, datatype, valueType }
    );
  }
}

/**
 * Prefetched data disagrees with what the document addresses
 */
export class ConsistencyError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONSISTENCY_ERROR', true, context);
  }
}

export class StatementNotFoundError extends AppError {
  constructor(public readonly guid: string, entityId: string) {
    super(`Statement GUID not found: ${guid}`, 'STATEMENT_NOT_FOUND', true, { guid, entityId });
  }
}

export class RdfSyntaxError extends AppError {
  constructor(message: string) {
    super(`RDF syntax error: ${message}`, 'RDF_SYNTAX_ERROR', true);
  }
}

/**
 * Error object returned by the MediaWiki Action API
 */
export class MediaWikiApiError extends AppError {
  constructor(
    public readonly apiCode: string,
    public readonly info: string
  ) {
    super(`[${apiCode}] ${info}`, 'MEDIAWIKI_API_ERROR', true, { apiCode });
  }
}

export class LoginError extends AppError {
  constructor(reason: string) {
    super(`Login failed: ${reason}`, 'LOGIN_FAILED', true);
  }
}

export class EditRetriesExhaustedError extends AppError {
  constructor(entityId: string, attempts: number) {
    super(
      `Edit of ${entityId} failed after ${attempts} attempts`,
      'EDIT_RETRIES_EXHAUSTED',
      true,
      { entityId, attempts }
    );
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', true, context);
  }
}

/**
 * Type guard for application errors
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
