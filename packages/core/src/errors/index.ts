/**
 * Custom Error Classes
 */

/**
 * Base error class for all flightlog errors
 */
export class FlightLogError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'FlightLogError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends FlightLogError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Missing or malformed configuration (env vars, credentials file)
 */
export class ConfigurationError extends FlightLogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * No log file matched in any searched location
 */
export class LogNotFoundError extends FlightLogError {
  constructor(searchedDirs: string[], extension: string) {
    super(
      `No ${extension} log files found in any location`,
      'LOG_NOT_FOUND',
      404,
      { searchedDirs, extension }
    );
    this.name = 'LogNotFoundError';
  }
}

/**
 * Object storage failure (connection, bucket, upload, policy)
 */
export class StorageError extends FlightLogError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, 'STORAGE_ERROR', 502, details, { cause });
    this.name = 'StorageError';
  }
}
