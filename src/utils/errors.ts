/**
 * Server Registry - Error Utilities
 *
 * Provides custom error types and error handling utilities.
 */

/**
 * Base error class for registry errors
 */
export class RegistryError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RegistryError);
    }
  }
}

/**
 * Error thrown when the saved server list cannot be restored
 */
export class RestoreFailureError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESTORE_FAILURE', details);
    this.name = 'RestoreFailureError';
  }
}

/**
 * Error thrown when a configuration file cannot be opened
 */
export class FileUnreadableError extends RegistryError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error | string) {
    const reason = cause === undefined ? '' : `: ${typeof cause === 'string' ? cause : cause.message}`;
    super(`Server configuration file is not readable: ${filePath}${reason}`, 'FILE_UNREADABLE', { filePath });
    this.name = 'FileUnreadableError';
    this.filePath = filePath;
  }
}

/**
 * Error thrown when a configuration file yields no usable configuration
 */
export class ParseFailureError extends RegistryError {
  public readonly filePath: string;
  public readonly parserErrors: string[];

  constructor(filePath: string, reason: string, parserErrors: string[] = []) {
    super(`Failed to parse server configuration ${filePath}: ${reason}`, 'PARSE_FAILURE', {
      filePath,
      parserErrors
    });
    this.name = 'ParseFailureError';
    this.filePath = filePath;
    this.parserErrors = parserErrors;
  }
}

/**
 * Error thrown when the preference store cannot be written
 */
export class PersistenceError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_FAILURE', details);
    this.name = 'PersistenceError';
  }
}

/**
 * Error thrown when a server attribute set fails validation
 */
export class InvalidConfigurationError extends RegistryError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid server configuration: ${issues.join('; ')}`, 'INVALID_SERVER_CONFIGURATION', { issues });
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error thrown for registry option errors
 */
export class ConfigurationError extends RegistryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for checking if an error is a RegistryError
 */
export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

/**
 * Normalize a caught value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Format an error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof RegistryError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
