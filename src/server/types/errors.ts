/**
 * Centralized error type definitions for the package insert pipelines
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid environment or rule-table configuration. Raised at startup.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, false, context);
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.DATABASE_ERROR, false, context);
  }
}

/**
 * Markup that could not be parsed into a document tree
 */
export class DocumentParseError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.DOCUMENT_PARSE_ERROR, true, context);
  }
}

export class ArchiveExtractionError extends AppError {
  constructor(archivePath: string, message: string, context?: Record<string, unknown>) {
    super(
      `Archive extraction failed (${archivePath}): ${message}`,
      ErrorCode.ARCHIVE_EXTRACTION_ERROR,
      true,
      { archivePath, ...context }
    );
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  DATABASE_ERROR = 'DATABASE_ERROR',
  DOCUMENT_PARSE_ERROR = 'DOCUMENT_PARSE_ERROR',
  ARCHIVE_EXTRACTION_ERROR = 'ARCHIVE_EXTRACTION_ERROR',
}

/**
 * Render any thrown value as a message string
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
