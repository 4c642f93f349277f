/**
 * Custom error classes for better error handling and debugging
 */

/**
 * Base application error with context
 */
export class AppError extends Error {
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Resource not found errors
 */
export class NotFoundError extends AppError {
  public readonly resourceType: string;
  public readonly resourceId?: string;

  constructor(resourceType: string, resourceId?: string) {
    super(`${resourceType} not found${resourceId ? `: ${resourceId}` : ''}`);
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends AppError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(message, field ? { field } : undefined);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * The source document could not be opened (missing, corrupt or unsupported)
 */
export class DocumentLoadError extends AppError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not open document ${path}: ${errorMessage(cause)}`, { path });
    this.name = 'DocumentLoadError';
    this.path = path;
  }
}

/**
 * The mutation worker failed or could not be launched. The destination
 * file is unchanged.
 */
export class DocumentMutationError extends AppError {
  public readonly logPath?: string;

  constructor(message: string, logPath?: string, context?: Record<string, unknown>) {
    super(message, logPath ? { ...context, logPath } : context);
    this.name = 'DocumentMutationError';
    this.logPath = logPath;
  }
}

/**
 * Workbook construction or file write failed
 */
export class SpreadsheetExportError extends AppError {
  constructor(destinationPath: string, cause: unknown) {
    super(`Spreadsheet export failed: ${errorMessage(cause)}`, { destinationPath });
    this.name = 'SpreadsheetExportError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status for an error raised while handling a request
 */
export function statusForError(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof DocumentLoadError) return 422;
  return 500;
}
