import { Response } from 'express';
import { DocumentMutationError, errorMessage, statusForError } from '../errors';

/**
 * Send the JSON error body for a failed request and log it
 */
export function sendError(res: Response, operation: string, error: unknown) {
  const status = statusForError(error);
  if (status >= 500) {
    console.error(`❌ ${operation}:`, error);
  } else {
    console.warn(`⚠️ ${operation}: ${errorMessage(error)}`);
  }

  if (error instanceof DocumentMutationError) {
    return res.status(status).json({ error: error.message, logPath: error.logPath ?? null });
  }
  return res.status(status).json({ error: errorMessage(error) });
}
