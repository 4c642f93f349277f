import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../errors';
import { isEstimateSection, isShapeDescriptor } from '../types';
import { sendError } from './errorResponse';

/**
 * Validate that a string is a valid UUID v4
 */
export function isValidUUID(str: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;
  return uuidRegex.test(str);
}

/**
 * Middleware to validate UUID route parameters
 */
export function validateUUIDParam(...paramNames: string[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    for (const paramName of paramNames) {
      const value = req.params[paramName];
      if (value && !isValidUUID(value)) {
        return sendError(res, 'VALIDATE_PARAMS', new ValidationError(`Invalid ${paramName} format - must be a valid UUID`, paramName));
      }
    }
    next();
  };
}

/**
 * Middleware to validate required body fields exist
 */
export function validateRequiredFields(...fieldNames: string[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    const missing = fieldNames.filter(field => {
      const value = typeof body === 'object' && body !== null ? Reflect.get(body, field) : undefined;
      return value === undefined || value === null || value === '';
    });

    if (missing.length > 0) {
      return sendError(res, 'VALIDATE_BODY', new ValidationError(`Missing required fields: ${missing.join(', ')}`, missing[0]));
    }
    next();
  };
}

/**
 * Middleware for save requests: a shape list and an optional destination
 */
export function validateSaveBody(req: Request, res: Response, next: NextFunction) {
  const { shapes, destinationPath } = req.body ?? {};
  if (!Array.isArray(shapes)) {
    return sendError(res, 'VALIDATE_BODY', new ValidationError('shapes must be an array', 'shapes'));
  }
  const invalid = shapes.findIndex((shape) => !isShapeDescriptor(shape));
  if (invalid !== -1) {
    return sendError(res, 'VALIDATE_BODY', new ValidationError(`Invalid shape at index ${invalid}`, 'shapes'));
  }
  if (destinationPath !== undefined && (typeof destinationPath !== 'string' || destinationPath.trim() === '')) {
    return sendError(res, 'VALIDATE_BODY', new ValidationError('destinationPath must be a non-empty string', 'destinationPath'));
  }
  next();
}

/**
 * Middleware for spreadsheet export requests
 */
export function validateExportBody(req: Request, res: Response, next: NextFunction) {
  const { sections, totalLabor } = req.body ?? {};
  if (!Array.isArray(sections) || !sections.every(isEstimateSection)) {
    return sendError(res, 'VALIDATE_BODY', new ValidationError('sections must be a list of { category, rows }', 'sections'));
  }
  if (typeof totalLabor !== 'number' || !Number.isFinite(totalLabor)) {
    return sendError(res, 'VALIDATE_BODY', new ValidationError('totalLabor must be a number', 'totalLabor'));
  }
  next();
}
