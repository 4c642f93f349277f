// Common utility functions used across the session stores and services
import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique ID for shapes and entries
 */
export const generateId = (): string => {
  return uuidv4();
};

// Plain decimal notation, optionally signed, with an optional exponent
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a user-entered numeric field (labor hours, wire length).
 * Anything that is not a plain decimal number reads as 0.
 */
export const parseNumericField = (text: string | null | undefined): number => {
  if (text == null) return 0;
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return 0;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : 0;
};

/**
 * Check if a value is empty (null, undefined, or a blank string)
 */
export const isBlank = (value: string | null | undefined): boolean => {
  return value == null || value.trim() === '';
};

/**
 * Pull a human readable message out of anything thrown: API error bodies,
 * Error instances, plain objects with message/error fields, primitives.
 */
export const extractErrorMessage = (error: unknown, fallback: string = 'Unknown error'): string => {
  if (error == null) return fallback;
  if (axios.isAxiosError<{ error?: unknown }>(error)) {
    const serverMessage = error.response?.data?.error;
    if (typeof serverMessage === 'string' && serverMessage !== '') {
      return serverMessage;
    }
    return error.message || fallback;
  }
  if (error instanceof Error) return error.message || fallback;
  if (typeof error === 'object') {
    if ('message' in error && typeof error.message === 'string') return error.message;
    if ('error' in error && typeof error.error === 'string') return error.error;
    return fallback;
  }
  return String(error);
};
