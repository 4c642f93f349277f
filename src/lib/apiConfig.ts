/**
 * Centralized API configuration
 *
 * The session talks to the local back end; the base URL can be overridden
 * at build time through VITE_API_BASE_URL.
 */

const DEFAULT_API_BASE_URL = 'http://localhost:4000/api';

/**
 * Get the API base URL, with a local fallback
 */
export function getApiBaseUrl(): string {
  // Priority 1: Explicitly set environment variable (always wins)
  const explicitUrl = import.meta.env.VITE_API_BASE_URL;
  if (explicitUrl) {
    return explicitUrl.replace(/\/+$/, '');
  }

  // Priority 2: Development fallback
  return DEFAULT_API_BASE_URL;
}
