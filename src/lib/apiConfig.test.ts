import { afterEach, describe, expect, it, vi } from 'vitest';
import { getApiBaseUrl } from './apiConfig';

describe('getApiBaseUrl', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to the local back end', () => {
    vi.stubEnv('VITE_API_BASE_URL', '');
    expect(getApiBaseUrl()).toBe('http://localhost:4000/api');
  });

  it('uses the configured URL without trailing slashes', () => {
    vi.stubEnv('VITE_API_BASE_URL', 'http://127.0.0.1:5000/api//');
    expect(getApiBaseUrl()).toBe('http://127.0.0.1:5000/api');
  });
});
