import os from 'os';
import path from 'path';

const readInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readFloat = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export interface ServerConfig {
  port: number;
  /** Settings are stored per application id */
  appId: string;
  settingsDir: string;
  logDir: string;
  /** Upper bound for one document mutation; 0 disables the limit */
  mutationTimeoutMs: number;
  previewScale: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const appId = env.TAKEOFF_APP_ID || 'takeoff-markup';
  const settingsDir = env.TAKEOFF_SETTINGS_DIR || path.join(os.homedir(), `.${appId}`);
  const timeout = parseInt(env.MUTATION_TIMEOUT_MS ?? '', 10);

  return {
    port: readInt(env.PORT, 4000),
    appId,
    settingsDir,
    logDir: env.TAKEOFF_LOG_DIR || path.join(settingsDir, 'logs'),
    mutationTimeoutMs: Number.isFinite(timeout) && timeout >= 0 ? timeout : 120000,
    previewScale: readFloat(env.PREVIEW_SCALE, 0.2),
  };
}

export const config = loadConfig();
