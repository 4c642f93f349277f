import path from 'path';
import fs from 'fs-extra';
import type { AppSettings } from '../types';

const DEFAULT_SETTINGS: AppSettings = { lastDir: '' };

/**
 * Small JSON settings file kept per application id. Read once at startup,
 * rewritten whenever a value changes.
 */
export class SettingsStore {
  private settings: AppSettings = { ...DEFAULT_SETTINGS };
  readonly filePath: string;

  constructor(settingsDir: string) {
    this.filePath = path.join(settingsDir, 'settings.json');
  }

  async load(): Promise<AppSettings> {
    try {
      if (await fs.pathExists(this.filePath)) {
        const stored: unknown = await fs.readJson(this.filePath);
        this.settings = { ...DEFAULT_SETTINGS, ...readSettings(stored) };
      }
    } catch (error) {
      console.warn(`⚠️ SETTINGS: Could not read ${this.filePath}, using defaults:`, error);
      this.settings = { ...DEFAULT_SETTINGS };
    }
    return this.get();
  }

  get(): AppSettings {
    return { ...this.settings };
  }

  async setLastDir(lastDir: string): Promise<void> {
    this.settings = { ...this.settings, lastDir };
    await fs.outputJson(this.filePath, this.settings, { spaces: 2 });
  }
}

function readSettings(value: unknown): Partial<AppSettings> {
  if (typeof value !== 'object' || value === null || !('lastDir' in value)) {
    return {};
  }
  return typeof value.lastDir === 'string' ? { lastDir: value.lastDir } : {};
}
