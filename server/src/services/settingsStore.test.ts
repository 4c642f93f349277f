import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SettingsStore } from './settingsStore';

describe('SettingsStore', () => {
  let settingsDir: string;

  beforeEach(async () => {
    settingsDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'settings-test-')), 'takeoff-markup');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(path.dirname(settingsDir));
  });

  it('starts with defaults when nothing is stored', async () => {
    await expect(new SettingsStore(settingsDir).load()).resolves.toEqual({ lastDir: '' });
  });

  it('persists the last directory for the next start', async () => {
    await new SettingsStore(settingsDir).setLastDir('/plans');

    expect(await fs.readJson(path.join(settingsDir, 'settings.json'))).toEqual({ lastDir: '/plans' });
    await expect(new SettingsStore(settingsDir).load()).resolves.toEqual({ lastDir: '/plans' });
  });

  it('falls back to defaults for an unreadable file', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.outputFile(path.join(settingsDir, 'settings.json'), '{ not json');

    await expect(new SettingsStore(settingsDir).load()).resolves.toEqual({ lastDir: '' });
  });

  it('ignores stored values of the wrong type', async () => {
    await fs.outputJson(path.join(settingsDir, 'settings.json'), { lastDir: 42 });

    await expect(new SettingsStore(settingsDir).load()).resolves.toEqual({ lastDir: '' });
  });
});
