import express from 'express';
import type { SettingsStore } from '../services/settingsStore';

export function createSettingsRoutes(settings: SettingsStore) {
  const router = express.Router();

  // Get persisted settings
  router.get('/', (_req, res) => {
    return res.json({ settings: settings.get() });
  });

  return router;
}
