import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { createDocumentRoutes } from './routes/documents';
import { createSettingsRoutes } from './routes/settings';
import type { DocumentSessionService } from './services/documentSessionService';
import type { SettingsStore } from './services/settingsStore';

export interface AppServices {
  sessions: DocumentSessionService;
  settings: SettingsStore;
}

export function createApp({ sessions, settings }: AppServices) {
  const app = express();

  // Local tool: relaxed helmet so the client can run from any dev origin
  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  }));
  app.use(compression());
  app.use(cors({
    origin: true,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    optionsSuccessStatus: 204,
  }));
  // Shape lists for large drawings can be sizeable
  app.use(express.json({ limit: '50mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/documents', createDocumentRoutes(sessions));
  app.use('/api/settings', createSettingsRoutes(settings));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
