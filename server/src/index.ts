import 'dotenv/config';
import { createApp } from './app';
import { config } from './config';
import { DocumentMutationService } from './services/documentMutationService';
import { DocumentSessionService } from './services/documentSessionService';
import { SettingsStore } from './services/settingsStore';

async function main() {
  const settings = new SettingsStore(config.settingsDir);
  const loaded = await settings.load();
  console.log(`⚙️ Settings loaded from ${settings.filePath} (last directory: ${loaded.lastDir || 'none'})`);

  const mutator = new DocumentMutationService({
    logDir: config.logDir,
    timeoutMs: config.mutationTimeoutMs,
  });
  const sessions = new DocumentSessionService({ mutator, settings, previewScale: config.previewScale });
  const app = createApp({ sessions, settings });

  const server = app.listen(config.port, () => {
    console.log(`🚀 Takeoff markup server running on port ${config.port}`);
    console.log(`📁 Mutation logs: ${config.logDir}`);
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down`);
    server.close();
    sessions
      .closeAll()
      .catch((error: unknown) => console.error('❌ Error closing documents:', error))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
