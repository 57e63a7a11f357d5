import { loadConfig } from './config';
import { createApp, createServices } from './app';

const config = loadConfig();
const services = createServices(config);
const app = createApp(services, config.corsOrigin);

const server = app.listen(config.port, () => {
  console.log(`[API] SQL workshop listening on port ${config.port}`);
  console.log(`[API] Database: ${config.databasePath}, backup: ${config.backupDir}`);
});

const shutdown = () => {
  console.log('[API] Shutting down...');
  server.close(() => {
    services.db.dispose();
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
