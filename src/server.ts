import { createApp } from './app';
import { loadSettings } from './config';
import { buildContainer } from './container';

const settings = loadSettings();
const container = buildContainer(settings);
const app = createApp(container);

const server = app.listen(settings.port, settings.host, () => {
  container.logger.info(`========================================`);
  container.logger.info(`${settings.appName} v${settings.version} (${settings.environment})`);
  container.logger.info(`SERVER STARTED ON http://${settings.host}:${settings.port}`);
  container.logger.info(`========================================`);
});

function shutdown(signal: string) {
  container.logger.info(`${signal} received, closing`);
  server.close(() => {
    container.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
