import 'dotenv/config';
import { createApp } from './app.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.app;

const server = app.listen(port, () => {
  container.logger.info(
    {
      port,
      environment: process.env.NODE_ENV ?? 'development',
      ...container.providers(),
    },
    'Coverage advisor API listening',
  );
});

const shutdown = (signal: string) => {
  container.logger.info({ signal }, 'Shutting down');
  server.close((error) => {
    if (error) {
      container.logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
