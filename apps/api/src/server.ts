import { createServer } from 'http';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { getConnection } from './services/connection.service.js';
import { logger } from './utils/logger.js';

const app = createApp();
const server = createServer(app);

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  logger.info({ signal }, 'Shutting down server');

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });
}

function bootstrap(): void {
  const connection = getConnection();
  server.listen(env.PORT, () => {
    logger.info(`Server running on port ${env.PORT}`);
    logger.info(`Environment: ${env.NODE_ENV}`);
    logger.info({ baseUrl: connection.baseUrl, database: connection.database }, 'Default Odoo connection');
  });
}

bootstrap();

process.on('SIGINT', () => {
  void shutdown('SIGINT').finally(() => process.exit(0));
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM').finally(() => process.exit(0));
});
