import 'dotenv/config';
import { createApp } from './api/app';
import { loadConfig } from './config';
import { registerShutdownHandlers } from './db/client';
import { createServices } from './services';
import { logger } from './utils/logger';

function main(): void {
  const config = loadConfig();
  const services = createServices(config);

  const app = createApp({
    cvService: services.cvService,
    matches: services.store,
    scheduler: services.scheduler,
    cronSecret: config.cronSecret,
    cvMaxUploadBytes: config.cvMaxUploadBytes,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server started successfully`, { port: config.port, threshold: config.similarityThreshold });
  });

  registerShutdownHandlers(
    () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      })
  );
}

try {
  main();
} catch (error) {
  logger.error('Server failed to start', error);
  process.exitCode = 1;
}
