import 'dotenv/config';
import { loadConfig } from './config';
import { registerShutdownHandlers } from './db/client';
import { createServices } from './services';
import { logger } from './utils/logger';

/**
 * Long-running worker: one pipeline run every PIPELINE_INTERVAL_MINUTES
 */
function startWorker(): void {
  const config = loadConfig();
  const { scheduler } = createServices(config);

  scheduler.start(config.pipelineIntervalMinutes * 60 * 1000);
  registerShutdownHandlers(() => scheduler.stop());

  logger.info('Worker started', {
    intervalMinutes: config.pipelineIntervalMinutes,
    threshold: config.similarityThreshold,
  });
}

try {
  startWorker();
} catch (error) {
  logger.error('Failed to start worker', error);
  process.exitCode = 1;
}
