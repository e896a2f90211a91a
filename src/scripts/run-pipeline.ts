import 'dotenv/config';
import { loadConfig } from '../config';
import { closePool } from '../db/client';
import { createServices } from '../services';
import { exitCodeFor } from '../services/pipeline';
import { createRunContext } from '../services/run-context';
import { logger } from '../utils/logger';

/**
 * Runs a single batch and exits: 0 clean, 2 when something was skipped, 1 on failure
 */
async function runOnce(): Promise<number> {
  const config = loadConfig();
  const { pipeline } = createServices(config);

  const report = await pipeline.run(createRunContext());
  logger.info('Run report', { ...report });
  return exitCodeFor(report);
}

async function main(): Promise<void> {
  try {
    process.exitCode = await runOnce();
  } finally {
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.error('Pipeline run failed', error);
  process.exitCode = 1;
});
