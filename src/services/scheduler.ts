import { RunReport } from '../types/run';
import { errorMessage } from '../errors';
import { logger } from '../utils/logger';
import { createRunContext } from './run-context';
import { PipelineRunner } from './pipeline';

/**
 * Runs the pipeline on an interval. At most one run is in flight at a time.
 */
export class PipelineScheduler {
  private running: Promise<RunReport> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(private runner: Pick<PipelineRunner, 'run'>) {}

  get isRunning(): boolean {
    return this.running !== null;
  }

  /**
   * Starts a run now. Resolves to null when a run is already in progress.
   */
  async trigger(): Promise<RunReport | null> {
    if (this.running) {
      logger.warn('Pipeline run requested while another run is in progress');
      return null;
    }

    const ctx = createRunContext();
    this.running = this.runner.run(ctx);
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  start(intervalMs: number, runImmediately = true): void {
    if (this.timer) return;

    const tick = () => {
      this.trigger().catch((error: unknown) => {
        logger.error('Scheduled pipeline run failed', error);
      });
    };

    this.timer = setInterval(tick, intervalMs);
    logger.info('Pipeline scheduler started', { intervalMs });
    if (runImmediately) tick();
  }

  /**
   * Stops the interval and waits for an in-flight run to finish
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running.catch((error: unknown) => {
        logger.warn('In-flight run failed during shutdown', { error: errorMessage(error) });
      });
    }
  }
}
