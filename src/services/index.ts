import { Config } from '../config';
import { PostgresStore, Store } from '../db/store';
import { createEmbedder } from '../embeddings';
import { Matcher } from '../matching/matcher';
import { createJobSources } from '../sources';
import { createAlertChannel } from './alerts';
import { CvService } from './cv-service';
import { JobFetcherService } from './job-fetcher';
import { JobIngestionService } from './job-ingestion';
import { NotificationDispatcher } from './notification-dispatcher';
import { createNotifier } from './notifier';
import { PipelineRunner } from './pipeline';
import { PipelineScheduler } from './scheduler';

export interface Services {
  store: Store;
  cvService: CvService;
  pipeline: PipelineRunner;
  scheduler: PipelineScheduler;
}

/**
 * Wires the production services from configuration
 */
export function createServices(config: Config, store: Store = new PostgresStore()): Services {
  const embedder = createEmbedder(config);
  const fetcher = new JobFetcherService(createJobSources(config), config);
  const ingestion = new JobIngestionService(store, embedder);
  const matcher = new Matcher(store, { threshold: config.similarityThreshold });
  const dispatcher = new NotificationDispatcher(
    store,
    createNotifier(config.email),
    createAlertChannel(config.alertWebhookUrl),
    {
      maxNotificationsPerUser: config.maxNotificationsPerUser,
      maxAttempts: config.notificationMaxAttempts,
      retryDelayMs: config.notificationRetryDelayMs,
    }
  );

  const pipeline = new PipelineRunner(
    { fetcher, ingestion, store, embedder, matcher, dispatcher },
    {
      fetchLookbackHours: config.jobFetchLookbackHours,
      matchLookbackHours: config.matchLookbackHours,
    }
  );

  return {
    store,
    cvService: new CvService(store, embedder),
    pipeline,
    scheduler: new PipelineScheduler(pipeline),
  };
}
