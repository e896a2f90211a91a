import { MatchStore } from '../db/store';
import { NotificationDeliveryError, StoreConstraintViolation, errorMessage } from '../errors';
import { MatchIntent } from '../types/match';
import { RunContext } from '../types/run';
import { User } from '../types/user';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';
import { AlertChannel } from './alerts';
import { renderMatchEmail } from './email-template';
import { Notifier } from './notifier';

export interface DispatcherOptions {
  maxNotificationsPerUser: number;
  maxAttempts: number;
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface DispatchResult {
  delivered: boolean;
  /** Intents included in the delivered email */
  notified: number;
  recorded: number;
  alreadyRecorded: number;
  persistFailures: number;
}

const NOTHING_SENT: DispatchResult = {
  delivered: false,
  notified: 0,
  recorded: 0,
  alreadyRecorded: 0,
  persistFailures: 0,
};

/**
 * Sends a user's match intents as one digest email, then records them.
 * Records are only written after delivery, so a failed send is retried by the
 * next run; a failed write after delivery may cause a repeat email, never a lost record.
 */
export class NotificationDispatcher {
  constructor(
    private store: MatchStore,
    private notifier: Notifier,
    private alerts: AlertChannel,
    private options: DispatcherOptions
  ) {}

  async dispatch(user: User, intents: MatchIntent[], ctx: RunContext): Promise<DispatchResult> {
    if (intents.length === 0) {
      return { ...NOTHING_SENT };
    }

    // Per-user limit; the remainder stays unmatched for the next run
    const batch = intents.slice(0, Math.max(0, this.options.maxNotificationsPerUser));
    if (batch.length === 0) {
      return { ...NOTHING_SENT };
    }
    const email = renderMatchEmail(user.name, batch);

    try {
      await withRetry(
        () => this.notifier.send({ to: user.email, ...email }),
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.retryDelayMs,
          sleep: this.options.sleep,
          shouldRetry: error => !(error instanceof NotificationDeliveryError) || error.retryable,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn(`Email delivery attempt ${attempt} failed, retrying`, {
              runId: ctx.runId,
              userId: user.id,
              delayMs,
              error,
            });
          },
        }
      );
    } catch (error) {
      await this.alerts.raise({
        kind: 'notification_delivery_failed',
        runId: ctx.runId,
        userId: user.id,
        message: `Could not deliver ${batch.length} match(es) to user ${user.id}`,
        details: { error: errorMessage(error), jobIds: batch.map(intent => intent.job.id) },
      });
      return { ...NOTHING_SENT };
    }

    const result: DispatchResult = {
      delivered: true,
      notified: batch.length,
      recorded: 0,
      alreadyRecorded: 0,
      persistFailures: 0,
    };

    const notifiedAt = new Date();
    for (const intent of batch) {
      try {
        await this.store.recordMatch({
          userId: user.id,
          jobId: intent.job.id,
          score: intent.score,
          notifiedAt,
          runId: ctx.runId,
        });
        result.recorded++;
      } catch (error) {
        if (error instanceof StoreConstraintViolation) {
          // Dedup held: the pair was recorded by an earlier or concurrent run
          result.alreadyRecorded++;
          continue;
        }
        result.persistFailures++;
        logger.error(`Failed to record match after delivery`, error, {
          runId: ctx.runId,
          userId: user.id,
          jobId: intent.job.id,
        });
      }
    }

    logger.info(`Sent ${batch.length} matches to user ${user.id}`, {
      runId: ctx.runId,
      recorded: result.recorded,
      alreadyRecorded: result.alreadyRecorded,
      persistFailures: result.persistFailures,
    });

    return result;
  }
}
