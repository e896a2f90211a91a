import fetch from 'node-fetch';
import { errorMessage } from '../errors';
import { logger } from '../utils/logger';

export interface OperationalAlert {
  kind: 'notification_delivery_failed';
  runId: string;
  userId: number;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Escalation path for failures that exhausted their retries
 */
export interface AlertChannel {
  raise(alert: OperationalAlert): Promise<void>;
}

export class LogAlertChannel implements AlertChannel {
  async raise(alert: OperationalAlert): Promise<void> {
    logger.error(`ALERT: ${alert.message}`, undefined, {
      alert: alert.kind,
      runId: alert.runId,
      userId: alert.userId,
      ...alert.details,
    });
  }
}

/**
 * Posts alerts as JSON to a webhook. A failing webhook is logged, never thrown.
 */
export class WebhookAlertChannel implements AlertChannel {
  constructor(
    private url: string,
    private timeoutMs = 5000
  ) {}

  async raise(alert: OperationalAlert): Promise<void> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(alert),
        timeout: this.timeoutMs,
      });
      if (!response.ok) {
        logger.warn(`Alert webhook returned ${response.status}`, { alert: alert.kind, runId: alert.runId });
      }
    } catch (error) {
      logger.warn(`Alert webhook failed`, { alert: alert.kind, runId: alert.runId, error: errorMessage(error) });
    }
  }
}

/**
 * Fans an alert out to every channel
 */
export class CompositeAlertChannel implements AlertChannel {
  constructor(private channels: AlertChannel[]) {}

  async raise(alert: OperationalAlert): Promise<void> {
    await Promise.all(this.channels.map(channel => channel.raise(alert)));
  }
}

export function createAlertChannel(webhookUrl?: string): AlertChannel {
  const channels: AlertChannel[] = [new LogAlertChannel()];
  if (webhookUrl) {
    channels.push(new WebhookAlertChannel(webhookUrl));
  }
  return channels.length === 1 ? channels[0] : new CompositeAlertChannel(channels);
}
