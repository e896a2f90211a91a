import { Resend } from 'resend';
import { NotificationDeliveryError, errorMessage } from '../errors';
import { logger } from '../utils/logger';

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
  text: string;
}

/**
 * Delivers one email. Failure is signalled with NotificationDeliveryError.
 */
export interface Notifier {
  send(message: EmailMessage): Promise<void>;
}

/**
 * Sends through the Resend API
 */
export class ResendNotifier implements Notifier {
  private resend: Resend;

  constructor(
    apiKey: string,
    private from: string
  ) {
    this.resend = new Resend(apiKey);
  }

  async send(message: EmailMessage): Promise<void> {
    let result: Awaited<ReturnType<Resend['emails']['send']>>;
    try {
      result = await this.resend.emails.send({
        from: this.from,
        to: message.to,
        subject: message.subject,
        html: message.html,
        text: message.text,
      });
    } catch (error) {
      throw new NotificationDeliveryError(`Email send failed: ${errorMessage(error)}`, true, { cause: error });
    }

    if (result.error) {
      // Validation errors will not succeed on retry
      const retryable = result.error.name !== 'validation_error' && result.error.name !== 'missing_required_field';
      throw new NotificationDeliveryError(`Email send failed: ${result.error.message}`, retryable);
    }

    logger.info(`Email sent`, { to: message.to, subject: message.subject, id: result.data?.id });
  }
}

/**
 * Dry-run notifier: logs instead of sending
 */
export class LogNotifier implements Notifier {
  async send(message: EmailMessage): Promise<void> {
    logger.info(`Dry-run: email not sent`, { to: message.to, subject: message.subject });
  }
}

export function createNotifier(email: { resendApiKey?: string; from: string; dryRun: boolean }): Notifier {
  if (email.dryRun || !email.resendApiKey) {
    logger.warn('Email dry-run mode: notifications will be logged, not sent');
    return new LogNotifier();
  }
  return new ResendNotifier(email.resendApiKey, email.from);
}
