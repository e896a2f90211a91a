import { describe, expect, it } from 'vitest';
import { CompositeAlertChannel, LogAlertChannel, OperationalAlert, createAlertChannel } from '../src/services/alerts';
import { LogNotifier, ResendNotifier, createNotifier } from '../src/services/notifier';
import { RecordingAlertChannel } from './fakes/fakes';

const alert: OperationalAlert = {
  kind: 'notification_delivery_failed',
  runId: 'run-1',
  userId: 7,
  message: 'Could not deliver 1 match(es) to user 7',
};

describe('alert channels', () => {
  it('fans out to every channel', async () => {
    const first = new RecordingAlertChannel();
    const second = new RecordingAlertChannel();

    await new CompositeAlertChannel([first, second]).raise(alert);

    expect(first.alerts).toEqual([alert]);
    expect(second.alerts).toEqual([alert]);
  });

  it('logs only when no webhook is configured', () => {
    expect(createAlertChannel()).toBeInstanceOf(LogAlertChannel);
    expect(createAlertChannel('https://hooks.example.com/alerts')).toBeInstanceOf(CompositeAlertChannel);
  });
});

describe('createNotifier', () => {
  it('logs instead of sending in dry-run mode', () => {
    expect(createNotifier({ from: 'alerts@example.com', dryRun: true, resendApiKey: 'test-key' })).toBeInstanceOf(
      LogNotifier
    );
  });

  it('uses Resend when a key is configured', () => {
    expect(createNotifier({ from: 'alerts@example.com', dryRun: false, resendApiKey: 're_test_key' })).toBeInstanceOf(
      ResendNotifier
    );
  });
});
