import type { NotifierAdapter } from '../adapters/notifier';
import { describeError, NotificationError } from '../errors';
import type { Logger } from '../logging/logger';

export interface DeliveryFailure {
  recipient: string;
  error: NotificationError;
}

export interface DeliverySummary {
  attempted: number;
  sent: number;
  failed: number;
  messageIds: string[];
  failures: DeliveryFailure[];
}

function toNotificationError(error: unknown, recipient: string): NotificationError {
  if (error instanceof NotificationError) {
    return error;
  }
  return new NotificationError(describeError(error), recipient, { cause: error });
}

/**
 * Send one message to every recipient in turn. A failed send is recorded and
 * the fan-out moves on; nothing is retried within the same call.
 */
export async function dispatchNotification(
  notifier: NotifierAdapter,
  recipients: readonly string[],
  message: string,
  logger: Logger,
): Promise<DeliverySummary> {
  const targets = recipients.map((recipient) => recipient.trim()).filter((recipient) => recipient.length > 0);
  const summary: DeliverySummary = { attempted: 0, sent: 0, failed: 0, messageIds: [], failures: [] };

  if (targets.length === 0) {
    logger.error('notify.no_recipients', { provider: notifier.provider });
    return summary;
  }

  for (const recipient of targets) {
    summary.attempted += 1;
    try {
      const result = await notifier.send(recipient, message);
      summary.sent += 1;
      summary.messageIds.push(result.id);
      logger.debug('notify.sent', { recipient, messageId: result.id });
    } catch (error) {
      const failure = toNotificationError(error, recipient);
      summary.failed += 1;
      summary.failures.push({ recipient, error: failure });
      logger.error('notify.failed', { recipient, error: failure.message });
    }
  }

  if (summary.failed > 0) {
    logger.warn('notify.partial_failure', { attempted: summary.attempted, failed: summary.failed });
  } else {
    logger.info('notify.complete', { sent: summary.sent });
  }

  return summary;
}
