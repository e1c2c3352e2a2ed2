import type { Logger } from '../../logging/logger';
import type { NotifierAdapter, SendResult } from './types';

function createMessageId(): string {
  return `console_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Dry-run notifier: writes the message to the log instead of texting it.
 */
export function createConsoleNotifier(logger: Logger): NotifierAdapter {
  return {
    provider: 'console',
    async send(recipient: string, message: string): Promise<SendResult> {
      const id = createMessageId();
      logger.info('notifier.console.message', { id, recipient, message });
      return { id };
    },
  };
}
