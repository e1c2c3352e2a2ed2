import twilio from 'twilio';
import type { TwilioSettings } from '../../config/settings';
import { describeError, NotificationError } from '../../errors';
import type { NotifierAdapter, SendResult } from './types';

export interface TwilioMessageCreateParams {
  from: string;
  to: string;
  body: string;
}

/** The part of the Twilio REST client used for sending SMS. */
export interface TwilioMessagesClient {
  messages: {
    create(params: TwilioMessageCreateParams): Promise<{ sid: string }>;
  };
}

export function createTwilioNotifier(
  settings: TwilioSettings,
  client: TwilioMessagesClient = twilio(settings.accountSid, settings.authToken),
): NotifierAdapter {
  return {
    provider: 'twilio',
    async send(recipient: string, message: string): Promise<SendResult> {
      try {
        const created = await client.messages.create({
          from: settings.fromNumber,
          to: recipient,
          body: message,
        });
        return { id: created.sid };
      } catch (error) {
        throw new NotificationError(`Failed to send SMS via Twilio: ${describeError(error)}`, recipient, {
          cause: error,
        });
      }
    },
  };
}
