import { toTwilioSettings, type SettingsFile } from '../../config/settings';
import type { Logger } from '../../logging/logger';
import { createConsoleNotifier } from './console';
import { createTwilioNotifier } from './twilio';
import type { NotifierAdapter, NotifierProvider } from './types';

export interface NotifierFactoryContext {
  settings: SettingsFile;
  logger: Logger;
}

const factories: Record<NotifierProvider, (context: NotifierFactoryContext) => NotifierAdapter> = {
  twilio: ({ settings }) => createTwilioNotifier(toTwilioSettings(settings)),
  console: ({ logger }) => createConsoleNotifier(logger),
};

export function createNotifier(provider: NotifierProvider, context: NotifierFactoryContext): NotifierAdapter {
  return factories[provider](context);
}

export type { NotifierAdapter, NotifierProvider, SendResult } from './types';
