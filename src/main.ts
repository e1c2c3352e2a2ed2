import type { Server } from 'node:http';
import { parseArgs } from 'node:util';
import { createNotifier, type NotifierAdapter } from './adapters/notifier';
import { env } from './config/env';
import { loadSettingsFile, toPollConfig, type LoadedSettings } from './config/settings';
import { describeError } from './errors';
import { createHttpClient } from './http/client';
import { createLogger } from './logging/logger';
import { createStatusApp } from './server/app';
import { createAvailabilityWatcher } from './watcher/watcher';

export const SERVICE_NAME = 'booking-slot-watcher';

// The booking page rejects requests without a browser user agent.
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.5735.90 Safari/537.36';

export const USAGE = `Usage: ${SERVICE_NAME} [options]

Options:
  --polling-interval <seconds>  Seconds to wait between checks (default: 60)
  --send-notification           Send a test notification instead of querying the booking page
  --once                        Run a single check and exit
  --config <file>               Configuration file to use (default: CONFIG_FILE or config.yaml)
  -h, --help                    Show this message`;

export interface CliOptions {
  pollingIntervalSeconds?: number;
  testMode: boolean;
  once: boolean;
  configFile?: string;
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      'polling-interval': { type: 'string' },
      'send-notification': { type: 'boolean', default: false },
      once: { type: 'boolean', default: false },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  let pollingIntervalSeconds: number | undefined;
  const rawInterval = values['polling-interval'];
  if (rawInterval !== undefined) {
    pollingIntervalSeconds = Number(rawInterval);
    if (!/^\d+$/.test(rawInterval.trim()) || !Number.isSafeInteger(pollingIntervalSeconds) || pollingIntervalSeconds <= 0) {
      throw new Error(`--polling-interval must be a positive whole number of seconds, got '${rawInterval}'`);
    }
  }

  return {
    pollingIntervalSeconds,
    testMode: values['send-notification'] ?? false,
    once: values.once ?? false,
    configFile: values.config,
    help: values.help ?? false,
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const logger = createLogger({ level: env.LOG_LEVEL });

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(`${describeError(error)}\n\n${USAGE}`);
    return 1;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let loaded: LoadedSettings;
  let notifier: NotifierAdapter;
  try {
    loaded = loadSettingsFile(options.configFile ?? env.CONFIG_FILE);
    notifier = createNotifier(env.NOTIFIER_PROVIDER, { settings: loaded.file, logger });
  } catch (error) {
    logger.error('config.invalid', { error: describeError(error) });
    return 1;
  }
  logger.info('config.loaded', { path: loaded.configPath, notifier: notifier.provider });

  const config = toPollConfig(loaded.file, {
    pollingIntervalSeconds: options.pollingIntervalSeconds,
    testMode: options.testMode,
  });

  const http = createHttpClient({
    timeoutMs: config.requestTimeoutMs,
    headers: { 'User-Agent': USER_AGENT },
    logger: logger.child('http'),
  });
  const watcher = createAvailabilityWatcher({ config, http, notifier, logger });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info('process.signal', { signal });
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  let server: Server | undefined;
  if (env.STATUS_PORT !== undefined) {
    const port = env.STATUS_PORT;
    server = createStatusApp({ serviceName: SERVICE_NAME, stats: watcher.stats, logger }).listen(port, () => {
      logger.info('server.listening', { url: `http://localhost:${port}` });
    });
  }

  try {
    await watcher.run({ signal: controller.signal, maxCycles: options.once ? 1 : undefined });
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    server?.close();
  }

  return 0;
}
