import type { NotifierAdapter } from '../adapters/notifier';
import { buildBookingEndpoints } from '../booking/endpoints';
import { buildNotificationMessage, formatSlots } from '../booking/formatter';
import { parseAvailability, parseAvailabilityJson, type Slot } from '../booking/parser';
import { buildAvailabilityRequest } from '../booking/payload';
import type { PollConfig } from '../config/settings';
import { describeError, UpstreamStatusError, WatcherError } from '../errors';
import { excerpt, type HttpClient, type HttpResponse } from '../http/client';
import type { Logger } from '../logging/logger';
import { dispatchNotification } from '../notifications/dispatch';
import { createCycleStats, type CycleStats } from './stats';
import type { CycleOutcome, FailureStage } from './types';

export type AbortableSleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface WatcherDependencies {
  config: PollConfig;
  http: HttpClient;
  notifier: NotifierAdapter;
  logger: Logger;
  stats?: CycleStats;
  now?: () => Date;
  sleep?: AbortableSleep;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Stop after this many cycles instead of polling until aborted. */
  maxCycles?: number;
}

export interface AvailabilityWatcher {
  runCycle(): Promise<CycleOutcome>;
  run(options?: RunOptions): Promise<void>;
  readonly stats: CycleStats;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export const sleepUnlessAborted: AbortableSleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener('abort', finish, { once: true });
  });

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

export function createAvailabilityWatcher(deps: WatcherDependencies): AvailabilityWatcher {
  const { config, http, notifier } = deps;
  const logger = deps.logger.child('watcher');
  const stats = deps.stats ?? createCycleStats();
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? sleepUnlessAborted;
  const endpoints = buildBookingEndpoints(config);

  function fail(stage: FailureStage, error: unknown): CycleOutcome {
    const failure = toError(error);
    logger.error(`${stage}.failed`, {
      kind: failure instanceof WatcherError ? failure.kind : 'unknown',
      error: failure.message,
      ...(failure instanceof UpstreamStatusError ? { status: failure.status, body: failure.bodyExcerpt } : {}),
    });
    return { status: 'failed', stage, error: failure };
  }

  function requireOk(response: HttpResponse, url: string): void {
    if (response.status !== 200) {
      throw new UpstreamStatusError(url, response.status, excerpt(response.body));
    }
  }

  async function fetchSlots(): Promise<Slot[] | CycleOutcome> {
    try {
      requireOk(await http.get(endpoints.sessionUrl), endpoints.sessionUrl);
    } catch (error) {
      return fail('session', error);
    }
    logger.info('session.ok');

    const request = buildAvailabilityRequest(now(), config);
    let response: HttpResponse;
    try {
      response = await http.postJson(endpoints.availabilityUrl, request.body);
      requireOk(response, endpoints.availabilityUrl);
    } catch (error) {
      return fail('availability', error);
    }
    logger.info('availability.ok', {
      windowStart: request.body.startDateTime.dateTime,
      windowEnd: request.body.endDateTime.dateTime,
    });
    logger.debug('availability.response', { body: excerpt(response.body) });

    try {
      return parseAvailabilityJson(response.body);
    } catch (error) {
      return fail('parse', error);
    }
  }

  async function executeCycle(): Promise<CycleOutcome> {
    let slots: Slot[];
    if (config.testMode) {
      logger.info('cycle.test_mode');
      slots = parseAvailability(undefined, { testMode: true });
    } else {
      const fetched = await fetchSlots();
      if (!Array.isArray(fetched)) {
        return fetched;
      }
      slots = fetched;
    }

    if (slots.length === 0) {
      logger.info('cycle.no_slots');
      return { status: 'no_slots' };
    }

    logger.info('cycle.slots_found', { count: slots.length });
    const message = buildNotificationMessage(formatSlots(slots, config.displayTimeZone), endpoints.sessionUrl);
    const delivery = await dispatchNotification(notifier, config.recipients, message, logger);
    return { status: 'notified', slots, delivery };
  }

  async function runCycle(): Promise<CycleOutcome> {
    let outcome: CycleOutcome;
    try {
      outcome = await executeCycle();
    } catch (error) {
      outcome = fail('unexpected', error);
    }
    stats.record(outcome);
    return outcome;
  }

  async function run(options: RunOptions = {}): Promise<void> {
    const { signal, maxCycles } = options;
    const intervalMs = config.pollingIntervalSeconds * 1000;
    let cycles = 0;

    logger.info('started', {
      pollingIntervalSeconds: config.pollingIntervalSeconds,
      testMode: config.testMode,
      staffCount: config.staffIds.length,
    });

    while (!signal?.aborted) {
      await runCycle();
      cycles += 1;
      if (signal?.aborted || (maxCycles !== undefined && cycles >= maxCycles)) {
        break;
      }
      logger.info('cycle.waiting', { seconds: config.pollingIntervalSeconds });
      await sleep(intervalMs, signal);
    }

    logger.info('stopped', { cycles });
  }

  return { runCycle, run, stats };
}
