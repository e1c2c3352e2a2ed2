import type { PollConfig } from '../config/settings';

const DAY_MS = 24 * 60 * 60 * 1000;
const WINDOW_LEAD_DAYS = 1;
const WINDOW_LENGTH_DAYS = 12;

export interface AvailabilityWindow {
  start: Date;
  end: Date;
}

export interface LabelledDateTime {
  dateTime: string;
  timeZone: string;
}

export interface AvailabilityRequestBody {
  serviceId: string;
  staffIds: string[];
  startDateTime: LabelledDateTime;
  endDateTime: LabelledDateTime;
}

export interface AvailabilityRequest {
  window: AvailabilityWindow;
  body: AvailabilityRequestBody;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Window starts at UTC midnight one day before `now` and spans twelve days.
 */
export function computeAvailabilityWindow(now: Date): AvailabilityWindow {
  const start = startOfUtcDay(new Date(now.getTime() - WINDOW_LEAD_DAYS * DAY_MS));
  const end = new Date(start.getTime() + WINDOW_LENGTH_DAYS * DAY_MS);
  return { start, end };
}

export function formatWindowBoundary(date: Date): string {
  return `${date.toISOString().slice(0, 10)}T00:00:00`;
}

export function buildAvailabilityRequest(
  now: Date,
  config: Pick<PollConfig, 'serviceId' | 'staffIds' | 'labelTimeZone'>,
): AvailabilityRequest {
  const window = computeAvailabilityWindow(now);

  return {
    window,
    body: {
      serviceId: config.serviceId,
      staffIds: [...config.staffIds],
      startDateTime: {
        dateTime: formatWindowBoundary(window.start),
        timeZone: config.labelTimeZone,
      },
      endDateTime: {
        dateTime: formatWindowBoundary(window.end),
        timeZone: config.labelTimeZone,
      },
    },
  };
}
