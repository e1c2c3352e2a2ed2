import { z } from 'zod';
import { describeError, ValidationError } from '../errors';
import { parseUpstreamTimestamp } from './timestamps';

export const STATUS_BUSY = 'BOOKINGSAVAILABILITYSTATUS_BUSY';
export const STATUS_OUT_OF_OFFICE = 'BOOKINGSAVAILABILITYSTATUS_OUT_OF_OFFICE';

export const EXCLUDED_STATUSES: ReadonlySet<string> = new Set([STATUS_BUSY, STATUS_OUT_OF_OFFICE]);

export interface Slot {
  start: string;
  end: string;
}

/** Injected in test mode so the notification path runs without the upstream. */
export const FIXTURE_SLOT: Readonly<Slot> = Object.freeze({
  start: '2024-10-22T18:00:00',
  end: '2024-10-22T18:30:00',
});

const availabilityItemSchema = z
  .object({
    status: z.string().nullish(),
    // Read only for bookable items, after the status check.
    startDateTime: z.unknown(),
    endDateTime: z.unknown(),
  })
  .passthrough();

const staffAvailabilitySchema = z
  .object({
    availabilityItems: z.array(availabilityItemSchema, {
      required_error: "Missing 'availabilityItems' in staff data.",
      invalid_type_error: "'availabilityItems' must be a list.",
    }),
  })
  .passthrough();

const availabilityResponseSchema = z
  .object({
    staffAvailabilityResponse: z
      .array(staffAvailabilitySchema, {
        required_error: "Missing 'staffAvailabilityResponse' in response.",
        invalid_type_error: "'staffAvailabilityResponse' must be a list.",
      })
      .min(1, "Missing 'staffAvailabilityResponse' in response."),
  })
  .passthrough();

export type AvailabilityItem = z.infer<typeof availabilityItemSchema>;
export type RawAvailabilityResponse = z.infer<typeof availabilityResponseSchema>;

export interface ParseOptions {
  testMode?: boolean;
  excludedStatuses?: ReadonlySet<string>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function readDateTime(field: unknown, label: string, location: string): string | undefined {
  if (field === null || field === undefined) {
    return undefined;
  }
  if (typeof field !== 'object') {
    throw new ValidationError(`Invalid '${label}' in item ${location}: expected an object with dateTime.`);
  }
  if (!('dateTime' in field)) {
    return undefined;
  }
  const { dateTime } = field;
  if (dateTime === null || dateTime === undefined) {
    return undefined;
  }
  if (typeof dateTime !== 'string') {
    throw new ValidationError(`Invalid '${label}' in item ${location}: dateTime must be a string.`);
  }
  return dateTime;
}

function requireTimestamp(field: unknown, label: string, location: string): string {
  const value = readDateTime(field, label, location);
  if (!value || !value.trim()) {
    throw new ValidationError(`Missing '${label}' in item ${location}.`);
  }
  if (!parseUpstreamTimestamp(value)) {
    throw new ValidationError(`Invalid '${label}' in item ${location}: ${value}`);
  }
  return value;
}

/**
 * Extract bookable slots from an availability response.
 *
 * Any structural problem fails the whole response; offending staff entries or
 * items are never skipped. Output keeps upstream staff-then-item order.
 */
export function parseAvailability(raw: unknown, options: ParseOptions = {}): Slot[] {
  if (options.testMode) {
    return [{ ...FIXTURE_SLOT }];
  }

  const excluded = options.excludedStatuses ?? EXCLUDED_STATUSES;
  const parsed = availabilityResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(describeIssues(parsed.error));
  }

  const slots: Slot[] = [];

  parsed.data.staffAvailabilityResponse.forEach((staff, staffIndex) => {
    staff.availabilityItems.forEach((item, itemIndex) => {
      if (item.status && excluded.has(item.status)) {
        return;
      }

      const location = `${staffIndex}.${itemIndex}`;
      const start = requireTimestamp(item.startDateTime, 'startDateTime', location);
      const end = requireTimestamp(item.endDateTime, 'endDateTime', location);
      slots.push({ start, end });
    });
  });

  return slots;
}

export function parseAvailabilityJson(body: string, options: ParseOptions = {}): Slot[] {
  let document: unknown;
  try {
    document = JSON.parse(body);
  } catch (error) {
    throw new ValidationError(`Failed to parse JSON response: ${describeError(error)}`, { cause: error });
  }
  return parseAvailability(document, options);
}
