import type { Slot } from './parser';
import { parseUpstreamTimestamp } from './timestamps';

const PART_NAMES = ['month', 'day', 'hour', 'minute', 'dayPeriod'] as const;

type PartName = (typeof PART_NAMES)[number];

export type SlotFormatter = (slot: Slot) => string;

function isPartName(type: string): type is PartName {
  return PART_NAMES.some((name) => name === type);
}

function readParts(formatter: Intl.DateTimeFormat, date: Date): Record<PartName, string> {
  const parts: Record<PartName, string> = { month: '', day: '', hour: '', minute: '', dayPeriod: '' };
  for (const part of formatter.formatToParts(date)) {
    if (isPartName(part.type)) {
      parts[part.type] = part.value;
    }
  }
  return parts;
}

function toDate(value: string): Date {
  const date = parseUpstreamTimestamp(value);
  if (!date) {
    throw new RangeError(`Slot timestamp is not ISO 8601: ${value}`);
  }
  return date;
}

/**
 * Build a formatter rendering slots as `Oct 22 11:00AM - 11:30AM` in the
 * given time zone.
 */
export function createSlotFormatter(timeZone: string): SlotFormatter {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  });

  return (slot) => {
    const start = readParts(formatter, toDate(slot.start));
    const end = readParts(formatter, toDate(slot.end));
    return (
      `${start.month} ${start.day} ${start.hour}:${start.minute}${start.dayPeriod.toUpperCase()}` +
      ` - ${end.hour}:${end.minute}${end.dayPeriod.toUpperCase()}`
    );
  };
}

export function formatSlots(slots: readonly Slot[], timeZone: string): string {
  const format = createSlotFormatter(timeZone);
  return slots.map(format).join('\n');
}

export function buildNotificationMessage(formattedSlots: string, bookingUrl: string): string {
  return `Booking Slots Available!\n\n${formattedSlots}\n\nGo to: ${bookingUrl}`;
}
