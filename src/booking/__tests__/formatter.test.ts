import { describe, expect, it } from 'vitest';
import { buildNotificationMessage, createSlotFormatter, formatSlots } from '../formatter';
import { FIXTURE_SLOT } from '../parser';

describe('formatSlots', () => {
  it('renders the fixture slot in Los Angeles time', () => {
    expect(formatSlots([FIXTURE_SLOT], 'America/Los_Angeles')).toBe('Oct 22 11:00AM - 11:30AM');
  });

  it('honours offsets carried by the timestamps', () => {
    const slot = { start: '2024-10-22T09:00:00-07:00', end: '2024-10-22T09:30:00-07:00' };
    expect(formatSlots([slot], 'America/Los_Angeles')).toBe('Oct 22 09:00AM - 09:30AM');
  });

  it('rolls the date back when the local day differs from UTC', () => {
    const slot = { start: '2024-11-01T02:00:00Z', end: '2024-11-01T02:30:00Z' };
    expect(formatSlots([slot], 'America/Los_Angeles')).toBe('Oct 31 07:00PM - 07:30PM');
  });

  it('accepts seven digit fractional seconds', () => {
    const slot = { start: '2024-10-22T18:00:00.0000000', end: '2024-10-22T18:30:00.0000000' };
    expect(formatSlots([slot], 'America/Los_Angeles')).toBe('Oct 22 11:00AM - 11:30AM');
  });

  it('joins several slots with newlines in input order', () => {
    const slots = [
      { start: '2024-12-05T17:30:00Z', end: '2024-12-05T18:00:00Z' },
      { start: '2024-12-04T14:00:00Z', end: '2024-12-04T15:00:00Z' },
    ];
    expect(formatSlots(slots, 'America/New_York')).toBe('Dec 05 12:30PM - 01:00PM\nDec 04 09:00AM - 10:00AM');
  });

  it('returns the same text when formatting the same slot twice', () => {
    const format = createSlotFormatter('Europe/Berlin');
    expect(format(FIXTURE_SLOT)).toBe(format(FIXTURE_SLOT));
    expect(formatSlots([FIXTURE_SLOT], 'Europe/Berlin')).toBe(format(FIXTURE_SLOT));
  });

  it('throws on a timestamp that is not ISO 8601', () => {
    expect(() => formatSlots([{ start: 'tomorrow', end: 'later' }], 'UTC')).toThrow(RangeError);
  });
});

describe('buildNotificationMessage', () => {
  it('wraps the slot lines with a heading and the booking link', () => {
    expect(buildNotificationMessage('Oct 22 11:00AM - 11:30AM', 'https://bookings.test/book/a/s/b')).toBe(
      'Booking Slots Available!\n\nOct 22 11:00AM - 11:30AM\n\nGo to: https://bookings.test/book/a/s/b',
    );
  });
});
