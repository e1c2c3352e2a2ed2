import type { PollConfig } from '../config/settings';

export type BookingPageIdentity = Pick<PollConfig, 'bookingHost' | 'bookingIdentity' | 'bookingToken'>;

export interface BookingEndpoints {
  /** Public booking page; also the link sent to recipients. */
  sessionUrl: string;
  availabilityUrl: string;
}

export function buildBookingEndpoints(identity: BookingPageIdentity): BookingEndpoints {
  const base = `https://${identity.bookingHost}`;
  const mailbox = encodeURIComponent(identity.bookingIdentity).replace(/%40/g, '@');

  const availabilityUrl = new URL(
    `/BookingsService/api/V1/bookingBusinessesc2/${mailbox}/GetStaffAvailability`,
    base,
  );
  availabilityUrl.searchParams.set('app', 'BookingsC2');
  availabilityUrl.searchParams.set('n', '7');

  return {
    sessionUrl: `${base}/book/${mailbox}/s/${encodeURIComponent(identity.bookingToken)}`,
    availabilityUrl: availabilityUrl.toString(),
  };
}
