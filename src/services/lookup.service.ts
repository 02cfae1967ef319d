import { CalcomClient } from './calcom/calcom.client';
import { Attendee, BookingReference, CalBooking, CANCELLED_STATUS } from '../types/booking';
import { localMinuteKey, requestedMinuteKey, toZone } from '../utils/timeResolver';
import { logger } from '../utils/logger';

export function sameEmail(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * The requesting user's own attendee record, or the first attendee when the
 * user is not listed.
 */
export function attendeeFor(booking: CalBooking, email: string): Attendee | undefined {
  return booking.attendees.find((a) => sameEmail(a.email, email)) ?? booking.attendees[0];
}

function isLiveReference(ref: BookingReference): ref is BookingReference & { bookingId: number } {
  return typeof ref.bookingId === 'number' && !ref.deleted;
}

export class BookingLookupService {
  constructor(private client: CalcomClient) {}

  /**
   * The booking API has no per-attendee listing, so the user's bookings are
   * rebuilt from the reference records: one detail fetch per distinct booking.
   */
  async getActiveBookings(email: string): Promise<CalBooking[]> {
    const references = await this.client.listBookingReferences();
    const bookingIds = [...new Set(references.filter(isLiveReference).map((ref) => ref.bookingId))];

    const bookings: CalBooking[] = [];
    for (const bookingId of bookingIds) {
      const booking = await this.client.getBooking(bookingId);
      if (booking.status === CANCELLED_STATUS) continue;
      if (!booking.attendees.some((a) => sameEmail(a.email, email))) continue;
      bookings.push(booking);
    }

    logger.debug('Active bookings resolved', {
      email,
      references: references.length,
      candidates: bookingIds.length,
      matched: bookings.length,
    });

    return bookings;
  }

  /**
   * Match on the booking's start as the attendee sees it on their own clock,
   * to the minute. Returns null both when the user has no bookings and when
   * none of them starts at that local time.
   */
  async findBooking(email: string, date: string, time: string): Promise<CalBooking | null> {
    const target = requestedMinuteKey(date, time);
    const bookings = await this.getActiveBookings(email);

    for (const booking of bookings) {
      const timezone = attendeeFor(booking, email)?.timeZone ?? 'UTC';
      const localStart = localMinuteKey(toZone(booking.startTime, timezone));
      if (localStart === target) {
        logger.debug('Booking matched', { bookingId: booking.id, target, timezone });
        return booking;
      }
    }

    logger.info('No booking matched requested slot', { email, target, candidates: bookings.length });
    return null;
  }
}
