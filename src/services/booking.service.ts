import { DateTime } from 'luxon';
import { CalcomClient } from './calcom/calcom.client';
import { attendeeFor, BookingLookupService } from './lookup.service';
import {
  BookingRequest,
  BookingSettings,
  BookingSummary,
  CalBooking,
  CancelOutcome,
  CancelRequest,
  CreatedBooking,
  OperationFailure,
  OperationResult,
  RescheduleRequest,
  UserBookingView,
} from '../types/booking';
import {
  errorMessage,
  ExternalServiceError,
  failureKindOf,
  FailureKind,
  MissingRequiredFieldError,
  NotFoundError,
  RateLimitedError,
} from '../utils/errors';
import { classifyErrorMessage } from '../utils/errorRules';
import { isAllowedDuration, normalizeDuration } from '../utils/duration';
import { assertNotPast, resolveBookingWindow, resolveLocalDateTime, toZone } from '../utils/timeResolver';
import { logger } from '../utils/logger';

const DISPLAY_LOCALE = 'en-US';
const NO_VIDEO_LINK = 'No video call link provided';
const PAST_RESCHEDULE_MESSAGE =
  'Cannot reschedule a meeting to a past date and time. Please choose a future date and time.';

function fail(kind: FailureKind, message: string): OperationFailure {
  return { success: false, kind, message };
}

function failFrom(error: unknown, prefix?: string): OperationFailure {
  const message = prefix ? `${prefix}: ${errorMessage(error)}` : errorMessage(error);
  return fail(failureKindOf(error), message);
}

function videoCallUrl(metadata: Record<string, unknown> | null | undefined): string | null {
  const url = metadata?.videoCallUrl;
  return typeof url === 'string' && url.length > 0 ? url : null;
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim() === '';
}

/**
 * The four user-facing booking operations. Stateless between calls: every
 * operation re-reads what it needs from the booking API, and every failure
 * comes back as an OperationResult rather than an exception.
 */
export class BookingService {
  constructor(
    private client: CalcomClient,
    private lookup: BookingLookupService,
    private settings: BookingSettings,
    private now: () => DateTime = () => DateTime.now()
  ) {}

  async create(request: BookingRequest): Promise<OperationResult<BookingSummary>> {
    const { timezone, language, eventTypeId } = this.settings;
    const duration = normalizeDuration(request.duration);

    if (!isAllowedDuration(request.duration)) {
      logger.info('Requested duration normalized', { requested: request.duration, duration });
    }

    let start: DateTime;
    let end: DateTime;
    try {
      ({ start, end } = resolveBookingWindow(request.date, request.time, timezone, duration));
      assertNotPast(start, this.now());
    } catch (error) {
      return failFrom(error);
    }

    let created: CreatedBooking;
    try {
      created = await this.client.createBooking({
        start: start.toISO() ?? '',
        end: end.toISO() ?? '',
        eventTypeId,
        responses: {
          name: request.name,
          email: request.email,
          notes: request.reason,
        },
        timeZone: timezone,
        language,
        metadata: {},
      });
    } catch (error) {
      logger.warn('Booking creation failed', { email: request.email, error: errorMessage(error) });
      return this.explainCreateFailure(error, request, duration);
    }

    const display = (dt: DateTime) => dt.setLocale(DISPLAY_LOCALE);
    const summary: BookingSummary = {
      Date: display(start).toFormat('LLLL dd, yyyy'),
      Time: `${display(start).toFormat('hh:mm a')} to ${display(end).toFormat('hh:mm a')} (${timezone})`,
      Duration: `${duration} minutes`,
      Reason: request.reason,
      Name: request.name,
      Email: request.email,
      'Meeting Link': videoCallUrl(created.metadata) ?? NO_VIDEO_LINK,
    };

    return {
      success: true,
      message: `Booking created successfully. Booking details: ${JSON.stringify(summary, null, 2)}`,
      data: summary,
    };
  }

  async list(email: string): Promise<OperationResult<{ bookings: UserBookingView[]; count: number }>> {
    let bookings: CalBooking[];
    try {
      bookings = await this.lookup.getActiveBookings(email);
    } catch (error) {
      logger.warn('Listing bookings failed', { email, error: errorMessage(error) });
      return failFrom(error, 'Error fetching user bookings');
    }

    const views = bookings.map((booking) => this.toUserView(booking, email));

    if (views.length === 0) {
      return { success: true, message: `No bookings found for ${email}.`, data: { bookings: [], count: 0 } };
    }

    return {
      success: true,
      message: `Found ${views.length} bookings for ${email}. Booking details: ${JSON.stringify({ user_bookings: views }, null, 2)}`,
      data: { bookings: views, count: views.length },
    };
  }

  async cancel(request: CancelRequest): Promise<OperationResult<CancelOutcome>> {
    const { email, date, time, reason } = request;
    const slot = `${email} on ${date} at ${time}`;

    let booking: CalBooking | null;
    try {
      booking = await this.lookup.findBooking(email, date, time);
    } catch (error) {
      return failFrom(error, 'Error looking up booking');
    }

    if (!booking) {
      return failFrom(new NotFoundError(`No booking found for ${slot}`));
    }

    try {
      await this.client.cancelBooking(booking.id, reason);
    } catch (error) {
      logger.warn('Booking cancellation failed', { bookingId: booking.id, error: errorMessage(error) });
      return failFrom(error, 'Error cancelling booking');
    }

    const cleanup = await this.deleteReferenceFor(booking.id);

    switch (cleanup.outcome) {
      case 'deleted':
        return {
          success: true,
          message: `Successfully cancelled booking and deleted reference for ${slot}`,
          data: { bookingId: booking.id, referenceCleanup: 'deleted' },
        };
      case 'not_found':
        return {
          success: true,
          message: `Successfully cancelled booking for ${slot}, but no matching reference found to delete`,
          data: { bookingId: booking.id, referenceCleanup: 'not_found' },
        };
      case 'failed':
        return {
          success: true,
          message: `Booking cancelled but error deleting reference: ${cleanup.error}`,
          data: { bookingId: booking.id, referenceCleanup: 'failed' },
        };
    }
  }

  async reschedule(request: RescheduleRequest): Promise<OperationResult<Record<string, unknown>>> {
    const { email, currentDate, currentTime, newDate, newTime, newDuration } = request;

    if (isBlank(newDate) && isBlank(newTime) && newDuration === undefined) {
      return fail('VALIDATION', 'No new values provided for rescheduling');
    }

    let booking: CalBooking | null;
    try {
      booking = await this.lookup.findBooking(email, currentDate, currentTime);
    } catch (error) {
      return failFrom(error, 'Error looking up booking');
    }

    if (!booking) {
      return failFrom(new NotFoundError(`No booking found for ${email} on ${currentDate} at ${currentTime}`));
    }

    const timezone = attendeeFor(booking, email)?.timeZone ?? this.settings.timezone;
    const originalStart = toZone(booking.startTime, timezone);
    const originalEnd = toZone(booking.endTime, timezone);

    let start: DateTime;
    let end: DateTime;
    try {
      start =
        isBlank(newDate) && isBlank(newTime)
          ? originalStart
          : resolveLocalDateTime(newDate || currentDate, newTime || currentTime, timezone);

      end =
        newDuration !== undefined
          ? start.plus({ minutes: normalizeDuration(newDuration) })
          : start.plus(originalEnd.diff(originalStart));

      assertNotPast(start, this.now(), PAST_RESCHEDULE_MESSAGE);
    } catch (error) {
      return failFrom(error);
    }

    const changes = { startTime: start.toISO() ?? '', endTime: end.toISO() ?? '' };

    try {
      const updated = await this.client.updateBooking(booking.id, changes);
      logger.info('Booking rescheduled', { bookingId: booking.id, ...changes });
      return {
        success: true,
        message: `Booking rescheduled successfully. Updated booking details: ${JSON.stringify(updated)}`,
        data: updated,
      };
    } catch (error) {
      logger.warn('Booking reschedule failed', { bookingId: booking.id, error: errorMessage(error) });
      const body = error instanceof ExternalServiceError && error.responseBody ? ` (response: ${error.responseBody})` : '';
      return fail(failureKindOf(error), `Error rescheduling booking: ${errorMessage(error)}${body}`);
    }
  }

  private explainCreateFailure(
    error: unknown,
    request: BookingRequest,
    duration: number
  ): OperationResult<BookingSummary> {
    if (!(error instanceof ExternalServiceError) || error instanceof RateLimitedError) {
      return failFrom(error, 'Error creating booking');
    }

    const kind = classifyErrorMessage(error.message);

    switch (kind) {
      case 'INVALID_DURATION':
        return fail(
          kind,
          `The requested duration (${request.duration} minutes) is not valid. The closest valid duration (${duration} minutes) will be used instead.`
        );
      case 'PAST_INSTANT':
        return fail(kind, 'Cannot book a meeting in the past. Please choose a future date and time.');
      case 'MISSING_REQUIRED_FIELD': {
        const missing: string[] = [];
        if (isBlank(request.name)) missing.push('name');
        if (isBlank(request.email)) missing.push('email');
        if (isBlank(request.date) || isBlank(request.time)) missing.push('date and time');
        if (isBlank(request.reason)) missing.push('reason');

        if (missing.length > 0) {
          return fail(kind, new MissingRequiredFieldError(missing).message);
        }
        return fail('VALIDATION', 'Invalid input. Please check all provided information and try again.');
      }
      default:
        return fail(kind, `Error creating booking: ${error.message}`);
    }
  }

  private async deleteReferenceFor(
    bookingId: number
  ): Promise<{ outcome: 'deleted' | 'not_found' } | { outcome: 'failed'; error: string }> {
    try {
      const references = await this.client.listBookingReferences();
      const forBooking = references.filter((ref) => ref.bookingId === bookingId);
      const reference = forBooking.find((ref) => !ref.deleted) ?? forBooking[0];
      if (!reference) {
        logger.info('No booking reference to delete', { bookingId });
        return { outcome: 'not_found' };
      }

      await this.client.deleteBookingReference(reference.id);
      return { outcome: 'deleted' };
    } catch (error) {
      logger.warn('Booking reference cleanup failed', { bookingId, error: errorMessage(error) });
      return { outcome: 'failed', error: errorMessage(error) };
    }
  }

  private toUserView(booking: CalBooking, email: string): UserBookingView {
    const attendee = attendeeFor(booking, email);
    const timezone = attendee?.timeZone ?? 'UTC';
    const format = (iso: string) =>
      toZone(iso, timezone).setLocale(DISPLAY_LOCALE).toFormat('yyyy-MM-dd HH:mm:ss ZZZZ');

    return {
      startTime: format(booking.startTime),
      endTime: format(booking.endTime),
      description: booking.description ?? null,
      timezone: attendee?.timeZone ?? null,
      locale: attendee?.locale ?? null,
      videoCallUrl: videoCallUrl(booking.metadata),
    };
  }
}
