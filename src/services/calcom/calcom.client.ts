import { z } from 'zod';
import { RetryingTransport } from './retrying.transport';
import {
  bookingEnvelopeSchema,
  bookingReferenceListSchema,
  createdBookingSchema,
  updatedBookingSchema,
} from './calcom.schemas';
import {
  BookingReference,
  CalBooking,
  CreateBookingPayload,
  CreatedBooking,
} from '../../types/booking';
import { ExternalServiceError } from '../../utils/errors';
import { logger } from '../../utils/logger';

/**
 * Typed wrappers over the Cal.com v1 booking endpoints. Every call goes
 * through the retrying transport; response bodies are validated before
 * they reach the orchestration layer.
 */
export class CalcomClient {
  constructor(private transport: RetryingTransport) {}

  async createBooking(payload: CreateBookingPayload): Promise<CreatedBooking> {
    const body = await this.transport.request({ method: 'POST', path: '/bookings', body: payload });
    const booking = this.parse(createdBookingSchema, body, 'POST /bookings');
    logger.info('Booking created', { bookingId: booking.id, start: payload.start });
    return booking;
  }

  async getBooking(bookingId: number): Promise<CalBooking> {
    const body = await this.transport.request({ method: 'GET', path: `/bookings/${bookingId}` });
    return this.parse(bookingEnvelopeSchema, body, `GET /bookings/${bookingId}`).booking;
  }

  async listBookingReferences(): Promise<BookingReference[]> {
    const body = await this.transport.request({ method: 'GET', path: '/booking-references' });
    return this.parse(bookingReferenceListSchema, body, 'GET /booking-references').booking_references;
  }

  async cancelBooking(bookingId: number, cancellationReason?: string): Promise<void> {
    await this.transport.request({
      method: 'DELETE',
      path: `/bookings/${bookingId}/cancel`,
      query: { cancellationReason: cancellationReason || undefined },
    });
    logger.info('Booking cancelled', { bookingId });
  }

  async deleteBookingReference(referenceId: number): Promise<void> {
    await this.transport.request({ method: 'DELETE', path: `/booking-references/${referenceId}` });
    logger.info('Booking reference deleted', { referenceId });
  }

  /** Returns the API's updated booking record untouched. */
  async updateBooking(
    bookingId: number,
    changes: { startTime: string; endTime: string }
  ): Promise<Record<string, unknown>> {
    const body = await this.transport.request({
      method: 'PATCH',
      path: `/bookings/${bookingId}`,
      body: changes,
    });
    const updated = this.parse(updatedBookingSchema, body, `PATCH /bookings/${bookingId}`);
    logger.info('Booking updated', { bookingId, ...changes });
    return updated;
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, request: string): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ExternalServiceError(200, `Malformed response from ${request}: ${issues}`, JSON.stringify(body));
    }
    return result.data;
  }
}
