import { adaBooking, buildBookingStack } from '../helpers/bookingStack';
import { ExternalServiceError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('CalcomClient', () => {
  it('should unwrap a booking and default missing attendees', async () => {
    const { api, client } = buildBookingStack();
    api.addBooking(adaBooking());
    api.failNext('GET', '/bookings/77', 200, {
      booking: { id: 77, startTime: '2099-01-01T10:00:00Z', endTime: '2099-01-01T10:30:00Z' },
    });

    await expect(client.getBooking(10)).resolves.toMatchObject({ id: 10, status: 'ACCEPTED' });
    await expect(client.getBooking(77)).resolves.toMatchObject({ id: 77, attendees: [] });
  });

  it('should reject a response that does not look like a booking', async () => {
    const { api, client } = buildBookingStack();
    api.failNext('GET', '/bookings/5', 200, { booking: { id: 'five' } });

    const error = await client.getBooking(5).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({ status: 200 });
    expect(String(error)).toContain('Malformed response from GET /bookings/5');
  });

  it('should treat an empty reference listing as no references', async () => {
    const { api, client } = buildBookingStack();
    api.failNext('GET', '/booking-references', 200, {});

    await expect(client.listBookingReferences()).resolves.toEqual([]);
  });

  it('should omit a blank cancellation reason', async () => {
    const { api, client } = buildBookingStack();
    api.addBooking(adaBooking());

    await client.cancelBooking(10, '');

    const [request] = api.requestsMatching('DELETE', '/bookings/10/cancel');
    expect(request.query).toEqual({ apiKey: 'test-api-key' });
  });
});
