import { CalcomClient } from './calcom/calcom.client';
import { CANCELLED_STATUS, PurgeReport } from '../types/booking';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export class ReconciliationService {
  constructor(private client: CalcomClient) {}

  /**
   * Delete every reference whose booking has been cancelled. One bad
   * reference does not stop the sweep; only failing to list references does.
   */
  async purgeCancelledReferences(): Promise<PurgeReport> {
    const references = await this.client.listBookingReferences();
    const report: PurgeReport = { scanned: references.length, removed: 0, failed: 0 };

    for (const reference of references) {
      if (typeof reference.bookingId !== 'number') continue;

      try {
        const booking = await this.client.getBooking(reference.bookingId);
        if (booking.status !== CANCELLED_STATUS) continue;

        await this.client.deleteBookingReference(reference.id);
        report.removed++;
      } catch (error) {
        report.failed++;
        logger.warn('Failed to purge booking reference', {
          referenceId: reference.id,
          bookingId: reference.bookingId,
          error: errorMessage(error),
        });
      }
    }

    logger.info('Cancelled booking references purged', { ...report });
    return report;
  }
}
