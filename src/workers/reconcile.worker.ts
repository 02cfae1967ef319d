import { Job, Worker } from 'bullmq';
import { connection, QUEUE_NAMES, ReferencePurgeJobData } from '../config/queue';
import { ReconciliationService } from '../services/reconciliation.service';
import { PurgeReport } from '../types/booking';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export async function processReferencePurge(
  job: Pick<Job<ReferencePurgeJobData>, 'id' | 'data'>,
  reconciler: ReconciliationService
): Promise<PurgeReport> {
  logger.info('Reference purge started', { jobId: job.id, trigger: job.data.trigger });

  try {
    const report = await reconciler.purgeCancelledReferences();
    logger.info('Reference purge completed', { jobId: job.id, ...report });
    return report;
  } catch (error) {
    logger.error('Reference purge failed', { jobId: job.id, error: errorMessage(error) });
    throw error;
  }
}

export function startReferencePurgeWorker(
  reconciler: ReconciliationService
): Worker<ReferencePurgeJobData, PurgeReport> | null {
  if (!connection) return null;

  const worker = new Worker<ReferencePurgeJobData, PurgeReport>(
    QUEUE_NAMES.MAINTENANCE,
    (job) => processReferencePurge(job, reconciler),
    { connection, concurrency: 1 }
  );

  worker.on('failed', (job, err) => {
    logger.error('Maintenance job failed', { jobId: job?.id, error: err.message });
  });

  return worker;
}
