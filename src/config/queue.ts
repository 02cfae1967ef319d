import { ConnectionOptions, Queue } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  MAINTENANCE: 'booking-maintenance',
} as const;

export const JOB_NAMES = {
  PURGE_REFERENCES: 'purge-cancelled-references',
} as const;

export interface ReferencePurgeJobData {
  trigger: 'schedule' | 'manual';
}

export function redisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : undefined;

  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username || undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: db !== undefined && Number.isInteger(db) ? db : undefined,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}

export const connection = env.REDIS_URL ? redisConnection(env.REDIS_URL) : null;

let maintenanceQueue: Queue<ReferencePurgeJobData> | null = null;

export function getMaintenanceQueue(): Queue<ReferencePurgeJobData> | null {
  if (!connection) return null;
  if (!maintenanceQueue) {
    maintenanceQueue = new Queue<ReferencePurgeJobData>(QUEUE_NAMES.MAINTENANCE, { connection });
  }
  return maintenanceQueue;
}

export async function scheduleReferencePurge(pattern: string = env.RECONCILE_CRON): Promise<void> {
  const queue = getMaintenanceQueue();
  if (!queue) {
    logger.info('Scheduled reference purge disabled (no REDIS_URL)');
    return;
  }

  try {
    await queue.add(
      JOB_NAMES.PURGE_REFERENCES,
      { trigger: 'schedule' },
      {
        repeat: { pattern },
        jobId: JOB_NAMES.PURGE_REFERENCES,
        attempts: 3,
        backoff: { type: 'exponential', delay: 60_000 },
        removeOnComplete: 100,
        removeOnFail: 500,
      }
    );
    logger.info('Reference purge scheduled', { pattern });
  } catch (error) {
    logger.warn('Failed to schedule reference purge', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
