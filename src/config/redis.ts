import { createClient } from 'redis';
import { env } from './env';
import { logger } from '../utils/logger';
import { KeyValueClient } from '../services/conversation.store';

/** Null when REDIS_URL is unset; history then stays in process. */
export const redis = env.REDIS_URL ? createClient({ url: env.REDIS_URL }) : null;

if (redis) {
  redis.on('error', (err: Error) => {
    logger.error('Redis error', { error: err.message });
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });
}

export async function connectRedis(): Promise<void> {
  if (redis && !redis.isOpen) {
    await redis.connect();
  }
}

export async function checkRedisHealth(): Promise<{ status: string; error?: string }> {
  if (!redis) {
    return { status: 'disabled' };
  }
  try {
    await redis.ping();
    return { status: 'healthy' };
  } catch (error) {
    return { status: 'unhealthy', error: error instanceof Error ? error.message : String(error) };
  }
}

export function redisKeyValue(): KeyValueClient | null {
  const client = redis;
  if (!client) return null;

  return {
    get: (key) => client.get(key),
    set: (key, value, options) => client.set(key, value, options),
    del: (key) => client.del(key),
  };
}
