import { Logger } from '@nestjs/common';
import Redis from 'ioredis';

export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

const logger = new Logger('Redis');

/**
 * One command, one attempt: no per-command retries and no offline queue, so a
 * dead server surfaces as an error on the call instead of a stall.
 */
export function createRedis(url: string): Redis {
  const redis = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
  });
  // Connection errors; command failures still reject on the call.
  redis.on('error', (e: Error) => logger.warn(`connection error: ${e.message}`));
  return redis;
}
