/**
 * Optional Redis connection using `ioredis`.
 *
 * `getRedisClient()` returns a connected singleton when `REDIS_URL` is set, or `null`
 * when it is unset or the first ping fails. Callers fall back to in-process state.
 */

import Redis from 'ioredis';
import { errorMessage } from './errors';
import logger from './logger';

let client: Redis | null = null;

export async function getRedisClient(): Promise<Redis | null> {
  if (client) return client;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  const candidate = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });

  try {
    await candidate.connect();
    await candidate.ping();
    client = candidate;
    return client;
  } catch (err) {
    candidate.disconnect();
    logger.warn({ err: errorMessage(err) }, 'Redis not available, falling back to in-process lock');
    return null;
  }
}

export default getRedisClient;
