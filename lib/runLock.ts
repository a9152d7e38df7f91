/**
 * Guard against overlapping scans when runs are triggered over HTTP.
 *
 * With Redis configured the lock is `SET key token NX PX ttl`, released only by the
 * holder's token. Without Redis a module-level flag covers the single process.
 */

import { randomUUID } from 'crypto';
import { getRedisClient } from './redisAdapter';

const LOCK_KEY = 'threat-sentinel:run-lock';

const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;

export interface RunLock {
  token: string;
  release(): Promise<void>;
}

let localHolder: string | null = null;

/** Returns the lock, or `null` when another run holds it. */
export async function acquireRunLock(ttlMs: number): Promise<RunLock | null> {
  const token = randomUUID();
  const redis = await getRedisClient();

  if (redis) {
    const ok = await redis.set(LOCK_KEY, token, 'PX', ttlMs, 'NX');
    if (ok !== 'OK') return null;
    return {
      token,
      release: async () => {
        await redis.eval(RELEASE_SCRIPT, 1, LOCK_KEY, token);
      },
    };
  }

  if (localHolder) return null;
  localHolder = token;
  return {
    token,
    release: async () => {
      if (localHolder === token) localHolder = null;
    },
  };
}

/**
 * Run `fn` under the lock. Resolves `{ acquired: false }` without calling `fn`
 * when a run is already in progress.
 */
export async function withRunLock<T>(ttlMs: number, fn: () => Promise<T>): Promise<{ acquired: true; value: T } | { acquired: false }> {
  const lock = await acquireRunLock(ttlMs);
  if (!lock) return { acquired: false };
  try {
    return { acquired: true, value: await fn() };
  } finally {
    await lock.release();
  }
}

export default withRunLock;
