import defaultLogger, { Logger } from '../logger';
import { errorMessage } from '../errors';
import { incRetries } from '../metrics';
import { fetchWithTimeout, sleep } from './timeout';

type Reply =
  | { transient: true; status: number }
  | { transient: false; status: number; body: string };

export const TRANSIENT_STATUSES: readonly number[] = [429, 500, 502, 503, 504];

export interface FetchRetryOptions {
  attempts?: number; // total attempts
  backoffMs?: number; // first backoff, doubled after every failure
  timeoutMs?: number; // per-request timeout
  retryStatuses?: readonly number[];
  logger?: Logger;
  label?: string;
}

export type FetchOutcome =
  | { ok: true; status: number; body: string; attempts: number }
  | { ok: false; reason: 'exhausted'; attempts: number; lastStatus?: number; error?: string };

/**
 * POST/GET with bounded exponential backoff.
 *
 * Network errors and `retryStatuses` responses sleep `backoff` and double it before
 * the next attempt, including after the final one (1+2+4+8+16+32 s for the
 * defaults). Any other response, successful or not, is handed back with its body
 * read as text; the per-attempt timeout covers the body read as well.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<FetchOutcome> {
  const attempts = opts?.attempts ?? 6;
  const timeoutMs = opts?.timeoutMs ?? 15_000;
  const retryStatuses = opts?.retryStatuses ?? TRANSIENT_STATUSES;
  const logger = opts?.logger ?? defaultLogger;
  const label = opts?.label ?? 'request';
  let backoff = opts?.backoffMs ?? 1_000;

  let lastStatus: number | undefined;
  let lastError: string | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    let reply: Reply;
    try {
      reply = await fetchWithTimeout<Reply>(url, init, timeoutMs, async (res) =>
        retryStatuses.includes(res.status)
          ? { transient: true, status: res.status }
          : { transient: false, status: res.status, body: await res.text() },
      );
    } catch (err) {
      lastError = errorMessage(err);
      lastStatus = undefined;
      logger.error({ attempt, backoffMs: backoff, err: lastError }, `${label} failed: ${lastError}`);
      incRetries();
      await sleep(backoff);
      backoff *= 2;
      continue;
    }

    if (reply.transient) {
      lastStatus = reply.status;
      lastError = undefined;
      logger.warn({ attempt, status: reply.status, backoffMs: backoff }, `Rate/server error ${reply.status}. Backoff ${backoff / 1000}s`);
      incRetries();
      await sleep(backoff);
      backoff *= 2;
      continue;
    }

    return { ok: true, status: reply.status, body: reply.body, attempts: attempt };
  }

  logger.error({ attempts, lastStatus, err: lastError }, `${label}: exceeded retries`);
  return { ok: false, reason: 'exhausted', attempts, lastStatus, error: lastError };
}

export default fetchWithRetry;
