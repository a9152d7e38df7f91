/**
 * Prometheus metrics for scan runs using `prom-client`.
 *
 * Metrics:
 * - `threat_sentinel_urls_checked_total` (Counter)
 * - `threat_sentinel_batches_total{outcome}` (Counter) — clean | matched | incomplete
 * - `threat_sentinel_matches_total` (Counter)
 * - `threat_sentinel_retries_total` (Counter) — backoff sleeps against the threat API
 * - `threat_sentinel_notifications_total{outcome}` (Counter) — sent | failed | skipped
 *
 * `register.metrics()` is served by `app/api/metrics/route.ts`.
 */

import { Counter, register } from 'prom-client';

export type BatchOutcome = 'clean' | 'matched' | 'incomplete';
export type NotificationOutcome = 'sent' | 'failed' | 'skipped';

export const urlsCheckedTotal = new Counter({
  name: 'threat_sentinel_urls_checked_total',
  help: 'Total number of URLs submitted to the threat-matching API',
});

export const batchesTotal = new Counter({
  name: 'threat_sentinel_batches_total',
  help: 'Batches processed, by outcome',
  labelNames: ['outcome'],
});

export const matchesTotal = new Counter({
  name: 'threat_sentinel_matches_total',
  help: 'Threat matches reported by the API',
});

export const retriesTotal = new Counter({
  name: 'threat_sentinel_retries_total',
  help: 'Retries after a transient failure of an outbound request',
});

export const notificationsTotal = new Counter({
  name: 'threat_sentinel_notifications_total',
  help: 'Alert deliveries, by outcome',
  labelNames: ['outcome'],
});

export function incUrlsChecked(count = 1): void {
  urlsCheckedTotal.inc(count);
}

export function incBatch(outcome: BatchOutcome): void {
  batchesTotal.inc({ outcome });
}

export function incMatches(count = 1): void {
  if (count > 0) matchesTotal.inc(count);
}

export function incRetries(): void {
  retriesTotal.inc();
}

export function incNotification(outcome: NotificationOutcome): void {
  notificationsTotal.inc({ outcome });
}

export { register };
const metrics = { register, incUrlsChecked, incBatch, incMatches, incRetries, incNotification };
export default metrics;
