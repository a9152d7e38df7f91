import { buildAlertMessage } from './alert';
import { chunk } from './batch';
import { CONFIG, Config } from './config';
import { readUrls } from './input';
import defaultLogger, { Logger } from './logger';
import { incBatch, incMatches, incUrlsChecked } from './metrics';
import { sendTelegram } from './notifier';
import { findThreats } from './safeBrowsing';
import { RunSummary } from './types';

export interface RunScanOptions {
  config?: Config;
  logger?: Logger;
}

export function emptySummary(): RunSummary {
  return { totalChecked: 0, batches: 0, batchesWithMatches: 0, incompleteBatches: 0, totalMatches: 0, notificationsSent: 0 };
}

/** Cut `text` to at most `max` code points, never splitting a surrogate pair. */
export function truncateChars(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length <= max ? text : chars.slice(0, max).join('');
}

/**
 * One full pass over the configured domains file: batches are checked strictly in
 * order, each batch with matches produces one alert. Failed checks and failed
 * deliveries are counted, never thrown.
 */
export async function runScan(opts?: RunScanOptions): Promise<RunSummary> {
  const config = opts?.config ?? CONFIG;
  const logger = opts?.logger ?? defaultLogger;
  const summary = emptySummary();

  const urls = await readUrls(config.DOMAINS_FILE);
  if (urls.length === 0) {
    logger.info({ file: config.DOMAINS_FILE }, 'No URLs to check.');
    return summary;
  }

  for (const batch of chunk(urls, config.BATCH_SIZE)) {
    summary.batches++;
    summary.totalChecked += batch.length;
    incUrlsChecked(batch.length);

    const result = await findThreats(batch, { config, logger });

    if (result.matches.length > 0) {
      summary.batchesWithMatches++;
      summary.totalMatches += result.matches.length;
      incMatches(result.matches.length);
      incBatch('matched');

      const msg = buildAlertMessage(result.matches, batch.length, { maxUrls: config.ALERT.MAX_URLS });
      const delivered = await sendTelegram(msg, { config, logger });
      if (delivered === 'sent') summary.notificationsSent++;

      const detail = truncateChars(JSON.stringify(result.raw ?? result.matches), config.ALERT.LOG_DETAIL_CHARS);
      logger.info(`Matches: ${detail}`);
    } else if (!result.complete) {
      summary.incompleteBatches++;
      incBatch('incomplete');
      logger.warn({ reason: result.reason }, `Check incomplete for batch of ${batch.length}`);
    } else {
      incBatch('clean');
      logger.info(`No matches in batch of ${batch.length}`);
    }
  }

  logger.info({ summary }, `Finished. Total processed: ${summary.totalChecked}`);
  return summary;
}

export default runScan;
