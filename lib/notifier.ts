import { CONFIG, Config } from './config';
import { errorMessage } from './errors';
import defaultLogger, { Logger } from './logger';
import { incNotification, NotificationOutcome } from './metrics';
import { fetchWithTimeout, readText } from './net/timeout';

export interface NotifyOptions {
  config?: Config;
  logger?: Logger;
}

export function isTelegramConfigured(config: Config = CONFIG): boolean {
  return Boolean(config.TELEGRAM.BOT_TOKEN && config.TELEGRAM.CHAT_ID);
}

/**
 * Deliver an HTML message through the Telegram Bot API `sendMessage` method.
 * Delivery problems are logged and reported through the returned outcome; this
 * never throws.
 */
export async function sendTelegram(text: string, opts?: NotifyOptions): Promise<NotificationOutcome> {
  const config = opts?.config ?? CONFIG;
  const logger = opts?.logger ?? defaultLogger;
  const { BOT_TOKEN, CHAT_ID, API_BASE, TIMEOUT_MS } = config.TELEGRAM;

  if (!BOT_TOKEN || !CHAT_ID) {
    logger.info('Telegram not configured.');
    incNotification('skipped');
    return 'skipped';
  }

  const payload = {
    chat_id: CHAT_ID,
    text,
    disable_web_page_preview: true,
    parse_mode: 'HTML',
  };

  let outcome: NotificationOutcome;
  try {
    const res = await fetchWithTimeout(
      `${API_BASE}/bot${BOT_TOKEN}/sendMessage`,
      { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(payload) },
      TIMEOUT_MS,
      readText,
    );
    if (res.status >= 400) {
      logger.error({ status: res.status }, `Telegram error ${res.status}: ${res.body.slice(0, 200)}`);
      outcome = 'failed';
    } else {
      logger.info('Telegram notified.');
      outcome = 'sent';
    }
  } catch (err) {
    logger.error({ err: errorMessage(err) }, `Telegram exception: ${errorMessage(err)}`);
    outcome = 'failed';
  }

  incNotification(outcome);
  return outcome;
}

export default sendTelegram;
