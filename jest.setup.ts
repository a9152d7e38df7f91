/**
 * Jest setup file.
 * Clear settings a developer shell may export so `CONFIG` loads its defaults.
 */

const SCRUBBED_ENV = [
  'GSB_API_KEY',
  'GSB_API_URL',
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
  'DOMAINS_FILE',
  'LOGFILE',
  'BATCH_SIZE',
  'CRON_SECRET',
  'REDIS_URL',
];

for (const name of SCRUBBED_ENV) {
  delete process.env[name];
}

export {};
