// Centralized runtime configuration for the Safe Browsing scan.
// Values are read from env with sane defaults and can be overridden in tests.

import { ConfigError } from './errors';

type Env = Record<string, string | undefined>;

function envInt(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function envStr(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

export function loadConfig(env: Env = process.env) {
  return {
    DOMAINS_FILE: envStr(env, 'DOMAINS_FILE') ?? 'domains.txt',
    LOGFILE: envStr(env, 'LOGFILE') ?? 'safebrowse.log',
    LOG_LEVEL: envStr(env, 'LOG_LEVEL') ?? 'info',
    BATCH_SIZE: envInt(env, 'BATCH_SIZE', 500),

    SAFE_BROWSING: {
      API_KEY: envStr(env, 'GSB_API_KEY'),
      API_URL: envStr(env, 'GSB_API_URL') ?? 'https://safebrowsing.googleapis.com/v4/threatMatches:find',
      CLIENT_ID: 'threat-sentinel',
      CLIENT_VERSION: '1.0',
      TIMEOUT_MS: envInt(env, 'GSB_TIMEOUT_MS', 15_000),
      MAX_ATTEMPTS: envInt(env, 'GSB_MAX_ATTEMPTS', 6),
      BACKOFF_MS: envInt(env, 'GSB_BACKOFF_MS', 1_000),
    },

    TELEGRAM: {
      BOT_TOKEN: envStr(env, 'TELEGRAM_BOT_TOKEN'),
      CHAT_ID: envStr(env, 'TELEGRAM_CHAT_ID'),
      API_BASE: envStr(env, 'TELEGRAM_API_BASE') ?? 'https://api.telegram.org',
      TIMEOUT_MS: envInt(env, 'TELEGRAM_TIMEOUT_MS', 10_000),
    },

    ALERT: {
      MAX_URLS: envInt(env, 'ALERT_MAX_URLS', 20),
      LOG_DETAIL_CHARS: 2000,
    },

    CRON_SECRET: envStr(env, 'CRON_SECRET'),
    RUN_LOCK_TTL_MS: envInt(env, 'RUN_LOCK_TTL_MS', 1000 * 60 * 15), // 15m
  };
}

export type Config = ReturnType<typeof loadConfig>;

export const CONFIG: Config = loadConfig();

/**
 * Returns the Safe Browsing API key or throws `ConfigError` when it is unset.
 * Callers must check this before doing any work.
 */
export function requireApiKey(config: Config = CONFIG): string {
  const key = config.SAFE_BROWSING.API_KEY;
  if (!key) {
    throw new ConfigError('GSB_API_KEY', 'Set GSB_API_KEY environment variable and re-run.');
  }
  return key;
}

export default CONFIG;
