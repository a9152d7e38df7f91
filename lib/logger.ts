/**
 * Process-wide logger built on `pino`.
 *
 * One JSON line per event with an ISO timestamp and an upper-case level label,
 * written to stdout and appended to the configured log file. The default export
 * is created once at startup; components take a `logger` option so runs and
 * tests can hand in their own instance.
 */

import pino from 'pino';
import { CONFIG } from './config';

export type Logger = pino.Logger;

const LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_LABELS: Record<string, string> = { warn: 'WARNING' };

export function toLevel(value: string | undefined): pino.Level {
  return LEVELS.find((l) => l === value?.toLowerCase()) ?? 'info';
}

export interface CreateLoggerOptions {
  level?: string;
  /** Log file to append to, alongside stdout. */
  file?: string;
  /** Single destination replacing stdout + file (tests). */
  destination?: pino.DestinationStream;
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  const level = opts.level === 'silent' ? 'silent' : toLevel(opts.level);
  const options: pino.LoggerOptions = {
    level,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: LEVEL_LABELS[label] ?? label.toUpperCase() }),
    },
  };

  if (opts.destination) return pino(options, opts.destination);
  if (level === 'silent') return pino(options);

  const streams: pino.StreamEntry[] = [{ level, stream: process.stdout }];
  if (opts.file) {
    streams.push({ level, stream: pino.destination({ dest: opts.file, append: true, mkdir: true }) });
  }
  return pino(options, pino.multistream(streams));
}

const logger = createLogger(
  process.env.NODE_ENV === 'test'
    ? { level: 'silent' }
    : { level: CONFIG.LOG_LEVEL, file: CONFIG.LOGFILE },
);

export default logger;
