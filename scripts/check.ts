#!/usr/bin/env node
/**
 * One scan from the command line, for a CI cron job.
 * Exits 1 only when GSB_API_KEY is missing; match and delivery failures are logged.
 */

import { CONFIG, requireApiKey } from '../lib/config';
import { ConfigError } from '../lib/errors';
import logger from '../lib/logger';
import { runScan } from '../lib/scan';

export async function main(): Promise<number> {
  try {
    requireApiKey(CONFIG);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error({ setting: err.setting }, err.message);
      return 1;
    }
    throw err;
  }

  await runScan({ config: CONFIG, logger });
  return 0;
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'scan crashed');
      process.exitCode = 1;
    },
  );
}
